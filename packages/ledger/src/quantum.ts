/**
 * @starkexit/ledger: Quantum arithmetic.
 *
 * The source exchange stores balances in quanta; the destination ledger
 * pays out in base units of the token:
 *
 *   destinationAmount = quantizedAmount * quantum
 *
 * Rules:
 * - bigint only, no floating point
 * - Results must fit a uint256 (the destination ledger's amount width)
 */

import { QUANTUM_UPPER_BOUND, UINT256_MAX } from "@starkexit/types";
import { LedgerError } from "./types.js";

export function isValidQuantum(quantum: bigint): boolean {
  return quantum >= 1n && quantum < QUANTUM_UPPER_BOUND;
}

/**
 * Scale a quantized balance to a destination-ledger amount.
 *
 * @throws LedgerError INVALID_QUANTUM or AMOUNT_OVERFLOW
 */
export function toDestinationAmount(quantizedAmount: bigint, quantum: bigint): bigint {
  if (!isValidQuantum(quantum)) {
    throw new LedgerError("INVALID_QUANTUM", `Invalid quantum: ${quantum}`);
  }
  const amount = quantizedAmount * quantum;
  if (amount > UINT256_MAX) {
    throw new LedgerError(
      "AMOUNT_OVERFLOW",
      `${quantizedAmount} × ${quantum} does not fit in a uint256`,
    );
  }
  return amount;
}
