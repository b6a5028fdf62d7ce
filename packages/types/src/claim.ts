/**
 * Claim Types
 *
 * A claim marks an (ownerKey, assetId) pair as paid out.
 * Claims move absent → pending → claimed; a pending claim returns to
 * absent only when its transfer is known not to have moved value.
 */

import type { Address, Hex } from "./primitives.js";

export type ClaimStatus = "pending" | "claimed";

/**
 * A committed claim and the payout it records.
 */
export interface ClaimRecord {
  /** keccak256(abi.encode(ownerKey, assetId)) */
  readonly key: Hex;
  readonly ownerKey: bigint;
  readonly assetId: bigint;
  readonly destination: Address;
  readonly token: Address;
  /** Destination-ledger amount actually transferred */
  readonly amount: bigint;
  /** Transaction hash or transfer id reported by the transferer */
  readonly transferRef: string;
  /** ISO 8601 timestamp */
  readonly claimedAt: string;
}

/**
 * A reserved claim whose payout has not been recorded yet. It blocks
 * any further disbursement for the same key.
 */
export interface PendingClaim {
  readonly key: Hex;
  readonly ownerKey: bigint;
  readonly assetId: bigint;
  readonly destination: Address;
  readonly token: Address;
  readonly amount: bigint;
  /** Set once a transfer was sent whose outcome could not be read */
  readonly transferRef?: string;
  /** ISO 8601 timestamp */
  readonly reservedAt: string;
}
