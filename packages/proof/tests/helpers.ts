/**
 * Shared fixtures for proof tests.
 */

import { STARK_PRIME } from "@starkexit/types";
import type { FieldHasher } from "../src/types.js";
import { AccountProofError, VaultProofError } from "../src/types.js";

/**
 * Cheap non-commutative stand-in for Pedersen. Injective in each
 * argument, so any single changed input changes the output.
 */
export const linearHasher: FieldHasher = {
  name: "linear-test",
  hash: (a, b) => (a * 3n + b * 7n + 1n) % STARK_PRIME,
};

/** Wraps a hasher and counts calls. */
export function countingHasher(inner: FieldHasher = linearHasher): FieldHasher & { calls: number } {
  const counter = {
    name: `counting(${inner.name})`,
    calls: 0,
    hash(a: bigint, b: bigint): bigint {
      counter.calls += 1;
      return inner.hash(a, b);
    },
  };
  return counter;
}

export function vaultReason(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof VaultProofError) return error.reason;
    throw error;
  }
  return undefined;
}

export function accountReason(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof AccountProofError) return error.reason;
    throw error;
  }
  return undefined;
}

/** Deterministic distinct address for index i. */
export function address(i: number): `0x${string}` {
  return `0x${(i + 1).toString(16).padStart(40, "0")}`;
}
