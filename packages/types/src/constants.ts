/**
 * Constants shared by every package.
 *
 * Values come from the source exchange's proof system (Stark field,
 * asset id width, quantum bound) and from the destination ledger
 * (native-currency sentinel, zero address).
 */

import type { Address } from "./primitives.js";

// =============================================================================
// Stark Field
// =============================================================================

/** The Stark field modulus: 2^251 + 17 * 2^192 + 1. */
export const STARK_PRIME =
  0x800000000000011000000000000000000000000000000000000000000000001n;

/** Asset ids on the source exchange are 250-bit values. */
export const ASSET_ID_BOUND = 1n << 250n;

/** Largest value a uint256 word can hold. */
export const UINT256_MAX = (1n << 256n) - 1n;

// =============================================================================
// Token Registry
// =============================================================================

/** Quantum must satisfy 1 <= quantum < QUANTUM_UPPER_BOUND. */
export const QUANTUM_UPPER_BOUND = 1n << 128n;

/** Sentinel destination meaning "the chain's native currency". */
export const NATIVE_TOKEN: Address = "0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE";

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";
