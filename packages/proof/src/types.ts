/**
 * @starkexit/proof: Core types.
 *
 * Types for the two proof formats the disburser accepts:
 * - Vault proofs: rows of Stark field elements hashed with a FieldHasher
 * - Account proofs: 32-byte keccak256 siblings, sorted-pair folding
 */

import type { Address, Hex, VaultRecord } from "@starkexit/types";

// =============================================================================
// Field Hash Strategy
// =============================================================================

/**
 * A two-to-one hash over Stark field elements.
 *
 * Inputs are always range-checked (< STARK_PRIME) before they reach
 * `hash`. Any correct implementation of the same function is
 * interchangeable.
 */
export interface FieldHasher {
  readonly name: string;
  hash(a: bigint, b: bigint): bigint;
}

// =============================================================================
// Vault Proof Types
// =============================================================================

/**
 * One decoded row of a vault proof: two 252-bit values.
 */
export interface VaultProofRow {
  readonly left: bigint;
  readonly right: bigint;
}

/**
 * A vault placed at a leaf index of the vault tree.
 */
export interface VaultEntry {
  readonly vaultId: bigint;
  readonly record: VaultRecord;
}

// =============================================================================
// Account Proof Types
// =============================================================================

/**
 * An ownerKey → destination binding, one leaf of the account tree.
 */
export interface AccountEntry {
  readonly ownerKey: bigint;
  readonly destination: Address;
}

/**
 * Where the account verifier reads the committed root from.
 */
export interface AccountRootSource {
  getAccountRoot(): Hex | undefined;
}

// =============================================================================
// Errors
// =============================================================================

export type VaultProofReason =
  | "PROOF_TOO_SHORT"
  | "PROOF_TOO_LONG"
  | "PROOF_LENGTH_ODD"
  | "MALFORMED_WORD"
  | "BAD_KEY_OR_ASSET"
  | "VAULT_ID_OUT_OF_RANGE"
  | "BAD_MERKLE_PATH"
  // Raised by the disburser when checking a proof against committed state
  | "VAULT_ROOT_NOT_SET"
  | "ROOT_MISMATCH"
  | "OWNER_MISMATCH"
  | "ASSET_MISMATCH";

/**
 * A vault proof was rejected. `reason` says which check failed.
 */
export class VaultProofError extends Error {
  public readonly code = "INVALID_VAULT_PROOF";
  public readonly reason: VaultProofReason;

  constructor(reason: VaultProofReason, message: string) {
    super(message);
    this.name = "VaultProofError";
    this.reason = reason;
  }
}

export type AccountProofReason =
  | "INVALID_OWNER_KEY"
  | "INVALID_DESTINATION"
  | "EMPTY_PROOF"
  | "PROOF_TOO_LONG"
  | "MALFORMED_PROOF_NODE"
  | "ROOT_NOT_SET"
  | "INVALID_PROOF";

/**
 * An account proof was rejected. `reason` says which check failed.
 */
export class AccountProofError extends Error {
  public readonly code = "INVALID_ACCOUNT_PROOF";
  public readonly reason: AccountProofReason;

  constructor(reason: AccountProofReason, message: string) {
    super(message);
    this.name = "AccountProofError";
    this.reason = reason;
  }
}
