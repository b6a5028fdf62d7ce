/**
 * @starkexit/proof: Proof verification for StarkEx exits.
 *
 * Vault proofs over the frozen Stark-field vault tree, account proofs
 * over the keccak256 ownerKey → destination tree, and builders for both.
 *
 * @packageDocumentation
 */

// Types
export type {
  FieldHasher,
  VaultProofRow,
  VaultEntry,
  AccountEntry,
  AccountRootSource,
  VaultProofReason,
  AccountProofReason,
} from "./types.js";
export { VaultProofError, AccountProofError } from "./types.js";

// Field hash
export { starkPedersenHasher, hashVaultLeaf } from "./field-hasher.js";

// Vault proofs
export {
  MIN_PROOF_LENGTH,
  MAX_PROOF_LENGTH,
  encodeVaultProof,
  decodeVaultProof,
  heightForLength,
  lengthForHeight,
} from "./vault-codec.js";
export { VaultProofVerifier } from "./vault-proof.js";
export { VaultTree, MIN_TREE_HEIGHT, MAX_TREE_HEIGHT } from "./vault-tree.js";

// Account proofs
export {
  MAX_ACCOUNT_PROOF_DEPTH,
  hashAccountLeaf,
  hashSortedPair,
  foldAccountProof,
  verifyAccountProof,
  AccountProofVerifier,
} from "./account-proof.js";
export { AccountMerkleTree } from "./account-tree.js";
