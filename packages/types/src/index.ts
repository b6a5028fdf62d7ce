/**
 * @starkexit/types: Shared domain types for the starkexit stack.
 *
 * These types are used across all packages:
 * - Vault records and proof wire shapes
 * - Token associations (asset → destination token, quantum)
 * - Claim records
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Primitive types
export type { Hex, Address } from "./primitives.js";

// Vault types
export type {
  VaultRecord,
  VaultProof,
  AccountProof,
  VaultLeafAndRoot,
} from "./vault.js";

// Token types
export type { TokenAssociation } from "./token.js";

// Claim types
export type { ClaimRecord, ClaimStatus, PendingClaim } from "./claim.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Constants
export {
  STARK_PRIME,
  ASSET_ID_BOUND,
  UINT256_MAX,
  QUANTUM_UPPER_BOUND,
  NATIVE_TOKEN,
  ZERO_ADDRESS,
} from "./constants.js";

// Runtime guards and parsing
export {
  isAddress,
  isZeroAddress,
  isBytes32,
  isUint256,
  isFieldElement,
  isVaultRecord,
  isTokenAssociation,
  isEventMetadata,
  isDomainEvent,
  parseUint,
  toHex,
} from "./guards.js";
