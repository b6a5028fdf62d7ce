/**
 * @starkexit/ledger: Registries and ledgers behind the disburser.
 *
 * - AdminLifecycle: configurable → finalized, one way
 * - TokenRegistry: asset id → (destination token, quantum), permanent
 * - ClaimsLedger: at most one payout per (ownerKey, assetId)
 * - Quantum arithmetic in bigint
 *
 * Design rules:
 * - All types are readonly
 * - Every mutation is published to the event store before it applies
 * - Fail-closed: invalid input throws, never silently succeeds
 */

export { AdminLifecycle } from "./admin.js";
export { TokenRegistry } from "./token-registry.js";
export type { TokenRegistryOptions } from "./token-registry.js";
export { ClaimsLedger, claimKey } from "./claims-ledger.js";
export { isValidQuantum, toDestinationAmount } from "./quantum.js";

export type {
  AdminState,
  AdminLifecycleOptions,
  TokenMappingInput,
  TokenLookup,
  ReservationDetails,
  ClaimDetails,
  ClaimReservation,
  ClaimsReader,
  ClaimsLedgerOptions,
  LedgerErrorCode,
} from "./types.js";
export { LedgerError } from "./types.js";
