/**
 * @starkexit/ledger: Core types.
 *
 * Types for the admin lifecycle, the token registry and the claims
 * ledger.
 */

import type { EventStore } from "@starkexit/event-store";
import type {
  Address,
  ClaimRecord,
  ClaimStatus,
  Hex,
  PendingClaim,
  TokenAssociation,
} from "@starkexit/types";

// ─── Admin Lifecycle ─────────────────────────────────────────────────────

/** One-way: configurable → finalized. */
export type AdminState = "configurable" | "finalized";

export interface AdminLifecycleOptions {
  /** Identity allowed to register assets and finalize */
  readonly owner: string;
  readonly events: EventStore;
  /** Restored state; defaults to configurable */
  readonly finalized?: boolean;
  /** Runs before finalization; throw to refuse it */
  readonly beforeFinalize?: () => void;
}

// ─── Token Registry ──────────────────────────────────────────────────────

/**
 * An association as submitted for registration. The destination is a
 * plain string until validated.
 */
export interface TokenMappingInput {
  readonly assetId: bigint;
  readonly quantum: bigint;
  readonly destinationToken: string;
}

/**
 * Read side of the token registry.
 */
export interface TokenLookup {
  isMapped(assetId: bigint): boolean;
  /** @throws LedgerError ASSET_NOT_MAPPED */
  getDestinationToken(assetId: bigint): Address;
  /** @throws LedgerError ASSET_NOT_MAPPED */
  getQuantum(assetId: bigint): bigint;
  getAssociation(assetId: bigint): TokenAssociation | undefined;
  list(): readonly TokenAssociation[];
}

// ─── Claims Ledger ───────────────────────────────────────────────────────

/**
 * The payout a reservation is made for, recorded before value moves.
 */
export interface ReservationDetails {
  readonly destination: Address;
  readonly token: Address;
  readonly amount: bigint;
  /** Who triggered the disbursement */
  readonly actor: string;
  readonly correlationId?: string;
}

/**
 * Reservation details plus the reference of the completed transfer.
 */
export interface ClaimDetails extends ReservationDetails {
  readonly transferRef: string;
}

/**
 * A claim held in the pending state by the disbursement that reserved
 * it. Settled exactly once: commit, release or hold.
 */
export interface ClaimReservation {
  readonly key: Hex;
  readonly ownerKey: bigint;
  readonly assetId: bigint;
  /**
   * Record the payout. Writes claim.disbursed.
   * @throws LedgerError RESERVATION_SETTLED
   */
  commit(transferRef: string): ClaimRecord;
  /**
   * Return the key to absent. Only for transfers known not to have
   * moved value. Writes claim.released.
   * @throws LedgerError RESERVATION_SETTLED
   */
  release(reason: string): void;
  /**
   * Keep the key pending after a transfer whose outcome is unknown.
   * Writes claim.unconfirmed with the transfer reference.
   * @throws LedgerError RESERVATION_SETTLED
   */
  hold(transferRef: string, reason: string): void;
}

/**
 * Read-only view of the claims ledger, safe to hand out.
 */
export interface ClaimsReader {
  /** True once a claim is pending or committed */
  isClaimed(ownerKey: bigint, assetId: bigint): boolean;
  getStatus(ownerKey: bigint, assetId: bigint): ClaimStatus | undefined;
  getClaim(ownerKey: bigint, assetId: bigint): ClaimRecord | undefined;
  getPending(ownerKey: bigint, assetId: bigint): PendingClaim | undefined;
  list(): readonly ClaimRecord[];
  listPending(): readonly PendingClaim[];
  /** Committed claims only */
  count(): number;
}

export interface ClaimsLedgerOptions {
  readonly events: EventStore;
  /** Committed claims restored from the event log */
  readonly initial?: readonly ClaimRecord[];
  /** Reservations restored from the event log; they stay pending */
  readonly pending?: readonly PendingClaim[];
  readonly now?: () => string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for registry, claims and admin operations. */
export type LedgerErrorCode =
  // admin
  | "UNAUTHORIZED"
  | "ADMIN_FINALIZED"
  | "ALREADY_FINALIZED"
  | "ROOTS_NOT_COMMITTED"
  // registry
  | "NO_ASSETS_TO_REGISTER"
  | "ZERO_ASSET_ID"
  | "INVALID_ASSET_ID"
  | "INVALID_QUANTUM"
  | "ZERO_DESTINATION"
  | "INVALID_DESTINATION"
  | "ASSET_ALREADY_REGISTERED"
  | "ASSET_NOT_MAPPED"
  // claims
  | "CLAIM_ALREADY_EXISTS"
  | "RESERVATION_SETTLED"
  | "AMOUNT_OVERFLOW";

/**
 * Structured error from the ledger components.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
