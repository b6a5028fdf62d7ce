/**
 * @starkexit/ledger: Claims ledger.
 *
 * Records which (ownerKey, assetId) pairs have been paid out.
 *
 * Lifecycle of a claim key, each step written to the event store
 * before it applies in memory:
 *   absent  → pending   claim.reserved (before any value moves)
 *   pending → claimed   claim.disbursed
 *   pending → pending   claim.unconfirmed (transfer sent, outcome unknown)
 *   pending → absent    claim.released (transfer known not to have moved value)
 *
 * A pending key restored from the log blocks disbursement just like a
 * live one. There is NO removal of a committed claim. The disburser
 * holds the only writable instance; everyone else gets the ClaimsReader
 * view.
 */

import { encodeAbiParameters, keccak256 } from "viem";
import type { EventStore } from "@starkexit/event-store";
import { createDomainEvent, EVENT_STREAMS, STARKEXIT_EVENTS } from "@starkexit/event-store";
import type { DomainEvent } from "@starkexit/types";
import { toHex } from "@starkexit/types";
import type { ClaimRecord, ClaimStatus, Hex, PendingClaim } from "@starkexit/types";
import type {
  ClaimDetails,
  ClaimReservation,
  ClaimsLedgerOptions,
  ClaimsReader,
  ReservationDetails,
} from "./types.js";
import { LedgerError } from "./types.js";

/**
 * keccak256(abi.encode(uint256 ownerKey, uint256 assetId))
 */
export function claimKey(ownerKey: bigint, assetId: bigint): Hex {
  return keccak256(
    encodeAbiParameters([{ type: "uint256" }, { type: "uint256" }], [ownerKey, assetId]),
  );
}

export class ClaimsLedger implements ClaimsReader {
  private readonly _events: EventStore;
  private readonly _now: () => string;
  private readonly _pending = new Map<Hex, PendingClaim>();
  private readonly _claims = new Map<Hex, ClaimRecord>();

  constructor(options: ClaimsLedgerOptions) {
    this._events = options.events;
    this._now = options.now ?? (() => new Date().toISOString());
    for (const record of options.initial ?? []) {
      this._claims.set(record.key, record);
    }
    for (const pending of options.pending ?? []) {
      if (!this._claims.has(pending.key)) {
        this._pending.set(pending.key, pending);
      }
    }
  }

  // ─── Read ────────────────────────────────────────────────────────────

  isClaimed(ownerKey: bigint, assetId: bigint): boolean {
    return this.getStatus(ownerKey, assetId) !== undefined;
  }

  getStatus(ownerKey: bigint, assetId: bigint): ClaimStatus | undefined {
    const key = claimKey(ownerKey, assetId);
    if (this._claims.has(key)) return "claimed";
    if (this._pending.has(key)) return "pending";
    return undefined;
  }

  getClaim(ownerKey: bigint, assetId: bigint): ClaimRecord | undefined {
    return this._claims.get(claimKey(ownerKey, assetId));
  }

  getPending(ownerKey: bigint, assetId: bigint): PendingClaim | undefined {
    return this._pending.get(claimKey(ownerKey, assetId));
  }

  list(): readonly ClaimRecord[] {
    return [...this._claims.values()];
  }

  listPending(): readonly PendingClaim[] {
    return [...this._pending.values()];
  }

  count(): number {
    return this._claims.size;
  }

  /**
   * A view that exposes reads only.
   */
  reader(): ClaimsReader {
    return {
      isClaimed: (ownerKey, assetId) => this.isClaimed(ownerKey, assetId),
      getStatus: (ownerKey, assetId) => this.getStatus(ownerKey, assetId),
      getClaim: (ownerKey, assetId) => this.getClaim(ownerKey, assetId),
      getPending: (ownerKey, assetId) => this.getPending(ownerKey, assetId),
      list: () => this.list(),
      listPending: () => this.listPending(),
      count: () => this.count(),
    };
  }

  // ─── Write ───────────────────────────────────────────────────────────

  /**
   * Move a claim key to pending. claim.reserved is durable before this
   * returns; if it cannot be written the key stays absent.
   *
   * @throws LedgerError CLAIM_ALREADY_EXISTS if pending or claimed
   */
  reserve(ownerKey: bigint, assetId: bigint, details: ReservationDetails): ClaimReservation {
    const key = claimKey(ownerKey, assetId);
    if (this._claims.has(key) || this._pending.has(key)) {
      throw new LedgerError(
        "CLAIM_ALREADY_EXISTS",
        `Claim already exists for owner ${toHex(ownerKey)} and asset ${assetId}`,
      );
    }

    const pending: PendingClaim = {
      key,
      ownerKey,
      assetId,
      destination: details.destination,
      token: details.token,
      amount: details.amount,
      reservedAt: this._now(),
    };
    this._append(
      createDomainEvent(STARKEXIT_EVENTS.CLAIM_RESERVED, {
        source: "claims",
        actor: details.actor,
        payload: {
          claimKey: key,
          ownerKey: toHex(ownerKey),
          assetId: assetId.toString(),
          destination: details.destination,
          token: details.token,
          amount: details.amount.toString(),
        },
        correlationId: details.correlationId,
        timestamp: pending.reservedAt,
      }),
    );
    this._pending.set(key, pending);

    let settled = false;
    // Settled only once the settling event is written
    const settle = <T>(write: () => T): T => {
      if (settled) {
        throw new LedgerError("RESERVATION_SETTLED", `Reservation ${key} was already settled`);
      }
      const result = write();
      settled = true;
      return result;
    };
    const meta = { source: "claims" as const, actor: details.actor, correlationId: details.correlationId };

    return {
      key,
      ownerKey,
      assetId,
      commit: (transferRef) => settle(() => this._commit(pending, transferRef, details)),
      release: (reason) => {
        settle(() => {
          this._append(
            createDomainEvent(STARKEXIT_EVENTS.CLAIM_RELEASED, {
              ...meta,
              payload: { claimKey: key, reason },
            }),
          );
          this._pending.delete(key);
        });
      },
      hold: (transferRef, reason) => {
        settle(() => {
          this._append(
            createDomainEvent(STARKEXIT_EVENTS.CLAIM_UNCONFIRMED, {
              ...meta,
              payload: { claimKey: key, transferRef, reason },
            }),
          );
          this._pending.set(key, { ...pending, transferRef });
        });
      },
    };
  }

  /**
   * Reserve and commit in one step.
   *
   * @throws LedgerError CLAIM_ALREADY_EXISTS
   */
  registerClaim(ownerKey: bigint, assetId: bigint, details: ClaimDetails): ClaimRecord {
    return this.reserve(ownerKey, assetId, details).commit(details.transferRef);
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _commit(
    pending: PendingClaim,
    transferRef: string,
    details: ReservationDetails,
  ): ClaimRecord {
    const record: ClaimRecord = {
      key: pending.key,
      ownerKey: pending.ownerKey,
      assetId: pending.assetId,
      destination: pending.destination,
      token: pending.token,
      amount: pending.amount,
      transferRef,
      claimedAt: this._now(),
    };

    this._append(
      createDomainEvent(STARKEXIT_EVENTS.CLAIM_DISBURSED, {
        source: "claims",
        actor: details.actor,
        payload: {
          claimKey: record.key,
          ownerKey: toHex(record.ownerKey),
          assetId: record.assetId.toString(),
          destination: record.destination,
          token: record.token,
          amount: record.amount.toString(),
          transferRef,
        },
        correlationId: details.correlationId,
        timestamp: record.claimedAt,
      }),
    );

    this._pending.delete(record.key);
    this._claims.set(record.key, record);
    return record;
  }

  private _append(event: DomainEvent): void {
    this._events.append(EVENT_STREAMS.claims, [event]);
  }
}
