/**
 * @starkexit/event-store: Domain event definitions.
 *
 * The public events through which the system's state can be rebuilt
 * by anyone holding the log, without privileged reads.
 *
 * Each event type defines:
 * - A type string
 * - The stream it is written to
 * - A payload shape (integers as decimal strings, keys and roots as hex)
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventMetadata, EventSource } from "@starkexit/types";

// =============================================================================
// Event Types
// =============================================================================

export const STARKEXIT_EVENTS = {
  ASSET_MAPPED: "asset.mapped",
  ROOT_COMMITTED: "root.committed",
  CLAIM_RESERVED: "claim.reserved",
  CLAIM_UNCONFIRMED: "claim.unconfirmed",
  CLAIM_RELEASED: "claim.released",
  CLAIM_DISBURSED: "claim.disbursed",
  ADMIN_FINALIZED: "admin.finalized",
} as const;

export type StarkexitEventType =
  (typeof STARKEXIT_EVENTS)[keyof typeof STARKEXIT_EVENTS];

/** Stream each component writes to. */
export const EVENT_STREAMS = {
  registry: "registry",
  roots: "roots",
  claims: "claims",
  admin: "admin",
} as const satisfies Record<EventSource, string>;

// =============================================================================
// Payloads
// =============================================================================

export type AssetMappedPayload = {
  readonly assetId: string;
  readonly quantum: string;
  readonly destinationToken: string;
};

export type RootKind = "vault" | "account";

export type RootCommittedPayload = {
  readonly kind: RootKind;
  /** 0x-prefixed hex */
  readonly root: string;
  /** True when this commit replaced an earlier root */
  readonly override: boolean;
};

/** Written before any value moves. */
export type ClaimReservedPayload = {
  readonly claimKey: string;
  /** 0x-prefixed hex */
  readonly ownerKey: string;
  readonly assetId: string;
  readonly destination: string;
  readonly token: string;
  readonly amount: string;
};

/** A transfer was sent but its outcome could not be read. */
export type ClaimUnconfirmedPayload = {
  readonly claimKey: string;
  readonly transferRef: string;
  readonly reason: string;
};

/** The transfer is known not to have moved value. */
export type ClaimReleasedPayload = {
  readonly claimKey: string;
  readonly reason: string;
};

export type ClaimDisbursedPayload = {
  readonly claimKey: string;
  /** 0x-prefixed hex */
  readonly ownerKey: string;
  readonly assetId: string;
  readonly destination: string;
  readonly token: string;
  readonly amount: string;
  readonly transferRef: string;
};

export type AdminFinalizedPayload = {
  readonly finalizedBy: string;
};

export interface EventPayloads {
  "asset.mapped": AssetMappedPayload;
  "root.committed": RootCommittedPayload;
  "claim.reserved": ClaimReservedPayload;
  "claim.unconfirmed": ClaimUnconfirmedPayload;
  "claim.released": ClaimReleasedPayload;
  "claim.disbursed": ClaimDisbursedPayload;
  "admin.finalized": AdminFinalizedPayload;
}

// =============================================================================
// Factory
// =============================================================================

export interface CreateEventOptions<T extends StarkexitEventType> {
  readonly source: EventSource;
  readonly actor: string;
  readonly payload: EventPayloads[T];
  readonly correlationId?: string;
  readonly causationId?: string;
  readonly timestamp?: string;
}

/**
 * Build a DomainEvent with fresh metadata.
 *
 * Optional metadata fields are left out rather than set to undefined,
 * so the canonical hash of the event survives a JSON round-trip.
 */
export function createDomainEvent<T extends StarkexitEventType>(
  type: T,
  options: CreateEventOptions<T>,
): DomainEvent {
  const eventId = randomUUID();
  const metadata: EventMetadata = {
    eventId,
    timestamp: options.timestamp ?? new Date().toISOString(),
    actor: options.actor,
    correlationId: options.correlationId ?? eventId,
    source: options.source,
    ...(options.causationId !== undefined
      ? { causationId: options.causationId }
      : {}),
  };

  return { type, metadata, payload: options.payload };
}
