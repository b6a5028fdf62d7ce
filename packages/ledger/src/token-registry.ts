/**
 * @starkexit/ledger: Token registry.
 *
 * Maps a source-exchange asset id to the token that pays it out and the
 * quantum that scales it. Mappings are permanent once registered.
 *
 * Registration rules, checked per association in order:
 * - Batch non-empty (NO_ASSETS_TO_REGISTER)
 * - assetId ≠ 0 (ZERO_ASSET_ID), assetId < 2^250 (INVALID_ASSET_ID)
 * - 1 ≤ quantum < 2^128 (INVALID_QUANTUM)
 * - destination not zero (ZERO_DESTINATION); NATIVE_TOKEN is valid
 * - destination is an address (INVALID_DESTINATION)
 * - assetId new, including within the batch (ASSET_ALREADY_REGISTERED)
 *
 * The whole batch is validated before anything is written.
 */

import { getAddress, isAddress } from "viem";
import type { EventStore } from "@starkexit/event-store";
import { createDomainEvent, EVENT_STREAMS, STARKEXIT_EVENTS } from "@starkexit/event-store";
import { ASSET_ID_BOUND, isZeroAddress } from "@starkexit/types";
import type { Address, TokenAssociation } from "@starkexit/types";
import type { AdminLifecycle } from "./admin.js";
import { isValidQuantum } from "./quantum.js";
import type { TokenLookup, TokenMappingInput } from "./types.js";
import { LedgerError } from "./types.js";

export interface TokenRegistryOptions {
  readonly admin: AdminLifecycle;
  readonly events: EventStore;
  /** Associations restored from the event log */
  readonly initial?: readonly TokenAssociation[];
}

export class TokenRegistry implements TokenLookup {
  private readonly _admin: AdminLifecycle;
  private readonly _events: EventStore;
  private readonly _associations = new Map<bigint, TokenAssociation>();

  constructor(options: TokenRegistryOptions) {
    this._admin = options.admin;
    this._events = options.events;
    for (const association of options.initial ?? []) {
      this._associations.set(association.assetId, association);
    }
  }

  // ─── Registration ────────────────────────────────────────────────────

  /**
   * Register a batch of mappings, all or nothing.
   * Emits one `asset.mapped` event per association.
   *
   * @throws LedgerError on the first failed rule; nothing is written
   */
  registerTokenMappings(
    associations: readonly TokenMappingInput[],
    caller: string,
    correlationId?: string,
  ): readonly TokenAssociation[] {
    this._admin.assertOwner(caller);
    this._admin.assertConfigurable();

    if (associations.length === 0) {
      throw new LedgerError("NO_ASSETS_TO_REGISTER", "No assets to register");
    }

    const batch = new Set<bigint>();
    const validated = associations.map((input) => {
      const association = this._validate(input, batch);
      batch.add(association.assetId);
      return association;
    });

    this._events.append(
      EVENT_STREAMS.registry,
      validated.map((a) =>
        createDomainEvent(STARKEXIT_EVENTS.ASSET_MAPPED, {
          source: "registry",
          actor: caller,
          payload: {
            assetId: a.assetId.toString(),
            quantum: a.quantum.toString(),
            destinationToken: a.destinationToken,
          },
          correlationId,
        }),
      ),
    );

    for (const association of validated) {
      this._associations.set(association.assetId, association);
    }
    return validated;
  }

  // ─── Lookup ──────────────────────────────────────────────────────────

  isMapped(assetId: bigint): boolean {
    return this._associations.has(assetId);
  }

  getDestinationToken(assetId: bigint): Address {
    return this._require(assetId).destinationToken;
  }

  getQuantum(assetId: bigint): bigint {
    return this._require(assetId).quantum;
  }

  getAssociation(assetId: bigint): TokenAssociation | undefined {
    return this._associations.get(assetId);
  }

  list(): readonly TokenAssociation[] {
    return [...this._associations.values()];
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _require(assetId: bigint): TokenAssociation {
    const association = this._associations.get(assetId);
    if (association === undefined) {
      throw new LedgerError("ASSET_NOT_MAPPED", `Asset ${assetId} is not mapped`);
    }
    return association;
  }

  private _validate(input: TokenMappingInput, batch: ReadonlySet<bigint>): TokenAssociation {
    const { assetId, quantum, destinationToken } = input;

    if (assetId === 0n) {
      throw new LedgerError("ZERO_ASSET_ID", "Asset id cannot be zero");
    }
    if (assetId < 0n || assetId >= ASSET_ID_BOUND) {
      throw new LedgerError("INVALID_ASSET_ID", `Asset id ${assetId} is not a 250-bit value`);
    }
    if (!isValidQuantum(quantum)) {
      throw new LedgerError("INVALID_QUANTUM", `Invalid quantum for asset ${assetId}`);
    }
    if (destinationToken === "" || (isAddress(destinationToken, { strict: false }) && isZeroAddress(destinationToken))) {
      throw new LedgerError("ZERO_DESTINATION", "Destination cannot be zero");
    }
    if (!isAddress(destinationToken, { strict: false })) {
      throw new LedgerError(
        "INVALID_DESTINATION",
        `Destination "${destinationToken}" is not an address`,
      );
    }
    if (this._associations.has(assetId) || batch.has(assetId)) {
      throw new LedgerError("ASSET_ALREADY_REGISTERED", `Asset ${assetId} is already registered`);
    }

    return { assetId, quantum, destinationToken: getAddress(destinationToken) };
  }
}
