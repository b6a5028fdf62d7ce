/**
 * @starkexit/event-store: In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 *
 * Also the base of JsonlEventStore, which adds durability through the
 * `persist` hook.
 *
 * Properties:
 * - O(1) append (amortized)
 * - Every event hash-linked to its predecessor
 */

import type { DomainEvent } from "@starkexit/types";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredEvent,
  UnhashedStoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

/**
 * In-memory event store.
 *
 * All events are stored in two data structures:
 * - Per-stream arrays (indexed by streamId) for stream reads
 * - Global array for readAll and integrity checks
 */
export class InMemoryEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent[] = [];

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError(
        "EMPTY_APPEND",
        "Cannot append zero events",
        streamId,
      );
    }

    const fromVersion = this.streamVersion(streamId) + 1;
    const appendedAt = new Date().toISOString();
    const stored: StoredEvent[] = [];
    let previousHash = this._lastHash;

    events.forEach((event, i) => {
      const base: UnhashedStoredEvent = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + i + 1,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);
      stored.push({ ...base, hash, previousHash });
      previousHash = hash;
    });

    // Durable first; memory only changes once persistence succeeded
    this.persist(stored);

    for (const event of stored) {
      this._index(event);
    }

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string): readonly StoredEvent[] {
    this._validateStreamId(streamId);
    return [...(this._streams.get(streamId) ?? [])];
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const maxCount = options?.maxCount;

    const result = this._globalLog.filter(
      (e) => e.globalPosition >= fromPosition,
    );

    if (maxCount !== undefined && maxCount >= 0) {
      return result.slice(0, maxCount);
    }
    return result;
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Extension Points ───────────────────────────────────────────────

  /**
   * Write freshly hashed events to durable storage. Throwing aborts the
   * append with nothing indexed. The in-memory store keeps nothing.
   */
  protected persist(_events: readonly StoredEvent[]): void {}

  /**
   * Index an event loaded from durable storage, without re-persisting
   * it.
   */
  protected restore(event: StoredEvent): void {
    this._index(event);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _index(event: StoredEvent): void {
    let stream = this._streams.get(event.streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(event.streamId, stream);
    }
    stream.push(event);
    this._globalLog.push(event);
    this._lastHash = event.hash;
  }

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }
}
