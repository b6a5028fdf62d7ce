/**
 * @starkexit/event-store: Append-only public event log.
 *
 * Provides:
 * - EventStore interface for append-only, hash-chained event streams
 * - InMemoryEventStore for tests and development
 * - JsonlEventStore for durable file-based persistence
 * - The system's domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  UnhashedStoredEvent,
  StoredEvent,
  AppendResult,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export { JsonlEventStore } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";

// Domain events
export {
  STARKEXIT_EVENTS,
  EVENT_STREAMS,
  createDomainEvent,
} from "./events.js";
export type {
  StarkexitEventType,
  RootKind,
  AssetMappedPayload,
  RootCommittedPayload,
  ClaimReservedPayload,
  ClaimUnconfirmedPayload,
  ClaimReleasedPayload,
  ClaimDisbursedPayload,
  AdminFinalizedPayload,
  EventPayloads,
  CreateEventOptions,
} from "./events.js";
