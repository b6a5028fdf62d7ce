/**
 * Event Types
 *
 * Every state change in the system is published as a DomainEvent.
 * The event log is the public record from which roots, mappings,
 * claims and the admin lifecycle can be reconstructed.
 *
 * Rules:
 * - Events are immutable after creation
 * - Payload integers are decimal strings, keys and roots are hex
 * - No UPDATE, no DELETE: only new events
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events */
  readonly correlationId: string;

  /** Which component emitted this event */
  readonly source: EventSource;
}

export type EventSource = "registry" | "roots" | "claims" | "admin";

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "asset.mapped", "claim.disbursed") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
