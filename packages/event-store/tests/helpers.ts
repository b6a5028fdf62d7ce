/**
 * Shared fixtures for event-store tests.
 */

import type { DomainEvent } from "@starkexit/types";

let counter = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2024-01-01T00:00:00.000Z",
      actor: "test",
      correlationId: `corr-${counter}`,
      source: "registry",
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}
