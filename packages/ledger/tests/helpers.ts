/**
 * Shared fixtures for ledger tests.
 */

import { InMemoryEventStore } from "@starkexit/event-store";
import { AdminLifecycle } from "../src/admin.js";

export const OWNER = "owner";
export const TOKEN = "0x000000000000000000000000000000000000bEEF";
export const DEST = "0x000000000000000000000000000000000000abcd";
export const TS = "2024-01-01T00:00:00.000Z";

export function setup(): { events: InMemoryEventStore; admin: AdminLifecycle } {
  const events = new InMemoryEventStore();
  const admin = new AdminLifecycle({ owner: OWNER, events });
  return { events, admin };
}
