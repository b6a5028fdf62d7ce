/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: single event, batch, stream versions, global positions
 * - ReadAll: global ordering, from position, max count
 * - Errors: empty append, invalid stream ID
 */

import { describe, it, expect } from "vitest";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";
import { GENESIS_HASH } from "../src/hash-chain.js";
import { makeEvent, makeEvents } from "./helpers.js";

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = new InMemoryEventStore();

    const result = store.append("stream-1", [makeEvent("test.created")]);

    expect(result).toEqual({
      streamId: "stream-1",
      fromVersion: 1,
      toVersion: 1,
      count: 1,
    });
  });

  it("assigns contiguous versions per stream and positions globally", () => {
    const store = new InMemoryEventStore();
    store.append("a", makeEvents(2, "a"));
    const result = store.append("b", makeEvents(3, "b"));
    store.append("a", [makeEvent("a.3")]);

    expect(result.fromVersion).toBe(1);
    expect(result.toVersion).toBe(3);
    expect(store.streamVersion("a")).toBe(3);
    expect(store.streamVersion("b")).toBe(3);
    expect(store.globalPosition()).toBe(6);

    const a = store.read("a");
    expect(a.map((e) => e.version)).toEqual([1, 2, 3]);
    expect(a.map((e) => e.globalPosition)).toEqual([1, 2, 6]);
  });

  it("links the first event to the genesis hash", () => {
    const store = new InMemoryEventStore();
    store.append("s", [makeEvent("x")]);

    const [first] = store.readAll();
    expect(first?.previousHash).toBe(GENESIS_HASH);
    expect(first?.hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("links each event to its predecessor across streams", () => {
    const store = new InMemoryEventStore();
    store.append("a", [makeEvent("x")]);
    store.append("b", [makeEvent("y")]);

    const [first, second] = store.readAll();
    expect(second?.previousHash).toBe(first?.hash);
  });

  it("throws on empty append", () => {
    const store = new InMemoryEventStore();
    expect(() => store.append("s", [])).toThrow(EventStoreError);
    expect(() => store.append("s", [])).toThrow(/zero events/);
  });

  it("throws on empty stream ID", () => {
    const store = new InMemoryEventStore();
    expect(() => store.append("", [makeEvent("x")])).toThrow(EventStoreError);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read / readAll", () => {
  it("returns an empty array for an unknown stream", () => {
    expect(new InMemoryEventStore().read("missing")).toEqual([]);
  });

  it("reads all events from a position with a limit", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(5));

    const page = store.readAll({ fromPosition: 2, maxCount: 2 });
    expect(page.map((e) => e.event.type)).toEqual(["event.2", "event.3"]);
  });

  it("returns copies that do not alias the stream", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(1));

    const first = store.read("s");
    store.append("s", makeEvents(1));
    expect(first).toHaveLength(1);
  });
});
