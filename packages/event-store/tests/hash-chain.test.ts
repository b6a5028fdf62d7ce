/**
 * Tests for the event hash chain: tamper-evident event log.
 *
 * Property-based checks use fast-check:
 * 1. Any N events → valid chain
 * 2. Remove any middle event → breaks chain
 * 3. Modify any payload → breaks chain
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { DomainEvent } from "@starkexit/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { StoredEvent, UnhashedStoredEvent } from "../src/types.js";
import { makeEvent } from "./helpers.js";

const BASE: UnhashedStoredEvent = {
  event: makeEvent("test", { x: "1" }),
  streamId: "s",
  version: 1,
  globalPosition: 1,
  appendedAt: "2024-01-01T00:00:00.000Z",
};

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("is deterministic for the same input", () => {
    expect(computeEventHash(BASE, GENESIS_HASH)).toBe(
      computeEventHash(BASE, GENESIS_HASH),
    );
  });

  it("ignores key order in the payload", () => {
    const a = { ...BASE, event: { ...BASE.event, payload: { a: "1", b: "2" } } };
    const b = { ...BASE, event: { ...BASE.event, payload: { b: "2", a: "1" } } };
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });

  it("changes when content or previousHash changes", () => {
    const modified = { ...BASE, event: { ...BASE.event, payload: { x: "2" } } };
    expect(computeEventHash(modified, GENESIS_HASH)).not.toBe(
      computeEventHash(BASE, GENESIS_HASH),
    );
    expect(computeEventHash(BASE, "other")).not.toBe(
      computeEventHash(BASE, GENESIS_HASH),
    );
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  it("accepts an empty chain", () => {
    expect(verifyHashChain([])).toEqual({
      valid: true,
      lastVerifiedPosition: 0,
      errors: [],
    });
  });

  it("reports a forged hash at its position", () => {
    const store = new InMemoryEventStore();
    store.append("s", [makeEvent("a"), makeEvent("b")]);
    const events = [...store.readAll()];
    const second = events[1];
    if (second === undefined) throw new Error("missing event");
    events[1] = { ...second, hash: "0".repeat(64) };

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.position).toBe(2);
    expect(result.lastVerifiedPosition).toBe(2);
  });
});

// =============================================================================
// Properties
// =============================================================================

const arbDomainEvent: fc.Arbitrary<DomainEvent> = fc
  .record({
    type: fc.constantFrom("asset.mapped", "root.committed", "claim.disbursed"),
    payload: fc.dictionary(
      fc.string({ minLength: 1, maxLength: 8 }),
      fc.string({ maxLength: 16 }),
    ),
  })
  .map(({ type, payload }) => makeEvent(type, payload));

describe("hash chain properties", () => {
  it("any N events produce a valid chain", () => {
    fc.assert(
      fc.property(fc.array(arbDomainEvent, { minLength: 1, maxLength: 20 }), (events) => {
        const store = new InMemoryEventStore();
        store.append("stream", events);
        expect(store.verifyIntegrity().valid).toBe(true);
      }),
      { numRuns: 50 },
    );
  });

  it("removing any event from the middle breaks the chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbDomainEvent, { minLength: 3, maxLength: 10 }),
        fc.nat(),
        (events, removeIndex) => {
          const store = new InMemoryEventStore();
          store.append("stream", events);

          const all = store.readAll();
          const idx = 1 + (removeIndex % (all.length - 2));
          const tampered = [...all.slice(0, idx), ...all.slice(idx + 1)];

          expect(verifyHashChain(tampered).valid).toBe(false);
        },
      ),
      { numRuns: 30 },
    );
  });

  it("modifying any event payload breaks the chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbDomainEvent, { minLength: 2, maxLength: 8 }),
        fc.nat(),
        (events, modifyIndex) => {
          const store = new InMemoryEventStore();
          store.append("stream", events);

          const all: StoredEvent[] = [...store.readAll()];
          const idx = modifyIndex % all.length;
          const original = all[idx];
          if (original === undefined) return;
          all[idx] = {
            ...original,
            event: {
              ...original.event,
              payload: { ...original.event.payload, tampered: true },
            },
          };

          expect(verifyHashChain(all).valid).toBe(false);
        },
      ),
      { numRuns: 30 },
    );
  });
});
