import { describe, it, expect } from "vitest";
import { isDomainEvent } from "@starkexit/types";
import { createDomainEvent, STARKEXIT_EVENTS } from "../src/events.js";

describe("createDomainEvent", () => {
  it("builds a valid event with fresh metadata", () => {
    const event = createDomainEvent(STARKEXIT_EVENTS.ADMIN_FINALIZED, {
      source: "admin",
      actor: "owner",
      payload: { finalizedBy: "owner" },
      timestamp: "2024-01-01T00:00:00.000Z",
    });

    expect(isDomainEvent(event)).toBe(true);
    expect(event.type).toBe("admin.finalized");
    expect(event.metadata.correlationId).toBe(event.metadata.eventId);
    expect(event.metadata.timestamp).toBe("2024-01-01T00:00:00.000Z");
    expect(event.payload).toEqual({ finalizedBy: "owner" });
  });

  it("omits causationId unless given", () => {
    const plain = createDomainEvent("root.committed", {
      source: "roots",
      actor: "relayer",
      payload: { kind: "vault", root: "0x1", override: false },
    });
    const caused = createDomainEvent("root.committed", {
      source: "roots",
      actor: "relayer",
      payload: { kind: "account", root: "0x2", override: true },
      causationId: "req-1",
      correlationId: "corr-9",
    });

    expect("causationId" in plain.metadata).toBe(false);
    expect(caused.metadata.causationId).toBe("req-1");
    expect(caused.metadata.correlationId).toBe("corr-9");
  });

  it("generates distinct event ids", () => {
    const make = () =>
      createDomainEvent("admin.finalized", {
        source: "admin",
        actor: "owner",
        payload: { finalizedBy: "owner" },
      });
    expect(make().metadata.eventId).not.toBe(make().metadata.eventId);
  });
});
