/**
 * Tests for the token registry.
 *
 * Covers:
 * - Registration, lookup and asset.mapped events
 * - Each validation rule, in order
 * - All-or-nothing batches
 * - Owner gate and finalization
 */

import { describe, it, expect, beforeEach } from "vitest";
import { getAddress } from "viem";
import type { InMemoryEventStore } from "@starkexit/event-store";
import { NATIVE_TOKEN, QUANTUM_UPPER_BOUND, ZERO_ADDRESS } from "@starkexit/types";
import type { AdminLifecycle } from "../src/admin.js";
import { TokenRegistry } from "../src/token-registry.js";
import { LedgerError } from "../src/types.js";
import type { TokenMappingInput } from "../src/types.js";
import { OWNER, TOKEN, setup } from "./helpers.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof LedgerError) return error.code;
    throw error;
  }
  return undefined;
}

const ETH_MAPPING: TokenMappingInput = { assetId: 1n, quantum: 10n ** 18n, destinationToken: TOKEN };

describe("TokenRegistry", () => {
  let events: InMemoryEventStore;
  let admin: AdminLifecycle;
  let registry: TokenRegistry;

  beforeEach(() => {
    ({ events, admin } = setup());
    registry = new TokenRegistry({ admin, events });
  });

  describe("registerTokenMappings", () => {
    it("registers and looks up a mapping", () => {
      const [association] = registry.registerTokenMappings([ETH_MAPPING], OWNER);

      expect(association).toEqual({
        assetId: 1n,
        quantum: 10n ** 18n,
        destinationToken: getAddress(TOKEN),
      });
      expect(registry.isMapped(1n)).toBe(true);
      expect(registry.getQuantum(1n)).toBe(10n ** 18n);
      expect(registry.getDestinationToken(1n)).toBe(getAddress(TOKEN));
      expect(registry.list()).toHaveLength(1);
    });

    it("accepts the native-currency sentinel", () => {
      registry.registerTokenMappings(
        [{ assetId: 2n, quantum: 1n, destinationToken: NATIVE_TOKEN.toLowerCase() }],
        OWNER,
      );
      expect(registry.getDestinationToken(2n)).toBe(NATIVE_TOKEN);
    });

    it("emits one asset.mapped event per association", () => {
      registry.registerTokenMappings(
        [ETH_MAPPING, { assetId: 7n, quantum: 100n, destinationToken: NATIVE_TOKEN }],
        OWNER,
      );

      const stored = events.read("registry");
      expect(stored.map((e) => e.event.type)).toEqual(["asset.mapped", "asset.mapped"]);
      expect(stored[1]?.event.payload).toEqual({
        assetId: "7",
        quantum: "100",
        destinationToken: NATIVE_TOKEN,
      });
      expect(stored[0]?.event.metadata.actor).toBe(OWNER);
    });
  });

  describe("validation", () => {
    it("rejects an empty batch", () => {
      expect(codeOf(() => registry.registerTokenMappings([], OWNER))).toBe("NO_ASSETS_TO_REGISTER");
    });

    it("rejects asset id zero before anything else", () => {
      expect(
        codeOf(() => registry.registerTokenMappings([{ assetId: 0n, quantum: 0n, destinationToken: "" }], OWNER)),
      ).toBe("ZERO_ASSET_ID");
    });

    it("rejects asset ids outside 250 bits", () => {
      expect(
        codeOf(() => registry.registerTokenMappings([{ ...ETH_MAPPING, assetId: 1n << 250n }], OWNER)),
      ).toBe("INVALID_ASSET_ID");
    });

    it("rejects quantum 0 and quantum at the upper bound", () => {
      expect(codeOf(() => registry.registerTokenMappings([{ ...ETH_MAPPING, quantum: 0n }], OWNER))).toBe(
        "INVALID_QUANTUM",
      );
      expect(
        codeOf(() => registry.registerTokenMappings([{ ...ETH_MAPPING, quantum: QUANTUM_UPPER_BOUND }], OWNER)),
      ).toBe("INVALID_QUANTUM");
    });

    it("rejects zero and empty destinations", () => {
      expect(
        codeOf(() => registry.registerTokenMappings([{ ...ETH_MAPPING, destinationToken: ZERO_ADDRESS }], OWNER)),
      ).toBe("ZERO_DESTINATION");
      expect(codeOf(() => registry.registerTokenMappings([{ ...ETH_MAPPING, destinationToken: "" }], OWNER))).toBe(
        "ZERO_DESTINATION",
      );
    });

    it("rejects destinations that are not addresses", () => {
      expect(
        codeOf(() => registry.registerTokenMappings([{ ...ETH_MAPPING, destinationToken: "0xbeef" }], OWNER)),
      ).toBe("INVALID_DESTINATION");
    });

    it("rejects re-registration of the same asset id", () => {
      registry.registerTokenMappings([ETH_MAPPING], OWNER);
      expect(
        codeOf(() => registry.registerTokenMappings([{ ...ETH_MAPPING, quantum: 1n }], OWNER)),
      ).toBe("ASSET_ALREADY_REGISTERED");
      expect(registry.getQuantum(1n)).toBe(10n ** 18n);
    });

    it("rejects an asset id repeated within the batch", () => {
      expect(codeOf(() => registry.registerTokenMappings([ETH_MAPPING, ETH_MAPPING], OWNER))).toBe(
        "ASSET_ALREADY_REGISTERED",
      );
    });

    it("writes nothing when a later association fails", () => {
      expect(() =>
        registry.registerTokenMappings([ETH_MAPPING, { ...ETH_MAPPING, assetId: 2n, quantum: 0n }], OWNER),
      ).toThrow(LedgerError);
      expect(registry.isMapped(1n)).toBe(false);
      expect(events.globalPosition()).toBe(0);
    });
  });

  describe("access", () => {
    it("rejects callers other than the owner", () => {
      expect(codeOf(() => registry.registerTokenMappings([ETH_MAPPING], "relayer"))).toBe("UNAUTHORIZED");
    });

    it("rejects registration after finalization", () => {
      admin.finalize(OWNER);
      expect(codeOf(() => registry.registerTokenMappings([ETH_MAPPING], OWNER))).toBe("ADMIN_FINALIZED");
    });
  });

  describe("lookup", () => {
    it("throws ASSET_NOT_MAPPED for unknown assets", () => {
      expect(registry.isMapped(9n)).toBe(false);
      expect(registry.getAssociation(9n)).toBeUndefined();
      expect(codeOf(() => registry.getQuantum(9n))).toBe("ASSET_NOT_MAPPED");
      expect(codeOf(() => registry.getDestinationToken(9n))).toBe("ASSET_NOT_MAPPED");
    });

    it("restores associations without emitting events", () => {
      const restored = new TokenRegistry({
        admin,
        events,
        initial: [{ assetId: 3n, quantum: 5n, destinationToken: NATIVE_TOKEN }],
      });
      expect(restored.getQuantum(3n)).toBe(5n);
      expect(events.globalPosition()).toBe(0);
    });
  });
});
