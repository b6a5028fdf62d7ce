/**
 * Runtime type guard tests for @starkexit/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAddress,
  isZeroAddress,
  isBytes32,
  isUint256,
  isFieldElement,
  isVaultRecord,
  isTokenAssociation,
  isEventMetadata,
  isDomainEvent,
  parseUint,
  toHex,
} from "../src/guards.js";
import {
  ASSET_ID_BOUND,
  NATIVE_TOKEN,
  QUANTUM_UPPER_BOUND,
  STARK_PRIME,
  UINT256_MAX,
  ZERO_ADDRESS,
} from "../src/constants.js";

// =============================================================================
// Primitive guards
// =============================================================================

describe("isAddress", () => {
  it("accepts lowercase and checksummed addresses", () => {
    expect(isAddress("0x000000000000000000000000000000000000beef")).toBe(true);
    expect(isAddress(NATIVE_TOKEN)).toBe(true);
  });

  it("rejects wrong length, missing prefix and non-strings", () => {
    expect(isAddress("0xbeef")).toBe(false);
    expect(isAddress("000000000000000000000000000000000000beef00")).toBe(false);
    expect(isAddress(42)).toBe(false);
    expect(isAddress(null)).toBe(false);
  });
});

describe("isZeroAddress", () => {
  it("detects the zero address only", () => {
    expect(isZeroAddress(ZERO_ADDRESS)).toBe(true);
    expect(isZeroAddress(NATIVE_TOKEN)).toBe(false);
  });
});

describe("isBytes32", () => {
  it("accepts exactly 32 bytes", () => {
    expect(isBytes32(`0x${"ab".repeat(32)}`)).toBe(true);
  });

  it("rejects 31 and 33 bytes", () => {
    expect(isBytes32(`0x${"ab".repeat(31)}`)).toBe(false);
    expect(isBytes32(`0x${"ab".repeat(33)}`)).toBe(false);
  });
});

describe("isUint256 / isFieldElement", () => {
  it("bounds uint256", () => {
    expect(isUint256(0n)).toBe(true);
    expect(isUint256(UINT256_MAX)).toBe(true);
    expect(isUint256(UINT256_MAX + 1n)).toBe(false);
    expect(isUint256(-1n)).toBe(false);
    expect(isUint256(1)).toBe(false);
  });

  it("bounds field elements by the Stark prime", () => {
    expect(isFieldElement(STARK_PRIME - 1n)).toBe(true);
    expect(isFieldElement(STARK_PRIME)).toBe(false);
  });
});

describe("parseUint", () => {
  it("parses decimal and hex", () => {
    expect(parseUint("1000")).toBe(1000n);
    expect(parseUint("0x12345")).toBe(0x12345n);
    expect(parseUint("0")).toBe(0n);
  });

  it("rejects signs, leading zeros, blanks and bare prefix", () => {
    expect(parseUint("-1")).toBeUndefined();
    expect(parseUint("007")).toBeUndefined();
    expect(parseUint("")).toBeUndefined();
    expect(parseUint(" 1")).toBeUndefined();
    expect(parseUint("0x")).toBeUndefined();
  });
});

describe("toHex", () => {
  it("renders lowercase 0x-prefixed hex", () => {
    expect(toHex(0xabcdefn)).toBe("0xabcdef");
    expect(toHex(0n)).toBe("0x0");
  });
});

// =============================================================================
// Domain guards
// =============================================================================

describe("isVaultRecord", () => {
  it("accepts a well-formed record", () => {
    expect(
      isVaultRecord({ ownerKey: 0x12345n, assetId: 1n, quantizedAmount: 5n }),
    ).toBe(true);
  });

  it("rejects zero owner key", () => {
    expect(
      isVaultRecord({ ownerKey: 0n, assetId: 1n, quantizedAmount: 5n }),
    ).toBe(false);
  });

  it("rejects asset id of 250 bits or more", () => {
    expect(
      isVaultRecord({ ownerKey: 1n, assetId: 1n << 250n, quantizedAmount: 5n }),
    ).toBe(false);
  });

  it("rejects numbers in place of bigints", () => {
    expect(isVaultRecord({ ownerKey: 1, assetId: 1, quantizedAmount: 5 })).toBe(false);
  });
});

describe("isTokenAssociation", () => {
  const valid = {
    assetId: 1n,
    quantum: 10n ** 18n,
    destinationToken: "0x000000000000000000000000000000000000beef",
  };

  it("accepts a valid association and the native sentinel", () => {
    expect(isTokenAssociation(valid)).toBe(true);
    expect(isTokenAssociation({ ...valid, destinationToken: NATIVE_TOKEN })).toBe(true);
  });

  it("bounds asset id and quantum and rejects the zero destination", () => {
    expect(isTokenAssociation({ ...valid, assetId: 0n })).toBe(false);
    expect(isTokenAssociation({ ...valid, assetId: ASSET_ID_BOUND })).toBe(false);
    expect(isTokenAssociation({ ...valid, assetId: ASSET_ID_BOUND - 1n })).toBe(true);
    expect(isTokenAssociation({ ...valid, quantum: 0n })).toBe(false);
    expect(isTokenAssociation({ ...valid, quantum: QUANTUM_UPPER_BOUND })).toBe(false);
    expect(isTokenAssociation({ ...valid, destinationToken: ZERO_ADDRESS })).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const metadata = {
  eventId: "evt-1",
  timestamp: "2024-01-01T00:00:00.000Z",
  actor: "relayer",
  correlationId: "corr-1",
  source: "roots",
};

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(metadata)).toBe(true);
    expect(isEventMetadata({ ...metadata, causationId: "evt-0" })).toBe(true);
  });

  it("rejects unknown sources", () => {
    expect(isEventMetadata({ ...metadata, source: "vault" })).toBe(false);
  });

  it("rejects non-string causationId", () => {
    expect(isEventMetadata({ ...metadata, causationId: 7 })).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({ type: "root.committed", metadata, payload: { kind: "vault" } }),
    ).toBe(true);
  });

  it("rejects array payloads", () => {
    expect(isDomainEvent({ type: "root.committed", metadata, payload: [] })).toBe(false);
  });

  it("rejects missing metadata", () => {
    expect(isDomainEvent({ type: "root.committed", payload: {} })).toBe(false);
  });
});
