/**
 * Runtime Type Guards
 *
 * Narrowing functions for domain types.
 * Used at system boundaries (HTTP bodies, replayed event payloads).
 */

import { ASSET_ID_BOUND, QUANTUM_UPPER_BOUND, STARK_PRIME, UINT256_MAX } from "./constants.js";
import type { DomainEvent, EventMetadata } from "./event.js";
import type { Address, Hex } from "./primitives.js";
import type { TokenAssociation } from "./token.js";
import type { VaultRecord } from "./vault.js";

// =============================================================================
// Primitive guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const BYTES32_PATTERN = /^0x[0-9a-fA-F]{64}$/;
const HEX_PATTERN = /^0x[0-9a-fA-F]+$/;
const DECIMAL_PATTERN = /^(0|[1-9]\d*)$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isZeroAddress(value: Address): boolean {
  return BigInt(value) === 0n;
}

export function isBytes32(value: unknown): value is Hex {
  return typeof value === "string" && BYTES32_PATTERN.test(value);
}

export function isUint256(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= UINT256_MAX;
}

export function isFieldElement(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value < STARK_PRIME;
}

/**
 * Parse an unsigned integer written as a decimal or 0x-hex string.
 * Returns undefined for anything else (signs, whitespace, empty hex).
 */
export function parseUint(value: string): bigint | undefined {
  if (DECIMAL_PATTERN.test(value) || HEX_PATTERN.test(value)) {
    return BigInt(value);
  }
  return undefined;
}

/**
 * Render a bigint as 0x-prefixed lowercase hex.
 */
export function toHex(value: bigint): Hex {
  return `0x${value.toString(16)}`;
}

// =============================================================================
// Domain guards
// =============================================================================

export function isVaultRecord(value: unknown): value is VaultRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isFieldElement(v.ownerKey) &&
    v.ownerKey !== 0n &&
    typeof v.assetId === "bigint" &&
    v.assetId >= 0n &&
    v.assetId < ASSET_ID_BOUND &&
    isFieldElement(v.quantizedAmount)
  );
}

export function isTokenAssociation(value: unknown): value is TokenAssociation {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.assetId === "bigint" &&
    v.assetId > 0n &&
    v.assetId < ASSET_ID_BOUND &&
    typeof v.quantum === "bigint" &&
    v.quantum >= 1n &&
    v.quantum < QUANTUM_UPPER_BOUND &&
    isAddress(v.destinationToken) &&
    !isZeroAddress(v.destinationToken)
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set(["registry", "roots", "claims", "admin"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source) &&
    (v.causationId === undefined || typeof v.causationId === "string")
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object" &&
    !Array.isArray(v.payload)
  );
}
