/**
 * Path parameter parsing shared by the route factories.
 */

import { parseUint, UINT256_MAX } from "@starkexit/types";

/** Decimal or 0x-hex uint256 path segment, or undefined. */
export function parseUintParam(value: string): bigint | undefined {
  const parsed = parseUint(value);
  return parsed !== undefined && parsed <= UINT256_MAX ? parsed : undefined;
}
