/**
 * Token Types
 *
 * Binds a source-exchange asset to the token that pays it out on the
 * destination ledger, with the fixed-point scale between them.
 */

import type { Address } from "./primitives.js";

/**
 * A registered asset mapping. Immutable once registered.
 *
 * destinationAmount = quantizedAmount * quantum
 */
export interface TokenAssociation {
  /** Source-exchange asset id. Never zero. */
  readonly assetId: bigint;

  /** Scaling factor. 1 <= quantum < 2^128 */
  readonly quantum: bigint;

  /** ERC-20 contract, or NATIVE_TOKEN for the native currency */
  readonly destinationToken: Address;
}
