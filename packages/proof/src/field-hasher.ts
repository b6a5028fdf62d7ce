/**
 * @starkexit/proof: Stark Pedersen field hasher.
 *
 * The vault tree of the source exchange is hashed with the Stark curve
 * Pedersen hash. `@scure/starknet` carries the precomputed point tables,
 * so nothing needs to be supplied at construction.
 */

import { pedersen } from "@scure/starknet";
import type { FieldHasher } from "./types.js";

export const starkPedersenHasher: FieldHasher = {
  name: "stark-pedersen",
  hash(a: bigint, b: bigint): bigint {
    return BigInt(pedersen(a, b));
  },
};

/**
 * Hash of a vault leaf: H(H(ownerKey, assetId), quantizedAmount).
 */
export function hashVaultLeaf(
  hasher: FieldHasher,
  ownerKey: bigint,
  assetId: bigint,
  quantizedAmount: bigint,
): bigint {
  return hasher.hash(hasher.hash(ownerKey, assetId), quantizedAmount);
}
