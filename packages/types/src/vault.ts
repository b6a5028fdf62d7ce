/**
 * Vault Types
 *
 * A vault is one leaf of the frozen state tree of the source exchange:
 * who owned how much of which asset when the exchange shut down.
 *
 * Rules:
 * - Vault records are read only through proofs, never written
 * - All integers are bigint (values reach 252 bits)
 */

import type { Hex } from "./primitives.js";

/**
 * One leaf of the frozen vault tree.
 */
export interface VaultRecord {
  /** Stark key of the owner. 0 < ownerKey < STARK_PRIME */
  readonly ownerKey: bigint;

  /** Source-exchange asset id (250 bits) */
  readonly assetId: bigint;

  /** Balance in quanta of the asset */
  readonly quantizedAmount: bigint;
}

/**
 * A vault proof on the wire: flat sequence of uint256 words,
 * two words per tree row.
 */
export type VaultProof = readonly bigint[];

/**
 * An account proof on the wire: one 32-byte sibling hash per level.
 */
export type AccountProof = readonly Hex[];

/**
 * The pair returned by a vault proof extraction.
 */
export interface VaultLeafAndRoot {
  readonly record: VaultRecord;
  readonly root: bigint;
}
