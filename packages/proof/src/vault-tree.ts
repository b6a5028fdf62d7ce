/**
 * @starkexit/proof: Sparse vault tree builder.
 *
 * Off-ledger counterpart of VaultProofVerifier: builds the frozen vault
 * tree from a set of vaults and emits proofs in the wire format.
 *
 * Design:
 * - Sparse: only non-empty subtrees are stored, per level
 * - Empty leaf hashes as H(H(0, 0), 0); empty subtrees are precomputed
 * - Leaf hash: H(H(ownerKey, assetId), quantizedAmount)
 * - Internal nodes: H(left, right)
 * - Immutable: build once, query many times
 */

import { isVaultRecord } from "@starkexit/types";
import type { VaultProof, VaultRecord } from "@starkexit/types";
import { hashVaultLeaf, starkPedersenHasher } from "./field-hasher.js";
import { encodeVaultProof, heightForLength, MAX_PROOF_LENGTH, MIN_PROOF_LENGTH } from "./vault-codec.js";
import type { FieldHasher, VaultEntry, VaultProofRow } from "./types.js";

export const MIN_TREE_HEIGHT = heightForLength(MIN_PROOF_LENGTH);
export const MAX_TREE_HEIGHT = heightForLength(MAX_PROOF_LENGTH - 2);

/**
 * Immutable sparse Merkle tree over vault records.
 *
 * Usage:
 * ```ts
 * const tree = VaultTree.build(31, [{ vaultId: 7n, record }]);
 * const root = tree.getRoot();
 * const proof = tree.getProof(7n);
 * new VaultProofVerifier().verify(proof); // true
 * ```
 */
export class VaultTree {
  private readonly height: number;
  private readonly hasher: FieldHasher;
  private readonly records: ReadonlyMap<bigint, VaultRecord>;
  /** levels[0] are leaves; levels[height] holds the root at index 0 */
  private readonly levels: readonly ReadonlyMap<bigint, bigint>[];
  /** emptyHashes[l] is the hash of an all-empty subtree at level l */
  private readonly emptyHashes: readonly bigint[];

  private constructor(
    height: number,
    records: ReadonlyMap<bigint, VaultRecord>,
    hasher: FieldHasher,
  ) {
    this.height = height;
    this.hasher = hasher;
    this.records = records;

    const empty: bigint[] = [hashVaultLeaf(hasher, 0n, 0n, 0n)];
    for (let l = 0; l < height; l++) {
      const below = empty[l] ?? 0n;
      empty.push(hasher.hash(below, below));
    }
    this.emptyHashes = empty;

    const leaves = new Map<bigint, bigint>();
    for (const [vaultId, r] of records) {
      leaves.set(vaultId, hashVaultLeaf(hasher, r.ownerKey, r.assetId, r.quantizedAmount));
    }

    const levels: Map<bigint, bigint>[] = [leaves];
    for (let l = 0; l < height; l++) {
      const current = levels[l] ?? new Map<bigint, bigint>();
      const next = new Map<bigint, bigint>();
      for (const index of current.keys()) {
        const parent = index >> 1n;
        if (next.has(parent)) continue;
        const left = current.get(parent << 1n) ?? this.emptyAt(l);
        const right = current.get((parent << 1n) | 1n) ?? this.emptyAt(l);
        next.set(parent, hasher.hash(left, right));
      }
      levels.push(next);
    }
    this.levels = levels;
  }

  /**
   * Build a tree of the given height.
   *
   * @throws RangeError on an unsupported height, a vault id outside the
   *   tree, a duplicate vault id, or an invalid record
   */
  static build(
    height: number,
    entries: readonly VaultEntry[],
    hasher: FieldHasher = starkPedersenHasher,
  ): VaultTree {
    if (!Number.isInteger(height) || height < MIN_TREE_HEIGHT || height > MAX_TREE_HEIGHT) {
      throw new RangeError(
        `Tree height must be between ${MIN_TREE_HEIGHT} and ${MAX_TREE_HEIGHT}`,
      );
    }

    const records = new Map<bigint, VaultRecord>();
    for (const { vaultId, record } of entries) {
      if (vaultId < 0n || vaultId >= 1n << BigInt(height)) {
        throw new RangeError(`Vault id ${vaultId} outside a tree of height ${height}`);
      }
      if (records.has(vaultId)) {
        throw new RangeError(`Duplicate vault id ${vaultId}`);
      }
      if (!isVaultRecord(record)) {
        throw new RangeError(`Invalid vault record at vault id ${vaultId}`);
      }
      records.set(vaultId, record);
    }

    return new VaultTree(height, records, hasher);
  }

  getRoot(): bigint {
    return this.levels[this.height]?.get(0n) ?? this.emptyAt(this.height);
  }

  getHeight(): number {
    return this.height;
  }

  getVaultCount(): number {
    return this.records.size;
  }

  /**
   * Wire-format proof for the vault at `vaultId`.
   *
   * @throws RangeError if no vault was placed there
   */
  getProof(vaultId: bigint): VaultProof {
    const record = this.records.get(vaultId);
    if (record === undefined) {
      throw new RangeError(`No vault at id ${vaultId}`);
    }

    const rows: VaultProofRow[] = [
      { left: record.ownerKey, right: record.assetId },
      {
        left: this.hasher.hash(record.ownerKey, record.assetId),
        right: record.quantizedAmount,
      },
    ];

    for (let l = 0; l < this.height; l++) {
      const level = this.levels[l];
      const base = (vaultId >> BigInt(l)) & ~1n;
      rows.push({
        left: level?.get(base) ?? this.emptyAt(l),
        right: level?.get(base | 1n) ?? this.emptyAt(l),
      });
    }

    rows.push({ left: this.getRoot(), right: vaultId });
    return encodeVaultProof(rows);
  }

  private emptyAt(level: number): bigint {
    return this.emptyHashes[level] ?? 0n;
  }
}
