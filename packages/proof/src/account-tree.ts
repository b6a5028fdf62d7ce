/**
 * @starkexit/proof: Account Merkle tree builder.
 *
 * Binary keccak256 tree over ownerKey → destination bindings, built the
 * way AccountProofVerifier folds proofs.
 *
 * Design:
 * - Leaves hashed with hashAccountLeaf, in entry order
 * - Internal nodes: hashSortedPair (commutative)
 * - Odd node count: the last node is promoted to the next level unchanged
 * - Empty tree: null root
 * - Single entry: leaf IS the root, and its proof is empty (which the
 *   verifier rejects; real trees have at least two entries)
 * - Immutable: build once, query many times
 */

import type { AccountProof, Hex } from "@starkexit/types";
import { foldAccountProof, hashAccountLeaf, hashSortedPair } from "./account-proof.js";
import type { AccountEntry } from "./types.js";

/**
 * Usage:
 * ```ts
 * const tree = AccountMerkleTree.build([{ ownerKey, destination }, ...]);
 * const root = tree.getRoot();
 * const proof = tree.getProofFor(ownerKey);
 * ```
 */
export class AccountMerkleTree {
  private readonly entries: readonly AccountEntry[];
  /** levels[0] are leaf hashes; the last level holds the root */
  private readonly levels: readonly (readonly Hex[])[];

  private constructor(entries: readonly AccountEntry[]) {
    this.entries = entries;

    const levels: Hex[][] = [entries.map((e) => hashAccountLeaf(e.ownerKey, e.destination))];
    let current = levels[0] ?? [];
    while (current.length > 1) {
      const next: Hex[] = [];
      for (let i = 0; i < current.length; i += 2) {
        const left = current[i];
        const right = current[i + 1];
        if (left === undefined) break;
        next.push(right === undefined ? left : hashSortedPair(left, right));
      }
      levels.push(next);
      current = next;
    }
    this.levels = levels;
  }

  /**
   * @throws RangeError if an owner key appears twice
   */
  static build(entries: readonly AccountEntry[]): AccountMerkleTree {
    const seen = new Set<bigint>();
    for (const { ownerKey } of entries) {
      if (seen.has(ownerKey)) {
        throw new RangeError(`Duplicate owner key 0x${ownerKey.toString(16)}`);
      }
      seen.add(ownerKey);
    }
    return new AccountMerkleTree([...entries]);
  }

  getRoot(): Hex | null {
    const top = this.levels[this.levels.length - 1];
    return top?.[0] ?? null;
  }

  getLeafCount(): number {
    return this.entries.length;
  }

  /**
   * Sibling path for the entry at `index`, leaf level first. Levels where
   * the node was promoted contribute no sibling.
   *
   * @returns the proof, or null if the index is out of range
   */
  getProof(index: number): AccountProof | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      return null;
    }

    const siblings: Hex[] = [];
    let position = index;
    for (const level of this.levels.slice(0, -1)) {
      const sibling = level[position % 2 === 0 ? position + 1 : position - 1];
      if (sibling !== undefined) {
        siblings.push(sibling);
      }
      position = Math.floor(position / 2);
    }
    return siblings;
  }

  /**
   * Proof for the entry holding `ownerKey`, or null if absent.
   */
  getProofFor(ownerKey: bigint): AccountProof | null {
    const index = this.entries.findIndex((e) => e.ownerKey === ownerKey);
    return index === -1 ? null : this.getProof(index);
  }

  /**
   * Statically verify a proof against a root without the tree.
   */
  static verifyProof(entry: AccountEntry, proof: AccountProof, root: Hex): boolean {
    const computed = foldAccountProof(hashAccountLeaf(entry.ownerKey, entry.destination), proof);
    return computed === root.toLowerCase();
  }
}
