/**
 * @starkexit/proof: Vault proof verifier.
 *
 * Authenticates that a (ownerKey, assetId, quantizedAmount) leaf sits at
 * `vaultId` in the tree whose root is embedded at the tail of the proof.
 *
 * Checks run in a fixed order and the first failure throws:
 *   1. PROOF_TOO_SHORT, 2. PROOF_TOO_LONG, 3. PROOF_LENGTH_ODD
 *      (before any decoding or hashing)
 *   4. MALFORMED_WORD
 *   5. BAD_KEY_OR_ASSET
 *   6. VAULT_ID_OUT_OF_RANGE
 *   7. BAD_MERKLE_PATH
 *
 * Extraction runs checks 1–5 (extractRoot and extractVaultId: 1–4) and
 * never walks the path. Comparing the root against committed state is
 * the caller's job.
 *
 * Stateless apart from the hasher; never writes.
 */

import { ASSET_ID_BOUND, STARK_PRIME } from "@starkexit/types";
import type { VaultLeafAndRoot, VaultProof, VaultRecord } from "@starkexit/types";
import { starkPedersenHasher } from "./field-hasher.js";
import {
  MAX_PROOF_LENGTH,
  MIN_PROOF_LENGTH,
  decodeRowAt,
  decodeVaultProof,
  heightForLength,
} from "./vault-codec.js";
import { VaultProofError } from "./types.js";
import type { FieldHasher, VaultProofRow } from "./types.js";

export class VaultProofVerifier {
  private readonly hasher: FieldHasher;

  constructor(hasher: FieldHasher = starkPedersenHasher) {
    this.hasher = hasher;
  }

  /** Name of the field hash in use. */
  get hashName(): string {
    return this.hasher.name;
  }

  /**
   * Verify a vault proof end to end.
   *
   * @returns true; never false
   * @throws VaultProofError with the reason of the first failed check
   */
  verify(proof: VaultProof): true {
    const height = this.treeHeight(proof);
    const rows = decodeVaultProof(proof);
    const leafRow = rowOf(rows, 0);
    const hashRow = rowOf(rows, 1);
    const tail = rowOf(rows, rows.length - 1);

    checkKeyAndAsset(leafRow);

    const vaultId = tail.right;
    if (vaultId >= 1n << BigInt(height)) {
      throw new VaultProofError(
        "VAULT_ID_OUT_OF_RANGE",
        `Vault id ${vaultId} does not fit a tree of height ${height}`,
      );
    }

    for (const row of rows.slice(1)) {
      if (row.left >= STARK_PRIME || (row !== tail && row.right >= STARK_PRIME)) {
        throw badPath("Proof contains a value outside the Stark field");
      }
    }

    if (this.hasher.hash(leafRow.left, leafRow.right) !== hashRow.left) {
      throw badPath("Leaf hash does not match (ownerKey, assetId)");
    }

    let node = this.hasher.hash(hashRow.left, hashRow.right);
    for (let level = 0; level < height; level++) {
      const pair = rowOf(rows, 2 + level);
      const isRight = ((vaultId >> BigInt(level)) & 1n) === 1n;
      if (node !== (isRight ? pair.right : pair.left)) {
        throw badPath(`Path breaks at level ${level}`);
      }
      node = this.hasher.hash(pair.left, pair.right);
    }

    if (node !== tail.left) {
      throw badPath("Path does not reach the embedded root");
    }

    return true;
  }

  /**
   * Decode the vault record. Does not authenticate it.
   */
  extractLeaf(proof: VaultProof): VaultRecord {
    this.treeHeight(proof);
    const rows = decodeVaultProof(proof);
    const leafRow = rowOf(rows, 0);
    checkKeyAndAsset(leafRow);
    return {
      ownerKey: leafRow.left,
      assetId: leafRow.right,
      quantizedAmount: rowOf(rows, 1).right,
    };
  }

  /**
   * Decode the root embedded at the tail of the proof.
   */
  extractRoot(proof: VaultProof): bigint {
    this.treeHeight(proof);
    decodeVaultProof(proof);
    return decodeRowAt(proof, -1).left;
  }

  /**
   * Decode record and root together. Same result as calling
   * extractLeaf and extractRoot separately.
   */
  extractLeafAndRoot(proof: VaultProof): VaultLeafAndRoot {
    const record = this.extractLeaf(proof);
    return { record, root: decodeRowAt(proof, -1).left };
  }

  extractVaultId(proof: VaultProof): bigint {
    this.treeHeight(proof);
    decodeVaultProof(proof);
    return decodeRowAt(proof, -1).right;
  }

  /**
   * Tree height implied by the proof length, after the length checks.
   */
  treeHeight(proof: VaultProof): number {
    if (proof.length < MIN_PROOF_LENGTH) {
      throw new VaultProofError("PROOF_TOO_SHORT", "Proof too short");
    }
    if (proof.length >= MAX_PROOF_LENGTH) {
      throw new VaultProofError("PROOF_TOO_LONG", "Proof too long");
    }
    if (proof.length % 2 !== 0) {
      throw new VaultProofError("PROOF_LENGTH_ODD", "Proof length must be even");
    }
    return heightForLength(proof.length);
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────

function rowOf(rows: readonly VaultProofRow[], index: number): VaultProofRow {
  const row = rows[index];
  if (row === undefined) {
    throw new VaultProofError("MALFORMED_WORD", `Missing row ${index}`);
  }
  return row;
}

function checkKeyAndAsset(row: VaultProofRow): void {
  if (row.left === 0n || row.left >= STARK_PRIME) {
    throw new VaultProofError("BAD_KEY_OR_ASSET", "Owner key out of range");
  }
  if (row.right >= ASSET_ID_BOUND) {
    throw new VaultProofError("BAD_KEY_OR_ASSET", "Asset id wider than 250 bits");
  }
}

function badPath(message: string): VaultProofError {
  return new VaultProofError("BAD_MERKLE_PATH", message);
}
