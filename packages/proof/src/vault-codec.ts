/**
 * @starkexit/proof: Vault proof wire format.
 *
 * A vault proof is a flat sequence of uint256 words, two per row.
 * Each row packs two 252-bit values into 512 bits:
 *
 *   left (252) | right (252) | zeros (8)
 *
 *   word0 = left << 4 | right >> 248
 *   word1 = (right mod 2^248) << 8
 *
 * Rows, top to bottom:
 *   0        (ownerKey, assetId)
 *   1        (H(ownerKey, assetId), quantizedAmount)
 *   2..h+1   (left, right) children at each level, leaf level first
 *   last     (root, vaultId)
 */

import { isUint256 } from "@starkexit/types";
import type { VaultProof } from "@starkexit/types";
import { VaultProofError } from "./types.js";
import type { VaultProofRow } from "./types.js";

/** Shortest accepted proof: tree height 31. */
export const MIN_PROOF_LENGTH = 68;

/** Exclusive upper bound on proof length: tree height 96 at most. */
export const MAX_PROOF_LENGTH = 200;

/** Rows that are not tree levels: two leaf rows and the root row. */
const NON_LEVEL_ROWS = 3;

const VALUE_BOUND = 1n << 252n;
const LOW_248 = (1n << 248n) - 1n;
const PADDING_MASK = 0xffn;

/**
 * Tree height implied by a proof length. Does not validate the length.
 */
export function heightForLength(length: number): number {
  return length / 2 - NON_LEVEL_ROWS;
}

/**
 * Proof length for a tree of the given height.
 */
export function lengthForHeight(height: number): number {
  return (height + NON_LEVEL_ROWS) * 2;
}

/**
 * Pack rows into wire words.
 *
 * @throws VaultProofError MALFORMED_WORD if a value does not fit in 252 bits
 */
export function encodeVaultProof(rows: readonly VaultProofRow[]): VaultProof {
  const words: bigint[] = [];
  rows.forEach((row, index) => {
    for (const value of [row.left, row.right]) {
      if (value < 0n || value >= VALUE_BOUND) {
        throw new VaultProofError(
          "MALFORMED_WORD",
          `Row ${index} holds a value wider than 252 bits`,
        );
      }
    }
    words.push((row.left << 4n) | (row.right >> 248n));
    words.push((row.right & LOW_248) << 8n);
  });
  return words;
}

/**
 * Unpack wire words into rows. The length must already be even.
 *
 * @throws VaultProofError MALFORMED_WORD on a word outside uint256 or
 *   non-zero padding bits
 */
export function decodeVaultProof(proof: VaultProof): VaultProofRow[] {
  const rows: VaultProofRow[] = [];
  for (let i = 0; i + 1 < proof.length; i += 2) {
    rows.push(decodeRow(proof[i], proof[i + 1], i / 2));
  }
  return rows;
}

/**
 * Unpack the row at `rowIndex`; negative indexes count from the end.
 */
export function decodeRowAt(proof: VaultProof, rowIndex: number): VaultProofRow {
  const row = rowIndex < 0 ? proof.length / 2 + rowIndex : rowIndex;
  return decodeRow(proof[row * 2], proof[row * 2 + 1], row);
}

function decodeRow(
  word0: bigint | undefined,
  word1: bigint | undefined,
  rowIndex: number,
): VaultProofRow {
  if (!isUint256(word0) || !isUint256(word1)) {
    throw new VaultProofError(
      "MALFORMED_WORD",
      `Row ${rowIndex} contains a word that is not a uint256`,
    );
  }
  if ((word1 & PADDING_MASK) !== 0n) {
    throw new VaultProofError(
      "MALFORMED_WORD",
      `Row ${rowIndex} has non-zero padding bits`,
    );
  }
  return {
    left: word0 >> 4n,
    right: ((word0 & 0xfn) << 248n) | (word1 >> 8n),
  };
}
