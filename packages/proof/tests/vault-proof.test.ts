/**
 * Vault Proof Tests
 *
 * Verifies:
 * - Tree-built proofs verify and extract the original record and root
 * - Length checks fire before any hashing, in order
 * - Each rejection reason fires for the input it names
 * - Flipping any single word of a valid proof is rejected as a bad path
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { STARK_PRIME } from "@starkexit/types";
import { VaultProofVerifier } from "../src/vault-proof.js";
import { VaultTree } from "../src/vault-tree.js";
import { decodeVaultProof, encodeVaultProof, lengthForHeight } from "../src/vault-codec.js";
import type { VaultProofRow } from "../src/types.js";
import { countingHasher, linearHasher, vaultReason } from "./helpers.js";

// =============================================================================
// Fixtures
// =============================================================================

const record = { ownerKey: 0x12345n, assetId: 1n, quantizedAmount: 5n };
const other = { ownerKey: 0x999n, assetId: 2n, quantizedAmount: 7n };

const tree = VaultTree.build(
  31,
  [
    { vaultId: 5n, record },
    { vaultId: 6n, record: other },
  ],
  linearHasher,
);
const proof = tree.getProof(5n);
const verifier = new VaultProofVerifier(linearHasher);

function withRows(edit: (rows: VaultProofRow[]) => void): readonly bigint[] {
  const rows = decodeVaultProof(proof);
  edit(rows);
  return encodeVaultProof(rows);
}

// =============================================================================
// Valid proofs
// =============================================================================

describe("valid proofs", () => {
  it("verifies a proof built by VaultTree", () => {
    expect(proof).toHaveLength(lengthForHeight(31));
    expect(verifier.verify(proof)).toBe(true);
    expect(verifier.verify(tree.getProof(6n))).toBe(true);
  });

  it("extracts the record, root, vault id and height", () => {
    expect(verifier.extractLeaf(proof)).toEqual(record);
    expect(verifier.extractRoot(proof)).toBe(tree.getRoot());
    expect(verifier.extractVaultId(proof)).toBe(5n);
    expect(verifier.treeHeight(proof)).toBe(31);
  });

  it("extractLeafAndRoot matches extractLeaf and extractRoot", () => {
    expect(verifier.extractLeafAndRoot(proof)).toEqual({
      record: verifier.extractLeaf(proof),
      root: verifier.extractRoot(proof),
    });
  });

  it("verifies at the deepest supported height", () => {
    const deep = VaultTree.build(96, [{ vaultId: (1n << 96n) - 1n, record }], linearHasher);
    const deepProof = deep.getProof((1n << 96n) - 1n);
    expect(deepProof).toHaveLength(198);
    expect(verifier.verify(deepProof)).toBe(true);
  });
});

// =============================================================================
// Structural rejection
// =============================================================================

describe("length checks", () => {
  it("rejects short, long and odd proofs", () => {
    expect(vaultReason(() => verifier.verify(proof.slice(0, 66)))).toBe("PROOF_TOO_SHORT");
    expect(vaultReason(() => verifier.verify(new Array<bigint>(200).fill(0n)))).toBe("PROOF_TOO_LONG");
    expect(vaultReason(() => verifier.verify(new Array<bigint>(69).fill(0n)))).toBe("PROOF_LENGTH_ODD");
    expect(vaultReason(() => verifier.verify(new Array<bigint>(199).fill(0n)))).toBe("PROOF_LENGTH_ODD");
  });

  it("prefers too short over odd", () => {
    expect(vaultReason(() => verifier.verify([1n, 2n, 3n]))).toBe("PROOF_TOO_SHORT");
  });

  it("rejects before computing any hash", () => {
    const hasher = countingHasher();
    const counted = new VaultProofVerifier(hasher);
    for (const length of [0, 66, 67, 69, 200, 1000]) {
      expect(() => counted.verify(new Array<bigint>(length).fill(1n))).toThrow();
    }
    expect(hasher.calls).toBe(0);
  });

  it("carries the fixed messages", () => {
    expect(() => verifier.verify([])).toThrow("Proof too short");
    expect(() => verifier.verify(new Array<bigint>(69).fill(0n))).toThrow("Proof length must be even");
  });
});

describe("content checks", () => {
  it("rejects non-zero padding bits", () => {
    const bad = [...proof];
    bad[1] = (bad[1] ?? 0n) | 1n;
    expect(vaultReason(() => verifier.verify(bad))).toBe("MALFORMED_WORD");
    expect(vaultReason(() => verifier.extractLeaf(bad))).toBe("MALFORMED_WORD");
  });

  it("rejects words outside uint256", () => {
    const tooWide = [...proof];
    tooWide[10] = 1n << 256n;
    expect(vaultReason(() => verifier.verify(tooWide))).toBe("MALFORMED_WORD");

    const negative = [...proof];
    negative[10] = -1n;
    expect(vaultReason(() => verifier.extractRoot(negative))).toBe("MALFORMED_WORD");
  });

  it("rejects a zero or out-of-field owner key", () => {
    const zero = withRows((rows) => {
      rows[0] = { left: 0n, right: 1n };
    });
    const huge = withRows((rows) => {
      rows[0] = { left: STARK_PRIME, right: 1n };
    });
    expect(vaultReason(() => verifier.verify(zero))).toBe("BAD_KEY_OR_ASSET");
    expect(vaultReason(() => verifier.extractLeaf(huge))).toBe("BAD_KEY_OR_ASSET");
  });

  it("rejects an asset id of 250 bits or more", () => {
    const wide = withRows((rows) => {
      rows[0] = { left: 0x12345n, right: 1n << 250n };
    });
    expect(vaultReason(() => verifier.extractLeafAndRoot(wide))).toBe("BAD_KEY_OR_ASSET");
  });

  it("extractRoot skips the key checks", () => {
    const zero = withRows((rows) => {
      rows[0] = { left: 0n, right: 1n };
    });
    expect(verifier.extractRoot(zero)).toBe(tree.getRoot());
  });

  it("rejects a vault id outside the tree", () => {
    const outside = withRows((rows) => {
      rows[rows.length - 1] = { left: tree.getRoot(), right: 1n << 31n };
    });
    expect(vaultReason(() => verifier.verify(outside))).toBe("VAULT_ID_OUT_OF_RANGE");
  });

  it("rejects path values outside the field", () => {
    const outside = withRows((rows) => {
      rows[4] = { left: STARK_PRIME, right: 0n };
    });
    expect(vaultReason(() => verifier.verify(outside))).toBe("BAD_MERKLE_PATH");
  });

  it("rejects a proof for a different root", () => {
    const otherRoot = withRows((rows) => {
      rows[rows.length - 1] = { left: tree.getRoot() + 1n, right: 5n };
    });
    expect(vaultReason(() => verifier.verify(otherRoot))).toBe("BAD_MERKLE_PATH");
  });
});

// =============================================================================
// Tamper rejection
// =============================================================================

describe("tamper rejection", () => {
  it("rejects a single flipped bit in every word", () => {
    proof.forEach((_, index) => {
      const tampered = [...proof];
      tampered[index] = (tampered[index] ?? 0n) ^ (1n << 8n);
      expect(vaultReason(() => verifier.verify(tampered))).toBe("BAD_MERKLE_PATH");
    });
  });

  it("rejects tampering for arbitrary vaults", () => {
    const small = fc.bigInt({ min: 0n, max: (1n << 64n) - 1n });
    fc.assert(
      fc.property(
        fc.bigInt({ min: 1n, max: (1n << 64n) - 1n }),
        small,
        small,
        fc.bigInt({ min: 0n, max: (1n << 31n) - 1n }),
        fc.nat({ max: 67 }),
        (ownerKey, assetId, quantizedAmount, vaultId, index) => {
          const vault = { ownerKey, assetId, quantizedAmount };
          const single = VaultTree.build(31, [{ vaultId, record: vault }], linearHasher);
          const valid = single.getProof(vaultId);

          expect(verifier.verify(valid)).toBe(true);
          expect(verifier.extractLeafAndRoot(valid)).toEqual({
            record: vault,
            root: single.getRoot(),
          });

          const tampered = [...valid];
          tampered[index] = (tampered[index] ?? 0n) ^ (1n << 8n);
          expect(() => verifier.verify(tampered)).toThrow();
        },
      ),
      { numRuns: 40 },
    );
  });
});
