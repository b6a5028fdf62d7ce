/**
 * @starkexit/proof: Account proof verifier.
 *
 * Authenticates that a Stark key is bound to a destination address
 * under the committed account root.
 *
 * Ordering contract, shared with AccountMerkleTree:
 * - Leaf: keccak256(keccak256(abi.encode(uint256 ownerKey, address destination)))
 * - Node: keccak256(min(a, b) ‖ max(a, b)), sorted as uint256
 *
 * Pre-checks run before any hashing, in order: owner key, destination,
 * empty proof, proof depth, node width, root presence.
 */

import { concat, encodeAbiParameters, getAddress, hexToBigInt, isAddress, keccak256 } from "viem";
import { isBytes32, isZeroAddress, STARK_PRIME } from "@starkexit/types";
import type { Address, Hex } from "@starkexit/types";
import { AccountProofError } from "./types.js";
import type { AccountRootSource } from "./types.js";

/** Deepest account tree a proof may describe. */
export const MAX_ACCOUNT_PROOF_DEPTH = 64;

// =============================================================================
// Hashing
// =============================================================================

/**
 * Leaf hash of an ownerKey → destination binding. The address is
 * checksummed first, so any casing hashes the same.
 */
export function hashAccountLeaf(ownerKey: bigint, destination: Address): Hex {
  const encoded = encodeAbiParameters(
    [{ type: "uint256" }, { type: "address" }],
    [ownerKey, getAddress(destination)],
  );
  return keccak256(keccak256(encoded));
}

/**
 * Commutative node hash: the smaller child goes first.
 */
export function hashSortedPair(a: Hex, b: Hex): Hex {
  return hexToBigInt(a) <= hexToBigInt(b)
    ? keccak256(concat([a, b]))
    : keccak256(concat([b, a]));
}

/**
 * Fold a leaf up through its siblings.
 */
export function foldAccountProof(leaf: Hex, proof: readonly Hex[]): Hex {
  return proof.reduce<Hex>((node, sibling) => hashSortedPair(node, sibling), leaf);
}

// =============================================================================
// Verification
// =============================================================================

/**
 * Verify an account proof against an explicit root.
 *
 * @returns true; never false
 * @throws AccountProofError with the reason of the first failed check
 */
export function verifyAccountProof(
  ownerKey: bigint,
  destination: string | null | undefined,
  proof: readonly string[],
  root: string | undefined,
): true {
  if (ownerKey <= 0n || ownerKey >= STARK_PRIME) {
    throw new AccountProofError("INVALID_OWNER_KEY", "Invalid owner key");
  }
  if (
    destination === null ||
    destination === undefined ||
    !isAddress(destination, { strict: false }) ||
    isZeroAddress(destination)
  ) {
    throw new AccountProofError("INVALID_DESTINATION", "Invalid destination address");
  }
  if (proof.length === 0) {
    throw new AccountProofError("EMPTY_PROOF", "Proof must not be empty");
  }
  if (proof.length > MAX_ACCOUNT_PROOF_DEPTH) {
    throw new AccountProofError(
      "PROOF_TOO_LONG",
      `Proof deeper than ${MAX_ACCOUNT_PROOF_DEPTH} levels`,
    );
  }

  const siblings: Hex[] = [];
  for (const [index, node] of proof.entries()) {
    if (!isBytes32(node)) {
      throw new AccountProofError(
        "MALFORMED_PROOF_NODE",
        `Proof node ${index} is not 32 bytes`,
      );
    }
    siblings.push(node);
  }

  if (root === undefined) {
    throw new AccountProofError("ROOT_NOT_SET", "Account root has not been committed");
  }

  const computed = foldAccountProof(hashAccountLeaf(ownerKey, destination), siblings);
  if (computed !== root.toLowerCase()) {
    throw new AccountProofError(
      "INVALID_PROOF",
      "Proof does not reach the committed account root",
    );
  }
  return true;
}

/**
 * Verifier bound to the committed account root.
 */
export class AccountProofVerifier {
  private readonly roots: AccountRootSource;

  constructor(roots: AccountRootSource) {
    this.roots = roots;
  }

  verify(
    ownerKey: bigint,
    destination: string | null | undefined,
    proof: readonly string[],
  ): true {
    return verifyAccountProof(ownerKey, destination, proof, this.roots.getAccountRoot());
  }
}
