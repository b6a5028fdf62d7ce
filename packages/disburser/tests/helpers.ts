/**
 * Shared fixtures for disburser tests.
 *
 * Vaults (tree height 31):
 *   0: owner 0x12345, asset 1, 5 quanta
 *   1: owner 0x12345, asset 2, 3 quanta
 *   2: owner 0x777,   asset 1, 9 quanta
 *   3: owner 0x12345, asset 5, 1 quantum (asset 5 is never mapped)
 *
 * Accounts: 0x12345 → DEST, 0x777 → OTHER
 * Assets:   1 → TOKEN (quantum 10^18), 2 → native (quantum 1)
 */

import { vi } from "vitest";
import { InMemoryEventStore } from "@starkexit/event-store";
import type { EventStore } from "@starkexit/event-store";
import { AccountMerkleTree, VaultTree } from "@starkexit/proof";
import type { FieldHasher } from "@starkexit/proof";
import { NATIVE_TOKEN, STARK_PRIME } from "@starkexit/types";
import type { Hex } from "@starkexit/types";
import { createDisbursementSystem } from "../src/system.js";
import type { DisbursementSystem } from "../src/system.js";
import { InMemoryTransferer } from "../src/transfer.js";
import type { InMemoryTransfererOptions } from "../src/transfer.js";
import type { DisbursementRequest, EvmTransferClient, ValueTransferer } from "../src/types.js";

export const OWNER = "owner";
export const RELAYER = "relayer";
export const TS = "2024-01-01T00:00:00.000Z";
export const TOKEN = "0x000000000000000000000000000000000000bEEF";
export const DEST = "0x000000000000000000000000000000000000abcd";
export const OTHER = "0x0000000000000000000000000000000000001234";

/** Cheap non-commutative stand-in for Pedersen. */
export const linearHasher: FieldHasher = {
  name: "linear-test",
  hash: (a, b) => (a * 3n + b * 7n + 1n) % STARK_PRIME,
};

export const vaultTree = VaultTree.build(
  31,
  [
    { vaultId: 0n, record: { ownerKey: 0x12345n, assetId: 1n, quantizedAmount: 5n } },
    { vaultId: 1n, record: { ownerKey: 0x12345n, assetId: 2n, quantizedAmount: 3n } },
    { vaultId: 2n, record: { ownerKey: 0x777n, assetId: 1n, quantizedAmount: 9n } },
    { vaultId: 3n, record: { ownerKey: 0x12345n, assetId: 5n, quantizedAmount: 1n } },
  ],
  linearHasher,
);

export const accountTree = AccountMerkleTree.build([
  { ownerKey: 0x12345n, destination: DEST },
  { ownerKey: 0x777n, destination: OTHER },
]);

export function accountRoot(): Hex {
  const root = accountTree.getRoot();
  if (root === null) throw new Error("account tree is empty");
  return root;
}

export function accountProof(ownerKey: bigint): readonly Hex[] {
  return accountTree.getProofFor(ownerKey) ?? [];
}

export function request(
  ownerKey: bigint,
  assetId: bigint,
  vaultId: bigint,
  destination: string = ownerKey === 0x777n ? OTHER : DEST,
): DisbursementRequest {
  return {
    ownerKey,
    destination,
    assetId,
    accountProof: accountProof(ownerKey),
    vaultProof: vaultTree.getProof(vaultId),
  };
}

export interface Scenario {
  readonly system: DisbursementSystem;
  readonly transferer: InMemoryTransferer;
  readonly events: EventStore;
}

export interface ScenarioOptions extends InMemoryTransfererOptions {
  readonly events?: EventStore;
  readonly commitRoots?: boolean;
  readonly registerAssets?: boolean;
  readonly fund?: boolean;
  readonly allowedCallers?: readonly string[];
  readonly allowRootOverride?: boolean;
  /** Pay through this instead of the in-memory transferer */
  readonly transferer?: ValueTransferer;
}

export function scenario(options: ScenarioOptions = {}): Scenario {
  const events = options.events ?? new InMemoryEventStore();
  const transferer = new InMemoryTransferer({ onTransfer: options.onTransfer });
  const system = createDisbursementSystem({
    owner: OWNER,
    rootProvider: RELAYER,
    transferer: options.transferer ?? transferer,
    events,
    hasher: linearHasher,
    now: () => TS,
    allowedCallers: options.allowedCallers,
    allowRootOverride: options.allowRootOverride,
  });

  if (options.commitRoots !== false) {
    system.roots.setVaultRoot(vaultTree.getRoot(), RELAYER);
    system.roots.setAccountRoot(accountRoot(), RELAYER);
  }
  if (options.registerAssets !== false) {
    system.registry.registerTokenMappings(
      [
        { assetId: 1n, quantum: 10n ** 18n, destinationToken: TOKEN },
        { assetId: 2n, quantum: 1n, destinationToken: NATIVE_TOKEN },
      ],
      OWNER,
    );
  }
  if (options.fund !== false) {
    transferer.fund(TOKEN, 10n ** 20n);
    transferer.fund(NATIVE_TOKEN, 1000n);
  }

  return { system, transferer, events };
}

export const TX_HASH = `0x${"ab".repeat(32)}` as const;

/** An EVM client whose transactions broadcast but never report a receipt. */
export function stalledClient() {
  return {
    sendNative: vi.fn(async () => TX_HASH),
    sendToken: vi.fn(async () => TX_HASH),
    waitForReceipt: vi.fn(async (): Promise<"success" | "reverted"> => {
      throw new Error("timed out waiting for receipt");
    }),
  } satisfies EvmTransferClient;
}

/** Error `code` and proof `reason`, if any, of a rejected promise. */
export async function rejection(
  promise: Promise<unknown>,
): Promise<{ code?: unknown; reason?: unknown; name?: unknown }> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof Error) {
      return {
        name: error.name,
        code: "code" in error ? error.code : undefined,
        reason: "reason" in error ? error.reason : undefined,
      };
    }
    throw error;
  }
  throw new Error("expected the promise to reject");
}
