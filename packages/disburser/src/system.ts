/**
 * @starkexit/disburser: System factory.
 *
 * Wires the admin lifecycle, root registry, token registry, claims
 * ledger, both verifiers and the disburser around one event store.
 * An existing store is replayed first, so a restarted process picks up
 * exactly where the public log left off.
 */

import type { EventStore } from "@starkexit/event-store";
import { InMemoryEventStore } from "@starkexit/event-store";
import { AdminLifecycle, ClaimsLedger, LedgerError, TokenRegistry } from "@starkexit/ledger";
import type { ClaimsReader } from "@starkexit/ledger";
import { AccountProofVerifier, VaultProofVerifier } from "@starkexit/proof";
import type { FieldHasher } from "@starkexit/proof";
import { toHex } from "@starkexit/types";
import { FundDisburser } from "./fund-disburser.js";
import { replayState } from "./replay.js";
import { RootRegistry } from "./root-registry.js";
import type { ValueTransferer } from "./types.js";

export interface DisbursementSystemConfig {
  /** Identity that registers assets and finalizes */
  readonly owner: string;
  /** Identity that commits roots */
  readonly rootProvider: string;
  readonly transferer: ValueTransferer;
  /** Defaults to a fresh in-memory store */
  readonly events?: EventStore;
  readonly allowRootOverride?: boolean;
  readonly allowedCallers?: readonly string[];
  /** Defaults to Stark Pedersen */
  readonly hasher?: FieldHasher;
  readonly now?: () => string;
}

/**
 * Public summary of the system state.
 */
export interface SystemState {
  readonly finalized: boolean;
  readonly vaultRoot: string | null;
  readonly accountRoot: string | null;
  readonly allowRootOverride: boolean;
  readonly assetCount: number;
  readonly claimCount: number;
  /** Reserved claims whose transfer is not settled */
  readonly pendingCount: number;
  readonly eventCount: number;
  readonly fieldHash: string;
}

export interface DisbursementSystem {
  readonly events: EventStore;
  readonly admin: AdminLifecycle;
  readonly roots: RootRegistry;
  readonly registry: TokenRegistry;
  readonly claims: ClaimsReader;
  readonly vaultVerifier: VaultProofVerifier;
  readonly accountVerifier: AccountProofVerifier;
  readonly disburser: FundDisburser;
  state(): SystemState;
}

export function createDisbursementSystem(config: DisbursementSystemConfig): DisbursementSystem {
  const events = config.events ?? new InMemoryEventStore();
  const replayed = replayState(events.readAll());

  const admin = new AdminLifecycle({
    owner: config.owner,
    events,
    finalized: replayed.finalized,
    beforeFinalize: () => {
      if (!roots.bothCommitted()) {
        throw new LedgerError(
          "ROOTS_NOT_COMMITTED",
          "Both the vault root and the account root must be committed before finalizing",
        );
      }
    },
  });

  const roots = new RootRegistry({
    rootProvider: config.rootProvider,
    admin,
    events,
    allowRootOverride: config.allowRootOverride,
    initial: { vaultRoot: replayed.vaultRoot, accountRoot: replayed.accountRoot },
  });

  const registry = new TokenRegistry({ admin, events, initial: replayed.associations });
  const ledger = new ClaimsLedger({
    events,
    initial: replayed.claims,
    pending: replayed.pending,
    now: config.now,
  });
  const vaultVerifier = new VaultProofVerifier(config.hasher);
  const accountVerifier = new AccountProofVerifier(roots);

  const disburser = new FundDisburser({
    claims: ledger,
    registry,
    roots,
    vaultVerifier,
    accountVerifier,
    transferer: config.transferer,
    allowedCallers: config.allowedCallers,
  });

  return {
    events,
    admin,
    roots,
    registry,
    claims: disburser.claims,
    vaultVerifier,
    accountVerifier,
    disburser,
    state: () => {
      const vaultRoot = roots.getVaultRoot();
      return {
        finalized: admin.isFinalized(),
        vaultRoot: vaultRoot === undefined ? null : toHex(vaultRoot),
        accountRoot: roots.getAccountRoot() ?? null,
        allowRootOverride: roots.allowRootOverride,
        assetCount: registry.list().length,
        claimCount: ledger.count(),
        pendingCount: ledger.listPending().length,
        eventCount: events.globalPosition(),
        fieldHash: vaultVerifier.hashName,
      };
    },
  };
}
