/**
 * @starkexit/disburser: Committed roots.
 *
 * Holds the vault root and the account root delivered by the root
 * provider (the messaging adapter between ledgers).
 *
 * Rules:
 * - Checked in order: caller (UNAUTHORIZED), lifecycle (ADMIN_FINALIZED),
 *   shape (INVALID_ROOT), prior commit (ROOT_ALREADY_SET)
 * - Only the root provider identity may commit
 * - Commit-once, unless allowRootOverride was set at construction
 * - No commits after the admin surface is finalized
 * - Every commit is published as root.committed
 */

import type { EventStore, RootKind } from "@starkexit/event-store";
import { createDomainEvent, EVENT_STREAMS, STARKEXIT_EVENTS } from "@starkexit/event-store";
import type { AdminLifecycle } from "@starkexit/ledger";
import type { AccountRootSource } from "@starkexit/proof";
import { isBytes32, isFieldElement, toHex } from "@starkexit/types";
import type { Hex } from "@starkexit/types";
import { DisbursementError } from "./types.js";

export interface RootRegistryOptions {
  readonly rootProvider: string;
  readonly admin: AdminLifecycle;
  readonly events: EventStore;
  /** Intended for pre-production only */
  readonly allowRootOverride?: boolean;
  readonly initial?: {
    readonly vaultRoot?: bigint;
    readonly accountRoot?: Hex;
  };
}

export class RootRegistry implements AccountRootSource {
  private readonly _rootProvider: string;
  private readonly _admin: AdminLifecycle;
  private readonly _events: EventStore;
  private readonly _allowOverride: boolean;
  private _vaultRoot: bigint | undefined;
  private _accountRoot: Hex | undefined;

  constructor(options: RootRegistryOptions) {
    this._rootProvider = options.rootProvider;
    this._admin = options.admin;
    this._events = options.events;
    this._allowOverride = options.allowRootOverride === true;
    this._vaultRoot = options.initial?.vaultRoot;
    this._accountRoot = options.initial?.accountRoot;
  }

  get allowRootOverride(): boolean {
    return this._allowOverride;
  }

  getVaultRoot(): bigint | undefined {
    return this._vaultRoot;
  }

  getAccountRoot(): Hex | undefined {
    return this._accountRoot;
  }

  bothCommitted(): boolean {
    return this._vaultRoot !== undefined && this._accountRoot !== undefined;
  }

  /**
   * Commit the vault root: a non-zero Stark field element.
   */
  setVaultRoot(root: bigint, caller: string, correlationId?: string): void {
    this._guard(caller);
    if (!isFieldElement(root) || root === 0n) {
      throw new DisbursementError("INVALID_ROOT", "Vault root must be a non-zero field element");
    }
    this._checkOverride("vault", this._vaultRoot !== undefined);
    const override = this._vaultRoot !== undefined;
    this._publish("vault", toHex(root), override, caller, correlationId);
    this._vaultRoot = root;
  }

  /**
   * Commit the account root: a non-zero 32-byte hash.
   */
  setAccountRoot(root: string, caller: string, correlationId?: string): void {
    this._guard(caller);
    if (!isBytes32(root) || BigInt(root) === 0n) {
      throw new DisbursementError("INVALID_ROOT", "Account root must be a non-zero 32-byte hash");
    }
    this._checkOverride("account", this._accountRoot !== undefined);
    const normalized: Hex = `0x${root.slice(2).toLowerCase()}`;
    const override = this._accountRoot !== undefined;
    this._publish("account", normalized, override, caller, correlationId);
    this._accountRoot = normalized;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _guard(caller: string): void {
    if (caller !== this._rootProvider) {
      throw new DisbursementError("UNAUTHORIZED", `"${caller}" may not commit roots`);
    }
    this._admin.assertConfigurable();
  }

  private _checkOverride(kind: RootKind, alreadySet: boolean): void {
    if (alreadySet && !this._allowOverride) {
      throw new DisbursementError("ROOT_ALREADY_SET", `The ${kind} root is already committed`);
    }
  }

  private _publish(
    kind: RootKind,
    root: Hex,
    override: boolean,
    caller: string,
    correlationId: string | undefined,
  ): void {
    this._events.append(EVENT_STREAMS.roots, [
      createDomainEvent(STARKEXIT_EVENTS.ROOT_COMMITTED, {
        source: "roots",
        actor: caller,
        payload: { kind, root, override },
        correlationId,
      }),
    ]);
  }
}
