/**
 * @starkexit/ledger: Admin lifecycle.
 *
 * The privileged surface (root commitment, asset registration) is used
 * a handful of times during setup and then locked for good.
 *
 * Rules:
 * - Two states: configurable → finalized, never back
 * - Only the owner identity may finalize, and only once
 * - After finalization every admin mutation fails with ADMIN_FINALIZED
 */

import type { EventStore } from "@starkexit/event-store";
import { createDomainEvent, EVENT_STREAMS, STARKEXIT_EVENTS } from "@starkexit/event-store";
import type { AdminLifecycleOptions, AdminState } from "./types.js";
import { LedgerError } from "./types.js";

export class AdminLifecycle {
  private readonly _owner: string;
  private readonly _events: EventStore;
  private readonly _beforeFinalize: (() => void) | undefined;
  private _state: AdminState;

  constructor(options: AdminLifecycleOptions) {
    this._owner = options.owner;
    this._events = options.events;
    this._beforeFinalize = options.beforeFinalize;
    this._state = options.finalized === true ? "finalized" : "configurable";
  }

  get owner(): string {
    return this._owner;
  }

  get state(): AdminState {
    return this._state;
  }

  isFinalized(): boolean {
    return this._state === "finalized";
  }

  /**
   * @throws LedgerError UNAUTHORIZED unless caller is the owner
   */
  assertOwner(caller: string): void {
    if (caller !== this._owner) {
      throw new LedgerError("UNAUTHORIZED", `"${caller}" is not the owner`);
    }
  }

  /**
   * @throws LedgerError ADMIN_FINALIZED once finalized
   */
  assertConfigurable(): void {
    if (this._state === "finalized") {
      throw new LedgerError(
        "ADMIN_FINALIZED",
        "Admin surface is finalized; no further configuration is accepted",
      );
    }
  }

  /**
   * Lock the admin surface permanently.
   *
   * @throws LedgerError UNAUTHORIZED, ALREADY_FINALIZED, or whatever the
   *   beforeFinalize hook throws
   */
  finalize(caller: string, correlationId?: string): void {
    this.assertOwner(caller);
    if (this._state === "finalized") {
      throw new LedgerError("ALREADY_FINALIZED", "Admin surface is already finalized");
    }
    this._beforeFinalize?.();

    this._events.append(EVENT_STREAMS.admin, [
      createDomainEvent(STARKEXIT_EVENTS.ADMIN_FINALIZED, {
        source: "admin",
        actor: caller,
        payload: { finalizedBy: caller },
        correlationId,
      }),
    ]);
    this._state = "finalized";
  }
}
