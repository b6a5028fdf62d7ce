/**
 * @starkexit/disburser: Rebuild state from the public event log.
 *
 * Folds asset.mapped, root.committed, the claim.* lifecycle and
 * admin.finalized events, in global order, into the state every
 * component is constructed from. Anyone holding the log can run this;
 * no privileged read is involved.
 *
 * A claim.reserved with no later claim.disbursed or claim.released comes
 * back as pending: a process that stopped mid-transfer cannot say whether
 * value moved, so the claim stays blocked.
 */

import type { StoredEvent } from "@starkexit/event-store";
import { EventStoreError, STARKEXIT_EVENTS } from "@starkexit/event-store";
import { isAddress, isBytes32, isTokenAssociation, parseUint } from "@starkexit/types";
import type { Address, ClaimRecord, Hex, PendingClaim, TokenAssociation } from "@starkexit/types";

export interface ReplayedState {
  readonly associations: readonly TokenAssociation[];
  readonly vaultRoot: bigint | undefined;
  readonly accountRoot: Hex | undefined;
  readonly claims: readonly ClaimRecord[];
  /** Reserved claims never settled, in reservation order */
  readonly pending: readonly PendingClaim[];
  readonly finalized: boolean;
  /** Events of types this system does not know, skipped */
  readonly skipped: number;
}

export function replayState(events: readonly StoredEvent[]): ReplayedState {
  const associations: TokenAssociation[] = [];
  const claims: ClaimRecord[] = [];
  const pending = new Map<Hex, PendingClaim>();
  let vaultRoot: bigint | undefined;
  let accountRoot: Hex | undefined;
  let finalized = false;
  let skipped = 0;

  for (const stored of events) {
    const { type, payload, metadata } = stored.event;
    const position = stored.globalPosition;
    const field = (name: string): string => stringField(payload, name, position);
    const uint = (name: string): bigint => uintField(field(name), name, position);
    const address = (name: string): Address => addressField(field(name), name, position);
    const key = (): Hex => {
      const value = field("claimKey");
      if (!isBytes32(value)) throw corrupt(position, "claimKey");
      return value;
    };
    const reserved = (): PendingClaim => {
      const entry = pending.get(key());
      if (entry === undefined) throw corrupt(position, "claimKey");
      return entry;
    };

    switch (type) {
      case STARKEXIT_EVENTS.ASSET_MAPPED: {
        const association = {
          assetId: uint("assetId"),
          quantum: uint("quantum"),
          destinationToken: address("destinationToken"),
        };
        if (!isTokenAssociation(association)) {
          throw new EventStoreError(
            "CORRUPT_LOG",
            `Event at position ${position} is not a valid token association`,
          );
        }
        associations.push(association);
        break;
      }

      case STARKEXIT_EVENTS.ROOT_COMMITTED: {
        const kind = field("kind");
        const root = field("root");
        if (kind === "vault") {
          vaultRoot = uintField(root, "root", position);
        } else if (kind === "account") {
          if (!isBytes32(root)) throw corrupt(position, "root");
          accountRoot = root;
        } else {
          throw corrupt(position, "kind");
        }
        break;
      }

      case STARKEXIT_EVENTS.CLAIM_RESERVED: {
        const claimKey = key();
        pending.set(claimKey, {
          key: claimKey,
          ownerKey: uint("ownerKey"),
          assetId: uint("assetId"),
          destination: address("destination"),
          token: address("token"),
          amount: uint("amount"),
          reservedAt: metadata.timestamp,
        });
        break;
      }

      case STARKEXIT_EVENTS.CLAIM_UNCONFIRMED: {
        const entry = reserved();
        pending.set(entry.key, { ...entry, transferRef: field("transferRef") });
        break;
      }

      case STARKEXIT_EVENTS.CLAIM_RELEASED:
        pending.delete(reserved().key);
        break;

      case STARKEXIT_EVENTS.CLAIM_DISBURSED: {
        const claimKey = key();
        pending.delete(claimKey);
        claims.push({
          key: claimKey,
          ownerKey: uint("ownerKey"),
          assetId: uint("assetId"),
          destination: address("destination"),
          token: address("token"),
          amount: uint("amount"),
          transferRef: field("transferRef"),
          claimedAt: metadata.timestamp,
        });
        break;
      }

      case STARKEXIT_EVENTS.ADMIN_FINALIZED:
        finalized = true;
        break;

      default:
        skipped += 1;
    }
  }

  return {
    associations,
    vaultRoot,
    accountRoot,
    claims,
    pending: [...pending.values()],
    finalized,
    skipped,
  };
}

// ─── Payload parsing ──────────────────────────────────────────────────

function corrupt(position: number, name: string): EventStoreError {
  return new EventStoreError(
    "CORRUPT_LOG",
    `Event at position ${position} has an invalid "${name}" field`,
  );
}

function stringField(payload: Readonly<Record<string, unknown>>, name: string, position: number): string {
  const value = payload[name];
  if (typeof value !== "string") throw corrupt(position, name);
  return value;
}

function uintField(value: string, name: string, position: number): bigint {
  const parsed = parseUint(value);
  if (parsed === undefined) throw corrupt(position, name);
  return parsed;
}

function addressField(value: string, name: string, position: number): Address {
  if (!isAddress(value)) throw corrupt(position, name);
  return value;
}
