/**
 * DisbursementService: Composition root behind the HTTP routes.
 *
 * Route handlers delegate to this service; they never touch domain
 * components directly. It converts between wire views (strings) and
 * domain values (bigints), tags every event with the request's
 * correlation id, and logs each mutation.
 */

import type { Logger } from "pino";
import { DisbursementError } from "@starkexit/disburser";
import type { DisbursementRequest, DisbursementSystem, SystemState } from "@starkexit/disburser";
import type { EventStoreIntegrityResult, StoredEvent } from "@starkexit/event-store";
import { claimKey } from "@starkexit/ledger";
import { AccountProofError, VaultProofError } from "@starkexit/proof";
import { toHex } from "@starkexit/types";
import type { TokenAssociation } from "@starkexit/types";
import type {
  AccountProofVerdict,
  AssetView,
  ClaimView,
  EventsQuery,
  ReceiptView,
  RegisterAssetsDto,
  VaultProofVerdict,
} from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export interface DisbursementServiceOptions {
  readonly system: DisbursementSystem;
  readonly logger: Logger;
}

/** Who is calling, and which request the resulting events belong to. */
export interface RequestContext {
  readonly caller: string;
  readonly requestId: string;
}

export interface EventPage {
  readonly events: readonly StoredEvent[];
  /** Position to pass as fromPosition for the next page */
  readonly nextPosition: number;
}

// =============================================================================
// Service
// =============================================================================

export class DisbursementService {
  readonly system: DisbursementSystem;
  private readonly _logger: Logger;

  constructor(options: DisbursementServiceOptions) {
    this.system = options.system;
    this._logger = options.logger;
  }

  // ─── Reads ─────────────────────────────────────────────────────────

  state(): SystemState {
    return this.system.state();
  }

  listAssets(): readonly AssetView[] {
    return this.system.registry.list().map(assetView);
  }

  getAsset(assetId: bigint): AssetView | undefined {
    const association = this.system.registry.getAssociation(assetId);
    return association === undefined ? undefined : assetView(association);
  }

  getClaim(ownerKey: bigint, assetId: bigint): ClaimView | undefined {
    const { claims } = this.system;
    const status = claims.getStatus(ownerKey, assetId);
    if (status === undefined) return undefined;

    const base = {
      key: claimKey(ownerKey, assetId),
      ownerKey: toHex(ownerKey),
      assetId: assetId.toString(),
    };
    const claim = claims.getClaim(ownerKey, assetId);
    if (claim === undefined) {
      const pending = claims.getPending(ownerKey, assetId);
      return {
        ...base,
        status: "pending",
        destination: pending?.destination,
        token: pending?.token,
        amount: pending?.amount.toString(),
        transferRef: pending?.transferRef,
        reservedAt: pending?.reservedAt,
      };
    }
    return {
      ...base,
      status: "claimed",
      destination: claim.destination,
      token: claim.token,
      amount: claim.amount.toString(),
      transferRef: claim.transferRef,
      claimedAt: claim.claimedAt,
    };
  }

  listEvents(query: EventsQuery): EventPage {
    const events = this.system.events.readAll({
      fromPosition: query.fromPosition,
      maxCount: query.limit,
    });
    const last = events.at(-1);
    return {
      events,
      nextPosition: last === undefined ? query.fromPosition : last.globalPosition + 1,
    };
  }

  checkIntegrity(): EventStoreIntegrityResult {
    return this.system.events.verifyIntegrity();
  }

  isReady(): boolean {
    return this.checkIntegrity().valid;
  }

  // ─── Proof checks (no state change) ────────────────────────────────

  verifyVaultProof(proof: readonly bigint[]): VaultProofVerdict {
    const verifier = this.system.vaultVerifier;
    try {
      verifier.verify(proof);
      const { record, root } = verifier.extractLeafAndRoot(proof);
      return {
        valid: true,
        ownerKey: toHex(record.ownerKey),
        assetId: record.assetId.toString(),
        quantizedAmount: record.quantizedAmount.toString(),
        vaultId: verifier.extractVaultId(proof).toString(),
        root: toHex(root),
        height: verifier.treeHeight(proof),
        matchesCommittedRoot: root === this.system.roots.getVaultRoot(),
      };
    } catch (error) {
      if (error instanceof VaultProofError) {
        return { valid: false, reason: error.reason, message: error.message };
      }
      throw error;
    }
  }

  verifyAccountProof(
    ownerKey: bigint,
    destination: string,
    proof: readonly string[],
  ): AccountProofVerdict {
    try {
      this.system.accountVerifier.verify(ownerKey, destination, proof);
      return { valid: true };
    } catch (error) {
      if (error instanceof AccountProofError) {
        return { valid: false, reason: error.reason, message: error.message };
      }
      throw error;
    }
  }

  // ─── Disbursement ──────────────────────────────────────────────────

  async disburse(dto: DisbursementRequest, context: RequestContext): Promise<ReceiptView> {
    const log = this._logger.child({
      requestId: context.requestId,
      caller: context.caller,
      ownerKey: toHex(dto.ownerKey),
      assetId: dto.assetId.toString(),
    });

    try {
      const receipt = await this.system.disburser.disburse(dto, {
        caller: context.caller,
        correlationId: context.requestId,
      });
      log.info(
        { amount: receipt.amount.toString(), token: receipt.token, transferRef: receipt.transferRef },
        "Disbursement completed",
      );
      return {
        key: receipt.key,
        ownerKey: toHex(receipt.ownerKey),
        assetId: receipt.assetId.toString(),
        vaultId: receipt.vaultId.toString(),
        destination: receipt.destination,
        token: receipt.token,
        quantizedAmount: receipt.quantizedAmount.toString(),
        quantum: receipt.quantum.toString(),
        amount: receipt.amount.toString(),
        transferRef: receipt.transferRef,
        claimedAt: receipt.claimedAt,
      };
    } catch (error) {
      if (error instanceof DisbursementError && error.code === "TRANSFER_UNCONFIRMED") {
        // Claim stays pending until someone checks the transaction
        log.error(errorFields(error), "Disbursement unconfirmed, claim held");
      } else {
        log.warn(errorFields(error), "Disbursement rejected");
      }
      throw error;
    }
  }

  // ─── Admin ─────────────────────────────────────────────────────────

  commitVaultRoot(root: bigint, context: RequestContext): void {
    this.system.roots.setVaultRoot(root, context.caller, context.requestId);
    this._logger.info(
      { requestId: context.requestId, caller: context.caller, root: toHex(root) },
      "Vault root committed",
    );
  }

  commitAccountRoot(root: string, context: RequestContext): void {
    this.system.roots.setAccountRoot(root, context.caller, context.requestId);
    this._logger.info(
      { requestId: context.requestId, caller: context.caller, root: this.system.roots.getAccountRoot() },
      "Account root committed",
    );
  }

  registerAssets(assets: RegisterAssetsDto["assets"], context: RequestContext): readonly AssetView[] {
    const registered = this.system.registry.registerTokenMappings(
      assets,
      context.caller,
      context.requestId,
    );
    this._logger.info(
      {
        requestId: context.requestId,
        caller: context.caller,
        assetIds: registered.map((a) => a.assetId.toString()),
      },
      "Assets registered",
    );
    return registered.map(assetView);
  }

  finalize(context: RequestContext): SystemState {
    this.system.admin.finalize(context.caller, context.requestId);
    this._logger.info(
      { requestId: context.requestId, caller: context.caller },
      "Admin surface finalized",
    );
    return this.state();
  }
}

// =============================================================================
// Helpers
// =============================================================================

function assetView(association: TokenAssociation): AssetView {
  return {
    assetId: association.assetId.toString(),
    quantum: association.quantum.toString(),
    destinationToken: association.destinationToken,
  };
}

function errorFields(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) return { error: String(error) };
  return {
    code: "code" in error ? error.code : undefined,
    reason: "reason" in error ? error.reason : undefined,
    message: error.message,
  };
}
