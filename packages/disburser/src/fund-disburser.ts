/**
 * @starkexit/disburser: Fund disburser.
 *
 * The single value-moving entry point. Open to anyone: the proofs
 * authorize the payout, not the caller.
 *
 * Steps, each a hard gate (first failure aborts with no state change):
 *   0. Caller allow-list, when configured    → CALLER_NOT_ALLOWED
 *   1. Claim key not pending or claimed      → FUND_ALREADY_DISBURSED
 *   2. Account proof under the account root  → AccountProofError
 *   3. Vault proof under the vault root, for
 *      the same owner and asset              → VaultProofError
 *   4. Asset mapped                          → ASSET_NOT_MAPPED
 *   5. Reserve the claim (claim.reserved is written here)
 *   6. Transfer quantizedAmount × quantum; then
 *      - success: commit the claim
 *      - known failure: release the claim    → TRANSFER_FAILED
 *      - unknown outcome: hold it pending    → TRANSFER_UNCONFIRMED
 *
 * Steps 1–5 run synchronously, so the reservation is in place before
 * the transfer yields. A reentrant call for the same claim during the
 * transfer fails at step 1, and so does any call after a restart that
 * replays the reservation.
 */

import { getAddress } from "viem";
import type { ClaimsLedger, ClaimsReader, TokenLookup } from "@starkexit/ledger";
import { toDestinationAmount } from "@starkexit/ledger";
import type { AccountProofVerifier, VaultProofVerifier } from "@starkexit/proof";
import { VaultProofError } from "@starkexit/proof";
import { toHex } from "@starkexit/types";
import type { RootRegistry } from "./root-registry.js";
import type {
  CallContext,
  DisbursementReceipt,
  DisbursementRequest,
  ValueTransferer,
} from "./types.js";
import { DisbursementError, TransferOutcomeUnknownError } from "./types.js";

export interface FundDisburserOptions {
  readonly claims: ClaimsLedger;
  readonly registry: TokenLookup;
  readonly roots: RootRegistry;
  readonly vaultVerifier: VaultProofVerifier;
  readonly accountVerifier: AccountProofVerifier;
  readonly transferer: ValueTransferer;
  /** When set, only these callers may disburse */
  readonly allowedCallers?: readonly string[];
}

export class FundDisburser {
  private readonly _claims: ClaimsLedger;
  private readonly _registry: TokenLookup;
  private readonly _roots: RootRegistry;
  private readonly _vaultVerifier: VaultProofVerifier;
  private readonly _accountVerifier: AccountProofVerifier;
  private readonly _transferer: ValueTransferer;
  private readonly _allowedCallers: ReadonlySet<string> | undefined;

  constructor(options: FundDisburserOptions) {
    this._claims = options.claims;
    this._registry = options.registry;
    this._roots = options.roots;
    this._vaultVerifier = options.vaultVerifier;
    this._accountVerifier = options.accountVerifier;
    this._transferer = options.transferer;
    this._allowedCallers =
      options.allowedCallers === undefined ? undefined : new Set(options.allowedCallers);
  }

  /** Read-only view of the claims this disburser writes. */
  get claims(): ClaimsReader {
    return this._claims.reader();
  }

  async disburse(
    request: DisbursementRequest,
    context: CallContext = { caller: "anonymous" },
  ): Promise<DisbursementReceipt> {
    const { ownerKey, destination, assetId, accountProof, vaultProof } = request;

    // 0. Deployment gate
    if (this._allowedCallers !== undefined && !this._allowedCallers.has(context.caller)) {
      throw new DisbursementError(
        "CALLER_NOT_ALLOWED",
        `"${context.caller}" is not allowed to disburse`,
      );
    }

    // 1. Idempotency
    if (this._claims.isClaimed(ownerKey, assetId)) {
      throw new DisbursementError(
        "FUND_ALREADY_DISBURSED",
        `Funds already disbursed for owner ${toHex(ownerKey)} and asset ${assetId}`,
      );
    }

    // 2. Account binding
    this._accountVerifier.verify(ownerKey, destination, accountProof);
    const to = getAddress(destination);

    // 3. Vault ownership
    const committedRoot = this._roots.getVaultRoot();
    if (committedRoot === undefined) {
      throw new VaultProofError("VAULT_ROOT_NOT_SET", "Vault root has not been committed");
    }
    this._vaultVerifier.verify(vaultProof);
    const { record, root } = this._vaultVerifier.extractLeafAndRoot(vaultProof);
    if (root !== committedRoot) {
      throw new VaultProofError("ROOT_MISMATCH", "Proof root differs from the committed vault root");
    }
    if (record.ownerKey !== ownerKey) {
      throw new VaultProofError("OWNER_MISMATCH", "Vault belongs to a different owner key");
    }
    if (record.assetId !== assetId) {
      throw new VaultProofError("ASSET_MISMATCH", "Vault holds a different asset");
    }

    // 4. Asset mapping
    const association = this._registry.getAssociation(assetId);
    if (association === undefined) {
      throw new DisbursementError("ASSET_NOT_MAPPED", `Asset ${assetId} is not mapped`);
    }
    const amount = toDestinationAmount(record.quantizedAmount, association.quantum);

    // 5. Effects before interaction
    const reservation = this._claims.reserve(ownerKey, assetId, {
      destination: to,
      token: association.destinationToken,
      amount,
      actor: context.caller,
      correlationId: context.correlationId,
    });

    // 6. Interaction
    let reference: string;
    try {
      ({ reference } = await this._transferer.transfer({
        token: association.destinationToken,
        to,
        amount,
      }));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      if (error instanceof TransferOutcomeUnknownError) {
        reservation.hold(error.reference, reason);
        throw new DisbursementError(
          "TRANSFER_UNCONFIRMED",
          `Transfer ${error.reference} was sent but not confirmed: ${reason}`,
          { cause: error },
        );
      }
      reservation.release(reason);
      throw new DisbursementError("TRANSFER_FAILED", `Transfer failed: ${reason}`, {
        cause: error,
      });
    }

    const claim = reservation.commit(reference);

    return {
      ...claim,
      quantizedAmount: record.quantizedAmount,
      quantum: association.quantum,
      vaultId: this._vaultVerifier.extractVaultId(vaultProof),
    };
  }
}
