/**
 * @starkexit/disburser: Core types.
 *
 * Requests, receipts and ports of the disbursement engine.
 */

import type { Address, ClaimRecord, Hex } from "@starkexit/types";

// =============================================================================
// Disbursement
// =============================================================================

/**
 * Everything a claimant submits. The proofs, not the caller, authorize
 * the payout.
 */
export interface DisbursementRequest {
  readonly ownerKey: bigint;
  readonly destination: string;
  readonly assetId: bigint;
  readonly accountProof: readonly string[];
  readonly vaultProof: readonly bigint[];
}

/**
 * The committed claim plus the values it was computed from.
 */
export interface DisbursementReceipt extends ClaimRecord {
  readonly quantizedAmount: bigint;
  readonly quantum: bigint;
  readonly vaultId: bigint;
}

/**
 * Per-call context: who is calling and how to correlate the events.
 */
export interface CallContext {
  readonly caller: string;
  readonly correlationId?: string;
}

// =============================================================================
// Value Transfer
// =============================================================================

export interface TransferRequest {
  /** ERC-20 contract, or NATIVE_TOKEN */
  readonly token: Address;
  readonly to: Address;
  readonly amount: bigint;
}

export interface TransferResult {
  /** Transaction hash or transfer id */
  readonly reference: string;
}

/**
 * Moves value on the destination ledger. A resolved promise means the
 * value moved. A TransferOutcomeUnknownError means it may have; any
 * other rejection means it did not.
 */
export interface ValueTransferer {
  transfer(request: TransferRequest): Promise<TransferResult>;
}

/**
 * Minimal EVM surface the EvmTransferer needs.
 */
export interface EvmTransferClient {
  /**
   * Sign and broadcast, resolving with the transaction hash. Rejects with
   * TransferOutcomeUnknownError once the signed transaction may have
   * reached the network; any other rejection means nothing was sent.
   */
  sendNative(to: Address, amount: bigint): Promise<Hex>;
  sendToken(token: Address, to: Address, amount: bigint): Promise<Hex>;
  /** Status of the mined transaction; rejects when it cannot be read */
  waitForReceipt(hash: Hex): Promise<"success" | "reverted">;
}

// =============================================================================
// Errors
// =============================================================================

export type DisbursementErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_ROOT"
  | "ROOT_ALREADY_SET"
  | "CALLER_NOT_ALLOWED"
  | "FUND_ALREADY_DISBURSED"
  | "ASSET_NOT_MAPPED"
  | "TRANSFER_FAILED"
  | "TRANSFER_UNCONFIRMED";

/**
 * Structured error from the disbursement engine.
 */
export class DisbursementError extends Error {
  public readonly code: DisbursementErrorCode;

  constructor(code: DisbursementErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DisbursementError";
    this.code = code;
  }
}

/**
 * A transfer was sent but whether it moved value is not known, e.g. the
 * receipt wait timed out. `reference` names the transfer to look up.
 */
export class TransferOutcomeUnknownError extends Error {
  public readonly reference: string;

  constructor(reference: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransferOutcomeUnknownError";
    this.reference = reference;
  }
}
