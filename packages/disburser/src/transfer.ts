/**
 * @starkexit/disburser: Value transferers.
 *
 * - InMemoryTransferer: custody balances in memory, for tests and demos
 * - EvmTransferer: native or ERC-20 transfers through an EvmTransferClient
 */

import { NATIVE_TOKEN } from "@starkexit/types";
import type { Address } from "@starkexit/types";
import type {
  EvmTransferClient,
  TransferRequest,
  TransferResult,
  ValueTransferer,
} from "./types.js";
import { TransferOutcomeUnknownError } from "./types.js";

function tokenKey(token: Address): string {
  return token.toLowerCase();
}

export function isNativeToken(token: Address): boolean {
  return tokenKey(token) === tokenKey(NATIVE_TOKEN);
}

// =============================================================================
// In-memory
// =============================================================================

export interface InMemoryTransfererOptions {
  /**
   * Called before value moves, while the disbursement is in flight.
   * A recipient that calls back into the disburser is modelled here.
   */
  readonly onTransfer?: (request: TransferRequest) => Promise<void> | void;
}

/**
 * Holds custody balances per token and credits recipients.
 */
export class InMemoryTransferer implements ValueTransferer {
  private readonly _custody = new Map<string, bigint>();
  private readonly _received = new Map<string, bigint>();
  private readonly _transfers: TransferRequest[] = [];
  private readonly _onTransfer: InMemoryTransfererOptions["onTransfer"];

  constructor(options: InMemoryTransfererOptions = {}) {
    this._onTransfer = options.onTransfer;
  }

  /** Add custody funds for a token. */
  fund(token: Address, amount: bigint): void {
    const key = tokenKey(token);
    this._custody.set(key, (this._custody.get(key) ?? 0n) + amount);
  }

  /** Custody balance still available for a token. */
  custodyOf(token: Address): bigint {
    return this._custody.get(tokenKey(token)) ?? 0n;
  }

  /** Total a recipient has received of a token. */
  balanceOf(token: Address, holder: Address): bigint {
    return this._received.get(`${tokenKey(token)}:${holder.toLowerCase()}`) ?? 0n;
  }

  /** Completed transfers, oldest first. */
  transfers(): readonly TransferRequest[] {
    return [...this._transfers];
  }

  async transfer(request: TransferRequest): Promise<TransferResult> {
    await this._onTransfer?.(request);

    const key = tokenKey(request.token);
    const available = this._custody.get(key) ?? 0n;
    if (available < request.amount) {
      throw new Error(
        `Insufficient custody balance for ${request.token}: have ${available}, need ${request.amount}`,
      );
    }

    this._custody.set(key, available - request.amount);
    const holder = `${key}:${request.to.toLowerCase()}`;
    this._received.set(holder, (this._received.get(holder) ?? 0n) + request.amount);
    this._transfers.push(request);

    return { reference: `memory-${this._transfers.length}` };
  }
}

// =============================================================================
// EVM
// =============================================================================

/**
 * Sends native currency or calls ERC-20 `transfer`, then waits for the
 * receipt. A reverted transaction rejects with a plain Error; a receipt
 * that cannot be read rejects with TransferOutcomeUnknownError carrying
 * the hash, since the transaction may still be mined.
 */
export class EvmTransferer implements ValueTransferer {
  private readonly _client: EvmTransferClient;

  constructor(client: EvmTransferClient) {
    this._client = client;
  }

  async transfer(request: TransferRequest): Promise<TransferResult> {
    const hash = isNativeToken(request.token)
      ? await this._client.sendNative(request.to, request.amount)
      : await this._client.sendToken(request.token, request.to, request.amount);

    let status: "success" | "reverted";
    try {
      status = await this._client.waitForReceipt(hash);
    } catch (error) {
      throw new TransferOutcomeUnknownError(
        hash,
        `No receipt for ${hash}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
    if (status === "reverted") {
      throw new Error(`Transaction ${hash} reverted`);
    }
    return { reference: hash };
  }
}
