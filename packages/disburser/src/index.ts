/**
 * @starkexit/disburser: Proof-gated disbursement engine.
 *
 * - RootRegistry: commit-once vault and account roots
 * - FundDisburser: verify both proofs, reserve the claim, transfer
 * - Value transferers: in-memory and EVM (viem)
 * - replayState / createDisbursementSystem: rebuild from the public log
 *
 * @packageDocumentation
 */

export type {
  DisbursementRequest,
  DisbursementReceipt,
  CallContext,
  TransferRequest,
  TransferResult,
  ValueTransferer,
  EvmTransferClient,
  DisbursementErrorCode,
} from "./types.js";
export { DisbursementError, TransferOutcomeUnknownError } from "./types.js";

export { RootRegistry } from "./root-registry.js";
export type { RootRegistryOptions } from "./root-registry.js";

export { InMemoryTransferer, EvmTransferer, isNativeToken } from "./transfer.js";
export type { InMemoryTransfererOptions } from "./transfer.js";
export { createViemTransferClient, resolveChain } from "./viem-client.js";
export type { ViemTransferClientConfig } from "./viem-client.js";

export { FundDisburser } from "./fund-disburser.js";
export type { FundDisburserOptions } from "./fund-disburser.js";

export { replayState } from "./replay.js";
export type { ReplayedState } from "./replay.js";

export { createDisbursementSystem } from "./system.js";
export type { DisbursementSystem, DisbursementSystemConfig, SystemState } from "./system.js";
