/**
 * @starkexit/disburser: viem-backed EvmTransferClient.
 *
 * Signs with a local private key and talks JSON-RPC over HTTP. The
 * transaction is signed before it is broadcast, so its hash is known
 * even when the broadcast call itself fails.
 * Known chains use viem's definitions; any other id gets a minimal
 * chain built from the RPC URL.
 */

import {
  createPublicClient,
  createWalletClient,
  defineChain,
  encodeFunctionData,
  erc20Abi,
  http,
  keccak256,
  type Chain,
} from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { arbitrum, base, mainnet, optimism, polygon, sepolia } from "viem/chains";
import type { Address, Hex } from "@starkexit/types";
import type { EvmTransferClient } from "./types.js";
import { TransferOutcomeUnknownError } from "./types.js";

// =============================================================================
// Chain ID to viem Chain mapping
// =============================================================================

const VIEM_CHAINS: Record<number, Chain> = {
  1: mainnet,
  11155111: sepolia,
  8453: base,
  42161: arbitrum,
  10: optimism,
  137: polygon,
};

export interface ViemTransferClientConfig {
  readonly rpcUrl: string;
  readonly chainId: number;
  readonly privateKey: Hex;
}

export function resolveChain(chainId: number, rpcUrl: string): Chain {
  return (
    VIEM_CHAINS[chainId] ??
    defineChain({
      id: chainId,
      name: `chain-${chainId}`,
      nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
      rpcUrls: { default: { http: [rpcUrl] } },
    })
  );
}

export function createViemTransferClient(config: ViemTransferClientConfig): EvmTransferClient {
  const chain = resolveChain(config.chainId, config.rpcUrl);
  const account = privateKeyToAccount(config.privateKey);
  const transport = http(config.rpcUrl);
  const wallet = createWalletClient({ account, chain, transport });
  const reader = createPublicClient({ chain, transport });

  // Preparing or signing fails before anything leaves the process
  async function broadcast(to: Address, value: bigint, data?: Hex): Promise<Hex> {
    const request = await wallet.prepareTransactionRequest({ account, to, value, data });
    const serializedTransaction = await wallet.signTransaction(request);
    const hash = keccak256(serializedTransaction);
    try {
      return await wallet.sendRawTransaction({ serializedTransaction });
    } catch (error) {
      throw new TransferOutcomeUnknownError(
        hash,
        `Broadcast of ${hash} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  return {
    sendNative: (to, amount) => broadcast(to, amount),

    sendToken: (token, to, amount) =>
      broadcast(
        token,
        0n,
        encodeFunctionData({ abi: erc20Abi, functionName: "transfer", args: [to, amount] }),
      ),

    async waitForReceipt(hash) {
      const receipt = await reader.waitForTransactionReceipt({ hash });
      return receipt.status;
    },
  };
}
