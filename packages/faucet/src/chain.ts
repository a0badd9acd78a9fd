// SPDX-License-Identifier: Apache-2.0
/**
 * ChainClient — the node-facing capabilities the dispense workflow needs.
 * The service layer only talks to this interface; createChainClient backs it
 * with a viem public client and the operator's local account.
 */

import { BaseError, http, createPublicClient } from "viem";
import type { Address, Hash, Hex, LocalAccount } from "viem";
import { sendRawTransaction } from "viem/actions";

export interface DispenseTransaction {
  to: Address;
  nonce: number;
  value: bigint;
  gas: bigint;
  maxFeePerGas: bigint;
  maxPriorityFeePerGas: bigint;
  chainId: number;
}

export interface ChainClient {
  /** Operator address; every signed transaction comes from it. */
  readonly address: Address;
  getBalance(address: Address): Promise<bigint>;
  getTransactionCount(address: Address): Promise<number>;
  getChainId(): Promise<number>;
  /** Sign with the operator wallet. Returns the serialized EIP-1559 transaction. */
  signTransaction(tx: DispenseTransaction): Promise<Hex>;
  /** Broadcast a signed transaction. Returns its hash. */
  sendRawTransaction(serialized: Hex): Promise<Hash>;
}

export interface ChainClientOptions {
  rpcUrl: string;
  account: LocalAccount;
}

export function createChainClient({ rpcUrl, account }: ChainClientOptions): ChainClient {
  const client = createPublicClient({ transport: http(rpcUrl) });

  return {
    address: account.address,
    getBalance: (address) => client.getBalance({ address }),
    getTransactionCount: (address) => client.getTransactionCount({ address }),
    getChainId: () => client.getChainId(),
    signTransaction: (tx) => account.signTransaction({ type: "eip1559", ...tx }),
    sendRawTransaction: (serializedTransaction) =>
      sendRawTransaction(client, { serializedTransaction }),
  };
}

/**
 * One-line text for a failed chain call. For viem errors this is the first
 * line of `shortMessage` followed by `details`, which carries the node's own
 * reason (e.g. "nonce too low").
 */
export function chainErrorMessage(err: unknown): string {
  if (err instanceof BaseError) {
    const summary = err.shortMessage.split("\n")[0];
    if (err.details && err.details !== summary) {
      return `${summary.replace(/\.$/, "")}: ${err.details}`;
    }
    return summary;
  }
  return err instanceof Error ? err.message : String(err);
}
