// SPDX-License-Identifier: Apache-2.0
import { getAddress, isAddress } from "viem";
import type { Address, Hash, Hex } from "viem";
import type { Logger, ServiceResult } from "@testnet-faucet/service-kit";
import type { DispenseErrorCode, FaucetResponse } from "./api.ts";
import { type ChainClient, type DispenseTransaction, chainErrorMessage } from "./chain.ts";
import type { FaucetConfig } from "./config.ts";

export type DispenseParams = Pick<FaucetConfig, "tokensPerRequest" | "gasPrice" | "gasLimit">;

export interface DispenseDeps {
  chain: ChainClient;
  params: DispenseParams;
  logger: Logger;
}

type DispenseFailure = Extract<ServiceResult<never>, { ok: false }>;

function fail(status: 400 | 500, code: DispenseErrorCode, message: string): DispenseFailure {
  return { ok: false, status, code, message };
}

/**
 * Returns the address if `value` is exactly its own EIP-55 encoding.
 * All-lowercase and all-uppercase spellings are rejected along with bad checksums.
 */
export function parseChecksummedAddress(value: string): Address | null {
  if (!isAddress(value, { strict: false })) return null;
  const checksummed = getAddress(value);
  return checksummed === value ? checksummed : null;
}

export function buildDispenseTransaction(
  to: Address,
  nonce: number,
  chainId: number,
  params: DispenseParams,
): DispenseTransaction {
  return {
    to,
    nonce,
    value: params.tokensPerRequest,
    gas: params.gasLimit,
    maxFeePerGas: params.gasPrice,
    maxPriorityFeePerGas: params.gasPrice,
    chainId,
  };
}

/**
 * Send the configured amount to `recipient`.
 *
 * Only zero-balance recipients qualify, and the operator must hold at least
 * the dispense amount. Each chain call is awaited in turn; the balance checks
 * and the broadcast are not atomic, so concurrent requests for one recipient
 * can both pass the checks.
 */
export async function dispense(
  recipient: string,
  { chain, params, logger }: DispenseDeps,
): Promise<ServiceResult<FaucetResponse>> {
  const to = parseChecksummedAddress(recipient);
  if (!to) return fail(400, "invalid_address", "Invalid address");

  const from = chain.address;

  let operatorBalance: bigint;
  try {
    operatorBalance = await chain.getBalance(from);
  } catch (err) {
    return fail(500, "upstream_error", `Failed to get balance: ${chainErrorMessage(err)}`);
  }
  if (operatorBalance < params.tokensPerRequest) {
    return fail(400, "insufficient_balance", "Insufficient balance");
  }

  let recipientBalance: bigint;
  try {
    recipientBalance = await chain.getBalance(to);
  } catch (err) {
    return fail(500, "upstream_error", `Failed to get balance: ${chainErrorMessage(err)}`);
  }
  if (recipientBalance > 0n) {
    return fail(400, "already_funded", "Receiver already has a balance greater than 0");
  }

  let nonce: number;
  try {
    nonce = await chain.getTransactionCount(from);
  } catch (err) {
    return fail(500, "upstream_error", `Failed to get nonce: ${chainErrorMessage(err)}`);
  }

  let chainId: number;
  try {
    chainId = await chain.getChainId();
  } catch (err) {
    return fail(500, "upstream_error", `Failed to get chain ID: ${chainErrorMessage(err)}`);
  }

  const tx = buildDispenseTransaction(to, nonce, chainId, params);

  let signed: Hex;
  try {
    signed = await chain.signTransaction(tx);
  } catch (err) {
    return fail(500, "build_error", `Failed to build transaction: ${chainErrorMessage(err)}`);
  }

  let txHash: Hash;
  try {
    txHash = await chain.sendRawTransaction(signed);
  } catch (err) {
    return fail(500, "submission_error", `Failed to send transaction: ${chainErrorMessage(err)}`);
  }

  logger.info("sent tokens", { amount: params.tokensPerRequest, to, tx_hash: txHash });
  return { ok: true, data: { transaction_hash: txHash } };
}
