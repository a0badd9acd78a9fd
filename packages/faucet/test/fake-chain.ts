/**
 * In-process ChainClient for tests. Balances and node answers are plain
 * fields; signing uses a real local account so submitted transactions can be
 * decoded and their hashes checked.
 */

import { vi } from "vitest";
import { keccak256 } from "viem";
import type { Address, Hash, Hex } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import type { ChainClient, DispenseTransaction } from "../src/chain.ts";
import type { Logger } from "@testnet-faucet/service-kit";

// Placeholder key, never funded anywhere
export const TEST_PRIVATE_KEY: Hex = `0x${"11".repeat(32)}`;

export const ONE_ETH = 1_000_000_000_000_000_000n;

export interface FakeChainState {
  operatorBalance: bigint;
  balances: Map<string, bigint>;
  nonce: number;
  chainId: number;
  submitted: Hex[];
}

export function createFakeChain(initial: Partial<Omit<FakeChainState, "submitted">> = {}) {
  const account = privateKeyToAccount(TEST_PRIVATE_KEY);
  const state: FakeChainState = {
    operatorBalance: initial.operatorBalance ?? 10n * ONE_ETH,
    balances: initial.balances ?? new Map(),
    nonce: initial.nonce ?? 7,
    chainId: initial.chainId ?? 31337,
    submitted: [],
  };

  const chain = {
    address: account.address,
    getBalance: vi.fn(async (address: Address): Promise<bigint> => {
      if (address === account.address) return state.operatorBalance;
      return state.balances.get(address) ?? 0n;
    }),
    getTransactionCount: vi.fn(async (_address: Address): Promise<number> => state.nonce),
    getChainId: vi.fn(async (): Promise<number> => state.chainId),
    signTransaction: vi.fn(
      (tx: DispenseTransaction): Promise<Hex> => account.signTransaction({ type: "eip1559", ...tx }),
    ),
    sendRawTransaction: vi.fn(async (serialized: Hex): Promise<Hash> => {
      state.submitted.push(serialized);
      return keccak256(serialized);
    }),
  } satisfies ChainClient;

  return { chain, state, account };
}

export function stubLogger(): Logger {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => logger),
  };
  return logger;
}
