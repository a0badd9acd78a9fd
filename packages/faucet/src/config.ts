// SPDX-License-Identifier: Apache-2.0
/**
 * Startup configuration: command-line flags, then FAUCET_* environment
 * variables, then defaults. Every failure throws ConfigError so the entry
 * point can exit before serving.
 */

import { resolveOption } from "@testnet-faucet/service-kit";
import { type Hex, maxUint256, maxUint64 } from "viem";
import { type PrivateKeyAccount, privateKeyToAccount } from "viem/accounts";

export class ConfigError extends Error {
  constructor(
    public readonly option: string,
    message: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface FaucetConfig {
  rpcUrl: string;
  /** Operator wallet. The raw key is not kept anywhere else. */
  account: PrivateKeyAccount;
  /** Wei sent per dispense. */
  tokensPerRequest: bigint;
  /** Wei per gas unit, used for both the max fee and the priority fee. */
  gasPrice: bigint;
  gasLimit: bigint;
  port: number;
  host: string;
}

interface OptionSpec {
  flag: string;
  env: string;
  default?: string;
  description: string;
}

export const OPTIONS = {
  rpcUrl: {
    flag: "rpc-url",
    env: "FAUCET_RPC_URL",
    default: "http://localhost:8545",
    description: "RPC URL of the network node",
  },
  privateKey: {
    flag: "private-key",
    env: "FAUCET_PRIVATE_KEY",
    description: "Private key of the faucet wallet (hex, 0x prefix optional)",
  },
  tokensPerRequest: {
    flag: "tokens-per-request",
    env: "FAUCET_TOKENS_PER_REQUEST",
    default: "1000000000000000000",
    description: "Amount sent per request, in wei",
  },
  port: {
    flag: "port",
    env: "FAUCET_PORT",
    default: "5556",
    description: "Port to listen on",
  },
  host: {
    flag: "host",
    env: "FAUCET_HOST",
    default: "127.0.0.1",
    description: "Host to bind to",
  },
  gasPriceGwei: {
    flag: "gas-price-gwei",
    env: "FAUCET_GAS_PRICE_GWEI",
    default: "1",
    description: "Gas price in gwei",
  },
  gasLimit: {
    flag: "gas-limit",
    env: "FAUCET_GAS_LIMIT",
    default: "21000",
    description: "Gas limit for dispense transactions",
  },
} as const satisfies Record<string, OptionSpec>;

const GWEI = 1_000_000_000n;

export function usage(): string {
  const lines = ["Usage: testnet-faucet --private-key <hex> [options]", "", "Options:"];
  for (const opt of Object.values<OptionSpec>(OPTIONS)) {
    const def = opt.default !== undefined ? ` (default: ${opt.default})` : " (required)";
    lines.push(`  --${opt.flag.padEnd(20)} ${opt.description}${def}  [env: ${opt.env}]`);
  }
  lines.push(`  --${"help".padEnd(20)} Show this message`);
  return lines.join("\n");
}

function read(opt: OptionSpec, argv: readonly string[], env: NodeJS.ProcessEnv): string {
  const value = resolveOption(opt.flag, opt.env, argv, env) ?? opt.default;
  if (value === undefined) {
    throw new ConfigError(opt.flag, `--${opt.flag} (or ${opt.env}) is required`);
  }
  return value;
}

function parseUnsigned(opt: OptionSpec, raw: string, max: bigint): bigint {
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(opt.flag, `Invalid --${opt.flag} value: "${raw}" is not an unsigned integer`);
  }
  const value = BigInt(raw);
  if (value > max) {
    throw new ConfigError(opt.flag, `Invalid --${opt.flag} value: ${raw} exceeds ${max}`);
  }
  return value;
}

export function parsePrivateKey(raw: string): PrivateKeyAccount {
  const hex = raw.startsWith("0x") ? raw.slice(2) : raw;
  if (!/^[0-9a-fA-F]*$/.test(hex) || hex.length % 2 !== 0) {
    throw new ConfigError(OPTIONS.privateKey.flag, "Invalid private key: not a hex string");
  }
  if (hex.length !== 64) {
    throw new ConfigError(OPTIONS.privateKey.flag, "Invalid private key length");
  }
  const key: Hex = `0x${hex}`;
  try {
    return privateKeyToAccount(key);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(OPTIONS.privateKey.flag, `Invalid private key: ${message}`);
  }
}

export function parseRpcUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(OPTIONS.rpcUrl.flag, `Invalid RPC URL: "${raw}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(OPTIONS.rpcUrl.flag, `Invalid RPC URL: unsupported protocol ${url.protocol}`);
  }
  return raw;
}

/** Resolve the full configuration. Throws ConfigError on the first invalid option. */
export function loadConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): FaucetConfig {
  const rpcUrl = parseRpcUrl(read(OPTIONS.rpcUrl, argv, env));
  const account = parsePrivateKey(read(OPTIONS.privateKey, argv, env));
  const tokensPerRequest = parseUnsigned(
    OPTIONS.tokensPerRequest,
    read(OPTIONS.tokensPerRequest, argv, env),
    maxUint256,
  );
  const port = Number(parseUnsigned(OPTIONS.port, read(OPTIONS.port, argv, env), 65535n));
  const host = read(OPTIONS.host, argv, env);
  const gasPriceGwei = parseUnsigned(
    OPTIONS.gasPriceGwei,
    read(OPTIONS.gasPriceGwei, argv, env),
    maxUint64,
  );
  const gasLimit = parseUnsigned(OPTIONS.gasLimit, read(OPTIONS.gasLimit, argv, env), maxUint64);

  return {
    rpcUrl,
    account,
    tokensPerRequest,
    gasPrice: gasPriceGwei * GWEI,
    gasLimit,
    port,
    host,
  };
}
