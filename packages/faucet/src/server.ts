// SPDX-License-Identifier: Apache-2.0
/**
 * Process entry point: load config (exit 1 on any error), then serve until
 * SIGINT/SIGTERM. Per-request failures never reach this level.
 */

import { pathToFileURL } from "node:url";
import { type ServerType, serve } from "@hono/node-server";
import { type Logger, createLogger, hasFlag } from "@testnet-faucet/service-kit";
import { createChainClient } from "./chain.ts";
import { ConfigError, type FaucetConfig, loadConfig, usage } from "./config.ts";
import { SERVICE_NAME, createFaucetApp } from "./index.ts";

export function startServer(config: FaucetConfig, logger: Logger): ServerType {
  const chain = createChainClient({ rpcUrl: config.rpcUrl, account: config.account });
  const app = createFaucetApp({
    chain,
    params: {
      tokensPerRequest: config.tokensPerRequest,
      gasPrice: config.gasPrice,
      gasLimit: config.gasLimit,
    },
    logger,
  });

  return serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    logger.info("listening", {
      host: config.host,
      port: info.port,
      rpc_url: config.rpcUrl,
      operator: config.account.address,
      tokens_per_request: config.tokensPerRequest,
      gas_price_wei: config.gasPrice,
      gas_limit: config.gasLimit,
    });
  });
}

export function main(argv: string[]): void {
  const logger = createLogger(SERVICE_NAME);

  if (hasFlag("help", argv)) {
    process.stdout.write(`${usage()}\n`);
    return;
  }

  let config: FaucetConfig;
  try {
    config = loadConfig(argv);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error("invalid configuration", { option: err.option, error: err.message });
    } else {
      logger.error("startup failed", { error: String(err) });
    }
    process.exit(1);
  }

  const server = startServer(config, logger);

  const shutdown = (signal: string) => {
    logger.info("shutting down", { signal });
    server.close((err) => {
      if (err) {
        logger.error("close failed", { error: String(err) });
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main(process.argv.slice(2));
}
