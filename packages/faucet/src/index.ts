// SPDX-License-Identifier: Apache-2.0
import { apiError, createServiceApp } from "@testnet-faucet/service-kit";
import type { FaucetRequest, HealthResponse } from "./api.ts";
import { type DispenseDeps, dispense } from "./service.ts";

export const SERVICE_NAME = "testnet-faucet";

function readRequest(body: object): FaucetRequest | undefined {
  return "address" in body && typeof body.address === "string"
    ? { address: body.address }
    : undefined;
}

export function createFaucetApp(deps: DispenseDeps) {
  const { logger } = deps;
  const app = createServiceApp({ serviceName: SERVICE_NAME, logger });

  // GET /health — liveness, independent of the node
  app.get("/health", (c) => {
    const body: HealthResponse = { status: "healthy", timestamp: new Date().toISOString() };
    return c.json(body);
  });

  // POST /faucet — dispense to a zero-balance address
  app.post("/faucet", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      logger.warn("JSON parse failed on POST /faucet", { error: String(err) });
      return c.json(apiError("Invalid JSON body"), 400);
    }
    if (typeof body !== "object" || body === null || Array.isArray(body)) {
      return c.json(apiError("Invalid JSON body"), 400);
    }

    const request = readRequest(body);
    if (!request) {
      return c.json(apiError("Invalid address"), 400);
    }
    const { address } = request;

    const result = await dispense(address, deps);
    if (!result.ok) {
      if (result.status >= 500) {
        logger.error("dispense failed", { code: result.code, message: result.message, address });
      }
      return c.json(apiError(result.message), result.status);
    }
    return c.json(result.data, 200);
  });

  return app;
}
