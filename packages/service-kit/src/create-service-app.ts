// SPDX-License-Identifier: Apache-2.0
/**
 * createServiceApp — shared factory for HTTP services.
 *
 * Wires the standard middleware so each service's app module only declares
 * its own routes.
 *
 * Config flags:
 *   skipAccessLog — skip the per-request access log line
 */

import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { cors } from "hono/cors";
import { accessLogMiddleware } from "./access-log.ts";
import { apiError } from "./errors.ts";
import { type Logger, createLogger } from "./logger.ts";
import { type RequestIdVariables, requestIdMiddleware } from "./request-id.ts";

export type ServiceEnv = { Variables: RequestIdVariables };

export interface ServiceAppConfig {
  /** Service name, used as the logger's `service` field. */
  serviceName: string;
  /** Logger to use; a new one named after the service is created otherwise. */
  logger?: Logger;
  skipAccessLog?: boolean;
}

/**
 * Build a pre-wired Hono app.
 *
 * Middleware order:
 *   1. requestIdMiddleware
 *   2. access log (unless skipped)
 *   3. CORS, any origin
 *   4. bodyLimit (1 MB)
 *
 * Unknown routes answer 404 and uncaught errors 500, both in the `{ error }` envelope.
 */
export function createServiceApp(config: ServiceAppConfig): Hono<ServiceEnv> {
  const { serviceName, skipAccessLog = false } = config;
  const logger = config.logger ?? createLogger(serviceName);

  const app = new Hono<ServiceEnv>();

  app.use("*", requestIdMiddleware());

  if (!skipAccessLog) {
    app.use("*", accessLogMiddleware(logger));
  }

  app.use("*", cors());

  app.use(
    "*",
    bodyLimit({
      maxSize: 1024 * 1024,
      onError: (c) => c.json(apiError("Request too large"), 413),
    }),
  );

  app.notFound((c) => c.json(apiError("Not found"), 404));

  app.onError((err, c) => {
    logger.error("unhandled error", { method: c.req.method, path: c.req.path, error: String(err) });
    return c.json(apiError("Internal server error"), 500);
  });

  return app;
}
