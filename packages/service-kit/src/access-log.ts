// SPDX-License-Identifier: Apache-2.0
import type { MiddlewareHandler } from "hono";
import type { Logger } from "./logger.ts";

/** One `info` line per request, written after the response is produced. */
export function accessLogMiddleware(logger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();
    await next();
    logger.info("request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration_ms: Date.now() - start,
    });
  };
}
