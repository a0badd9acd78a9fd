// SPDX-License-Identifier: Apache-2.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";

export type RequestIdVariables = { requestId: string };

const als = new AsyncLocalStorage<string>();

/**
 * Returns the request ID for the current async context, or null if outside a request.
 */
export function getRequestId(): string | null {
  return als.getStore() ?? null;
}

/**
 * Hono middleware that assigns a request ID to each request.
 * Reads `X-Request-Id` from the incoming request if present, otherwise generates one.
 * The ID lives in AsyncLocalStorage (for the logger) and on the Hono context (for handlers),
 * and is echoed back in the `X-Request-Id` response header.
 */
export function requestIdMiddleware(): MiddlewareHandler<{ Variables: RequestIdVariables }> {
  return async (c, next) => {
    const id = c.req.header("x-request-id") ?? randomUUID().slice(0, 12);
    c.set("requestId", id);
    c.header("X-Request-Id", id);
    await als.run(id, next);
  };
}
