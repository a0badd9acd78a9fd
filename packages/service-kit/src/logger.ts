// SPDX-License-Identifier: Apache-2.0
import { getRequestId } from "./request-id.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

function getMinLevel(): LogLevel {
  const env = process.env.LOG_LEVEL;
  if (isLogLevel(env)) return env;
  return process.env.NODE_ENV === "development" ? "debug" : "info";
}

export interface Logger {
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
  debug(msg: string, extra?: Record<string, unknown>): void;
  child(extra: Record<string, unknown>): Logger;
}

// wei amounts are bigints; JSON.stringify rejects them
function replacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

function emit(
  level: LogLevel,
  service: string,
  msg: string,
  baseExtra: Record<string, unknown>,
  extra?: Record<string, unknown>,
): void {
  const minLevel = getMinLevel();
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

  const requestId = getRequestId();
  const line = JSON.stringify(
    {
      level,
      service,
      msg,
      request_id: requestId ?? null,
      ts: new Date().toISOString(),
      ...baseExtra,
      ...extra,
    },
    replacer,
  );

  process.stdout.write(`${line}\n`);
}

export function createLogger(service: string, baseExtra: Record<string, unknown> = {}): Logger {
  return {
    debug(msg: string, extra?: Record<string, unknown>) {
      emit("debug", service, msg, baseExtra, extra);
    },
    info(msg: string, extra?: Record<string, unknown>) {
      emit("info", service, msg, baseExtra, extra);
    },
    warn(msg: string, extra?: Record<string, unknown>) {
      emit("warn", service, msg, baseExtra, extra);
    },
    error(msg: string, extra?: Record<string, unknown>) {
      emit("error", service, msg, baseExtra, extra);
    },
    child(extra: Record<string, unknown>): Logger {
      return createLogger(service, { ...baseExtra, ...extra });
    },
  };
}
