export * from "./logger.ts";
export * from "./request-id.ts";
export * from "./access-log.ts";
export * from "./errors.ts";
export * from "./flags.ts";
export * from "./create-service-app.ts";
