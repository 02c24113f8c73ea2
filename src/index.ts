export * from "./app/index.ts";
export * from "./config/index.ts";
export * from "./document/index.ts";
export { InvariantError, invariant } from "./errors.ts";
export { configureLogging, type LoggingOptions, type LogLevel } from "./logger.ts";
export * from "./viewer/index.ts";
