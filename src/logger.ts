/**
 * Logger for pageview.
 *
 * The pager owns the terminal, so nothing is written to stdout/stderr.
 * By default the console transport is silent; `configureLogging` adds a
 * file transport when a log file is configured.
 *
 * @example
 * ```typescript
 * import * as logger from "./logger.ts";
 *
 * logger.debug("viewer constructed", { width, height });
 * logger.error("data source failed", { error: String(err) });
 * ```
 */

import winston from "winston";

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LoggingOptions {
  readonly level: LogLevel;
  /** Path of a log file. Empty disables file logging. */
  readonly file: string;
}

/** JSON lines with timestamp and pid; metadata is flattened into the entry. */
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const entry: Record<string, unknown> = {
      timestamp,
      level,
      pid: process.pid,
      message,
    };
    for (const [key, value] of Object.entries(meta)) {
      entry[key] = value;
    }
    return JSON.stringify(entry);
  }),
);

const winstonLogger = winston.createLogger({
  level: "warn",
  format: logFormat,
  transports: [new winston.transports.Console({ silent: true })],
  exitOnError: false,
});

let fileTransport: winston.transports.FileTransportInstance | undefined;
let filePath: string | undefined;

/**
 * Apply logging settings. Replaces any previously configured file transport.
 */
export function configureLogging(options: LoggingOptions): void {
  winstonLogger.level = options.level;
  if (fileTransport) {
    winstonLogger.remove(fileTransport);
    fileTransport = undefined;
    filePath = undefined;
  }
  if (options.file.length > 0) {
    fileTransport = new winston.transports.File({ filename: options.file });
    filePath = options.file;
    winstonLogger.add(fileTransport);
  }
}

/** Current minimum level. */
export function logLevel(): string {
  return winstonLogger.level;
}

/** Path of the current log file, if any. */
export function logFile(): string | undefined {
  return filePath;
}

function write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  try {
    winstonLogger.log(level, message, context ?? {});
  } catch {
    // Logging never takes the pager down.
  }
}

export function error(message: string, context?: Record<string, unknown>): void {
  write("error", message, context);
}

export function warn(message: string, context?: Record<string, unknown>): void {
  write("warn", message, context);
}

export function info(message: string, context?: Record<string, unknown>): void {
  write("info", message, context);
}

export function debug(message: string, context?: Record<string, unknown>): void {
  write("debug", message, context);
}
