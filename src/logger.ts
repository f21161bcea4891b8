/**
 * Logging seam.
 *
 * Components accept a {@link LoggerMethods} instead of reaching for a
 * module-level logger, so diagnostics never leak between documents and tests
 * can assert on them with spies.
 */

import { type DestinationStream, pino } from "pino";
import { type LogLevel, loadConfigFromEnv } from "./config.js";

export interface LoggerMethods {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface CreateLoggerOptions {
  /** Default: `logLevel` from {@link loadConfigFromEnv}. */
  level?: LogLevel;
  name?: string;
  /** Where JSON lines go. Default: stdout. */
  destination?: DestinationStream;
}

const noop = (): void => undefined;

/** Logger that drops everything. Default when no logger is injected. */
export const silentLogger: LoggerMethods = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/** Build a pino-backed logger writing JSON lines. */
export function createLogger(options: CreateLoggerOptions = {}): LoggerMethods {
  const settings = {
    name: options.name ?? "dataset-citation-extractor",
    level: options.level ?? loadConfigFromEnv().logLevel,
  };
  const base = options.destination ? pino(settings, options.destination) : pino(settings);
  return {
    debug: (message, ...args) => base.debug(message, ...args),
    info: (message, ...args) => base.info(message, ...args),
    warn: (message, ...args) => base.warn(message, ...args),
    error: (message, ...args) => base.error(message, ...args),
  };
}
