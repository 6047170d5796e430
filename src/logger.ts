/**
 * Module-scoped color-coded loggers for the charge controller bridge.
 *
 * Pretty, colour-tagged lines in development; one JSON object per line
 * everywhere else, ready for journald or a log shipper.
 */
import pino from "pino";

import { loggingConfig } from "./config.js";

/**
 * ANSI colour per module, used in the pretty message prefix.
 */
const MODULE_COLORS = {
  bridge: "\x1b[34m", // blue
  scheduler: "\x1b[33m", // yellow
  device: "\x1b[36m", // cyan
  discovery: "\x1b[35m", // magenta
  mqtt: "\x1b[91m", // bright red
} as const;

const RESET = "\x1b[0m";

export type ModuleName = keyof typeof MODULE_COLORS;

export type Logger = pino.Logger;

type LogContext = Record<string, unknown>;

/**
 * Create a module-scoped logger.
 *
 * @example
 * const log = createLogger("device");
 * log.warn({ field: "solar_voltage", address: 0x0107 }, "Field omitted");
 */
export function createLogger(module: ModuleName): Logger {
  const options: pino.LoggerOptions = {
    name: module,
    level: loggingConfig.LOG_LEVEL,
  };

  if (loggingConfig.NODE_ENV !== "development") {
    return pino(options);
  }

  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        messageFormat: `${MODULE_COLORS[module]}[{name}]${RESET} {msg}`,
        ignore: "pid,hostname",
        translateTime: "HH:MM:ss",
      },
    },
  });
}

/**
 * Message of an Error, or the string form of anything else that was thrown.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Log operation entry with consistent format.
 */
export function logOperationStart(
  logger: Logger,
  operation: string,
  context: LogContext = {},
): void {
  logger.info({ operation, ...context }, `→ ${operation} started`);
}

/**
 * Log operation completion with its duration.
 */
export function logOperationComplete(
  logger: Logger,
  operation: string,
  startTime: number,
  context: LogContext = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

export function logOperationFailed(
  logger: Logger,
  operation: string,
  error: unknown,
  context: LogContext = {},
): void {
  const message = describeError(error);
  logger.error(
    { operation, error: message, ...context },
    `✗ ${operation} failed: ${message}`,
  );
}
