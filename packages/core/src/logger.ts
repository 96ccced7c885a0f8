// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Logger adapter interface for structured logging in backend clients.
 *
 * Lets applications plug in their own logging (Winston, Pino, a log
 * shipper) instead of console output.
 *
 * @example
 * ```typescript
 * import { createBackendClient } from "@roamlink/client";
 * import type { LoggerAdapter } from "@roamlink/core";
 *
 * class MyLogger implements LoggerAdapter {
 *   debug(context: string, message: string, data?: unknown) {
 *     console.debug(`[${context}] ${message}`, data);
 *   }
 *
 *   info(context: string, message: string, data?: unknown) {
 *     console.log(`[${context}] ${message}`, data);
 *   }
 *
 *   warn(context: string, message: string, data?: unknown) {
 *     console.warn(`[${context}] ${message}`, data);
 *   }
 *
 *   error(context: string, message: string, data?: unknown) {
 *     console.error(`[${context}] ${message}`, data);
 *   }
 * }
 *
 * const client = createBackendClient({
 *   server: "https://ns.example.com/backend",
 *   senderID: "000001",
 *   receiverID: "000002",
 *   logger: new MyLogger(),
 * });
 * ```
 */
export interface LoggerAdapter {
  /**
   * Log a debug-level message
   *
   * @param context - Category or source of the log (e.g., "dispatch", "correlation")
   * @param message - Log message
   * @param data - Optional structured data
   */
  debug(context: string, message: string, data?: unknown): void;

  info(context: string, message: string, data?: unknown): void;

  warn(context: string, message: string, data?: unknown): void;

  /**
   * Log an error-level message
   *
   * @param data - Optional structured data (error details, stack trace, etc.)
   */
  error(context: string, message: string, data?: unknown): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /**
   * Custom log sink. When set, console output is skipped.
   */
  log?: (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ) => void;

  /**
   * Minimum log level to output (default: "debug")
   */
  minLevel?: LogLevel;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Create a logger adapter with custom configuration
 */
export function createLogger(options: LoggerOptions = {}): LoggerAdapter {
  const minLevelValue = LEVELS[options.minLevel ?? "debug"];

  const write = (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ): void => {
    if (LEVELS[level] < minLevelValue) return;
    if (options.log) {
      options.log(level, context, message, data);
      return;
    }
    const line = `[${context}] ${message}`;
    if (data === undefined) {
      console[level](line);
    } else {
      console[level](line, data);
    }
  };

  return {
    debug: (context, message, data) => write("debug", context, message, data),
    info: (context, message, data) => write("info", context, message, data),
    warn: (context, message, data) => write("warn", context, message, data),
    error: (context, message, data) => write("error", context, message, data),
  };
}

/**
 * Logger that drops everything.
 */
export const silentLogger: LoggerAdapter = createLogger({
  log: () => undefined,
});

/**
 * Log context constants used by the backend client
 *
 * Applications can use these to filter or categorize logs
 */
export const LOG_CONTEXT = {
  DISPATCH: "dispatch",
  CORRELATION: "correlation",
  TRANSPORT: "transport",
  PUBLISH: "publish",
  PUBSUB: "pubsub",
} as const;
