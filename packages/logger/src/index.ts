/**
 * @fwsync/logger
 *
 * Structured JSON logging with correlation IDs, one per synchronization cycle
 */

import { customAlphabet } from "nanoid";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogContext {
  correlationId: string;
  /** Minimum level that is written (default: info) */
  minLevel?: LogLevel;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(context: Partial<LogContext>): Logger;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  correlationId: string;
  message: string;
  [key: string]: unknown;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a structured logger with correlation ID support
 */
export function createLogger(context: LogContext): Logger {
  const threshold = LOG_LEVELS.indexOf(context.minLevel ?? "info");

  const formatLog = (
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>
  ): string => {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      correlationId: context.correlationId,
      message,
      ...Object.fromEntries(
        Object.entries(context).filter(
          ([key]) => key !== "correlationId" && key !== "minLevel"
        )
      ),
      ...meta,
    };
    return JSON.stringify(entry);
  };

  const enabled = (level: LogLevel) => LOG_LEVELS.indexOf(level) >= threshold;

  return {
    debug: (msg, meta) => {
      if (enabled("debug")) console.debug(formatLog("debug", msg, meta));
    },
    info: (msg, meta) => {
      if (enabled("info")) console.info(formatLog("info", msg, meta));
    },
    warn: (msg, meta) => {
      if (enabled("warn")) console.warn(formatLog("warn", msg, meta));
    },
    error: (msg, meta) => {
      if (enabled("error")) console.error(formatLog("error", msg, meta));
    },
    child: (childContext) =>
      createLogger({
        ...context,
        ...childContext,
        correlationId: childContext.correlationId ?? context.correlationId,
      }),
  };
}

/**
 * A logger that drops everything, for callers that do not care
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

const randomSuffix = customAlphabet("0123456789abcdefghijklmnopqrstuvwxyz", 6);

/**
 * Generate a unique correlation ID for one synchronization cycle
 */
export function generateCorrelationId(prefix = "cycle"): string {
  return `${prefix}_${Date.now().toString(36)}_${randomSuffix()}`;
}
