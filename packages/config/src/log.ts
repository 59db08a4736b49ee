import { Result } from "better-result";
import { ParseError } from "@fwsync/errors";
import { parseBool, parseInteger } from "./parse";

/**
 * Rule and chain log levels. `nolog` disables logging.
 */
export type LogLevel =
  | "nolog"
  | "emerg"
  | "alert"
  | "crit"
  | "err"
  | "warning"
  | "notice"
  | "info"
  | "debug";

const LEVEL_NAMES: Record<string, LogLevel> = {
  nolog: "nolog",
  emerg: "emerg",
  alert: "alert",
  crit: "crit",
  err: "err",
  warn: "warning",
  warning: "warning",
  notice: "notice",
  info: "info",
  debug: "debug",
};

const SEVERITY: Record<LogLevel, number | undefined> = {
  nolog: undefined,
  emerg: 0,
  alert: 1,
  crit: 2,
  err: 3,
  warning: 4,
  notice: 5,
  info: 6,
  debug: 7,
};

export function parseLogLevel(text: string): Result<LogLevel, ParseError> {
  const level = Object.hasOwn(LEVEL_NAMES, text) ? LEVEL_NAMES[text] : undefined;
  if (!level) {
    return Result.err(new ParseError({ message: `invalid log level "${text}"`, input: text }));
  }
  return Result.ok(level);
}

/**
 * nflog severity (0-7), undefined for `nolog`
 */
export function logLevelSeverity(level: LogLevel): number | undefined {
  return SEVERITY[level];
}

export function formatLogLevel(level: LogLevel): string {
  return level === "warning" ? "warn" : level;
}

export type RateTimescale = "second" | "minute" | "hour" | "day";

function isTimescale(value: string): value is RateTimescale {
  return value === "second" || value === "minute" || value === "hour" || value === "day";
}

export interface LogRateLimit {
  enabled: boolean;
  rate: number;
  per: RateTimescale;
  burst: number;
}

export const DEFAULT_LOG_RATE_LIMIT: Readonly<LogRateLimit> = {
  enabled: true,
  rate: 1,
  per: "second",
  burst: 5,
};

/**
 * Parse `[enable,]key=value,...` with keys enable, burst and rate (`n[/unit]`)
 */
export function parseLogRateLimit(text: string): Result<LogRateLimit, ParseError> {
  const limit: LogRateLimit = { ...DEFAULT_LOG_RATE_LIMIT };

  for (const element of text.split(",")) {
    const index = element.indexOf("=");

    if (index === -1) {
      const enabled = parseBool(element);
      if (enabled.isErr()) {
        return Result.err(enabled.error);
      }
      limit.enabled = enabled.unwrap();
      continue;
    }

    const key = element.slice(0, index);
    const value = element.slice(index + 1);
    if (key === "" || value === "") {
      return Result.err(new ParseError({ message: "invalid value in log_ratelimit", input: text }));
    }

    switch (key) {
      case "enable": {
        const enabled = parseBool(value);
        if (enabled.isErr()) {
          return Result.err(enabled.error);
        }
        limit.enabled = enabled.unwrap();
        break;
      }
      case "burst": {
        const burst = parseInteger(value, "burst");
        if (burst.isErr()) {
          return Result.err(burst.error);
        }
        limit.burst = burst.unwrap();
        break;
      }
      case "rate": {
        const slash = value.indexOf("/");
        const rateText = slash === -1 ? value : value.slice(0, slash);
        const rate = parseInteger(rateText, "rate");
        if (rate.isErr()) {
          return Result.err(rate.error);
        }
        limit.rate = rate.unwrap();

        if (slash !== -1) {
          const unit = value.slice(slash + 1);
          if (unit === "") {
            return Result.err(new ParseError({ message: "empty unit specification", input: text }));
          }
          if (!isTimescale(unit)) {
            return Result.err(new ParseError({ message: `invalid time scale: ${unit}`, input: text }));
          }
          limit.per = unit;
        }
        break;
      }
      default:
        return Result.err(
          new ParseError({ message: `invalid key in log_ratelimit: ${key}`, input: text })
        );
    }
  }

  return Result.ok(limit);
}
