/**
 * Daemon settings from the environment
 */

import { hostname } from "node:os";
import { z } from "zod";
import { Result } from "better-result";
import { ValidationError } from "@fwsync/errors";
import type { LogLevel } from "@fwsync/logger";

const nonEmpty = z.string().trim().min(1);

export const envSchema = z.object({
  FWSYNC_CONFIG_ROOT: nonEmpty.default("/etc/fwsync"),
  FWSYNC_STATE_DIR: nonEmpty.default("/var/lib/fwsync"),
  FWSYNC_FORCE_DISABLE_FLAG: nonEmpty.default("/run/fwsync-force-disable"),
  FWSYNC_INTERVAL_MS: z.coerce
    .number()
    .int("must be an integer")
    .min(100, "must be at least 100")
    .default(5000),
  FWSYNC_NFT_BIN: nonEmpty.default("nft"),
  FWSYNC_IP_BIN: nonEmpty.default("ip"),
  FWSYNC_NODENAME: nonEmpty.optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface Env {
  configRoot: string;
  stateDir: string;
  forceDisableFlag: string;
  intervalMs: number;
  nftBinary: string;
  ipBinary: string;
  nodename: string;
  logLevel: LogLevel;
}

export function parseEnv(raw: Record<string, string | undefined>): Result<Env, ValidationError> {
  // unset and empty variables take the default
  const present = Object.fromEntries(Object.entries(raw).filter(([, value]) => value !== undefined && value !== ""));

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join(", ");
    return Result.err(new ValidationError({ message: `invalid environment: ${issues}` }));
  }

  const env = parsed.data;
  return Result.ok({
    configRoot: env.FWSYNC_CONFIG_ROOT,
    stateDir: env.FWSYNC_STATE_DIR,
    forceDisableFlag: env.FWSYNC_FORCE_DISABLE_FLAG,
    intervalMs: env.FWSYNC_INTERVAL_MS,
    nftBinary: env.FWSYNC_NFT_BIN,
    ipBinary: env.FWSYNC_IP_BIN,
    nodename: env.FWSYNC_NODENAME ?? hostname(),
    logLevel: env.LOG_LEVEL,
  });
}
