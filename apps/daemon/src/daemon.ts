/**
 * The synchronization loop
 *
 * Every cycle reloads the configuration, compiles it and pushes the result to
 * the engine. Cycles never overlap; a failed cycle is logged and the next one
 * starts after the usual interval.
 */

import { access } from "node:fs/promises";
import { setTimeout as delay } from "node:timers/promises";
import { Result } from "better-result";
import type { NftIoError } from "@fwsync/errors";
import {
  type ConfigSource,
  type EngineError,
  type EngineGateway,
  Firewall,
  type FullHostFwError,
  loadFirewallConfig,
  type LoadError,
  type LoadOptions,
  type TunableWriter,
} from "@fwsync/firewall";
import { generateCorrelationId, type Logger } from "@fwsync/logger";

export type CycleOutcome = "forced-off" | "disabled" | "applied";

export type CycleError = LoadError | FullHostFwError | EngineError;

export interface DaemonOptions {
  source: ConfigSource;
  gateway: EngineGateway;
  logger: Logger;
  /** Base ruleset applied before every compiled batch */
  skeleton: string;
  nodename: string;
  stateDir: string;
  forceDisableFlag: string;
  intervalMs: number;
  detectManagementCidrs?: LoadOptions["detectManagementCidrs"];
  writeTunable?: TunableWriter;
  fileExists?: (path: string) => Promise<boolean>;
  sleep?: (ms: number) => Promise<unknown>;
}

async function fileExists(path: string): Promise<boolean> {
  const result = await Result.tryPromise({
    try: () => access(path),
    catch: (error) => error,
  });
  return result.isOk();
}

export class Daemon {
  private stopping = false;
  private readonly logger: Logger;
  private readonly exists: (path: string) => Promise<boolean>;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(private readonly options: DaemonOptions) {
    this.logger = options.logger.child({ component: "daemon" });
    this.exists = options.fileExists ?? fileExists;
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Ask the loop to end after the current cycle
   */
  stop(): void {
    this.stopping = true;
  }

  async runCycle(logger: Logger = this.logger): Promise<Result<CycleOutcome, CycleError>> {
    const started = performance.now();
    const { source, gateway } = this.options;

    if (await this.exists(this.options.forceDisableFlag)) {
      logger.info("force disable flag found, removing tables", { flag: this.options.forceDisableFlag });
      const removed = await this.removeTables(logger);
      if (removed.isErr()) {
        return Result.err(removed.error);
      }
      return Result.ok("forced-off");
    }

    const loaded = await loadFirewallConfig(
      source,
      gateway,
      { nodename: this.options.nodename, detectManagementCidrs: this.options.detectManagementCidrs },
      logger
    );
    if (loaded.isErr()) {
      return Result.err(loaded.error);
    }

    const firewall = new Firewall(loaded.unwrap(), logger);
    if (!firewall.isEnabled()) {
      logger.debug("firewall disabled, removing tables");
      const removed = await this.removeTables(logger);
      if (removed.isErr()) {
        return Result.err(removed.error);
      }
      return Result.ok("disabled");
    }

    const skeleton = await gateway.applyText(this.options.skeleton);
    if (skeleton.isErr()) {
      return Result.err(skeleton.error);
    }

    const commands = firewall.fullHostFw();
    if (commands.isErr()) {
      return Result.err(commands.error);
    }

    const applied = await gateway.apply(commands.unwrap());
    if (applied.isErr()) {
      return Result.err(applied.error);
    }

    await firewall.applyHostTunables(this.options.stateDir, this.options.writeTunable);

    logger.info("firewall applied", {
      commands: commands.unwrap().nftables.length,
      elapsedMs: Math.round(performance.now() - started),
    });
    return Result.ok("applied");
  }

  /**
   * Drop both owned tables. A table that is already gone makes nft complain,
   * which is not an error here.
   */
  async removeTables(logger: Logger = this.logger): Promise<Result<void, NftIoError>> {
    for (const commands of Firewall.removeCommands()) {
      const removed = await this.options.gateway.apply(commands);
      if (removed.isErr()) {
        if (removed.error._tag === "NftIoError") {
          return Result.err(removed.error);
        }
        logger.debug("table not removed", { stderr: removed.error.stderr.trim() });
      }
    }
    return Result.ok(undefined);
  }

  /**
   * Run cycles until stopped, then remove the tables
   */
  async run(): Promise<Result<void, NftIoError>> {
    this.logger.info("starting", { intervalMs: this.options.intervalMs, nodename: this.options.nodename });

    while (!this.stopping) {
      const logger = this.logger.child({ correlationId: generateCorrelationId() });
      const outcome = await this.runCycle(logger);
      if (outcome.isErr()) {
        logger.error("cycle failed", { error: outcome.error.message, tag: outcome.error._tag });
      }

      if (this.stopping) {
        break;
      }
      await this.sleep(this.options.intervalMs);
    }

    this.logger.info("stopping, removing tables");
    return this.removeTables();
  }
}
