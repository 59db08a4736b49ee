/**
 * Datacenter-wide policy (`firewall/cluster.fw`)
 */

import { Result } from "better-result";
import type { PolicyError } from "@fwsync/errors";
import type { Alias } from "./alias";
import type { Group } from "./group";
import type { Ipset } from "./ipset";
import { type LogRateLimit, DEFAULT_LOG_RATE_LIMIT, parseLogRateLimit } from "./log";
import { type OptionParsers, parseBool, parseOptions } from "./parse";
import type { Rule } from "./rule";
import { type Direction, type Verdict, parseVerdict } from "./rule-match";
import { type ConfigFile, emptyConfigFile, parseConfigFile } from "./section";

export interface ClusterOptions {
  enable: boolean;
  ebtables: boolean;
  log_ratelimit: LogRateLimit;
  policy_in: Verdict;
  policy_out: Verdict;
  policy_forward: Verdict;
}

const clusterOptionParsers: OptionParsers<ClusterOptions> = {
  enable: parseBool,
  ebtables: parseBool,
  log_ratelimit: parseLogRateLimit,
  policy_in: parseVerdict,
  policy_out: parseVerdict,
  policy_forward: parseVerdict,
};

export class ClusterConfig {
  private constructor(
    private readonly file: ConfigFile,
    readonly options: Partial<ClusterOptions>
  ) {}

  static empty(): ClusterConfig {
    return new ClusterConfig(emptyConfigFile(), {});
  }

  static parse(text: string): Result<ClusterConfig, PolicyError> {
    const file = parseConfigFile(text, { label: "cluster", ipsetScope: "dc" });
    if (file.isErr()) {
      return Result.err(file.error);
    }

    const options = parseOptions(file.unwrap().options, clusterOptionParsers);
    if (options.isErr()) {
      return Result.err(options.error);
    }

    return Result.ok(new ClusterConfig(file.unwrap(), options.unwrap()));
  }

  get rules(): readonly Rule[] {
    return this.file.rules;
  }

  get ipsets(): ReadonlyMap<string, Ipset> {
    return this.file.ipsets;
  }

  get groups(): ReadonlyMap<string, Group> {
    return this.file.groups;
  }

  alias(name: string): Alias | undefined {
    return this.file.aliases.get(name);
  }

  /**
   * Add a datacenter set unless the policy already declares one of that name
   */
  addIpset(ipset: Ipset): boolean {
    if (this.file.ipsets.has(ipset.name.name)) {
      return false;
    }
    this.file.ipsets.set(ipset.name.name, ipset);
    return true;
  }

  isEnabled(): boolean {
    return this.options.enable ?? false;
  }

  ebtables(): boolean {
    return this.options.ebtables ?? false;
  }

  /**
   * The log rate limit, or undefined when it is disabled
   */
  logRateLimit(): LogRateLimit | undefined {
    const limit = this.options.log_ratelimit ?? DEFAULT_LOG_RATE_LIMIT;
    return limit.enabled ? limit : undefined;
  }

  defaultPolicy(dir: Direction): Verdict {
    switch (dir) {
      case "in":
        return this.options.policy_in ?? "DROP";
      case "out":
        return this.options.policy_out ?? "ACCEPT";
      case "forward":
        return this.options.policy_forward ?? "ACCEPT";
    }
  }
}
