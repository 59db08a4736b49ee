/**
 * Per-bridge forwarding policy (`sdn/firewall/<vnet>.fw`)
 */

import { Result } from "better-result";
import type { PolicyError } from "@fwsync/errors";
import { type LogLevel, parseLogLevel } from "./log";
import { type OptionParsers, parseBool, parseOptions } from "./parse";
import type { Rule } from "./rule";
import { type Verdict, parseVerdict } from "./rule-match";
import { type ConfigFile, emptyConfigFile, parseConfigFile } from "./section";

export interface BridgeOptions {
  enable: boolean;
  log_level_forward: LogLevel;
  policy_forward: Verdict;
}

const bridgeOptionParsers: OptionParsers<BridgeOptions> = {
  enable: parseBool,
  log_level_forward: parseLogLevel,
  policy_forward: parseVerdict,
};

export class BridgeConfig {
  private constructor(
    readonly name: string,
    private readonly file: ConfigFile,
    readonly options: Partial<BridgeOptions>
  ) {}

  static empty(name: string): BridgeConfig {
    return new BridgeConfig(name, emptyConfigFile(), {});
  }

  static parse(name: string, text: string): Result<BridgeConfig, PolicyError> {
    const file = parseConfigFile(text, {
      label: "bridge",
      forbidden: ["aliases", "ipsets", "groups"],
      forwardOnly: true,
    });
    if (file.isErr()) {
      return Result.err(file.error);
    }

    const options = parseOptions(file.unwrap().options, bridgeOptionParsers);
    if (options.isErr()) {
      return Result.err(options.error);
    }

    return Result.ok(new BridgeConfig(name, file.unwrap(), options.unwrap()));
  }

  get rules(): readonly Rule[] {
    return this.file.rules;
  }

  isEnabled(): boolean {
    return this.options.enable ?? false;
  }

  logLevel(): LogLevel {
    return this.options.log_level_forward ?? "nolog";
  }

  defaultPolicy(): Verdict {
    return this.options.policy_forward ?? "ACCEPT";
  }
}
