/**
 * Node-local policy (`local/host.fw`)
 */

import { Result } from "better-result";
import type { ParseError, PolicyError } from "@fwsync/errors";
import { type LogLevel, parseLogLevel } from "./log";
import { type OptionParsers, parseBool, parseInteger, parseOptions } from "./parse";
import type { Rule } from "./rule";
import type { Direction } from "./rule-match";
import { type ConfigFile, emptyConfigFile, parseConfigFile } from "./section";

export interface HostOptions {
  enable: boolean;
  nftables: boolean;
  log_level_in: LogLevel;
  log_level_out: LogLevel;
  log_level_forward: LogLevel;
  log_nf_conntrack: boolean;
  ndp: boolean;
  nf_conntrack_allow_invalid: boolean;
  nf_conntrack_helpers: string[];
  nf_conntrack_max: number;
  nf_conntrack_tcp_timeout_established: number;
  nf_conntrack_tcp_timeout_syn_recv: number;
  nosmurfs: boolean;
  protection_synflood: boolean;
  protection_synflood_rate: number;
  protection_synflood_burst: number;
  smurf_log_level: LogLevel;
  tcp_flags_log_level: LogLevel;
  tcpflags: boolean;
}

const parseNumber = (value: string): Result<number, ParseError> => parseInteger(value, "number");

function parseHelperList(value: string): Result<string[], ParseError> {
  return Result.ok(
    value
      .split(",")
      .map((name) => name.trim())
      .filter((name) => name !== "")
  );
}

const hostOptionParsers: OptionParsers<HostOptions> = {
  enable: parseBool,
  nftables: parseBool,
  log_level_in: parseLogLevel,
  log_level_out: parseLogLevel,
  log_level_forward: parseLogLevel,
  log_nf_conntrack: parseBool,
  ndp: parseBool,
  nf_conntrack_allow_invalid: parseBool,
  nf_conntrack_helpers: parseHelperList,
  nf_conntrack_max: parseNumber,
  nf_conntrack_tcp_timeout_established: parseNumber,
  nf_conntrack_tcp_timeout_syn_recv: parseNumber,
  nosmurfs: parseBool,
  protection_synflood: parseBool,
  protection_synflood_rate: parseNumber,
  protection_synflood_burst: parseNumber,
  smurf_log_level: parseLogLevel,
  tcp_flags_log_level: parseLogLevel,
  tcpflags: parseBool,
};

export class HostConfig {
  private constructor(
    private readonly file: ConfigFile,
    readonly options: Partial<HostOptions>
  ) {}

  static empty(): HostConfig {
    return new HostConfig(emptyConfigFile(), {});
  }

  static parse(text: string): Result<HostConfig, PolicyError> {
    const file = parseConfigFile(text, {
      label: "host",
      forbidden: ["aliases", "ipsets", "groups"],
    });
    if (file.isErr()) {
      return Result.err(file.error);
    }

    const options = parseOptions(file.unwrap().options, hostOptionParsers);
    if (options.isErr()) {
      return Result.err(options.error);
    }

    return Result.ok(new HostConfig(file.unwrap(), options.unwrap()));
  }

  get rules(): readonly Rule[] {
    return this.file.rules;
  }

  isEnabled(): boolean {
    return this.options.enable ?? true;
  }

  nftables(): boolean {
    return this.options.nftables ?? false;
  }

  logLevel(dir: Direction): LogLevel {
    switch (dir) {
      case "in":
        return this.options.log_level_in ?? "nolog";
      case "out":
        return this.options.log_level_out ?? "nolog";
      case "forward":
        return this.options.log_level_forward ?? "nolog";
    }
  }

  logInvalidConntrack(): boolean {
    return this.options.log_nf_conntrack ?? false;
  }

  allowNdp(): boolean {
    return this.options.ndp ?? true;
  }

  blockInvalidConntrack(): boolean {
    return !(this.options.nf_conntrack_allow_invalid ?? false);
  }

  conntrackHelpers(): readonly string[] {
    return this.options.nf_conntrack_helpers ?? [];
  }

  nfConntrackMax(): number | undefined {
    return this.options.nf_conntrack_max;
  }

  nfConntrackTcpTimeoutEstablished(): number | undefined {
    return this.options.nf_conntrack_tcp_timeout_established;
  }

  nfConntrackTcpTimeoutSynRecv(): number | undefined {
    return this.options.nf_conntrack_tcp_timeout_syn_recv;
  }

  blockSmurfs(): boolean {
    return this.options.nosmurfs ?? true;
  }

  blockSmurfsLogLevel(): LogLevel {
    return this.options.smurf_log_level ?? "nolog";
  }

  blockSynflood(): boolean {
    return this.options.protection_synflood ?? false;
  }

  synfloodRate(): number {
    return this.options.protection_synflood_rate ?? 200;
  }

  synfloodBurst(): number {
    return this.options.protection_synflood_burst ?? 1000;
  }

  blockInvalidTcp(): boolean {
    return this.options.tcpflags ?? false;
  }

  blockInvalidTcpLogLevel(): LogLevel {
    return this.options.tcp_flags_log_level ?? "nolog";
  }
}
