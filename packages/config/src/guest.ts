/**
 * Per-guest policy (`firewall/<vmid>.fw`) together with the guest's network devices
 */

import { Result } from "better-result";
import { ParseError, type PolicyError } from "@fwsync/errors";
import type { Alias } from "./alias";
import { type GuestType, ifacePrefix } from "./guest-map";
import type { Ipset } from "./ipset";
import { type LogLevel, parseLogLevel } from "./log";
import { type NetworkDevice, indexFromNetKey, parseNetworkConfig } from "./network-device";
import { type OptionParsers, parseBool, parseOptions } from "./parse";
import type { Rule } from "./rule";
import { type Verdict, parseVerdict } from "./rule-match";
import { type ConfigFile, emptyConfigFile, parseConfigFile } from "./section";

/** Guest chains only exist for these directions */
export type GuestDirection = "in" | "out";

export interface GuestOptions {
  dhcp: boolean;
  enable: boolean;
  ipfilter: boolean;
  ndp: boolean;
  radv: boolean;
  log_level_in: LogLevel;
  log_level_out: LogLevel;
  macfilter: boolean;
  policy_in: Verdict;
  policy_out: Verdict;
}

const guestOptionParsers: OptionParsers<GuestOptions> = {
  dhcp: parseBool,
  enable: parseBool,
  ipfilter: parseBool,
  ndp: parseBool,
  radv: parseBool,
  log_level_in: parseLogLevel,
  log_level_out: parseLogLevel,
  macfilter: parseBool,
  policy_in: parseVerdict,
  policy_out: parseVerdict,
};

export class GuestConfig {
  private constructor(
    readonly vmid: number,
    readonly type: GuestType,
    private readonly file: ConfigFile,
    readonly options: Partial<GuestOptions>,
    readonly devices: ReadonlyMap<number, NetworkDevice>
  ) {}

  /**
   * @param firewallText - contents of the guest's policy file (undefined: none)
   * @param definitionText - contents of the guest's resource definition
   */
  static parse(
    vmid: number,
    type: GuestType,
    firewallText: string | undefined,
    definitionText: string
  ): Result<GuestConfig, PolicyError> {
    const label = `guest ${vmid}`;

    let file = emptyConfigFile();
    if (firewallText !== undefined) {
      const parsed = parseConfigFile(firewallText, {
        label: "guest",
        ipsetScope: "guest",
        guestIfaceNames: true,
        forbidden: ["groups"],
      });
      if (parsed.isErr()) {
        return Result.err(parsed.error);
      }
      file = parsed.unwrap();
    }

    const options = parseOptions(file.options, guestOptionParsers);
    if (options.isErr()) {
      return Result.err(options.error);
    }

    const devices = parseNetworkConfig(definitionText);
    if (devices.isErr()) {
      return Result.err(
        new ParseError({ message: `${label}: ${devices.error.message}`, input: devices.error.input })
      );
    }

    return Result.ok(new GuestConfig(vmid, type, file, options.unwrap(), devices.unwrap()));
  }

  get rules(): readonly Rule[] {
    return this.file.rules;
  }

  get ipsets(): ReadonlyMap<string, Ipset> {
    return this.file.ipsets;
  }

  alias(name: string): Alias | undefined {
    return this.file.aliases.get(name);
  }

  addIpset(ipset: Ipset): boolean {
    if (this.file.ipsets.has(ipset.name.name)) {
      return false;
    }
    this.file.ipsets.set(ipset.name.name, ipset);
    return true;
  }

  /**
   * Devices by ascending index
   */
  sortedDevices(): [number, NetworkDevice][] {
    return [...this.devices.entries()].sort(([a], [b]) => a - b);
  }

  /**
   * `net<N>` to the host-side interface name, undefined for an invalid key
   */
  ifaceNameByKey(key: string): string | undefined {
    const index = indexFromNetKey(key);
    return index === undefined ? undefined : this.ifaceNameByIndex(index);
  }

  ifaceNameByIndex(index: number): string {
    return `${ifacePrefix(this.type)}${this.vmid}i${index}`;
  }

  isEnabled(): boolean {
    return this.options.enable ?? false;
  }

  logLevel(dir: GuestDirection): LogLevel {
    return (dir === "in" ? this.options.log_level_in : this.options.log_level_out) ?? "nolog";
  }

  allowNdp(): boolean {
    return this.options.ndp ?? true;
  }

  allowDhcp(): boolean {
    return this.options.dhcp ?? true;
  }

  allowRa(): boolean {
    return this.options.radv ?? false;
  }

  macfilter(): boolean {
    return this.options.macfilter ?? true;
  }

  ipfilter(): boolean {
    return this.options.ipfilter ?? false;
  }

  defaultPolicy(dir: GuestDirection): Verdict {
    return dir === "in" ? (this.options.policy_in ?? "DROP") : (this.options.policy_out ?? "ACCEPT");
  }
}
