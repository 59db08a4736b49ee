/**
 * Section parser shared by the cluster, host, guest and bridge policy files
 *
 *   [OPTIONS]          key: value
 *   [ALIASES]          name cidr [# comment]
 *   [RULES]            rule lines
 *   [IPSET name]       [!]address [# comment]
 *   [group name]       rule lines
 */

import { Result } from "better-result";
import { ConfigError, ParseError, type PolicyError } from "@fwsync/errors";
import { type Alias, parseAlias } from "./alias";
import { Group } from "./group";
import { Ipset, type IpsetScope } from "./ipset";
import { parseNamedSectionTail, splitKeyValue } from "./parse";
import { type Rule, parseRule, ruleIface } from "./rule";

export type SectionKind = "aliases" | "ipsets" | "groups";

export interface ParserConfig {
  /** Label used in error messages, e.g. "host" */
  label: string;
  /** Scope of `[IPSET]` sections; without one they are rejected */
  ipsetScope?: IpsetScope;
  /** Rule interfaces must be `net<number>` */
  guestIfaceNames?: boolean;
  forbidden?: readonly SectionKind[];
  /** Only `FORWARD` match rules are accepted */
  forwardOnly?: boolean;
}

export interface ConfigFile {
  options: Map<string, string>;
  rules: Rule[];
  aliases: Map<string, Alias>;
  ipsets: Map<string, Ipset>;
  groups: Map<string, Group>;
}

export function emptyConfigFile(): ConfigFile {
  return {
    options: new Map(),
    rules: [],
    aliases: new Map(),
    ipsets: new Map(),
    groups: new Map(),
  };
}

type Section =
  | { kind: "none" }
  | { kind: "options" }
  | { kind: "aliases" }
  | { kind: "rules" }
  | { kind: "ipset"; ipset: Ipset }
  | { kind: "group"; name: string; group: Group };

function startsWithIgnoreCase(line: string, prefix: string): boolean {
  return line.slice(0, prefix.length).toLowerCase() === prefix.toLowerCase();
}

class SectionParser {
  private readonly file = emptyConfigFile();
  private section: Section = { kind: "none" };

  constructor(private readonly config: ParserConfig) {}

  parse(text: string): Result<ConfigFile, PolicyError> {
    for (const raw of text.split("\n")) {
      const line = raw.trim();

      if (line === "" || line.startsWith("#")) {
        continue;
      }

      const result = this.parseLine(line);
      if (result.isErr()) {
        return Result.err(result.error);
      }
    }

    const closed = this.enter({ kind: "none" });
    if (closed.isErr()) {
      return Result.err(closed.error);
    }

    return Result.ok(this.file);
  }

  private parseLine(line: string): Result<void, PolicyError> {
    const upper = line.toUpperCase();

    if (upper === "[OPTIONS]") {
      return this.enter({ kind: "options" });
    }

    if (upper === "[ALIASES]") {
      const allowed = this.allow("aliases");
      return allowed.isErr() ? allowed : this.enter({ kind: "aliases" });
    }

    if (upper === "[RULES]") {
      return this.enter({ kind: "rules" });
    }

    if (startsWithIgnoreCase(line, "[IPSET")) {
      const allowed = this.allow("ipsets");
      if (allowed.isErr()) {
        return allowed;
      }

      const tail = parseNamedSectionTail("ipset", line.slice("[IPSET".length));
      if (tail.isErr()) {
        return Result.err(tail.error);
      }

      const scope = this.config.ipsetScope;
      if (!scope) {
        return Result.err(
          new ConfigError({
            message: "IPSET in config, but no scope set in parser config",
            source: this.config.label,
          })
        );
      }

      const { name, comment } = tail.unwrap();
      return this.enter({ kind: "ipset", ipset: Ipset.fromParts(scope, name, comment) });
    }

    if (startsWithIgnoreCase(line, "[group")) {
      const allowed = this.allow("groups");
      if (allowed.isErr()) {
        return allowed;
      }

      const tail = parseNamedSectionTail("group", line.slice("[group".length));
      if (tail.isErr()) {
        return Result.err(tail.error);
      }

      const { name, comment } = tail.unwrap();
      return this.enter({ kind: "group", name, group: new Group(comment) });
    }

    if (line.startsWith("[")) {
      return Result.err(new ParseError({ message: `invalid section "${line}"`, input: line }));
    }

    switch (this.section.kind) {
      case "none":
        return Result.err(new ParseError({ message: `config line with no section: "${line}"`, input: line }));
      case "options":
        return this.parseOption(line);
      case "aliases":
        return this.parseAlias(line);
      case "rules":
        return this.parseRule(line);
      case "ipset":
        return this.section.ipset.addEntry(line);
      case "group":
        return this.section.group.addRule(line);
    }
  }

  private allow(kind: SectionKind): Result<void, ConfigError> {
    if (this.config.forbidden?.includes(kind)) {
      return Result.err(
        new ConfigError({
          message: `${this.config.label} firewall config cannot declare ${kind}`,
          source: this.config.label,
        })
      );
    }
    return Result.ok(undefined);
  }

  private parseOption(line: string): Result<void, PolicyError> {
    const pair = splitKeyValue(line);
    if (!pair) {
      return Result.err(
        new ParseError({ message: `expected colon separated key and value, found "${line}"`, input: line })
      );
    }

    const [key, value] = pair;
    if (this.file.options.has(key)) {
      return Result.err(new ConfigError({ message: `duplicate option "${key}"`, source: this.config.label }));
    }

    this.file.options.set(key, value);
    return Result.ok(undefined);
  }

  private parseAlias(line: string): Result<void, PolicyError> {
    const alias = parseAlias(line);
    if (alias.isErr()) {
      return Result.err(alias.error);
    }

    const value = alias.unwrap();
    if (this.file.aliases.has(value.name)) {
      return Result.err(new ConfigError({ message: `duplicate alias: ${line}`, source: this.config.label }));
    }

    this.file.aliases.set(value.name, value);
    return Result.ok(undefined);
  }

  private parseRule(line: string): Result<void, PolicyError> {
    const parsed = parseRule(line);
    if (parsed.isErr()) {
      return Result.err(parsed.error);
    }
    const rule = parsed.unwrap();

    if (this.config.guestIfaceNames) {
      const iface = ruleIface(rule);
      const digits = iface === undefined ? undefined : /^net(\d{1,5})$/.exec(iface);
      if (iface !== undefined && (!digits || Number(digits[1]) > 65535)) {
        return Result.err(
          new ParseError({ message: 'interface name must be of the form "net<number>"', input: line })
        );
      }
    }

    if (this.config.forwardOnly && (rule.rule.kind !== "match" || rule.rule.match.dir !== "forward")) {
      return Result.err(
        new ConfigError({
          message: `${this.config.label} firewall config only accepts FORWARD rules`,
          source: this.config.label,
        })
      );
    }

    this.file.rules.push(rule);
    return Result.ok(undefined);
  }

  private enter(next: Section): Result<void, ConfigError> {
    const previous = this.section;
    this.section = next;

    if (previous.kind === "ipset") {
      const name = previous.ipset.name.name;
      if (this.file.ipsets.has(name)) {
        return Result.err(new ConfigError({ message: `duplicate ipset: "${name}"`, source: this.config.label }));
      }
      this.file.ipsets.set(name, previous.ipset);
    }

    if (previous.kind === "group") {
      if (this.file.groups.has(previous.name)) {
        return Result.err(
          new ConfigError({ message: `duplicate group: "${previous.name}"`, source: this.config.label })
        );
      }
      this.file.groups.set(previous.name, previous.group);
    }

    return Result.ok(undefined);
  }
}

export function parseConfigFile(text: string, config: ParserConfig): Result<ConfigFile, PolicyError> {
  return new SectionParser(config).parse(text);
}
