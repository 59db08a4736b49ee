/**
 * Match rules: `DIRECTION ACTION [options...]`
 *
 * ACTION is a verdict or `MACRO(VERDICT)`; options are `-name value` or `--name value`.
 */

import { Result } from "better-result";
import { ParseError, type PolicyError } from "@fwsync/errors";
import { IpList } from "./address";
import { AliasName } from "./alias";
import { type IcmpMatch, parseIcmpMatch } from "./icmp";
import { IpsetName } from "./ipset";
import { type LogLevel, parseLogLevel } from "./log";
import { matchName, matchNonWhitespace } from "./parse";
import { PortList } from "./port";

export type Direction = "in" | "out" | "forward";

export function parseDirection(text: string): Result<Direction, ParseError> {
  switch (text.toUpperCase()) {
    case "IN":
      return Result.ok("in");
    case "OUT":
      return Result.ok("out");
    case "FORWARD":
      return Result.ok("forward");
    default:
      return Result.err(
        new ParseError({
          message: `invalid direction: "${text}", expected 'IN', 'OUT' or 'FORWARD'`,
          input: text,
        })
      );
  }
}

export type Verdict = "ACCEPT" | "REJECT" | "DROP";

export function parseVerdict(text: string): Result<Verdict, ParseError> {
  switch (text.toUpperCase()) {
    case "ACCEPT":
      return Result.ok("ACCEPT");
    case "REJECT":
      return Result.ok("REJECT");
    case "DROP":
      return Result.ok("DROP");
    default:
      return Result.err(
        new ParseError({
          message: `invalid verdict "${text}", expected one of 'ACCEPT', 'REJECT' or 'DROP'`,
          input: text,
        })
      );
  }
}

export interface RuleOptions {
  proto?: string;
  dport?: string;
  sport?: string;
  dest?: string;
  source?: string;
  iface?: string;
  log?: LogLevel;
  icmpType?: string;
}

type OptionKey = keyof RuleOptions;

const OPTION_KEYS: Record<string, OptionKey> = {
  proto: "proto",
  p: "proto",
  dport: "dport",
  sport: "sport",
  dest: "dest",
  source: "source",
  iface: "iface",
  i: "iface",
  log: "log",
  "icmp-type": "icmpType",
};

export function parseRuleOptions(text: string): Result<RuleOptions, ParseError> {
  const options: RuleOptions = {};
  const seen = new Set<OptionKey>();
  let line = text;

  for (;;) {
    line = line.trimStart();
    if (line === "") {
      break;
    }

    if (!line.startsWith("-")) {
      return Result.err(new ParseError({ message: "expected an option starting with '-'", input: text }));
    }
    line = line.slice(1);
    // the second dash is optional
    if (line.startsWith("-")) {
      line = line.slice(1);
    }

    const param = matchName(line);
    if (!param) {
      return Result.err(new ParseError({ message: "expected a parameter name after '-'", input: text }));
    }
    const [name, afterName] = param;

    const value = matchNonWhitespace(afterName.trimStart());
    if (!value) {
      return Result.err(new ParseError({ message: `expected a value for "${name}"`, input: text }));
    }
    const [optionValue, rest] = value;
    line = rest;

    const key = Object.hasOwn(OPTION_KEYS, name) ? OPTION_KEYS[name] : undefined;
    if (!key) {
      return Result.err(new ParseError({ message: `unknown option in rule: ${name}`, input: text }));
    }

    if (seen.has(key)) {
      return Result.err(new ParseError({ message: `duplicate option in rule: ${name}`, input: text }));
    }
    seen.add(key);

    if (key === "log") {
      const level = parseLogLevel(optionValue);
      if (level.isErr()) {
        return Result.err(level.error);
      }
      options.log = level.unwrap();
    } else {
      options[key] = optionValue;
    }
  }

  return Result.ok(options);
}

export type IpAddrMatch =
  | { kind: "ip"; list: IpList }
  | { kind: "set"; name: IpsetName }
  | { kind: "alias"; name: AliasName };

/**
 * Tried in order: literal list, `+scope/name` set reference, `scope/name` alias
 */
export function parseIpAddrMatch(text: string): Result<IpAddrMatch, ParseError> {
  if (text === "") {
    return Result.err(new ParseError({ message: "empty IP specification" }));
  }

  const list = IpList.parse(text);
  if (list.isOk()) {
    return Result.ok({ kind: "ip", list: list.unwrap() });
  }

  const set = IpsetName.parse(text);
  if (set.isOk()) {
    return Result.ok({ kind: "set", name: set.unwrap() });
  }

  const alias = AliasName.parse(text);
  if (alias.isOk()) {
    return Result.ok({ kind: "alias", name: alias.unwrap() });
  }

  return Result.err(new ParseError({ message: `invalid IP specification: ${text}`, input: text }));
}

export interface IpMatch {
  src?: IpAddrMatch;
  dst?: IpAddrMatch;
}

export function createIpMatch(
  src: IpAddrMatch | undefined,
  dst: IpAddrMatch | undefined
): Result<IpMatch, ParseError> {
  if (!src && !dst) {
    return Result.err(new ParseError({ message: "either src or dst must be set" }));
  }

  if (src?.kind === "ip" && dst?.kind === "ip" && src.list.family !== dst.list.family) {
    return Result.err(new ParseError({ message: "src and dst family must be equal" }));
  }

  return Result.ok({ src, dst });
}

export interface Ports {
  sport?: PortList;
  dport?: PortList;
}

export type PortProtocolName = "tcp" | "udp" | "sctp" | "dccp" | "udplite";

export type Protocol =
  | { kind: PortProtocolName; ports: Ports }
  | { kind: "icmp" | "icmpv6"; icmp: IcmpMatch }
  | { kind: "numeric"; value: number }
  | { kind: "named"; name: string };

const PROTOCOL_ALIASES: Record<string, PortProtocolName | "icmp" | "icmpv6"> = {
  dccp: "dccp",
  "33": "dccp",
  sctp: "sctp",
  "132": "sctp",
  tcp: "tcp",
  "6": "tcp",
  udp: "udp",
  "17": "udp",
  udplite: "udplite",
  "136": "udplite",
  icmp: "icmp",
  "1": "icmp",
  "ipv6-icmp": "icmpv6",
  icmpv6: "icmpv6",
  "58": "icmpv6",
};

function parsePorts(options: RuleOptions): Result<Ports, ParseError> {
  const ports: Ports = {};

  if (options.sport !== undefined) {
    const sport = PortList.parse(options.sport);
    if (sport.isErr()) {
      return Result.err(sport.error);
    }
    ports.sport = sport.unwrap();
  }

  if (options.dport !== undefined) {
    const dport = PortList.parse(options.dport);
    if (dport.isErr()) {
      return Result.err(dport.error);
    }
    ports.dport = dport.unwrap();
  }

  return Result.ok(ports);
}

export function protocolFromOptions(
  options: RuleOptions
): Result<Protocol | undefined, PolicyError> {
  const proto = options.proto;
  if (proto === undefined) {
    return Result.ok(undefined);
  }

  const known = Object.hasOwn(PROTOCOL_ALIASES, proto) ? PROTOCOL_ALIASES[proto] : undefined;

  if (known === "icmp" || known === "icmpv6") {
    if (options.icmpType === undefined) {
      return Result.ok({ kind: known, icmp: {} });
    }
    const icmp = parseIcmpMatch(known, options.icmpType);
    if (icmp.isErr()) {
      return Result.err(icmp.error);
    }
    return Result.ok({ kind: known, icmp: icmp.unwrap() });
  }

  if (known) {
    const ports = parsePorts(options);
    if (ports.isErr()) {
      return Result.err(ports.error);
    }
    return Result.ok({ kind: known, ports: ports.unwrap() });
  }

  if (/^\d+$/.test(proto) && Number(proto) <= 255) {
    return Result.ok({ kind: "numeric", value: Number(proto) });
  }

  return Result.ok({ kind: "named", name: proto });
}

export interface RuleMatch {
  dir: Direction;
  verdict: Verdict;
  macro?: string;
  iface?: string;
  log?: LogLevel;
  ip?: IpMatch;
  proto?: Protocol;
}

export function ruleMatchFromOptions(
  dir: Direction,
  verdict: Verdict,
  macro: string | undefined,
  options: RuleOptions
): Result<RuleMatch, PolicyError> {
  if (options.dport !== undefined && options.icmpType !== undefined) {
    return Result.err(new ParseError({ message: "dport and icmp-type are mutually exclusive" }));
  }

  const rule: RuleMatch = { dir, verdict };
  if (macro !== undefined) rule.macro = macro;
  if (options.iface !== undefined) rule.iface = options.iface;
  if (options.log !== undefined) rule.log = options.log;

  if (options.source !== undefined || options.dest !== undefined) {
    let src: IpAddrMatch | undefined;
    let dst: IpAddrMatch | undefined;

    if (options.source !== undefined) {
      const parsed = parseIpAddrMatch(options.source);
      if (parsed.isErr()) {
        return Result.err(parsed.error);
      }
      src = parsed.unwrap();
    }

    if (options.dest !== undefined) {
      const parsed = parseIpAddrMatch(options.dest);
      if (parsed.isErr()) {
        return Result.err(parsed.error);
      }
      dst = parsed.unwrap();
    }

    const ip = createIpMatch(src, dst);
    if (ip.isErr()) {
      return Result.err(ip.error);
    }
    rule.ip = ip.unwrap();
  }

  const proto = protocolFromOptions(options);
  if (proto.isErr()) {
    return Result.err(proto.error);
  }
  const protocol = proto.unwrap();
  if (protocol) {
    rule.proto = protocol;
  }

  return Result.ok(rule);
}

/**
 * Parse `VERDICT` or `MACRO(VERDICT)` and return the rest of the line
 */
export function parseAction(
  line: string
): Result<{ macro?: string; verdict: Verdict; rest: string }, ParseError> {
  const first = matchName(line);
  if (!first) {
    return Result.err(new ParseError({ message: "expected a verdict or macro name", input: line }));
  }
  const [word, afterWord] = first;

  if (!afterWord.startsWith("(")) {
    const verdict = parseVerdict(word);
    if (verdict.isErr()) {
      return Result.err(verdict.error);
    }
    return Result.ok({ verdict: verdict.unwrap(), rest: afterWord.trimStart() });
  }

  const inner = matchName(afterWord.slice(1));
  if (!inner) {
    return Result.err(new ParseError({ message: "expected a verdict", input: line }));
  }
  const [verdictText, afterVerdict] = inner;

  if (!afterVerdict.startsWith(")")) {
    return Result.err(new ParseError({ message: "expected closing ')' after verdict", input: line }));
  }

  const verdict = parseVerdict(verdictText);
  if (verdict.isErr()) {
    return Result.err(verdict.error);
  }

  return Result.ok({ macro: word, verdict: verdict.unwrap(), rest: afterVerdict.slice(1).trimStart() });
}

export function parseRuleMatch(line: string): Result<RuleMatch, PolicyError> {
  const first = matchName(line);
  if (!first) {
    return Result.err(new ParseError({ message: "expected a direction", input: line }));
  }
  const [dirText, afterDir] = first;

  const dir = parseDirection(dirText);
  if (dir.isErr()) {
    return Result.err(dir.error);
  }

  const action = parseAction(afterDir.trimStart());
  if (action.isErr()) {
    return Result.err(action.error);
  }
  const { macro, verdict, rest } = action.unwrap();

  const options = parseRuleOptions(rest);
  if (options.isErr()) {
    return Result.err(options.error);
  }

  return ruleMatchFromOptions(dir.unwrap(), verdict, macro, options.unwrap());
}
