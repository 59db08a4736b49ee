/**
 * Rule compiler
 *
 * Translates configuration rules into candidates for one chain. The order of
 * the steps matters: the log and verdict candidates are created first, then
 * every match narrows or multiplies them.
 */

import { Result } from "better-result";
import {
  type CtHelperMacro,
  type Direction,
  type Family,
  FAMILIES,
  getMacro,
  helperName,
  type IcmpMatch,
  type IpAddrMatch,
  type IpsetName,
  type LogLevel,
  logLevelSeverity,
  type Ports,
  type Protocol,
  type Rule,
  type RuleGroup,
  type RuleMatch,
  type Verdict,
} from "@fwsync/config";
import { CompileError, type ResourceError } from "@fwsync/errors";
import type { Logger } from "@fwsync/logger";
import {
  accept,
  type ChainRef,
  ct,
  ctHelper,
  drop,
  type Expression,
  jump,
  limit,
  log,
  match,
  meta,
  payload,
  setRef,
  type Statement,
  supportsFamily,
} from "@fwsync/nftables";
import { Candidate, finalize } from "./candidate";
import type { FirewallConfig } from "./config";
import { cidrExpression, ipListExpression, ipProtocol, portListExpression } from "./expression";
import { ipsetSetName } from "./names";

export interface RuleEnv {
  chain: ChainRef;
  direction: Direction;
  config: FirewallConfig;
  /** Set when compiling for a guest chain */
  vmid?: number;
  logger: Logger;
}

export type RuleCompileError = CompileError | ResourceError;

function containsFamily(env: RuleEnv, family: Family): boolean {
  return supportsFamily(env.chain.family, family);
}

function ifaceName(env: RuleEnv, name: string): string {
  const resolved =
    env.vmid === undefined
      ? env.config.interfaceName(name)
      : env.config.guest(env.vmid)?.ifaceNameByKey(name);

  if (resolved === undefined) {
    env.logger.warn("cannot resolve interface name", { iface: name, vmid: env.vmid });
    return name;
  }

  return resolved;
}

/**
 * Seen from the host, traffic into a guest leaves through its interface
 */
function ifaceKey(env: RuleEnv): Result<string, CompileError> {
  if (env.direction === "forward") {
    return Result.err(
      new CompileError({
        message: "cannot define interfaces for forward direction",
        chain: env.chain.name,
      })
    );
  }

  const outbound = env.vmid === undefined ? env.direction === "out" : env.direction === "in";
  return Result.ok(outbound ? "oifname" : "iifname");
}

function handleIface(
  candidates: Candidate[],
  env: RuleEnv,
  name: string
): Result<Candidate[], CompileError> {
  const key = ifaceKey(env);
  if (key.isErr()) {
    return Result.err(key.error);
  }

  const iface = ifaceName(env, name);
  return Result.ok(candidates.map((candidate) => candidate.with(match("==", meta(key.unwrap()), iface))));
}

export function generateVerdict(
  verdict: Verdict,
  env: Pick<RuleEnv, "chain" | "direction">
): Statement {
  switch (verdict) {
    case "REJECT":
      // bridged inbound traffic cannot be answered with a reject
      return env.chain.family === "bridge" && env.direction === "in" ? drop : jump("do-reject");
    case "ACCEPT":
      return accept;
    case "DROP":
      return drop;
  }
}

export function logPrefix(
  vmid: number | undefined,
  severity: number,
  chain: string,
  verdict: Verdict
): string {
  return `:${vmid ?? 0}:${severity}:${chain}: ${verdict}: `;
}

/**
 * `[limit?, log]` for an nflog entry, or undefined for `nolog`
 */
export function logStatements(
  config: FirewallConfig,
  level: LogLevel,
  chain: string,
  verdict: Verdict,
  vmid?: number
): Statement[] | undefined {
  const severity = logLevelSeverity(level);
  if (severity === undefined) {
    return undefined;
  }

  const statements: Statement[] = [];
  const rateLimit = config.cluster.logRateLimit();
  if (rateLimit) {
    statements.push(limit({ rate: rateLimit.rate, per: rateLimit.per, burst: rateLimit.burst }));
  }
  statements.push(log({ prefix: logPrefix(vmid, severity, chain, verdict), group: 0 }));

  return statements;
}

function withPorts(candidate: Candidate, ports: Ports): Candidate {
  let result = candidate;
  if (ports.sport) {
    result = result.with(match("==", payload("th", "sport"), portListExpression(ports.sport)));
  }
  if (ports.dport) {
    result = result.with(match("==", payload("th", "dport"), portListExpression(ports.dport)));
  }
  return result;
}

function icmpStatement(protocol: "icmp" | "icmpv6", icmp: IcmpMatch): Statement {
  if (icmp.code !== undefined) {
    return match("==", payload(protocol, "code"), icmp.code);
  }
  if (icmp.type !== undefined) {
    return match("==", payload(protocol, "type"), icmp.type);
  }
  return match("==", meta("l4proto"), protocol);
}

export function applyProtocol(candidates: readonly Candidate[], protocol: Protocol): Candidate[] {
  switch (protocol.kind) {
    case "tcp":
    case "udp":
    case "sctp":
    case "dccp":
    case "udplite":
      return candidates.map((candidate) =>
        withPorts(candidate.with(match("==", meta("l4proto"), protocol.kind)), protocol.ports)
      );
    case "icmp":
    case "icmpv6": {
      const family: Family = protocol.kind === "icmp" ? "v4" : "v6";
      return candidates.map((candidate) =>
        candidate.accepts(family)
          ? candidate.with(icmpStatement(protocol.kind, protocol.icmp)).pin(family)
          : candidate
      );
    }
    case "numeric":
      return candidates.map((candidate) => candidate.with(match("==", meta("l4proto"), protocol.value)));
    case "named":
      return candidates.map((candidate) => candidate.with(match("==", meta("l4proto"), protocol.name)));
  }
}

function applyMacro(
  candidates: Candidate[],
  name: string,
  env: RuleEnv
): Result<Candidate[], RuleCompileError> {
  const macro = getMacro(name);
  if (macro.isErr()) {
    return Result.err(macro.error);
  }

  const found = macro.unwrap();
  if (!found) {
    return Result.err(new CompileError({ message: `cannot find macro ${name}`, chain: env.chain.name }));
  }

  return Result.ok(found.code.flatMap((protocol) => applyProtocol(candidates, protocol)));
}

function matchAddress(
  candidates: Candidate[],
  family: Family,
  field: string,
  right: Expression,
  env: RuleEnv
): Candidate[] {
  if (!containsFamily(env, family)) {
    return candidates;
  }

  const left = payload(ipProtocol(family), field);
  return candidates.map((candidate) =>
    candidate.accepts(family) ? candidate.with(match("==", left, right)).pin(family) : candidate
  );
}

/**
 * Membership in both halves of an ipset: in the member set and not in the
 * nomatch set. `contains: false` negates the membership.
 */
export function handleSet(
  candidates: readonly Candidate[],
  name: IpsetName,
  field: string,
  env: RuleEnv,
  contains: boolean
): Candidate[] {
  return candidates.flatMap((candidate) =>
    FAMILIES.filter((family) => candidate.accepts(family) && containsFamily(env, family)).map(
      (family) => {
        const left = payload(ipProtocol(family), field);
        return candidate
          .pin(family)
          .with(
            match(contains ? "==" : "!=", left, setRef(ipsetSetName(family, name, env.vmid, false))),
            match(contains ? "!=" : "==", left, setRef(ipsetSetName(family, name, env.vmid, true)))
          );
      }
    )
  );
}

function handleIpMatch(
  candidates: Candidate[],
  ip: IpAddrMatch,
  field: string,
  env: RuleEnv
): Result<Candidate[], CompileError> {
  switch (ip.kind) {
    case "ip":
      return Result.ok(matchAddress(candidates, ip.list.family, field, ipListExpression(ip.list), env));
    case "alias": {
      const alias = env.config.alias(ip.name, env.vmid);
      if (!alias) {
        return Result.err(
          new CompileError({ message: `could not find alias ${ip.name.toString()}`, chain: env.chain.name })
        );
      }
      return Result.ok(
        matchAddress(candidates, alias.address.family, field, cidrExpression(alias.address), env)
      );
    }
    case "set":
      return Result.ok(handleSet(candidates, ip.name, field, env, true));
  }
}

function ruleMatchCandidates(
  rule: RuleMatch,
  env: RuleEnv
): Result<Candidate[], RuleCompileError> {
  if (env.direction !== rule.dir) {
    return Result.ok([]);
  }

  let candidates: Candidate[] = [];

  if (rule.log !== undefined) {
    const statements = logStatements(env.config, rule.log, env.chain.name, rule.verdict, env.vmid);
    if (statements) {
      candidates.push(Candidate.of(...statements));
    }
  }

  candidates.push(Candidate.of(generateVerdict(rule.verdict, env)));

  if (rule.iface !== undefined) {
    const withIface = handleIface(candidates, env, rule.iface);
    if (withIface.isErr()) {
      return Result.err(withIface.error);
    }
    candidates = withIface.unwrap();
  }

  if (rule.proto) {
    candidates = applyProtocol(candidates, rule.proto);
  }

  if (rule.macro !== undefined) {
    const expanded = applyMacro(candidates, rule.macro, env);
    if (expanded.isErr()) {
      return Result.err(expanded.error);
    }
    candidates = expanded.unwrap();
  }

  for (const [ip, field] of [
    [rule.ip?.src, "saddr"],
    [rule.ip?.dst, "daddr"],
  ] as const) {
    if (!ip) {
      continue;
    }
    const matched = handleIpMatch(candidates, ip, field, env);
    if (matched.isErr()) {
      return Result.err(matched.error);
    }
    candidates = matched.unwrap();
  }

  return Result.ok(candidates);
}

function groupCandidates(group: RuleGroup, env: RuleEnv): Result<Candidate[], CompileError> {
  // groups cannot filter bridged traffic by interface
  if (env.direction === "forward" && group.iface !== undefined) {
    return Result.ok([]);
  }

  const candidates = [Candidate.of(jump(`group-${group.group}-${env.direction}`))];
  if (group.iface === undefined) {
    return Result.ok(candidates);
  }

  return handleIface(candidates, env, group.iface);
}

/**
 * Candidates of a rule before the family fan-out
 */
export function ruleCandidates(rule: Rule, env: RuleEnv): Result<Candidate[], RuleCompileError> {
  if (rule.disabled) {
    return Result.ok([]);
  }

  return rule.rule.kind === "group"
    ? groupCandidates(rule.rule.group, env)
    : ruleMatchCandidates(rule.rule.match, env);
}

export function compileRule(rule: Rule, env: RuleEnv): Result<Candidate[], RuleCompileError> {
  return ruleCandidates(rule, env).map((candidates) => finalize(candidates, env.chain));
}

/**
 * Rules that attach a conntrack helper to matching connections and accept
 * the related traffic
 */
export function compileCtHelper(helper: CtHelperMacro, env: RuleEnv): Candidate[] {
  if (helper.family !== undefined && !containsFamily(env, helper.family)) {
    return [];
  }

  const candidates: Candidate[] = [];

  for (const [name, protocol] of [
    ["tcp", helper.tcp],
    ["udp", helper.udp],
  ] as const) {
    if (!protocol) {
      continue;
    }
    const established = Candidate.of(match("==", ct("state"), ["new", "established"]), accept);
    const attach = Candidate.of(ctHelper(helperName(helper, name)));
    candidates.push(...applyProtocol([established, attach], protocol));
  }

  if (candidates.length === 0) {
    return [];
  }

  const family = helper.family === undefined ? undefined : ipProtocol(helper.family);
  candidates.push(Candidate.of(accept).with(match("==", ct("helper", family), helper.name)));

  return finalize(candidates, env.chain);
}

/**
 * Address filter of one guest interface: traffic whose address is not in the
 * ipfilter set is dropped
 */
export function compileIpfilter(
  name: IpsetName,
  index: number,
  env: RuleEnv
): Result<Candidate[], CompileError> {
  if (env.vmid === undefined) {
    return Result.err(new CompileError({ message: "can only create ipfilter for guests", chain: env.chain.name }));
  }

  const guest = env.config.guest(env.vmid);
  if (!guest) {
    return Result.err(
      new CompileError({ message: `no guest config found for guest ${env.vmid}`, chain: env.chain.name })
    );
  }

  if (!guest.ipfilter()) {
    return Result.ok([]);
  }

  const iface = guest.ifaceNameByIndex(index);
  const v4Set = setRef(ipsetSetName("v4", name, env.vmid, false));

  switch (env.direction) {
    case "in": {
      if (!containsFamily(env, "v4")) {
        return Result.ok([]);
      }
      const arp = Candidate.of(drop)
        .pin("v4")
        .with(match("==", meta("oifname"), iface), match("!=", payload("arp", "daddr ip"), v4Set));
      return Result.ok(finalize([arp], env.chain));
    }
    case "out": {
      const base = Candidate.of(drop).with(match("==", meta("iifname"), iface));
      const candidates = handleSet([base], name, "saddr", env, false);
      if (containsFamily(env, "v4")) {
        candidates.push(base.pin("v4").with(match("!=", payload("arp", "saddr ip"), v4Set)));
      }
      return Result.ok(finalize(candidates, env.chain));
    }
    case "forward":
      return Result.err(
        new CompileError({ message: "cannot generate IP filter for direction forward", chain: env.chain.name })
      );
  }
}
