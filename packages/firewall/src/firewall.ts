/**
 * Orchestrator
 *
 * Produces the complete batch for one cycle: resets the owned chains, then
 * rebuilds the cluster, host, guest and bridge firewall in a fixed order.
 * Compilation is all or nothing; the first resolution failure aborts it.
 */

import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Result } from "better-result";
import {
  type BridgeConfig,
  Cidr,
  type Direction,
  getCtHelper,
  type GuestConfig,
  type GuestDirection,
  Ipfilter,
  type Group,
  Ipset,
  type LogLevel,
  type Rule,
  type Verdict,
} from "@fwsync/config";
import type { CompileError, ResourceError } from "@fwsync/errors";
import type { Logger } from "@fwsync/logger";
import {
  accept,
  add,
  type Batch,
  batch,
  type ChainRef,
  type Command,
  concat,
  drop,
  flush,
  goto,
  jump,
  match,
  meta,
  payload,
  remove,
  set,
  type Statement,
  type TableRef,
} from "@fwsync/nftables";
import { toAddRules } from "./candidate";
import type { FirewallConfig } from "./config";
import { ctHelperObjects, ipsetObjects } from "./object";
import { chains, CLUSTER_TABLE, GUEST_TABLE, maps } from "./names";
import {
  compileCtHelper,
  compileIpfilter,
  compileRule,
  generateVerdict,
  logStatements,
  type RuleCompileError,
  type RuleEnv,
} from "./rule";

export type FullHostFwError = CompileError | ResourceError;

const GUEST_DIRECTIONS: readonly GuestDirection[] = ["in", "out"];

/**
 * A kernel or state-file value derived from the host options
 */
export interface HostTunable {
  name: string;
  path: string;
  value: string;
}

export type TunableWriter = (path: string, value: string) => Promise<unknown>;

const NETFILTER_SYSCTL = "/proc/sys/net/netfilter";

export class Firewall {
  private readonly logger: Logger;

  constructor(
    private readonly config: FirewallConfig,
    logger: Logger
  ) {
    this.logger = logger.child({ component: "firewall" });
  }

  isEnabled(): boolean {
    return this.config.isEnabled();
  }

  /**
   * Batches that remove everything the firewall owns, one table each
   */
  static removeCommands(): Batch[] {
    return [batch([remove.table(CLUSTER_TABLE)]), batch([remove.table(GUEST_TABLE)])];
  }

  fullHostFw(): Result<Batch, FullHostFwError> {
    const commands: Command[] = [];

    if (!this.config.isEnabled()) {
      this.logger.info("firewall is disabled, nothing to do");
      return Result.ok(batch(commands));
    }

    this.resetFirewall(commands);

    if (this.config.host.isEnabled()) {
      this.logger.info("creating cluster and host configuration");
      const host = this.buildHost(commands);
      if (host.isErr()) {
        return Result.err(host.error);
      }
    } else {
      commands.push(remove.table(CLUSTER_TABLE));
    }

    const guests = [...this.config.guests.values()].filter((guest) => guest.isEnabled());
    const bridges = [...this.config.bridges.values()].filter((bridge) => bridge.isEnabled());

    if (guests.length === 0 && bridges.length === 0) {
      commands.push(remove.table(GUEST_TABLE));
      return Result.ok(batch(commands));
    }

    this.logger.info("creating guest configuration", {
      guests: guests.length,
      bridges: bridges.length,
    });

    const shared = this.createClusterObjects(
      commands,
      GUEST_TABLE,
      bridges.length > 0 ? ["in", "out", "forward"] : ["in", "out"]
    );
    if (shared.isErr()) {
      return Result.err(shared.error);
    }

    for (const guest of guests) {
      const built = this.buildGuest(commands, guest);
      if (built.isErr()) {
        return Result.err(built.error);
      }
    }

    for (const bridge of bridges) {
      const built = this.buildBridge(commands, bridge);
      if (built.isErr()) {
        return Result.err(built.error);
      }
    }

    return Result.ok(batch(commands));
  }

  private resetFirewall(commands: Command[]): void {
    commands.push(
      flush.chain(chains.cluster("in")),
      flush.chain(chains.cluster("out")),
      add.chain(chains.host("in")),
      flush.chain(chains.host("in")),
      flush.chain(chains.hostOption("in")),
      add.chain(chains.host("out")),
      flush.chain(chains.host("out")),
      flush.chain(chains.hostOption("out")),
      flush.map(maps.guest("in")),
      flush.map(maps.guest("out")),
      flush.map(maps.bridge()),
      flush.chain(chains.conntrack()),
      flush.chain(chains.synfloodLimit()),
      flush.chain(chains.logInvalidTcp()),
      flush.chain(chains.logSmurfs())
    );

    // chains that jump to group chains go first
    for (const prefix of ["guest-", "bridge-", "group-"]) {
      for (const chain of this.config.chains()) {
        if (chain.name.startsWith(prefix)) {
          commands.push(remove.chain({ family: chain.family, table: chain.table, name: chain.name }));
        }
      }
    }
  }

  private buildHost(commands: Command[]): Result<void, FullHostFwError> {
    const management = this.createManagementIpset(commands);
    if (management.isErr()) {
      return Result.err(management.error);
    }

    const shared = this.createClusterObjects(commands, CLUSTER_TABLE, ["in", "out"]);
    if (shared.isErr()) {
      return Result.err(shared.error);
    }

    for (const dir of GUEST_DIRECTIONS) {
      const cluster = this.createClusterRules(commands, dir);
      if (cluster.isErr()) {
        return Result.err(cluster.error);
      }
    }

    this.setupCtHelpers(commands);
    this.handleHostOptions(commands);

    for (const dir of GUEST_DIRECTIONS) {
      const host = this.appendRules(commands, this.config.host.rules, this.ruleEnv(chains.host(dir), dir));
      if (host.isErr()) {
        return Result.err(host.error);
      }
    }

    return Result.ok(undefined);
  }

  private createManagementIpset(commands: Command[]): Result<void, CompileError> {
    if (this.config.cluster.ipsets.has("management")) {
      return Result.ok(undefined);
    }

    this.logger.debug("generating management ipset", {
      cidrs: this.config.managementCidrs.map((cidr) => cidr.toString()),
    });

    const ipset = Ipset.fromParts("dc", "management");
    for (const cidr of this.config.managementCidrs) {
      ipset.push({ nomatch: false, address: { kind: "ip", entry: cidr } });
    }

    return this.pushObjects(commands, ipsetObjects(ipset, { table: CLUSTER_TABLE, config: this.config }));
  }

  /**
   * Cluster ipsets and group chains of one table
   */
  private createClusterObjects(
    commands: Command[],
    table: TableRef,
    directions: readonly Direction[]
  ): Result<void, FullHostFwError> {
    const ipsets = this.createIpsets(commands, this.config.cluster.ipsets, table);
    if (ipsets.isErr()) {
      return Result.err(ipsets.error);
    }

    for (const [name, group] of sortedByName(this.config.cluster.groups)) {
      for (const dir of directions) {
        const created = this.createGroupChain(commands, table, name, group, dir);
        if (created.isErr()) {
          return Result.err(created.error);
        }
      }
    }

    return Result.ok(undefined);
  }

  private createIpsets(
    commands: Command[],
    ipsets: ReadonlyMap<string, Ipset>,
    table: TableRef,
    vmid?: number
  ): Result<void, CompileError> {
    for (const [name, ipset] of sortedByName(ipsets)) {
      if (ipset.isIpfilter()) {
        continue;
      }

      this.logger.debug("creating ipset", { ipset: name, table: table.table, vmid });
      const objects = this.pushObjects(commands, ipsetObjects(ipset, { table, config: this.config, vmid }));
      if (objects.isErr()) {
        return Result.err(objects.error);
      }
    }

    return Result.ok(undefined);
  }

  private createGroupChain(
    commands: Command[],
    table: TableRef,
    name: string,
    group: Group,
    dir: Direction
  ): Result<void, RuleCompileError> {
    const chain = chains.group(table, name, dir);
    commands.push(add.chain(chain), flush.chain(chain));
    return this.appendRules(commands, group.rules, this.ruleEnv(chain, dir));
  }

  private createClusterRules(commands: Command[], dir: GuestDirection): Result<void, RuleCompileError> {
    const chain = chains.cluster(dir);
    const env = this.ruleEnv(chain, dir);

    const rules = this.appendRules(commands, this.config.cluster.rules, env);
    if (rules.isErr()) {
      return Result.err(rules.error);
    }

    const policy = this.config.cluster.defaultPolicy(dir);
    this.closeChain(commands, env, this.config.host.logLevel(dir), policy);

    return Result.ok(undefined);
  }

  private setupCtHelpers(commands: Command[]): void {
    const chain = chains.conntrack();
    const env = this.ruleEnv(chain, "in");

    for (const name of this.config.host.conntrackHelpers()) {
      const helper = getCtHelper(name);
      if (helper.isErr()) {
        this.logger.warn("cannot load conntrack helpers", { error: helper.error.message });
        return;
      }

      const found = helper.unwrap();
      if (!found) {
        this.logger.warn("ignoring unknown conntrack helper", { helper: name });
        continue;
      }

      this.logger.debug("adding conntrack helper", { helper: name });
      commands.push(...ctHelperObjects(found, CLUSTER_TABLE));
      commands.push(...toAddRules(chain, compileCtHelper(found, env)));
    }
  }

  private handleHostOptions(commands: Command[]): void {
    const host = this.config.host;
    const chainIn = chains.hostOption("in");
    const chainOut = chains.hostOption("out");

    const ndp = host.allowNdp() ? "allow" : "block";
    commands.push(add.rule(chainIn, [jump(`${ndp}-ndp-in`)]), add.rule(chainOut, [jump(`${ndp}-ndp-out`)]));

    if (host.blockSynflood()) {
      const limiter = chains.synfloodLimit();
      const rateLimit: Statement = {
        limit: { rate: host.synfloodRate(), per: "second", burst: host.synfloodBurst(), inv: true },
      };

      commands.push(add.rule(chainIn, [jump("block-synflood")]));
      for (const [protocol, setName] of [
        ["ip", "@v4-synflood-limit"],
        ["ip6", "@v6-synflood-limit"],
      ] as const) {
        commands.push(
          add.rule(limiter, [
            { set: { op: "update", elem: payload(protocol, "saddr"), set: setName, stmt: [rateLimit] } },
            drop,
          ])
        );
      }
    }

    if (host.blockInvalidTcp()) {
      commands.push(add.rule(chainIn, [jump("block-invalid-tcp")]));
      this.pushLogRule(commands, chains.logInvalidTcp(), host.blockInvalidTcpLogLevel(), "DROP");
    }

    if (host.blockSmurfs()) {
      commands.push(add.rule(chainIn, [jump("block-smurfs")]));
      this.pushLogRule(commands, chains.logSmurfs(), host.blockSmurfsLogLevel(), "DROP");
    }

    if (host.blockInvalidConntrack()) {
      commands.push(add.rule(chainIn, [jump("block-conntrack-invalid")]));
    }
  }

  private buildGuest(commands: Command[], guest: GuestConfig): Result<void, FullHostFwError> {
    const vmid = guest.vmid;
    this.logger.debug("generating guest firewall", { vmid });

    for (const dir of GUEST_DIRECTIONS) {
      const chain = chains.guest(vmid, dir);
      commands.push(add.chain(chain), flush.chain(chain));
    }

    const ipsets = this.createIpsets(commands, guest.ipsets, GUEST_TABLE, vmid);
    if (ipsets.isErr()) {
      return Result.err(ipsets.error);
    }

    const ipfilters = this.createIpfilters(commands, guest);
    if (ipfilters.isErr()) {
      return Result.err(ipfilters.error);
    }

    this.handleGuestOptions(commands, guest);

    for (const dir of GUEST_DIRECTIONS) {
      const rules = this.createGuestRules(commands, guest, dir);
      if (rules.isErr()) {
        return Result.err(rules.error);
      }
    }

    return Result.ok(undefined);
  }

  /**
   * One address filter per network device: the guest's own `ipfilter-net<N>`
   * set, or a default one when `ipfilter` is on
   */
  private createIpfilters(commands: Command[], guest: GuestConfig): Result<void, CompileError> {
    const vmid = guest.vmid;
    const objectEnv = { table: GUEST_TABLE, config: this.config, vmid };

    for (const [index, device] of guest.sortedDevices()) {
      const name = Ipfilter.nameForIndex(index);
      let ipset = guest.ipsets.get(name);

      if (!ipset) {
        if (!guest.ipfilter()) {
          continue;
        }

        this.logger.debug("generating default ipfilter", { vmid, device: `net${index}` });
        ipset = Ipset.fromParts("guest", name);
        ipset.push({ nomatch: false, address: { kind: "ip", entry: Cidr.host(device.mac.eui64LinkLocal()) } });
        for (const address of [device.ip, device.ip6]) {
          if (address) {
            ipset.push({ nomatch: false, address: { kind: "ip", entry: Cidr.host(address.address) } });
          }
        }
      }

      const objects = this.pushObjects(commands, ipsetObjects(ipset, objectEnv));
      if (objects.isErr()) {
        return Result.err(objects.error);
      }

      for (const dir of GUEST_DIRECTIONS) {
        const chain = chains.guest(vmid, dir);
        const rules = compileIpfilter(ipset.name, index, this.ruleEnv(chain, dir, vmid));
        if (rules.isErr()) {
          return Result.err(rules.error);
        }
        commands.push(...toAddRules(chain, rules.unwrap()));
      }
    }

    return Result.ok(undefined);
  }

  private handleGuestOptions(commands: Command[], guest: GuestConfig): void {
    const chainIn = chains.guest(guest.vmid, "in");
    const chainOut = chains.guest(guest.vmid, "out");
    const devices = guest.sortedDevices();

    if (guest.macfilter() && devices.length > 0) {
      const allowed = set(
        devices.map(([index, device]) => concat([guest.ifaceNameByIndex(index), device.mac.toString()]))
      );

      for (const source of [payload("ether", "saddr"), payload("arp", "saddr ether")]) {
        commands.push(add.rule(chainOut, [match("!=", concat([meta("iifname"), source]), allowed), drop]));
      }
    }

    const dhcp = guest.allowDhcp() ? "allow" : "block";
    commands.push(add.rule(chainIn, [jump(`${dhcp}-dhcp-in`)]), add.rule(chainOut, [jump(`${dhcp}-dhcp-out`)]));

    const ndp = guest.allowNdp() ? "allow" : "block";
    commands.push(add.rule(chainIn, [jump(`${ndp}-ndp-in`)]), add.rule(chainOut, [jump(`${ndp}-ndp-out`)]));

    const ra = guest.allowRa() ? "allow" : "block";
    commands.push(add.rule(chainOut, [jump(`${ra}-ra-out`)]));

    // outgoing ARP passes unless the MAC filter dropped it
    commands.push(add.rule(chainOut, [match("==", payload("ether", "type"), "arp"), accept]));
  }

  private createGuestRules(
    commands: Command[],
    guest: GuestConfig,
    dir: GuestDirection
  ): Result<void, RuleCompileError> {
    const chain = chains.guest(guest.vmid, dir);
    const env = this.ruleEnv(chain, dir, guest.vmid);

    const rules = this.appendRules(commands, guest.rules, env);
    if (rules.isErr()) {
      return Result.err(rules.error);
    }

    const elements = guest
      .sortedDevices()
      .filter(([, device]) => device.firewall)
      .map(([index]) => [guest.ifaceNameByIndex(index), goto(chain.name)]);
    if (elements.length > 0) {
      commands.push(add.element(maps.guest(dir), elements));
    }

    if (dir === "in") {
      commands.push(add.rule(chain, [jump("after-vm-in")]));
    }

    this.closeChain(commands, env, guest.logLevel(dir), guest.defaultPolicy(dir));

    return Result.ok(undefined);
  }

  private buildBridge(commands: Command[], bridge: BridgeConfig): Result<void, RuleCompileError> {
    const chain = chains.bridge(bridge.name);
    const env = this.ruleEnv(chain, "forward");
    this.logger.debug("generating bridge firewall", { bridge: bridge.name });

    commands.push(add.chain(chain), flush.chain(chain));

    const rules = this.appendRules(commands, bridge.rules, env);
    if (rules.isErr()) {
      return Result.err(rules.error);
    }

    commands.push(add.element(maps.bridge(), [[bridge.name, goto(chain.name)]]));
    this.closeChain(commands, env, bridge.logLevel(), bridge.defaultPolicy());

    return Result.ok(undefined);
  }

  private appendRules(
    commands: Command[],
    rules: readonly Rule[],
    env: RuleEnv
  ): Result<void, RuleCompileError> {
    for (const rule of rules) {
      const compiled = compileRule(rule, env);
      if (compiled.isErr()) {
        return Result.err(compiled.error);
      }
      commands.push(...toAddRules(env.chain, compiled.unwrap()));
    }
    return Result.ok(undefined);
  }

  /**
   * Log rule and policy verdict at the end of a chain
   */
  private closeChain(commands: Command[], env: RuleEnv, level: LogLevel, policy: Verdict): void {
    this.pushLogRule(commands, env.chain, level, policy, env.vmid);
    commands.push(add.rule(env.chain, [generateVerdict(policy, env)]));
  }

  private pushLogRule(
    commands: Command[],
    chain: ChainRef,
    level: LogLevel,
    verdict: Verdict,
    vmid?: number
  ): void {
    const statements = logStatements(this.config, level, chain.name, verdict, vmid);
    if (statements) {
      commands.push(add.rule(chain, statements));
    }
  }

  private pushObjects(
    commands: Command[],
    objects: Result<Command[], CompileError>
  ): Result<void, CompileError> {
    if (objects.isErr()) {
      return Result.err(objects.error);
    }
    commands.push(...objects.unwrap());
    return Result.ok(undefined);
  }

  private ruleEnv(chain: ChainRef, direction: Direction, vmid?: number): RuleEnv {
    return { chain, direction, config: this.config, vmid, logger: this.logger };
  }

  /**
   * Kernel tunables from the host options. The conntrack values are only
   * written when set; the conntrack log switch always is.
   */
  hostTunables(stateDir: string): HostTunable[] {
    const host = this.config.host;
    const tunables: HostTunable[] = [];

    for (const [name, value] of [
      ["nf_conntrack_max", host.nfConntrackMax()],
      ["nf_conntrack_tcp_timeout_established", host.nfConntrackTcpTimeoutEstablished()],
      ["nf_conntrack_tcp_timeout_syn_recv", host.nfConntrackTcpTimeoutSynRecv()],
    ] as const) {
      if (value !== undefined) {
        tunables.push({ name, path: join(NETFILTER_SYSCTL, name), value: String(value) });
      }
    }

    tunables.push({
      name: "log_nf_conntrack",
      path: join(stateDir, "log_nf_conntrack"),
      value: host.logInvalidConntrack() ? "1" : "0",
    });

    return tunables;
  }

  /**
   * Write the host tunables. A failed write is logged and skipped.
   */
  async applyHostTunables(stateDir: string, write: TunableWriter = writeFile): Promise<void> {
    for (const tunable of this.hostTunables(stateDir)) {
      this.logger.debug("setting tunable", { name: tunable.name, value: tunable.value });

      const written = await Result.tryPromise({
        try: () => write(tunable.path, tunable.value),
        catch: (error) => error,
      });
      if (written.isErr()) {
        this.logger.warn(`cannot set ${tunable.name}`, { path: tunable.path, error: String(written.error) });
      }
    }
  }
}

function sortedByName<V>(map: ReadonlyMap<string, V>): [string, V][] {
  return [...map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}
