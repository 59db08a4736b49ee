/**
 * The configuration of one synchronization cycle
 *
 * Everything the compiler needs is loaded up front: the policy files, the
 * SDN snapshots, the live chain inventory and the interface names.
 */

import { Result } from "better-result";
import {
  type Alias,
  type AliasName,
  BridgeConfig,
  type Cidr,
  ClusterConfig,
  GuestConfig,
  GuestMap,
  HostConfig,
  Ipam,
  SdnConfig,
} from "@fwsync/config";
import {
  LoaderError,
  type NftCommandError,
  type NftIoError,
  type PolicyError,
} from "@fwsync/errors";
import type { Logger } from "@fwsync/logger";
import type { ListChain } from "@fwsync/nftables";
import type { EngineGateway } from "./gateway";
import { isOwnedTable } from "./names";
import type { ConfigSource } from "./source";

export interface FirewallConfigParts {
  cluster: ClusterConfig;
  host: HostConfig;
  guests?: ReadonlyMap<number, GuestConfig>;
  bridges?: ReadonlyMap<string, BridgeConfig>;
  sdn?: SdnConfig;
  ipam?: Ipam;
  /** Alternative and kernel interface names to the kernel name */
  interfaces?: ReadonlyMap<string, string>;
  /** Live chains, as listed by the engine */
  chains?: readonly ListChain[];
  managementCidrs?: readonly Cidr[];
}

function sortedMap<K, V>(map: ReadonlyMap<K, V>, compare: (a: K, b: K) => number): Map<K, V> {
  return new Map([...map.entries()].sort(([a], [b]) => compare(a, b)));
}

const byName = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export class FirewallConfig {
  readonly cluster: ClusterConfig;
  readonly host: HostConfig;
  readonly guests: ReadonlyMap<number, GuestConfig>;
  readonly bridges: ReadonlyMap<string, BridgeConfig>;
  readonly sdn: SdnConfig;
  readonly ipam: Ipam;
  readonly managementCidrs: readonly Cidr[];
  private readonly interfaces: ReadonlyMap<string, string>;
  private readonly liveChains: readonly ListChain[];

  constructor(
    parts: FirewallConfigParts,
    private readonly logger: Logger
  ) {
    this.cluster = parts.cluster;
    this.host = parts.host;
    this.guests = sortedMap(parts.guests ?? new Map(), (a, b) => a - b);
    this.bridges = sortedMap(parts.bridges ?? new Map(), byName);
    this.sdn = parts.sdn ?? SdnConfig.empty();
    this.ipam = parts.ipam ?? Ipam.empty();
    this.managementCidrs = parts.managementCidrs ?? [];
    this.interfaces = parts.interfaces ?? new Map();
    this.liveChains = [...(parts.chains ?? [])]
      .filter((chain) => isOwnedTable({ family: chain.family, table: chain.table }))
      .sort((a, b) => byName(a.name, b.name));
  }

  isEnabled(): boolean {
    return this.cluster.isEnabled() && this.host.nftables();
  }

  /**
   * Live chains of the owned tables, by name
   */
  chains(): readonly ListChain[] {
    return this.liveChains;
  }

  guest(vmid: number): GuestConfig | undefined {
    return this.guests.get(vmid);
  }

  alias(name: AliasName, vmid?: number): Alias | undefined {
    if (name.scope === "dc") {
      return this.cluster.alias(name.name);
    }

    const guest = vmid === undefined ? undefined : this.guests.get(vmid);
    if (!guest) {
      this.logger.warn("alias lookup for unknown guest", { alias: name.toString(), vmid });
      return undefined;
    }

    return guest.alias(name.name);
  }

  interfaceName(name: string): string | undefined {
    return this.interfaces.get(name);
  }
}

export interface LoadOptions {
  /** Guests on other nodes are ignored */
  nodename: string;
  /** Only consulted when the cluster defines no `management` ipset */
  detectManagementCidrs?: () => Promise<Result<Cidr[], LoaderError>>;
}

export type LoadError = PolicyError | LoaderError | NftCommandError | NftIoError;

async function loadGuests(
  source: ConfigSource,
  nodename: string
): Promise<Result<Map<number, GuestConfig>, LoadError>> {
  const guests = new Map<number, GuestConfig>();

  const listText = await source.guestList();
  if (listText.isErr()) {
    return Result.err(listText.error);
  }

  let guestMap = new GuestMap();
  const text = listText.unwrap();
  if (text !== undefined) {
    const parsed = GuestMap.parse(text);
    if (parsed.isErr()) {
      return Result.err(parsed.error);
    }
    guestMap = parsed.unwrap();
  }

  for (const [vmid, entry] of guestMap.local(nodename)) {
    const firewall = await source.guestFirewallConfig(vmid);
    if (firewall.isErr()) {
      return Result.err(firewall.error);
    }
    const firewallText = firewall.unwrap();
    if (firewallText === undefined) {
      continue;
    }

    const definition = await source.guestConfig(vmid, entry);
    if (definition.isErr()) {
      return Result.err(definition.error);
    }
    const definitionText = definition.unwrap();
    if (definitionText === undefined) {
      return Result.err(
        new LoaderError({
          message: `guest ${vmid} has a firewall config but no definition`,
          path: GuestMap.configPath(vmid, entry),
        })
      );
    }

    const config = GuestConfig.parse(vmid, entry.type, firewallText, definitionText);
    if (config.isErr()) {
      return Result.err(config.error);
    }
    guests.set(vmid, config.unwrap());
  }

  return Result.ok(guests);
}

async function loadBridges(
  source: ConfigSource,
  sdn: SdnConfig
): Promise<Result<Map<string, BridgeConfig>, LoadError>> {
  const bridges = new Map<string, BridgeConfig>();

  for (const vnet of sdn.vnets()) {
    const text = await source.bridgeFirewallConfig(vnet);
    if (text.isErr()) {
      return Result.err(text.error);
    }
    const bridgeText = text.unwrap();
    if (bridgeText === undefined) {
      continue;
    }

    const config = BridgeConfig.parse(vnet, bridgeText);
    if (config.isErr()) {
      return Result.err(config.error);
    }
    bridges.set(vnet, config.unwrap());
  }

  return Result.ok(bridges);
}

async function loadOptional<T>(
  read: () => Promise<Result<string | undefined, LoaderError>>,
  parse: (text: string) => Result<T, LoadError>,
  fallback: () => T
): Promise<Result<T, LoadError>> {
  const text = await read();
  if (text.isErr()) {
    return Result.err(text.error);
  }
  const value = text.unwrap();
  return value === undefined ? Result.ok(fallback()) : parse(value);
}

/**
 * Load the configuration of one cycle. Missing files fall back to defaults.
 */
export async function loadFirewallConfig(
  source: ConfigSource,
  gateway: EngineGateway,
  options: LoadOptions,
  logger: Logger
): Promise<Result<FirewallConfig, LoadError>> {
  const log = logger.child({ component: "loader" });

  const cluster = await loadOptional(() => source.cluster(), ClusterConfig.parse, ClusterConfig.empty);
  if (cluster.isErr()) {
    return Result.err(cluster.error);
  }

  const host = await loadOptional(() => source.host(), HostConfig.parse, HostConfig.empty);
  if (host.isErr()) {
    return Result.err(host.error);
  }

  const guests = await loadGuests(source, options.nodename);
  if (guests.isErr()) {
    return Result.err(guests.error);
  }

  const sdn = await loadOptional(() => source.sdnRunningConfig(), SdnConfig.parse, SdnConfig.empty);
  if (sdn.isErr()) {
    return Result.err(sdn.error);
  }

  const ipam = await loadOptional(() => source.ipam(), Ipam.parse, Ipam.empty);
  if (ipam.isErr()) {
    return Result.err(ipam.error);
  }

  const bridges = await loadBridges(source, sdn.unwrap());
  if (bridges.isErr()) {
    return Result.err(bridges.error);
  }

  const clusterConfig = cluster.unwrap();
  for (const ipset of sdn.unwrap().ipsets()) {
    if (!clusterConfig.addIpset(ipset)) {
      log.debug("keeping configured ipset over SDN ipset", { ipset: ipset.name.toString() });
    }
  }

  const guestConfigs = guests.unwrap();
  for (const [vmid, ipset] of ipam.unwrap().guestIpsets()) {
    guestConfigs.get(vmid)?.addIpset(ipset);
  }

  const chains = await gateway.chains();
  if (chains.isErr()) {
    return Result.err(chains.error);
  }

  const interfaces = await gateway.interfaceMapping();
  if (interfaces.isErr()) {
    return Result.err(interfaces.error);
  }

  let managementCidrs: Cidr[] = [];
  if (!clusterConfig.ipsets.has("management") && options.detectManagementCidrs) {
    const detected = await options.detectManagementCidrs();
    if (detected.isErr()) {
      return Result.err(detected.error);
    }
    managementCidrs = detected.unwrap();
  }

  log.debug("loaded configuration", {
    guests: guestConfigs.size,
    bridges: bridges.unwrap().size,
    chains: chains.unwrap().length,
  });

  return Result.ok(
    new FirewallConfig(
      {
        cluster: clusterConfig,
        host: host.unwrap(),
        guests: guestConfigs,
        bridges: bridges.unwrap(),
        sdn: sdn.unwrap(),
        ipam: ipam.unwrap(),
        interfaces: interfaces.unwrap(),
        chains: chains.unwrap(),
        managementCidrs,
      },
      logger.child({ component: "config" })
    )
  );
}
