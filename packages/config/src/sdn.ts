/**
 * Read-only snapshots of the software-defined network: the running vnet/subnet
 * configuration and the IPAM state. Both feed ipsets into the firewall.
 */

import { z } from "zod";
import { Result } from "better-result";
import type { ParseError } from "@fwsync/errors";
import { Cidr, IpAddress } from "./address";
import { Ipset } from "./ipset";
import { parseJson } from "./parse";

const runningConfigSchema = z.object({
  vnets: z
    .object({ ids: z.record(z.string(), z.object({ zone: z.string() }).passthrough()).default({}) })
    .default({}),
  subnets: z
    .object({
      ids: z
        .record(
          z.string(),
          z.object({ vnet: z.string(), gateway: z.string().optional() }).passthrough()
        )
        .default({}),
    })
    .default({}),
});

export interface Subnet {
  vnet: string;
  zone: string;
  cidr: Cidr;
  gateway?: IpAddress;
}

/**
 * Subnet ids look like `<zone>-<address>-<mask>`
 */
function parseSubnetId(id: string): { zone: string; cidr: Cidr } | undefined {
  const first = id.indexOf("-");
  const last = id.lastIndexOf("-");
  if (first === -1 || first === last) {
    return undefined;
  }

  const cidr = Cidr.parse(`${id.slice(first + 1, last)}/${id.slice(last + 1)}`);
  if (cidr.isErr()) {
    return undefined;
  }

  return { zone: id.slice(0, first), cidr: cidr.unwrap() };
}

export class SdnConfig {
  private constructor(
    private readonly vnetZones: ReadonlyMap<string, string>,
    readonly subnets: readonly Subnet[]
  ) {}

  static empty(): SdnConfig {
    return new SdnConfig(new Map(), []);
  }

  static parse(text: string): Result<SdnConfig, ParseError> {
    const parsed = parseJson(text, runningConfigSchema, "SDN running config");
    if (parsed.isErr()) {
      return Result.err(parsed.error);
    }
    const data = parsed.unwrap();

    const vnets = new Map<string, string>();
    for (const [name, vnet] of Object.entries(data.vnets.ids)) {
      vnets.set(name, vnet.zone);
    }

    const subnets: Subnet[] = [];
    for (const [id, subnet] of Object.entries(data.subnets.ids)) {
      const key = parseSubnetId(id);
      if (!key) {
        continue;
      }

      const entry: Subnet = { vnet: subnet.vnet, zone: key.zone, cidr: key.cidr };
      if (subnet.gateway !== undefined) {
        const gateway = IpAddress.parse(subnet.gateway);
        if (gateway.isOk()) {
          entry.gateway = gateway.unwrap();
        }
      }
      subnets.push(entry);
    }

    return Result.ok(new SdnConfig(vnets, subnets));
  }

  /**
   * Names of the defined vnets, sorted
   */
  vnets(): string[] {
    return [...this.vnetZones.keys()].sort();
  }

  /**
   * Datacenter ipsets derived from the vnets: `<vnet>-all` and `<vnet>-gateway`
   */
  ipsets(): Ipset[] {
    const ipsets: Ipset[] = [];

    for (const vnet of this.vnets()) {
      const all = Ipset.fromParts("dc", `${vnet}-all`);
      const gateway = Ipset.fromParts("dc", `${vnet}-gateway`);

      for (const subnet of this.subnets.filter((s) => s.vnet === vnet)) {
        all.push({ nomatch: false, address: { kind: "ip", entry: subnet.cidr } });
        if (subnet.gateway) {
          gateway.push({ nomatch: false, address: { kind: "ip", entry: Cidr.host(subnet.gateway) } });
        }
      }

      ipsets.push(all, gateway);
    }

    return ipsets;
  }
}

const vmidSchema = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .regex(/^\d+$/)
    .transform((value) => Number(value)),
]);

const ipamSchema = z.object({
  zones: z
    .record(
      z.string(),
      z.object({
        subnets: z
          .record(
            z.string(),
            z.object({
              ips: z
                .record(
                  z.string(),
                  z.object({
                    vmid: vmidSchema.optional(),
                    hostname: z.string().optional(),
                    mac: z.string().optional(),
                    gateway: z.union([z.boolean(), z.number()]).optional(),
                  })
                )
                .default({}),
            })
          )
          .default({}),
      })
    )
    .default({}),
});

export interface IpamEntry {
  zone: string;
  subnet: string;
  address: IpAddress;
  vmid?: number;
  hostname?: string;
  mac?: string;
}

export class Ipam {
  private constructor(readonly entries: readonly IpamEntry[]) {}

  static empty(): Ipam {
    return new Ipam([]);
  }

  static parse(text: string): Result<Ipam, ParseError> {
    const parsed = parseJson(text, ipamSchema, "IPAM state");
    if (parsed.isErr()) {
      return Result.err(parsed.error);
    }

    const entries: IpamEntry[] = [];
    for (const [zone, { subnets }] of Object.entries(parsed.unwrap().zones)) {
      for (const [subnet, { ips }] of Object.entries(subnets)) {
        for (const [ip, data] of Object.entries(ips)) {
          const address = IpAddress.parse(ip);
          if (address.isErr()) {
            continue;
          }
          const entry: IpamEntry = { zone, subnet, address: address.unwrap() };
          if (data.vmid !== undefined) entry.vmid = data.vmid;
          if (data.hostname !== undefined) entry.hostname = data.hostname;
          if (data.mac !== undefined) entry.mac = data.mac;
          entries.push(entry);
        }
      }
    }

    return Result.ok(new Ipam(entries));
  }

  /**
   * One guest-scoped `ipam` set per guest that has addresses, keyed by vmid
   */
  guestIpsets(): Map<number, Ipset> {
    const ipsets = new Map<number, Ipset>();

    for (const entry of this.entries) {
      if (entry.vmid === undefined) {
        continue;
      }

      let ipset = ipsets.get(entry.vmid);
      if (!ipset) {
        ipset = Ipset.fromParts("guest", "ipam");
        ipsets.set(entry.vmid, ipset);
      }
      ipset.push({ nomatch: false, address: { kind: "ip", entry: Cidr.host(entry.address) } });
    }

    return ipsets;
  }
}
