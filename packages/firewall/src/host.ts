/**
 * Local network facts: the node's own addresses and the networks they live in
 */

import { lookup } from "node:dns/promises";
import { networkInterfaces } from "node:os";
import { Result } from "better-result";
import { Cidr, IpAddress } from "@fwsync/config";
import { LoaderError } from "@fwsync/errors";

/**
 * Addresses the node name resolves to
 */
export async function hostIps(nodename: string): Promise<Result<IpAddress[], LoaderError>> {
  const resolved = await Result.tryPromise({
    try: () => lookup(nodename, { all: true }),
    catch: (error) =>
      new LoaderError({ message: `cannot resolve node name ${nodename}: ${String(error)}`, cause: error }),
  });
  if (resolved.isErr()) {
    return Result.err(resolved.error);
  }

  const addresses: IpAddress[] = [];
  for (const { address } of resolved.unwrap()) {
    const parsed = IpAddress.parse(address);
    if (parsed.isOk()) {
      addresses.push(parsed.unwrap());
    }
  }
  return Result.ok(addresses);
}

/**
 * CIDRs configured on the local interfaces, loopback included
 */
export function interfaceCidrs(): Cidr[] {
  const cidrs: Cidr[] = [];

  for (const addresses of Object.values(networkInterfaces())) {
    for (const info of addresses ?? []) {
      if (info.cidr === null) {
        continue;
      }
      // link-local v6 entries carry a zone (`fe80::1%eth0/64`)
      const parsed = Cidr.parse(info.cidr.replace(/%[^/]*/, ""));
      if (parsed.isOk()) {
        cidrs.push(parsed.unwrap());
      }
    }
  }

  return cidrs;
}

/**
 * The networks, in network form, that contain one of the host addresses
 */
export function managementCidrs(addresses: readonly IpAddress[], cidrs: readonly Cidr[]): Cidr[] {
  const result: Cidr[] = [];

  for (const cidr of cidrs) {
    if (!addresses.some((address) => cidr.containsAddress(address))) {
      continue;
    }
    const network = cidr.network();
    if (!result.some((known) => known.equals(network))) {
      result.push(network);
    }
  }

  return result;
}

export async function detectManagementCidrs(nodename: string): Promise<Result<Cidr[], LoaderError>> {
  const addresses = await hostIps(nodename);
  return addresses.map((ips) => managementCidrs(ips, interfaceCidrs()));
}
