/**
 * Engine expressions for configuration values
 */

import type { Cidr, Family, IpEntry, IpList, PortEntry, PortList } from "@fwsync/config";
import { type CtFamily, type Expression, oneOrSet, prefix, range } from "@fwsync/nftables";

export function cidrExpression(cidr: Cidr): Expression {
  return prefix(cidr.address.toString(), cidr.mask);
}

export function ipEntryExpression(entry: IpEntry): Expression {
  if ("mask" in entry) {
    return cidrExpression(entry);
  }
  return range(entry.begin.toString(), entry.end.toString());
}

export function ipListExpression(list: IpList): Expression {
  return oneOrSet(list.entries.map(ipEntryExpression));
}

export function portEntryExpression(entry: PortEntry): Expression {
  return entry.kind === "port" ? entry.port : range(entry.begin, entry.end);
}

export function portListExpression(list: PortList): Expression {
  return oneOrSet(list.entries.map(portEntryExpression));
}

/**
 * Payload protocol, and ct family, of an address family
 */
export function ipProtocol(family: Family): CtFamily {
  return family === "v4" ? "ip" : "ip6";
}
