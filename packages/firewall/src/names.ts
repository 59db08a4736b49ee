/**
 * Tables, chains and sets the firewall owns
 *
 * Cluster and host rules share `inet fwsync`; guests and bridges live in
 * `bridge fwsync-guests`. The base chains, maps and helper chains referenced
 * here are created by the skeleton ruleset.
 */

import type { Direction, Family, IpsetName } from "@fwsync/config";
import type { ChainRef, TableRef } from "@fwsync/nftables";

export const CLUSTER_TABLE: TableRef = { family: "inet", table: "fwsync" };

// the host rules live next to the cluster rules
export const HOST_TABLE: TableRef = CLUSTER_TABLE;

export const GUEST_TABLE: TableRef = { family: "bridge", table: "fwsync-guests" };

export function isOwnedTable(ref: TableRef): boolean {
  return [CLUSTER_TABLE, GUEST_TABLE].some(
    (owned) => owned.family === ref.family && owned.table === ref.table
  );
}

export function chainIn(table: TableRef, name: string): ChainRef {
  return { family: table.family, table: table.table, name };
}

export const chains = {
  cluster: (dir: Direction) => chainIn(CLUSTER_TABLE, `cluster-${dir}`),
  host: (dir: Direction) => chainIn(HOST_TABLE, `host-${dir}`),
  hostOption: (dir: Direction) => chainIn(HOST_TABLE, `option-${dir}`),
  conntrack: () => chainIn(HOST_TABLE, "ct-in"),
  synfloodLimit: () => chainIn(HOST_TABLE, "ratelimit-synflood"),
  logInvalidTcp: () => chainIn(HOST_TABLE, "log-invalid-tcp"),
  logSmurfs: () => chainIn(HOST_TABLE, "log-smurfs"),
  guest: (vmid: number, dir: Direction) => chainIn(GUEST_TABLE, `guest-${vmid}-${dir}`),
  bridge: (name: string) => chainIn(GUEST_TABLE, `bridge-${name}-forward`),
  group: (table: TableRef, name: string, dir: Direction) => chainIn(table, `group-${name}-${dir}`),
};

export const maps = {
  guest: (dir: Direction) => chainIn(GUEST_TABLE, `vm-map-${dir}`),
  bridge: () => chainIn(GUEST_TABLE, "bridge-map"),
};

/**
 * Engine-level name of one half of an ipset:
 * `v4-dc/<name>`, `v6-guest-<vmid>/<name>`, with `-nomatch` for the excluded entries
 */
export function ipsetSetName(
  family: Family,
  name: IpsetName,
  vmid: number | undefined,
  nomatch: boolean
): string {
  const scoped = name.scope === "dc" ? `dc/${name.name}` : `guest-${vmid ?? 0}/${name.name}`;
  return `${family}-${scoped}${nomatch ? "-nomatch" : ""}`;
}
