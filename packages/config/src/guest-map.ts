/**
 * Registry of all guests in the cluster (`.vmlist`)
 */

import { z } from "zod";
import { Result } from "better-result";
import { ParseError } from "@fwsync/errors";
import { parseJson } from "./parse";

export type GuestType = "qemu" | "lxc";

const guestEntrySchema = z.object({
  node: z.string(),
  type: z.enum(["qemu", "lxc"]),
  version: z.number().int().nonnegative().optional(),
});

const guestMapSchema = z.object({
  version: z.number().int().nonnegative().optional(),
  ids: z.record(z.string().regex(/^\d+$/, "vmid must be numeric"), guestEntrySchema).default({}),
});

export type GuestEntry = z.infer<typeof guestEntrySchema>;

/**
 * Interface name prefix: `tap` for VMs, `veth` for containers
 */
export function ifacePrefix(type: GuestType): string {
  return type === "qemu" ? "tap" : "veth";
}

export function configFolder(type: GuestType): string {
  return type === "qemu" ? "qemu-server" : "lxc";
}

export class GuestMap {
  constructor(readonly guests: ReadonlyMap<number, GuestEntry> = new Map()) {}

  static parse(text: string): Result<GuestMap, ParseError> {
    const parsed = parseJson(text, guestMapSchema, "guest map");
    if (parsed.isErr()) {
      return Result.err(parsed.error);
    }

    const guests = new Map<number, GuestEntry>();
    for (const [vmid, entry] of Object.entries(parsed.unwrap().ids)) {
      guests.set(Number(vmid), entry);
    }

    return Result.ok(new GuestMap(guests));
  }

  /**
   * Guests running on `nodename`, by ascending vmid
   */
  local(nodename: string): [number, GuestEntry][] {
    return [...this.guests.entries()]
      .filter(([, entry]) => entry.node === nodename)
      .sort(([a], [b]) => a - b);
  }

  static firewallConfigPath(vmid: number): string {
    return `firewall/${vmid}.fw`;
  }

  static configPath(vmid: number, entry: GuestEntry): string {
    return `local/${configFolder(entry.type)}/${vmid}.conf`;
  }
}
