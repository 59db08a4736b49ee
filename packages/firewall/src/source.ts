/**
 * Where configuration text comes from
 *
 * Every read resolves to the file's text, or to undefined when the file does
 * not exist. Any other failure is a LoaderError.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { Result } from "better-result";
import { type GuestEntry, GuestMap } from "@fwsync/config";
import { LoaderError } from "@fwsync/errors";

export type ReadResult = Promise<Result<string | undefined, LoaderError>>;

export interface ConfigSource {
  cluster(): ReadResult;
  host(): ReadResult;
  guestList(): ReadResult;
  guestConfig(vmid: number, entry: GuestEntry): ReadResult;
  guestFirewallConfig(vmid: number): ReadResult;
  sdnRunningConfig(): ReadResult;
  ipam(): ReadResult;
  bridgeFirewallConfig(name: string): ReadResult;
}

/**
 * Locations below the configuration root
 */
export const CONFIG_PATHS = {
  cluster: "firewall/cluster.fw",
  host: "local/host.fw",
  guestList: ".vmlist",
  sdnRunningConfig: "sdn/.running-config",
  ipam: "priv/ipam.db",
  bridgeFirewallConfig: (name: string) => `sdn/firewall/${name}.fw`,
};

/**
 * Reads relative paths; implementations decide where they live
 */
abstract class PathConfigSource implements ConfigSource {
  protected abstract read(path: string): ReadResult;

  cluster(): ReadResult {
    return this.read(CONFIG_PATHS.cluster);
  }

  host(): ReadResult {
    return this.read(CONFIG_PATHS.host);
  }

  guestList(): ReadResult {
    return this.read(CONFIG_PATHS.guestList);
  }

  guestConfig(vmid: number, entry: GuestEntry): ReadResult {
    return this.read(GuestMap.configPath(vmid, entry));
  }

  guestFirewallConfig(vmid: number): ReadResult {
    return this.read(GuestMap.firewallConfigPath(vmid));
  }

  sdnRunningConfig(): ReadResult {
    return this.read(CONFIG_PATHS.sdnRunningConfig);
  }

  ipam(): ReadResult {
    return this.read(CONFIG_PATHS.ipam);
  }

  bridgeFirewallConfig(name: string): ReadResult {
    return this.read(CONFIG_PATHS.bridgeFirewallConfig(name));
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FsConfigSource extends PathConfigSource {
  constructor(private readonly root: string) {
    super();
  }

  protected async read(path: string): ReadResult {
    const fullPath = join(this.root, path);

    const result = await Result.tryPromise({
      try: () => readFile(fullPath, "utf8"),
      catch: (error) =>
        new LoaderError({
          message: `cannot read ${fullPath}: ${String(error)}`,
          path: fullPath,
          cause: error,
        }),
    });

    if (result.isErr() && isNotFound(result.error.cause)) {
      return Result.ok(undefined);
    }

    return result;
  }
}

/**
 * In-memory files keyed by their path below the configuration root
 */
export class MemoryConfigSource extends PathConfigSource {
  private readonly files: Map<string, string>;

  constructor(files: Record<string, string> = {}) {
    super();
    this.files = new Map(Object.entries(files));
  }

  set(path: string, text: string): void {
    this.files.set(path, text);
  }

  delete(path: string): void {
    this.files.delete(path);
  }

  protected async read(path: string): ReadResult {
    return Result.ok(this.files.get(path));
  }
}
