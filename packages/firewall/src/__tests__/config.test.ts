import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { Result } from "better-result";
import { Cidr, ClusterConfig, HostConfig } from "@fwsync/config";
import { LoaderError } from "@fwsync/errors";
import { silentLogger } from "@fwsync/logger";
import { FirewallConfig, loadFirewallConfig } from "../config";
import { MemoryEngineGateway } from "../gateway";
import { FsConfigSource, MemoryConfigSource } from "../source";

const VMLIST = JSON.stringify({
  version: 3,
  ids: {
    "100": { node: "node1", type: "qemu", version: 1 },
    "101": { node: "node1", type: "lxc", version: 2 },
    "102": { node: "node1", type: "qemu", version: 3 },
    "200": { node: "node2", type: "qemu", version: 4 },
  },
});

const RUNNING_CONFIG = JSON.stringify({
  vnets: { ids: { vnet0: { zone: "zone0" }, vnet1: { zone: "zone0" } } },
  subnets: { ids: { "zone0-10.100.0.0-24": { vnet: "vnet0", gateway: "10.100.0.1" } } },
});

const IPAM = JSON.stringify({
  zones: { zone0: { subnets: { "10.100.0.0/24": { ips: { "10.100.0.10": { vmid: 100 } } } } } },
});

function source(): MemoryConfigSource {
  return new MemoryConfigSource({
    "firewall/cluster.fw": "[OPTIONS]\nenable: 1\n\n[IPSET vnet0-all]\n192.0.2.0/24\n",
    "local/host.fw": "[OPTIONS]\nnftables: 1\n",
    ".vmlist": VMLIST,
    "firewall/100.fw": "[OPTIONS]\nenable: 1\n",
    "local/qemu-server/100.conf": "net0: virtio=BC:24:11:00:00:01,bridge=vmbr0,firewall=1",
    "firewall/101.fw": "[OPTIONS]\nenable: 1\n",
    "local/lxc/101.conf": "net0: name=eth0,bridge=vmbr0,hwaddr=BC:24:11:00:00:02,type=veth",
    "local/qemu-server/102.conf": "net0: virtio=BC:24:11:00:00:03,bridge=vmbr0",
    "firewall/200.fw": "[OPTIONS]\nenable: 1\n",
    "sdn/.running-config": RUNNING_CONFIG,
    "priv/ipam.db": IPAM,
    "sdn/firewall/vnet0.fw": "[OPTIONS]\nenable: 1\n",
  });
}

const options = { nodename: "node1" };

describe("loadFirewallConfig", () => {
  it("loads local guests that have a policy file", async () => {
    const result = await loadFirewallConfig(source(), new MemoryEngineGateway(), options, silentLogger);

    expect(result.isOk()).toBe(true);
    const config = result.unwrap();
    expect([...config.guests.keys()]).toEqual([100, 101]);
    expect(config.guest(101)?.ifaceNameByIndex(0)).toBe("veth101i0");
    expect(config.isEnabled()).toBe(true);
  });

  it("loads bridges of vnets with a policy file", async () => {
    const config = (await loadFirewallConfig(source(), new MemoryEngineGateway(), options, silentLogger)).unwrap();

    expect([...config.bridges.keys()]).toEqual(["vnet0"]);
  });

  it("merges SDN and IPAM sets without replacing declared ones", async () => {
    const config = (await loadFirewallConfig(source(), new MemoryEngineGateway(), options, silentLogger)).unwrap();

    const declared = config.cluster.ipsets.get("vnet0-all");
    expect(declared?.entries.map((entry) => entry.address.kind === "ip" && entry.address.entry.toString())).toEqual([
      "192.0.2.0/24",
    ]);
    expect(config.cluster.ipsets.has("vnet0-gateway")).toBe(true);
    expect(config.cluster.ipsets.has("vnet1-all")).toBe(true);
    expect(config.guest(100)?.ipsets.get("ipam")?.entries).toHaveLength(1);
  });

  it("falls back to defaults for missing files", async () => {
    const result = await loadFirewallConfig(new MemoryConfigSource(), new MemoryEngineGateway(), options, silentLogger);

    expect(result.isOk()).toBe(true);
    const config = result.unwrap();
    expect(config.isEnabled()).toBe(false);
    expect(config.guests.size).toBe(0);
    expect(config.bridges.size).toBe(0);
  });

  it("requires a definition for every guest policy", async () => {
    const files = source();
    files.delete("local/lxc/101.conf");

    const result = await loadFirewallConfig(files, new MemoryEngineGateway(), options, silentLogger);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error._tag).toBe("LoaderError");
      expect(result.error.message).toBe("guest 101 has a firewall config but no definition");
    }
  });

  it("reports policy parse errors", async () => {
    const files = source();
    files.set("local/host.fw", "[OPTIONS]\nnftables: maybe\n");

    const result = await loadFirewallConfig(files, new MemoryEngineGateway(), options, silentLogger);

    expect(result.isErr()).toBe(true);
  });

  it("keeps only the live chains of the owned tables", async () => {
    const gateway = new MemoryEngineGateway([
      { family: "bridge", table: "fwsync-guests", name: "guest-100-in", handle: 2 },
      { family: "ip", table: "filter", name: "INPUT", handle: 1 },
      { family: "inet", table: "fwsync", name: "cluster-in", handle: 3 },
    ]);

    const config = (await loadFirewallConfig(source(), gateway, options, silentLogger)).unwrap();

    expect(config.chains().map((chain) => chain.name)).toEqual(["cluster-in", "guest-100-in"]);
  });

  it("detects management networks unless the cluster declares them", async () => {
    const detected = Cidr.parse("192.0.2.0/24").unwrap();
    let calls = 0;
    const detectManagementCidrs = async () => {
      calls += 1;
      return Result.ok([detected]);
    };

    const config = (
      await loadFirewallConfig(source(), new MemoryEngineGateway(), { ...options, detectManagementCidrs }, silentLogger)
    ).unwrap();
    expect(config.managementCidrs).toEqual([detected]);

    const files = source();
    files.set("firewall/cluster.fw", "[OPTIONS]\nenable: 1\n\n[IPSET management]\n10.0.0.0/8\n");
    await loadFirewallConfig(files, new MemoryEngineGateway(), { ...options, detectManagementCidrs }, silentLogger);
    expect(calls).toBe(1);
  });

  it("passes detection failures on", async () => {
    const detectManagementCidrs = async () =>
      Result.err(new LoaderError({ message: "cannot resolve node name node1" }));

    const result = await loadFirewallConfig(
      source(),
      new MemoryEngineGateway(),
      { ...options, detectManagementCidrs },
      silentLogger
    );

    expect(result.isErr() && result.error.message).toBe("cannot resolve node name node1");
  });
});

describe("FirewallConfig", () => {
  it("resolves aliases by scope", () => {
    const config = new FirewallConfig(
      {
        cluster: ClusterConfig.parse("[ALIASES]\nlan 10.0.0.0/8\n").unwrap(),
        host: HostConfig.empty(),
      },
      silentLogger
    );

    const [dc] = [...ClusterConfig.parse("[IPSET x]\ndc/lan\nguest/lan\n").unwrap().ipsets.values()][0].entries;
    expect(dc.address.kind === "alias" && config.alias(dc.address.alias)?.address.toString()).toBe("10.0.0.0/8");

    const guestAlias = [...ClusterConfig.parse("[IPSET x]\nguest/lan\n").unwrap().ipsets.values()][0].entries[0];
    expect(guestAlias.address.kind === "alias" && config.alias(guestAlias.address.alias, 100)).toBeUndefined();
  });
});

describe("FsConfigSource", () => {
  let root = "";

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), "fwsync-"));
    await mkdir(join(root, "firewall"));
    await writeFile(join(root, "firewall", "cluster.fw"), "[OPTIONS]\nenable: 1\n");
    await mkdir(join(root, "local", "host.fw"), { recursive: true });
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("reads files below the root", async () => {
    const result = await new FsConfigSource(root).cluster();

    expect(result.unwrap()).toBe("[OPTIONS]\nenable: 1\n");
  });

  it("treats missing files as absent", async () => {
    const result = await new FsConfigSource(root).guestFirewallConfig(100);

    expect(result.isOk()).toBe(true);
    expect(result.unwrap()).toBeUndefined();
  });

  it("reports other read failures", async () => {
    // a directory where the host policy should be
    const result = await new FsConfigSource(root).host();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error._tag).toBe("LoaderError");
      expect(result.error.path).toBe(join(root, "local", "host.fw"));
    }
  });
});
