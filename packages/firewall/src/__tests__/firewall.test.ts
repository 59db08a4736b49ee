import { describe, it, expect, vi } from "vitest";
import { BridgeConfig, ClusterConfig, GuestConfig, HostConfig } from "@fwsync/config";
import { type Logger, silentLogger } from "@fwsync/logger";
import { add, type Batch, flush, type ListChain, remove, type Statement } from "@fwsync/nftables";
import { FirewallConfig, type FirewallConfigParts } from "../config";
import { Firewall } from "../firewall";
import { chainIn, chains, CLUSTER_TABLE, GUEST_TABLE, maps } from "../names";

const ENABLED_CLUSTER = "[OPTIONS]\nenable: 1\n";
const NFTABLES_HOST = "[OPTIONS]\nnftables: 1\n";

const GUEST_DEFINITION = [
  "net0: virtio=BC:24:11:00:00:01,bridge=vmbr0,firewall=1",
  "net1: virtio=BC:24:11:00:00:02,bridge=vmbr1,firewall=0",
].join("\n");

interface Texts {
  cluster?: string;
  host?: string;
  guests?: Record<number, string>;
  bridges?: Record<string, string>;
  chains?: ListChain[];
}

function firewall(texts: Texts, logger: Logger = silentLogger): Firewall {
  const parts: FirewallConfigParts = {
    cluster: ClusterConfig.parse(texts.cluster ?? ENABLED_CLUSTER).unwrap(),
    host: HostConfig.parse(texts.host ?? NFTABLES_HOST).unwrap(),
    guests: new Map(
      Object.entries(texts.guests ?? {}).map(([vmid, text]) => [
        Number(vmid),
        GuestConfig.parse(Number(vmid), "qemu", text, GUEST_DEFINITION).unwrap(),
      ])
    ),
    bridges: new Map(
      Object.entries(texts.bridges ?? {}).map(([name, text]) => [name, BridgeConfig.parse(name, text).unwrap()])
    ),
    chains: texts.chains,
  };
  return new Firewall(new FirewallConfig(parts, logger), logger);
}

function compile(texts: Texts): Batch {
  const result = firewall(texts).fullHostFw();
  if (result.isErr()) {
    throw new Error(result.error.message);
  }
  return result.unwrap();
}

function rulesIn(batch: Batch, chain: string): Statement[][] {
  return batch.nftables.flatMap((command) =>
    "add" in command && "rule" in command.add && command.add.rule.chain === chain ? [command.add.rule.expr] : []
  );
}

const accept = { accept: null };
const drop = { drop: null };
const jump = (target: string) => ({ jump: { target } });

const RESET = [
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
  flush.chain(chains.logSmurfs()),
];

describe("Firewall.fullHostFw", () => {
  it("emits nothing when the firewall is disabled", () => {
    expect(compile({ cluster: "[OPTIONS]\nenable: 0\n" })).toEqual({ nftables: [] });
    expect(compile({ host: "[OPTIONS]\nnftables: 0\n" })).toEqual({ nftables: [] });
  });

  it("builds the cluster and host chains of an empty policy", () => {
    const management = (name: string) => chainIn(CLUSTER_TABLE, name);

    expect(compile({}).nftables).toEqual([
      ...RESET,
      add.intervalSet(management("v4-dc/management"), "ipv4_addr"),
      flush.set(management("v4-dc/management")),
      add.intervalSet(management("v4-dc/management-nomatch"), "ipv4_addr"),
      flush.set(management("v4-dc/management-nomatch")),
      add.intervalSet(management("v6-dc/management"), "ipv6_addr"),
      flush.set(management("v6-dc/management")),
      add.intervalSet(management("v6-dc/management-nomatch"), "ipv6_addr"),
      flush.set(management("v6-dc/management-nomatch")),
      add.rule(chains.cluster("in"), [drop]),
      add.rule(chains.cluster("out"), [accept]),
      add.rule(chains.hostOption("in"), [jump("allow-ndp-in")]),
      add.rule(chains.hostOption("out"), [jump("allow-ndp-out")]),
      add.rule(chains.hostOption("in"), [jump("block-smurfs")]),
      add.rule(chains.hostOption("in"), [jump("block-conntrack-invalid")]),
      remove.table(GUEST_TABLE),
    ]);
  });

  it("compiles the same policy to the same batch", () => {
    const texts: Texts = {
      cluster: `${ENABLED_CLUSTER}\n[IPSET trusted]\n10.0.0.0/8\n\n[RULES]\nIN SSH(ACCEPT) -source +dc/trusted\n`,
      guests: { 100: "[OPTIONS]\nenable: 1\n\n[RULES]\nIN ACCEPT -p tcp -dport 80\n" },
    };

    expect(compile(texts)).toEqual(compile(texts));
  });

  it("ignores disabled guests", () => {
    const withGuest = compile({ guests: { 100: "[OPTIONS]\nenable: 0\n\n[RULES]\nIN ACCEPT\n" } });

    expect(withGuest).toEqual(compile({}));
  });

  it("deletes the cluster table when the host firewall is off", () => {
    const batch = compile({ host: "[OPTIONS]\nnftables: 1\nenable: 0\n" });

    expect(batch.nftables).toEqual([...RESET, remove.table(CLUSTER_TABLE), remove.table(GUEST_TABLE)]);
  });

  it("deletes stale guest, bridge and group chains of the owned tables", () => {
    const chain = (family: ListChain["family"], table: string, name: string, handle: number): ListChain => ({
      family,
      table,
      name,
      handle,
    });

    const batch = compile({
      chains: [
        chain("inet", "fwsync", "group-web-in", 1),
        chain("bridge", "fwsync-guests", "guest-100-out", 2),
        chain("bridge", "fwsync-guests", "bridge-vnet0-forward", 3),
        chain("bridge", "fwsync-guests", "guest-100-in", 4),
        chain("inet", "fwsync", "host-in", 5),
        chain("ip", "filter", "guest-1-in", 6),
      ],
    });

    expect(batch.nftables.filter((command) => "delete" in command && "chain" in command.delete)).toEqual([
      remove.chain(chainIn(GUEST_TABLE, "guest-100-in")),
      remove.chain(chainIn(GUEST_TABLE, "guest-100-out")),
      remove.chain(chainIn(GUEST_TABLE, "bridge-vnet0-forward")),
      remove.chain(chainIn(CLUSTER_TABLE, "group-web-in")),
    ]);
  });

  it("closes the cluster chains with the log rule and the policy", () => {
    const batch = compile({
      cluster: `${ENABLED_CLUSTER}policy_in: REJECT\n\n[RULES]\nIN ACCEPT -p tcp -dport 22\n`,
      host: `${NFTABLES_HOST}log_level_in: info\n`,
    });

    expect(rulesIn(batch, "cluster-in")).toEqual([
      [
        { match: { op: "==", left: { meta: { key: "l4proto" } }, right: "tcp" } },
        { match: { op: "==", left: { payload: { protocol: "th", field: "dport" } }, right: 22 } },
        accept,
      ],
      [
        { limit: { rate: 1, per: "second", burst: 5 } },
        { log: { prefix: ":0:6:cluster-in: REJECT: ", group: 0 } },
      ],
      [jump("do-reject")],
    ]);
  });

  it("creates group chains in both tables", () => {
    const batch = compile({
      cluster: `${ENABLED_CLUSTER}\n[group web]\nIN HTTP(ACCEPT)\n`,
      guests: { 100: "[OPTIONS]\nenable: 1\n" },
    });

    const created = batch.nftables.filter((command) => "add" in command && "chain" in command.add);
    expect(created).toEqual([
      add.chain(chains.host("in")),
      add.chain(chains.host("out")),
      add.chain(chains.group(CLUSTER_TABLE, "web", "in")),
      add.chain(chains.group(CLUSTER_TABLE, "web", "out")),
      add.chain(chains.group(GUEST_TABLE, "web", "in")),
      add.chain(chains.group(GUEST_TABLE, "web", "out")),
      add.chain(chains.guest(100, "in")),
      add.chain(chains.guest(100, "out")),
    ]);
    expect(rulesIn(batch, "group-web-in")).toHaveLength(2);
    expect(rulesIn(batch, "group-web-out")).toEqual([]);
  });

  it("builds guest chains and map entries", () => {
    const batch = compile({
      guests: { 100: "[OPTIONS]\nenable: 1\n\n[RULES]\nIN ACCEPT -p tcp -dport 22\n" },
    });

    expect(rulesIn(batch, "guest-100-in")).toEqual([
      [jump("allow-dhcp-in")],
      [jump("allow-ndp-in")],
      [
        { match: { op: "==", left: { meta: { key: "l4proto" } }, right: "tcp" } },
        { match: { op: "==", left: { payload: { protocol: "th", field: "dport" } }, right: 22 } },
        accept,
      ],
      [jump("after-vm-in")],
      [drop],
    ]);

    const macs = {
      set: [
        { concat: ["tap100i0", "BC:24:11:00:00:01"] },
        { concat: ["tap100i1", "BC:24:11:00:00:02"] },
      ],
    };
    expect(rulesIn(batch, "guest-100-out")).toEqual([
      [
        {
          match: {
            op: "!=",
            left: { concat: [{ meta: { key: "iifname" } }, { payload: { protocol: "ether", field: "saddr" } }] },
            right: macs,
          },
        },
        drop,
      ],
      [
        {
          match: {
            op: "!=",
            left: { concat: [{ meta: { key: "iifname" } }, { payload: { protocol: "arp", field: "saddr ether" } }] },
            right: macs,
          },
        },
        drop,
      ],
      [jump("allow-dhcp-out")],
      [jump("allow-ndp-out")],
      [jump("block-ra-out")],
      [{ match: { op: "==", left: { payload: { protocol: "ether", field: "type" } }, right: "arp" } }, accept],
      [accept],
    ]);

    // only net0 has the firewall flag
    const elements = batch.nftables.filter((command) => "add" in command && "element" in command.add);
    expect(elements).toEqual([
      add.element(maps.guest("in"), [["tap100i0", { goto: { target: "guest-100-in" } }]]),
      add.element(maps.guest("out"), [["tap100i0", { goto: { target: "guest-100-out" } }]]),
    ]);
  });

  it("creates the default ipfilter set of every device", () => {
    const batch = compile({ guests: { 100: "[OPTIONS]\nenable: 1\nipfilter: 1\nmacfilter: 0\n" } });

    const elements = batch.nftables.filter((command) => "add" in command && "element" in command.add);
    expect(elements.slice(0, 2)).toEqual([
      add.element(chainIn(GUEST_TABLE, "v6-guest-100/ipfilter-net0"), [
        { prefix: { addr: "fe80::be24:11ff:fe00:1", len: 128 } },
      ]),
      add.element(chainIn(GUEST_TABLE, "v6-guest-100/ipfilter-net1"), [
        { prefix: { addr: "fe80::be24:11ff:fe00:2", len: 128 } },
      ]),
    ]);
    expect(rulesIn(batch, "guest-100-in")[0]).toEqual([
      { match: { op: "==", left: { meta: { key: "oifname" } }, right: "tap100i0" } },
      {
        match: {
          op: "!=",
          left: { payload: { protocol: "arp", field: "daddr ip" } },
          right: "@v4-guest-100/ipfilter-net0",
        },
      },
      drop,
    ]);
  });

  it("builds bridge chains and their forward groups", () => {
    const batch = compile({
      cluster: `${ENABLED_CLUSTER}\n[group web]\nIN HTTP(ACCEPT)\n`,
      bridges: { vnet0: "[OPTIONS]\nenable: 1\npolicy_forward: DROP\n\n[RULES]\nFORWARD ACCEPT -p tcp -dport 443\n" },
    });

    const created = batch.nftables.filter((command) => "add" in command && "chain" in command.add);
    expect(created.slice(4)).toEqual([
      add.chain(chains.group(GUEST_TABLE, "web", "in")),
      add.chain(chains.group(GUEST_TABLE, "web", "out")),
      add.chain(chains.group(GUEST_TABLE, "web", "forward")),
      add.chain(chains.bridge("vnet0")),
    ]);
    expect(rulesIn(batch, "bridge-vnet0-forward")).toEqual([
      [
        { match: { op: "==", left: { meta: { key: "l4proto" } }, right: "tcp" } },
        { match: { op: "==", left: { payload: { protocol: "th", field: "dport" } }, right: 443 } },
        accept,
      ],
      [drop],
    ]);
    expect(batch.nftables).toContainEqual(
      add.element(maps.bridge(), [["vnet0", { goto: { target: "bridge-vnet0-forward" } }]])
    );
  });

  it("applies the host hardening options", () => {
    const batch = compile({
      host: [
        NFTABLES_HOST,
        "protection_synflood: 1",
        "protection_synflood_rate: 10",
        "protection_synflood_burst: 20",
        "tcpflags: 1",
        "tcp_flags_log_level: info",
        "nosmurfs: 0",
        "nf_conntrack_allow_invalid: 1",
        "ndp: 0",
      ].join("\n"),
    });

    expect(rulesIn(batch, "option-in")).toEqual([
      [jump("block-ndp-in")],
      [jump("block-synflood")],
      [jump("block-invalid-tcp")],
    ]);
    const limit = { limit: { rate: 10, per: "second", burst: 20, inv: true } };
    expect(rulesIn(batch, "ratelimit-synflood")).toEqual([
      [
        {
          set: {
            op: "update",
            elem: { payload: { protocol: "ip", field: "saddr" } },
            set: "@v4-synflood-limit",
            stmt: [limit],
          },
        },
        drop,
      ],
      [
        {
          set: {
            op: "update",
            elem: { payload: { protocol: "ip6", field: "saddr" } },
            set: "@v6-synflood-limit",
            stmt: [limit],
          },
        },
        drop,
      ],
    ]);
    expect(rulesIn(batch, "log-invalid-tcp")).toEqual([
      [
        { limit: { rate: 1, per: "second", burst: 5 } },
        { log: { prefix: ":0:6:log-invalid-tcp: DROP: ", group: 0 } },
      ],
    ]);
  });

  it("sets up known conntrack helpers and skips unknown ones", () => {
    const warn = vi.fn();
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn(), child: () => logger };

    const result = firewall({ host: `${NFTABLES_HOST}nf_conntrack_helpers: ftp,nosuch\n` }, logger).fullHostFw();

    expect(result.isOk()).toBe(true);
    const batch = result.unwrap();
    expect(batch.nftables).toContainEqual(add.ctHelper(chainIn(CLUSTER_TABLE, "helper-ftp-tcp"), "ftp", "tcp"));
    expect(rulesIn(batch, "ct-in")).toHaveLength(3);
    expect(warn).toHaveBeenCalledWith("ignoring unknown conntrack helper", { helper: "nosuch" });
  });

  it("aborts the whole batch on a compile error", () => {
    const result = firewall({ cluster: `${ENABLED_CLUSTER}\n[RULES]\nIN ACCEPT -source dc/missing\n` }).fullHostFw();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("could not find alias dc/missing");
    }
  });
});

describe("Firewall.removeCommands", () => {
  it("deletes each owned table in its own batch", () => {
    expect(Firewall.removeCommands()).toEqual([
      { nftables: [{ delete: { table: { family: "inet", name: "fwsync" } } }] },
      { nftables: [{ delete: { table: { family: "bridge", name: "fwsync-guests" } } }] },
    ]);
  });
});

describe("host tunables", () => {
  const host = `${NFTABLES_HOST}nf_conntrack_max: 262144\nlog_nf_conntrack: 1\n`;

  it("lists only the values that are set", () => {
    expect(firewall({ host }).hostTunables("/var/lib/fwsync")).toEqual([
      { name: "nf_conntrack_max", path: "/proc/sys/net/netfilter/nf_conntrack_max", value: "262144" },
      { name: "log_nf_conntrack", path: "/var/lib/fwsync/log_nf_conntrack", value: "1" },
    ]);
  });

  it("warns about failed writes and carries on", async () => {
    const warn = vi.fn();
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn(), child: () => logger };
    const write = vi.fn(async (path: string) => {
      if (path.startsWith("/proc")) {
        throw new Error("read-only file system");
      }
    });

    await firewall({ host }, logger).applyHostTunables("/tmp/state", write);

    expect(write).toHaveBeenCalledTimes(2);
    expect(write).toHaveBeenLastCalledWith("/tmp/state/log_nf_conntrack", "1");
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe("cannot set nf_conntrack_max");
  });
});
