import { describe, it, expect } from "vitest";
import { BridgeConfig } from "../bridge";
import { ClusterConfig } from "../cluster";
import { GuestConfig } from "../guest";
import { HostConfig } from "../host";
import { Ipset } from "../ipset";

const CLUSTER = `
[OPTIONS]
enable: 1
policy_in: ACCEPT

[ALIASES]
local 10.0.0.0/8 # the lan

[IPSET test] # test set
10.0.0.1
!10.0.0.2
dc/local

[RULES]
IN ACCEPT -p tcp -dport 22
|OUT DROP

[group web] # web servers
IN HTTP(ACCEPT)
`;

const GUEST_DEFINITION = [
  "cores: 2",
  "net0: virtio=BC:24:11:00:00:01,bridge=vmbr0,firewall=1",
  "net1: virtio=BC:24:11:00:00:02,bridge=vmbr1,firewall=0",
].join("\n");

describe("ClusterConfig", () => {
  it("parses every section", () => {
    const result = ClusterConfig.parse(CLUSTER);

    expect(result.isOk()).toBe(true);
    const config = result.unwrap();

    expect(config.isEnabled()).toBe(true);
    expect(config.defaultPolicy("in")).toBe("ACCEPT");
    expect(config.defaultPolicy("out")).toBe("ACCEPT");
    expect(config.defaultPolicy("forward")).toBe("ACCEPT");

    const alias = config.alias("local");
    expect(alias?.address.toString()).toBe("10.0.0.0/8");
    expect(alias?.comment).toBe("the lan");

    const ipset = config.ipsets.get("test");
    expect(ipset?.comment).toBe("test set");
    expect(ipset?.name.toString()).toBe("dc/test");
    expect(ipset?.entries.map((entry) => entry.nomatch)).toEqual([false, true, false]);
    expect(ipset?.entries[2].address.kind).toBe("alias");

    expect(config.rules.map((rule) => rule.disabled)).toEqual([false, true]);
    expect(config.groups.get("web")?.comment).toBe("web servers");
    expect(config.groups.get("web")?.rules.length).toBe(1);
  });

  it("applies defaults to an empty policy", () => {
    const config = ClusterConfig.empty();

    expect(config.isEnabled()).toBe(false);
    expect(config.ebtables()).toBe(false);
    expect(config.defaultPolicy("in")).toBe("DROP");
    expect(config.logRateLimit()).toEqual({ enabled: true, rate: 1, per: "second", burst: 5 });
  });

  it("drops a disabled log rate limit", () => {
    const config = ClusterConfig.parse("[OPTIONS]\nlog_ratelimit: enable=0").unwrap();

    expect(config.logRateLimit()).toBeUndefined();
  });

  it("adds generated sets without replacing declared ones", () => {
    const config = ClusterConfig.parse(CLUSTER).unwrap();

    expect(config.addIpset(Ipset.fromParts("dc", "test"))).toBe(false);
    expect(config.ipsets.get("test")?.entries.length).toBe(3);
    expect(config.addIpset(Ipset.fromParts("dc", "extra"))).toBe(true);
    expect(config.ipsets.has("extra")).toBe(true);
  });

  it("accepts lower case section headers", () => {
    const config = ClusterConfig.parse("[ipset Servers]\n10.0.0.1\n[GROUP admins]\nIN ACCEPT").unwrap();

    expect(config.ipsets.has("Servers")).toBe(true);
    expect(config.groups.has("admins")).toBe(true);
  });

  it.each([
    ["[OPTIONS]\nenable: 1\nenable: 0", 'duplicate option "enable"'],
    ["[ALIASES]\nlocal 10.0.0.0/8\nlocal 10.0.0.0/16", "duplicate alias: local 10.0.0.0/16"],
    ["[IPSET a]\n10.0.0.1\n[IPSET a]\n10.0.0.2", 'duplicate ipset: "a"'],
    ["[group a]\n[group a]", 'duplicate group: "a"'],
    ["[FOO]", 'invalid section "[FOO]"'],
    ["enable: 1", 'config line with no section: "enable: 1"'],
    ["[OPTIONS]\npolicy_in: ALLOW", `invalid value for option "policy_in": invalid verdict "ALLOW", expected one of 'ACCEPT', 'REJECT' or 'DROP'`],
  ])("rejects %j", (text, message) => {
    const result = ClusterConfig.parse(text);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(message);
    }
  });
});

describe("HostConfig", () => {
  it("applies defaults to an empty policy", () => {
    const config = HostConfig.empty();

    expect(config.isEnabled()).toBe(true);
    expect(config.nftables()).toBe(false);
    expect(config.allowNdp()).toBe(true);
    expect(config.blockInvalidConntrack()).toBe(true);
    expect(config.blockSmurfs()).toBe(true);
    expect(config.blockSynflood()).toBe(false);
    expect(config.synfloodRate()).toBe(200);
    expect(config.synfloodBurst()).toBe(1000);
    expect(config.logLevel("forward")).toBe("nolog");
    expect(config.nfConntrackMax()).toBeUndefined();
  });

  it("parses options", () => {
    const text = [
      "[OPTIONS]",
      "nftables: 1",
      "nf_conntrack_allow_invalid: 1",
      "nf_conntrack_helpers: ftp, tftp",
      "nf_conntrack_max: 262144",
      "log_level_in: warn",
      "tcpflags: yes",
    ].join("\n");

    const config = HostConfig.parse(text).unwrap();

    expect(config.nftables()).toBe(true);
    expect(config.blockInvalidConntrack()).toBe(false);
    expect(config.conntrackHelpers()).toEqual(["ftp", "tftp"]);
    expect(config.nfConntrackMax()).toBe(262144);
    expect(config.logLevel("in")).toBe("warning");
    expect(config.blockInvalidTcp()).toBe(true);
  });

  it("rejects a non-numeric limit", () => {
    const result = HostConfig.parse("[OPTIONS]\nnf_conntrack_max: abc");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('invalid value for option "nf_conntrack_max": invalid number: "abc"');
    }
  });

  it("rejects sections the host may not declare", () => {
    const result = HostConfig.parse("[ALIASES]\nlocal 10.0.0.1");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error._tag).toBe("ConfigError");
      expect(result.error.message).toBe("host firewall config cannot declare aliases");
    }
  });
});

describe("GuestConfig", () => {
  it("parses policy and devices", () => {
    const firewall = ["[OPTIONS]", "enable: 1", "ipfilter: 1", "[RULES]", "IN ACCEPT -i net0 -p tcp -dport 80"].join("\n");

    const result = GuestConfig.parse(100, "qemu", firewall, GUEST_DEFINITION);

    expect(result.isOk()).toBe(true);
    const guest = result.unwrap();
    expect(guest.isEnabled()).toBe(true);
    expect(guest.ipfilter()).toBe(true);
    expect(guest.macfilter()).toBe(true);
    expect(guest.allowDhcp()).toBe(true);
    expect(guest.allowRa()).toBe(false);
    expect(guest.defaultPolicy("in")).toBe("DROP");
    expect(guest.defaultPolicy("out")).toBe("ACCEPT");
    expect(guest.sortedDevices().map(([index, device]) => [index, device.firewall])).toEqual([
      [0, true],
      [1, false],
    ]);
    expect(guest.rules.length).toBe(1);
  });

  it("names host-side interfaces by guest type", () => {
    const vm = GuestConfig.parse(100, "qemu", undefined, GUEST_DEFINITION).unwrap();
    const ct = GuestConfig.parse(101, "lxc", undefined, "").unwrap();

    expect(vm.ifaceNameByKey("net0")).toBe("tap100i0");
    expect(ct.ifaceNameByKey("net3")).toBe("veth101i3");
    expect(vm.ifaceNameByKey("net31")).toBeUndefined();
    expect(vm.ifaceNameByKey("eth0")).toBeUndefined();
  });

  it("is disabled without a policy file", () => {
    const guest = GuestConfig.parse(100, "qemu", undefined, GUEST_DEFINITION).unwrap();

    expect(guest.isEnabled()).toBe(false);
    expect(guest.logLevel("in")).toBe("nolog");
  });

  it("requires net<N> interface names in rules", () => {
    const result = GuestConfig.parse(100, "qemu", "[RULES]\nIN ACCEPT -i eth0", GUEST_DEFINITION);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('interface name must be of the form "net<number>"');
    }
  });

  it("rejects groups", () => {
    const result = GuestConfig.parse(100, "qemu", "[group web]\nIN ACCEPT", GUEST_DEFINITION);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("guest firewall config cannot declare groups");
    }
  });

  it("names the guest when its definition is broken", () => {
    const result = GuestConfig.parse(100, "qemu", undefined, "net0: virtio=nope");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('guest 100: invalid MAC address: "nope"');
    }
  });

  it("marks ipfilter sets", () => {
    const guest = GuestConfig.parse(
      100,
      "qemu",
      "[IPSET ipfilter-net0]\n10.0.0.5\n[IPSET other]\n10.0.0.6",
      GUEST_DEFINITION
    ).unwrap();

    expect(guest.ipsets.get("ipfilter-net0")?.kind).toEqual({ kind: "ipfilter", index: 0 });
    expect(guest.ipsets.get("other")?.kind).toEqual({ kind: "ordinary" });
  });
});

describe("BridgeConfig", () => {
  it("parses forward rules", () => {
    const text = "[OPTIONS]\nenable: 1\npolicy_forward: DROP\n[RULES]\nFORWARD ACCEPT -p tcp -dport 22";

    const bridge = BridgeConfig.parse("vnet0", text).unwrap();

    expect(bridge.name).toBe("vnet0");
    expect(bridge.isEnabled()).toBe(true);
    expect(bridge.defaultPolicy()).toBe("DROP");
    expect(bridge.rules.length).toBe(1);
  });

  it("accepts only forward rules", () => {
    const result = BridgeConfig.parse("vnet0", "[RULES]\nIN ACCEPT");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("bridge firewall config only accepts FORWARD rules");
    }
  });

  it("is disabled and forwards by default", () => {
    const bridge = BridgeConfig.empty("vnet0");

    expect(bridge.isEnabled()).toBe(false);
    expect(bridge.defaultPolicy()).toBe("ACCEPT");
  });
});
