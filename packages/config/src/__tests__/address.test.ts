import { describe, it, expect } from "vitest";
import { Cidr, IpAddress, IpList, IpRange, parseIpEntry } from "../address";

describe("IpAddress", () => {
  it("parses and formats IPv4 addresses", () => {
    const result = IpAddress.parse("192.168.10.1");

    expect(result.isOk()).toBe(true);
    const address = result.unwrap();
    expect(address.family).toBe("v4");
    expect(address.toString()).toBe("192.168.10.1");
  });

  it("compresses the longest run of zero groups", () => {
    expect(IpAddress.parse("2001:DB8:0:0:0:0:0:1").unwrap().toString()).toBe("2001:db8::1");
    expect(IpAddress.parse("1:0:0:2:0:0:0:3").unwrap().toString()).toBe("1:0:0:2::3");
    expect(IpAddress.parse("1:0:0:2:0:0:3:4").unwrap().toString()).toBe("1::2:0:0:3:4");
    expect(IpAddress.parse("::").unwrap().toString()).toBe("::");
    expect(IpAddress.parse("::1").unwrap().toString()).toBe("::1");
    expect(IpAddress.parse("1::").unwrap().toString()).toBe("1::");
  });

  it("does not compress a single zero group", () => {
    expect(IpAddress.parse("1:2:3:0:5:6:7:8").unwrap().toString()).toBe("1:2:3:0:5:6:7:8");
  });

  it("keeps the dotted tail of IPv4-mapped addresses", () => {
    expect(IpAddress.parse("::ffff:192.0.2.1").unwrap().toString()).toBe("::ffff:192.0.2.1");
  });

  it("rejects malformed addresses", () => {
    for (const input of ["10.0.0.256", "01.0.0.1", "10.0.0", "1:2:3:4:5:6:7:8:9", "1::2::3", "12345::"]) {
      const result = IpAddress.parse(input);
      expect(result.isErr()).toBe(true);
    }
  });

  it("reports the input in the error message", () => {
    const result = IpAddress.parseV4("fe80::1");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('invalid IPv4 address: "fe80::1"');
    }
  });
});

describe("Cidr", () => {
  it("round-trips prefixes as written", () => {
    for (const input of ["10.0.0.0/8", "192.168.1.17/24", "fe80::1/64", "::/0", "0.0.0.0/0"]) {
      expect(Cidr.parse(input).unwrap().toString()).toBe(input);
    }
  });

  it("treats a bare address as a host prefix", () => {
    expect(Cidr.parse("10.0.0.1").unwrap().toString()).toBe("10.0.0.1/32");
    expect(Cidr.parse("fe80::1").unwrap().toString()).toBe("fe80::1/128");
  });

  it("rejects prefix lengths wider than the family", () => {
    const result = Cidr.parse("10.0.0.0/33");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("invalid ip address or CIDR");
    }
  });

  it("contains the addresses inside the prefix", () => {
    const cidr = Cidr.parse("10.0.0.0/8").unwrap();

    expect(cidr.containsAddress(IpAddress.parse("10.255.1.2").unwrap())).toBe(true);
    expect(cidr.containsAddress(IpAddress.parse("11.0.0.0").unwrap())).toBe(false);
    expect(cidr.containsAddress(IpAddress.parse("::ffff:10.0.0.1").unwrap())).toBe(false);
  });

  it("contains its own address", () => {
    for (const input of ["10.1.2.3/8", "fe80::1234/64", "192.168.0.1/32"]) {
      const cidr = Cidr.parse(input).unwrap();
      expect(cidr.containsAddress(cidr.address)).toBe(true);
    }
  });

  it("contains everything of its family at mask 0", () => {
    const cidr = Cidr.parse("0.0.0.0/0").unwrap();

    expect(cidr.containsAddress(IpAddress.parse("255.255.255.255").unwrap())).toBe(true);
    expect(cidr.containsAddress(IpAddress.parse("::").unwrap())).toBe(false);
  });

  it("contains only the address itself at full width", () => {
    const cidr = Cidr.parse("10.0.0.1/32").unwrap();

    expect(cidr.containsAddress(IpAddress.parse("10.0.0.1").unwrap())).toBe(true);
    expect(cidr.containsAddress(IpAddress.parse("10.0.0.2").unwrap())).toBe(false);
  });

  it("clears host bits in the network form", () => {
    expect(Cidr.parse("10.1.2.3/8").unwrap().network().toString()).toBe("10.0.0.0/8");
    expect(Cidr.parse("fe80::1234/64").unwrap().network().toString()).toBe("fe80::/64");
  });
});

describe("IpRange", () => {
  it("parses ranges", () => {
    expect(IpRange.parse("10.0.0.1-10.0.0.10").unwrap().toString()).toBe("10.0.0.1-10.0.0.10");
  });

  it("rejects a begin after the end", () => {
    const result = IpRange.parse("10.0.0.10-10.0.0.1");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("start address is greater than end address");
    }
  });

  it("rejects mixed families", () => {
    const result = IpRange.parse("10.0.0.1-fe80::1");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("mismatched ip address families");
    }
  });
});

describe("parseIpEntry", () => {
  it("picks CIDR or range by the number of dashes", () => {
    expect(parseIpEntry("10.0.0.0/24").unwrap()).toBeInstanceOf(Cidr);
    expect(parseIpEntry("10.0.0.1-10.0.0.2").unwrap()).toBeInstanceOf(IpRange);
    expect(parseIpEntry("10.0.0.1-10.0.0.2-10.0.0.3").isErr()).toBe(true);
  });
});

describe("IpList", () => {
  it("parses comma separated entries of one family", () => {
    const result = IpList.parse("10.0.0.0/8, 192.168.0.0-192.168.255.255,172.16.0.1");

    expect(result.isOk()).toBe(true);
    const list = result.unwrap();
    expect(list.length).toBe(3);
    expect(list.family).toBe("v4");
    expect(list.toString()).toBe("10.0.0.0/8,192.168.0.0-192.168.255.255,172.16.0.1/32");
  });

  it("rejects mixed families", () => {
    const result = IpList.parse("10.0.0.1,fe80::1");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("ip list contains entries of different families");
    }
  });

  it("rejects an empty list", () => {
    expect(IpList.create([]).isErr()).toBe(true);
    expect(IpList.parse("").isErr()).toBe(true);
  });
});
