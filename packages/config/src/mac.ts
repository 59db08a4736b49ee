import { Result } from "better-result";
import { ParseError } from "@fwsync/errors";
import { IpAddress } from "./address";

const OCTET = /^[0-9a-fA-F]{1,2}$/;

export class MacAddress {
  private constructor(readonly octets: readonly number[]) {}

  static parse(text: string): Result<MacAddress, ParseError> {
    const parts = text.split(":");
    if (parts.length !== 6 || !parts.every((part) => OCTET.test(part))) {
      return Result.err(new ParseError({ message: `invalid MAC address: "${text}"`, input: text }));
    }
    return Result.ok(new MacAddress(parts.map((part) => parseInt(part, 16))));
  }

  /**
   * Link-local address derived from the MAC (RFC 4291, Appendix A)
   */
  eui64LinkLocal(): IpAddress {
    const [a, b, c, d, e, f] = this.octets;
    // flip the universal/local bit
    const interfaceId = [a ^ 0x02, b, c, 0xff, 0xfe, d, e, f];
    const low = interfaceId.reduce((acc, octet) => (acc << 8n) | BigInt(octet), 0n);
    return IpAddress.v6((0xfe80n << 112n) | low);
  }

  toString(): string {
    return this.octets.map((octet) => octet.toString(16).toUpperCase().padStart(2, "0")).join(":");
  }
}
