/**
 * IP address value types
 *
 * - IpAddress: one IPv4 or IPv6 address, stored as an unsigned bigint
 * - Cidr: address plus prefix length (the address is kept as written)
 * - IpRange: inclusive begin-end pair of one family
 * - IpList: comma separated CIDRs/ranges that all share one family
 */

import { Result } from "better-result";
import { ParseError } from "@fwsync/errors";

export type Family = "v4" | "v6";

export const FAMILIES: readonly Family[] = ["v4", "v6"];

export function familyWidth(family: Family): number {
  return family === "v4" ? 32 : 128;
}

const V4_OCTET = /^(0|[1-9]\d{0,2})$/;
const V6_GROUP = /^[0-9a-fA-F]{1,4}$/;

function parseV4Value(text: string): bigint | undefined {
  const parts = text.split(".");
  if (parts.length !== 4) {
    return undefined;
  }

  let value = 0n;
  for (const part of parts) {
    if (!V4_OCTET.test(part)) {
      return undefined;
    }
    const octet = Number(part);
    if (octet > 255) {
      return undefined;
    }
    value = (value << 8n) | BigInt(octet);
  }

  return value;
}

function parseV6Groups(text: string): number[] | undefined {
  if (text === "") {
    return [];
  }

  const groups: number[] = [];
  const parts = text.split(":");

  for (const [index, part] of parts.entries()) {
    if (index === parts.length - 1 && part.includes(".")) {
      const embedded = parseV4Value(part);
      if (embedded === undefined) {
        return undefined;
      }
      groups.push(Number(embedded >> 16n), Number(embedded & 0xffffn));
      continue;
    }

    if (!V6_GROUP.test(part)) {
      return undefined;
    }
    groups.push(parseInt(part, 16));
  }

  return groups;
}

function parseV6Value(text: string): bigint | undefined {
  const halves = text.split("::");
  if (halves.length > 2) {
    return undefined;
  }

  let groups: number[];

  if (halves.length === 2) {
    const head = parseV6Groups(halves[0]);
    const tail = parseV6Groups(halves[1]);
    if (!head || !tail || head.length + tail.length > 7) {
      return undefined;
    }
    // an embedded IPv4 address may only appear at the very end
    if (halves[0].includes(".")) {
      return undefined;
    }
    const zeros = new Array<number>(8 - head.length - tail.length).fill(0);
    groups = [...head, ...zeros, ...tail];
  } else {
    const all = parseV6Groups(text);
    if (!all || all.length !== 8) {
      return undefined;
    }
    groups = all;
  }

  return groups.reduce((acc, group) => (acc << 16n) | BigInt(group), 0n);
}

function formatV4(value: bigint): string {
  return [24n, 16n, 8n, 0n].map((shift) => ((value >> shift) & 0xffn).toString()).join(".");
}

function formatV6(value: bigint): string {
  const groups: number[] = [];
  for (let shift = 112n; shift >= 0n; shift -= 16n) {
    groups.push(Number((value >> shift) & 0xffffn));
  }

  // IPv4-mapped addresses keep the dotted tail
  if (groups.slice(0, 5).every((group) => group === 0) && groups[5] === 0xffff) {
    return `::ffff:${formatV4(value & 0xffffffffn)}`;
  }

  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < 8; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < 8 && groups[j] === 0) {
      j++;
    }
    if (j - i > bestLength) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = groups.map((group) => group.toString(16));
  if (bestLength < 2) {
    return hex.join(":");
  }

  const head = hex.slice(0, bestStart).join(":");
  const tail = hex.slice(bestStart + bestLength).join(":");
  return `${head}::${tail}`;
}

export class IpAddress {
  private constructor(
    readonly family: Family,
    readonly value: bigint
  ) {}

  static v4(value: bigint): IpAddress {
    return new IpAddress("v4", BigInt.asUintN(32, value));
  }

  static v6(value: bigint): IpAddress {
    return new IpAddress("v6", BigInt.asUintN(128, value));
  }

  static parseV4(text: string): Result<IpAddress, ParseError> {
    const value = parseV4Value(text);
    if (value === undefined) {
      return Result.err(new ParseError({ message: `invalid IPv4 address: "${text}"`, input: text }));
    }
    return Result.ok(IpAddress.v4(value));
  }

  static parseV6(text: string): Result<IpAddress, ParseError> {
    const value = parseV6Value(text);
    if (value === undefined) {
      return Result.err(new ParseError({ message: `invalid IPv6 address: "${text}"`, input: text }));
    }
    return Result.ok(IpAddress.v6(value));
  }

  static parse(text: string): Result<IpAddress, ParseError> {
    const v4 = parseV4Value(text);
    if (v4 !== undefined) {
      return Result.ok(IpAddress.v4(v4));
    }

    const v6 = parseV6Value(text);
    if (v6 !== undefined) {
      return Result.ok(IpAddress.v6(v6));
    }

    return Result.err(new ParseError({ message: `invalid ip address: "${text}"`, input: text }));
  }

  get width(): number {
    return familyWidth(this.family);
  }

  equals(other: IpAddress): boolean {
    return this.family === other.family && this.value === other.value;
  }

  toString(): string {
    return this.family === "v4" ? formatV4(this.value) : formatV6(this.value);
  }
}

export class Cidr {
  private constructor(
    readonly address: IpAddress,
    readonly mask: number
  ) {}

  static create(address: IpAddress, mask?: number): Result<Cidr, ParseError> {
    const prefix = mask ?? address.width;
    if (!Number.isInteger(prefix) || prefix < 0 || prefix > address.width) {
      return Result.err(
        new ParseError({ message: `invalid prefix length /${prefix} for ${address.toString()}` })
      );
    }
    return Result.ok(new Cidr(address, prefix));
  }

  /**
   * A single host address (/32 or /128)
   */
  static host(address: IpAddress): Cidr {
    return new Cidr(address, address.width);
  }

  static parse(text: string): Result<Cidr, ParseError> {
    const v4 = Cidr.parseFamily(text, "v4");
    if (v4.isOk()) {
      return v4;
    }

    const v6 = Cidr.parseFamily(text, "v6");
    if (v6.isOk()) {
      return v6;
    }

    return Result.err(new ParseError({ message: "invalid ip address or CIDR", input: text }));
  }

  static parseV4(text: string): Result<Cidr, ParseError> {
    return Cidr.parseFamily(text, "v4");
  }

  static parseV6(text: string): Result<Cidr, ParseError> {
    return Cidr.parseFamily(text, "v6");
  }

  private static parseFamily(text: string, family: Family): Result<Cidr, ParseError> {
    const parts = text.split("/");
    if (parts.length > 2) {
      return Result.err(new ParseError({ message: `invalid CIDR: "${text}"`, input: text }));
    }

    const address = family === "v4" ? IpAddress.parseV4(parts[0]) : IpAddress.parseV6(parts[0]);
    if (address.isErr()) {
      return Result.err(address.error);
    }

    if (parts.length === 1) {
      return Result.ok(Cidr.host(address.unwrap()));
    }

    if (!/^\d{1,3}$/.test(parts[1])) {
      return Result.err(new ParseError({ message: `invalid prefix length in "${text}"`, input: text }));
    }

    return Cidr.create(address.unwrap(), Number(parts[1]));
  }

  get family(): Family {
    return this.address.family;
  }

  containsAddress(address: IpAddress): boolean {
    if (address.family !== this.family) {
      return false;
    }

    const shift = BigInt(this.address.width - this.mask);
    return address.value >> shift === this.address.value >> shift;
  }

  /**
   * The same prefix with the host bits cleared
   */
  network(): Cidr {
    const shift = BigInt(this.address.width - this.mask);
    const value = (this.address.value >> shift) << shift;
    const address = this.family === "v4" ? IpAddress.v4(value) : IpAddress.v6(value);
    return new Cidr(address, this.mask);
  }

  equals(other: Cidr): boolean {
    return this.mask === other.mask && this.address.equals(other.address);
  }

  toString(): string {
    return `${this.address.toString()}/${this.mask}`;
  }
}

export class IpRange {
  private constructor(
    readonly begin: IpAddress,
    readonly end: IpAddress
  ) {}

  static create(begin: IpAddress, end: IpAddress): Result<IpRange, ParseError> {
    if (begin.family !== end.family) {
      return Result.err(new ParseError({ message: "mismatched ip address families" }));
    }

    if (begin.value >= end.value) {
      return Result.err(new ParseError({ message: "start address is greater than end address" }));
    }

    return Result.ok(new IpRange(begin, end));
  }

  static parse(text: string): Result<IpRange, ParseError> {
    const parts = text.split("-");
    if (parts.length !== 2) {
      return Result.err(new ParseError({ message: `invalid ip range: "${text}"`, input: text }));
    }

    const begin = IpAddress.parse(parts[0]);
    if (begin.isErr()) {
      return Result.err(begin.error);
    }

    const end = IpAddress.parse(parts[1]);
    if (end.isErr()) {
      return Result.err(end.error);
    }

    return IpRange.create(begin.unwrap(), end.unwrap());
  }

  get family(): Family {
    return this.begin.family;
  }

  toString(): string {
    return `${this.begin.toString()}-${this.end.toString()}`;
  }
}

export type IpEntry = Cidr | IpRange;

export function parseIpEntry(text: string): Result<IpEntry, ParseError> {
  const dashes = text.split("-").length - 1;

  if (dashes === 0) {
    return Cidr.parse(text);
  }

  if (dashes === 1) {
    return IpRange.parse(text);
  }

  return Result.err(new ParseError({ message: `invalid ip entry: "${text}"`, input: text }));
}

export class IpList {
  private constructor(
    readonly entries: readonly IpEntry[],
    readonly family: Family
  ) {}

  static create(entries: readonly IpEntry[]): Result<IpList, ParseError> {
    if (entries.length === 0) {
      return Result.err(new ParseError({ message: "empty ip list" }));
    }

    const family = entries[0].family;
    if (entries.some((entry) => entry.family !== family)) {
      return Result.err(new ParseError({ message: "ip list contains entries of different families" }));
    }

    return Result.ok(new IpList(entries, family));
  }

  static parse(text: string): Result<IpList, ParseError> {
    const entries: IpEntry[] = [];

    for (const part of text.split(",")) {
      const entry = parseIpEntry(part.trim());
      if (entry.isErr()) {
        return Result.err(entry.error);
      }
      entries.push(entry.unwrap());
    }

    return IpList.create(entries);
  }

  get length(): number {
    return this.entries.length;
  }

  toString(): string {
    return this.entries.map((entry) => entry.toString()).join(",");
  }
}
