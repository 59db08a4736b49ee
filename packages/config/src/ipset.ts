/**
 * Named IP sets, declared in `[IPSET name]` sections
 */

import { Result } from "better-result";
import { ParseError } from "@fwsync/errors";
import { type IpEntry, parseIpEntry } from "./address";
import { AliasName } from "./alias";
import { indexFromNetKey } from "./network-device";
import { matchNonWhitespace, parseTrailingComment } from "./parse";

export type IpsetScope = "dc" | "guest";

export class IpsetName {
  constructor(
    readonly scope: IpsetScope,
    readonly name: string
  ) {}

  /**
   * `+dc/name` or `+guest/name`
   */
  static parse(text: string): Result<IpsetName, ParseError> {
    const index = text.indexOf("/");
    const prefix = index === -1 ? "" : text.slice(0, index);
    const name = index === -1 ? "" : text.slice(index + 1);

    if (name === "") {
      return Result.err(new ParseError({ message: `invalid ipset name: ${text}`, input: text }));
    }

    if (prefix === "+dc") {
      return Result.ok(new IpsetName("dc", name));
    }
    if (prefix === "+guest") {
      return Result.ok(new IpsetName("guest", name));
    }

    return Result.err(new ParseError({ message: `invalid scope for ipset: ${prefix}`, input: text }));
  }

  toString(): string {
    return `${this.scope}/${this.name}`;
  }
}

export type IpsetAddress =
  | { kind: "ip"; entry: IpEntry }
  | { kind: "alias"; alias: AliasName };

export interface IpsetEntry {
  nomatch: boolean;
  address: IpsetAddress;
  comment?: string;
}

export function parseIpsetAddress(text: string): Result<IpsetAddress, ParseError> {
  const entry = parseIpEntry(text);
  if (entry.isOk()) {
    return Result.ok({ kind: "ip", entry: entry.unwrap() });
  }

  const alias = AliasName.parse(text);
  if (alias.isOk()) {
    return Result.ok({ kind: "alias", alias: alias.unwrap() });
  }

  return Result.err(new ParseError({ message: `invalid address in ipset: ${text}`, input: text }));
}

/**
 * Parse `[!]address [# comment]`
 */
export function parseIpsetEntry(line: string): Result<IpsetEntry, ParseError> {
  let text = line.trimStart();
  const nomatch = text.startsWith("!");
  if (nomatch) {
    text = text.slice(1).trimStart();
  }

  const value = matchNonWhitespace(text);
  if (!value) {
    return Result.err(new ParseError({ message: "missing value in ipset entry", input: line }));
  }
  const [addressText, rest] = value;

  const address = parseIpsetAddress(addressText);
  if (address.isErr()) {
    return Result.err(address.error);
  }

  const comment = parseTrailingComment("ipset entry", rest);
  if (comment.isErr()) {
    return Result.err(comment.error);
  }

  const entry: IpsetEntry = { nomatch, address: address.unwrap() };
  const commentText = comment.unwrap();
  if (commentText !== undefined) {
    entry.comment = commentText;
  }
  return Result.ok(entry);
}

/**
 * Decided once when the set is built: a guest set named `ipfilter-net<N>`
 * is the address filter of network device N
 */
export type IpsetKind = { kind: "ordinary" } | { kind: "ipfilter"; index: number };

export const Ipfilter = {
  nameForIndex: (index: number): string => `ipfilter-net${index}`,
};

function kindOf(name: IpsetName): IpsetKind {
  if (name.scope === "guest" && name.name.startsWith("ipfilter-")) {
    const index = indexFromNetKey(name.name.slice("ipfilter-".length));
    if (index !== undefined) {
      return { kind: "ipfilter", index };
    }
  }
  return { kind: "ordinary" };
}

export class Ipset {
  readonly kind: IpsetKind;
  readonly entries: IpsetEntry[] = [];

  constructor(
    readonly name: IpsetName,
    readonly comment?: string
  ) {
    this.kind = kindOf(name);
  }

  static fromParts(scope: IpsetScope, name: string, comment?: string): Ipset {
    return new Ipset(new IpsetName(scope, name), comment);
  }

  addEntry(line: string): Result<void, ParseError> {
    const entry = parseIpsetEntry(line);
    if (entry.isErr()) {
      return Result.err(entry.error);
    }
    this.entries.push(entry.unwrap());
    return Result.ok(undefined);
  }

  push(entry: IpsetEntry): void {
    this.entries.push(entry);
  }

  isIpfilter(): boolean {
    return this.kind.kind === "ipfilter";
  }
}
