import { Result } from "better-result";
import { ParseError } from "@fwsync/errors";
import { Cidr } from "./address";
import { matchName, matchNonWhitespace, parseTrailingComment } from "./parse";

export type AliasScope = "dc" | "guest";

export function isAliasScope(value: string): value is AliasScope {
  return value === "dc" || value === "guest";
}

export class AliasName {
  constructor(
    readonly scope: AliasScope,
    readonly name: string
  ) {}

  static parse(text: string): Result<AliasName, ParseError> {
    const index = text.indexOf("/");
    const scope = index === -1 ? "" : text.slice(0, index);
    const name = index === -1 ? "" : text.slice(index + 1);

    if (name === "") {
      return Result.err(new ParseError({ message: `invalid alias name: "${text}"`, input: text }));
    }

    if (!isAliasScope(scope)) {
      return Result.err(new ParseError({ message: `invalid scope for alias: ${scope}`, input: text }));
    }

    return Result.ok(new AliasName(scope, name));
  }

  toString(): string {
    return `${this.scope}/${this.name}`;
  }
}

export interface Alias {
  name: string;
  address: Cidr;
  comment?: string;
}

/**
 * Parse an `[ALIASES]` line: `name cidr [# comment]`
 */
export function parseAlias(line: string): Result<Alias, ParseError> {
  const named = matchName(line.trimStart());
  if (!named) {
    return Result.err(new ParseError({ message: "expected an alias name", input: line }));
  }
  const [name, afterName] = named;

  const value = matchNonWhitespace(afterName.trimStart());
  if (!value) {
    return Result.err(new ParseError({ message: `expected a value for alias "${name}"`, input: line }));
  }
  const [addressText, rest] = value;

  const address = Cidr.parse(addressText);
  if (address.isErr()) {
    return Result.err(address.error);
  }

  const comment = parseTrailingComment("alias", rest);
  if (comment.isErr()) {
    return Result.err(comment.error);
  }

  const alias: Alias = { name, address: address.unwrap() };
  const text = comment.unwrap();
  if (text !== undefined) {
    alias.comment = text;
  }
  return Result.ok(alias);
}
