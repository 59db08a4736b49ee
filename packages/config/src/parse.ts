import { z } from "zod";
import { Result } from "better-result";
import { ParseError } from "@fwsync/errors";

const NAME_CHAR = /[A-Za-z0-9-]/;

/**
 * Split a leading name (ASCII alphanumerics and '-') from the rest of the line
 */
export function matchName(line: string): [string, string] | undefined {
  let end = 0;
  while (end < line.length && NAME_CHAR.test(line[end])) {
    end++;
  }

  if (end === 0) {
    return undefined;
  }

  return [line.slice(0, end), line.slice(end)];
}

/**
 * Split a leading run of non-whitespace from the rest, which is trimmed at the start
 */
export function matchNonWhitespace(line: string): [string, string] | undefined {
  const match = /\s/.exec(line);
  const [text, rest] = match
    ? [line.slice(0, match.index), line.slice(match.index).trimStart()]
    : [line, ""];

  if (text === "") {
    return undefined;
  }

  return [text, rest];
}

/**
 * Split `key: value` at the first colon
 */
export function splitKeyValue(line: string): [string, string] | undefined {
  const index = line.indexOf(":");
  if (index === -1) {
    return undefined;
  }

  const key = line.slice(0, index).trim();
  if (key === "") {
    return undefined;
  }

  return [key, line.slice(index + 1).trim()];
}

export function parseBool(value: string): Result<boolean, ParseError> {
  const lower = value.toLowerCase();

  if (value === "0" || lower === "false" || lower === "off" || lower === "no") {
    return Result.ok(false);
  }

  if (value === "1" || lower === "true" || lower === "on" || lower === "yes") {
    return Result.ok(true);
  }

  return Result.err(new ParseError({ message: `not a boolean: "${value}"`, input: value }));
}

/**
 * Parse an unsigned decimal integer in [min, max]
 */
export function parseInteger(
  value: string,
  what: string,
  min = 0,
  max = Number.MAX_SAFE_INTEGER
): Result<number, ParseError> {
  if (!/^\d+$/.test(value)) {
    return Result.err(new ParseError({ message: `invalid ${what}: "${value}"`, input: value }));
  }

  const parsed = Number(value);
  if (parsed < min || parsed > max) {
    return Result.err(
      new ParseError({ message: `${what} out of range: ${value}`, input: value })
    );
  }

  return Result.ok(parsed);
}

/**
 * Parse the tail of a named section header, e.g. ` name] # comment`
 */
export function parseNamedSectionTail(
  kind: string,
  tail: string
): Result<{ name: string; comment?: string }, ParseError> {
  const named = matchName(tail.trimStart());
  if (!named) {
    return Result.err(new ParseError({ message: `expected a name for ${kind} section`, input: tail }));
  }

  const [name, rest] = named;
  const afterName = rest.trimStart();
  if (!afterName.startsWith("]")) {
    return Result.err(new ParseError({ message: `expected ']' after ${kind} name`, input: tail }));
  }

  const trailing = afterName.slice(1).trim();
  if (trailing === "") {
    return Result.ok({ name });
  }

  if (!trailing.startsWith("#")) {
    return Result.err(
      new ParseError({ message: `trailing characters after ${kind} section: "${trailing}"`, input: tail })
    );
  }

  const comment = trailing.slice(1).trim();
  return Result.ok(comment === "" ? { name } : { name, comment });
}

/**
 * Parse JSON text and validate it against a zod schema
 */
export function parseJson<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  what: string
): Result<T, ParseError> {
  const json = Result.try({
    try: (): unknown => JSON.parse(text),
    catch: (error) => new ParseError({ message: `failed to parse ${what}: ${String(error)}` }),
  });
  if (json.isErr()) {
    return Result.err(json.error);
  }

  const parsed = schema.safeParse(json.unwrap());
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    return Result.err(new ParseError({ message: `invalid ${what}: ${issues}` }));
  }

  return Result.ok(parsed.data);
}

/**
 * Accept nothing or `# comment` after the value of an entry
 */
export function parseTrailingComment(
  what: string,
  rest: string
): Result<string | undefined, ParseError> {
  const line = rest.trimStart();

  if (line.startsWith("#")) {
    return Result.ok(line.slice(1).trim());
  }

  if (line !== "") {
    return Result.err(
      new ParseError({ message: `trailing characters in ${what}: "${line}"`, input: rest })
    );
  }

  return Result.ok(undefined);
}

export type OptionParsers<T> = {
  [K in keyof T]-?: (value: string) => Result<T[K], ParseError>;
};

function setOption<T, K extends keyof T>(
  options: Partial<T>,
  key: K,
  parse: (value: string) => Result<T[K], ParseError>,
  value: string
): Result<void, ParseError> {
  const parsed = parse(value);
  if (parsed.isErr()) {
    return Result.err(
      new ParseError({
        message: `invalid value for option "${String(key)}": ${parsed.error.message}`,
        input: value,
      })
    );
  }
  options[key] = parsed.unwrap();
  return Result.ok(undefined);
}

/**
 * Turn the raw `[OPTIONS]` pairs into typed values; keys without a parser are ignored
 */
export function parseOptions<T>(
  raw: ReadonlyMap<string, string>,
  parsers: OptionParsers<T>
): Result<Partial<T>, ParseError> {
  const options: Partial<T> = {};
  const isKnown = (key: string): key is Extract<keyof T, string> => Object.hasOwn(parsers, key);

  for (const [key, value] of raw) {
    if (!isKnown(key)) {
      continue;
    }
    const result = setOption(options, key, parsers[key], value);
    if (result.isErr()) {
      return Result.err(result.error);
    }
  }

  return Result.ok(options);
}
