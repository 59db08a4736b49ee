import { Result } from "better-result";
import { ParseError } from "@fwsync/errors";
import { namedPorts, type NamedPorts } from "./services";

export type PortEntry =
  | { kind: "port"; port: number }
  | { kind: "range"; begin: number; end: number };

export function formatPortEntry(entry: PortEntry): string {
  return entry.kind === "port" ? String(entry.port) : `${entry.begin}-${entry.end}`;
}

function parsePort(text: string, ports?: NamedPorts): Result<number, ParseError> {
  if (/^\d+$/.test(text) && Number(text) <= 65535) {
    return Result.ok(Number(text));
  }

  // the services database is only read once a name needs resolving
  const named = (ports ?? namedPorts()).get(text);
  if (named !== undefined) {
    return Result.ok(named);
  }

  return Result.err(new ParseError({ message: `invalid port specification: ${text}`, input: text }));
}

/**
 * Parse `port` or `begin:end`, where each side is numeric or a service name
 */
export function parsePortEntry(
  text: string,
  ports?: NamedPorts
): Result<PortEntry, ParseError> {
  const trimmed = text.trim();
  const index = trimmed.indexOf(":");

  if (index === -1) {
    const port = parsePort(trimmed, ports);
    if (port.isErr()) {
      return Result.err(port.error);
    }
    return Result.ok({ kind: "port", port: port.unwrap() });
  }

  const begin = parsePort(trimmed.slice(0, index), ports);
  if (begin.isErr()) {
    return Result.err(begin.error);
  }

  const end = parsePort(trimmed.slice(index + 1), ports);
  if (end.isErr()) {
    return Result.err(end.error);
  }

  if (begin.unwrap() > end.unwrap()) {
    return Result.err(new ParseError({ message: "start port is greater than end port", input: text }));
  }

  return Result.ok({ kind: "range", begin: begin.unwrap(), end: end.unwrap() });
}

export class PortList {
  private constructor(readonly entries: readonly PortEntry[]) {}

  static of(...entries: PortEntry[]): PortList {
    return new PortList(entries);
  }

  static parse(text: string, ports?: NamedPorts): Result<PortList, ParseError> {
    if (text.trim() === "") {
      return Result.err(new ParseError({ message: "empty port specification", input: text }));
    }

    const entries: PortEntry[] = [];
    for (const part of text.trim().split(",")) {
      const entry = parsePortEntry(part, ports);
      if (entry.isErr()) {
        return Result.err(entry.error);
      }
      entries.push(entry.unwrap());
    }

    return Result.ok(new PortList(entries));
  }

  toString(): string {
    const body = this.entries.map(formatPortEntry).join(",");
    return this.entries.length > 1 ? `{${body}}` : body;
  }
}
