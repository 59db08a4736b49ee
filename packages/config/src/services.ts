/**
 * Named ports from the services database (`/etc/services`)
 *
 * The table is read once on first use and kept for the lifetime of the process.
 */

import { readFileSync } from "node:fs";
import { Result } from "better-result";

export const SERVICES_PATH = "/etc/services";

export type NamedPorts = ReadonlyMap<string, number>;

/**
 * Parse `name port/proto [aliases...] [# comment]` lines. The first definition of a name wins.
 */
export function parseServices(text: string): NamedPorts {
  const ports = new Map<string, number>();

  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (line === "" || line.startsWith("#")) {
      continue;
    }

    const [name, portProto, ...aliases] = line.split(/\s+/);
    if (!name || !portProto) {
      continue;
    }

    const portText = portProto.split("/")[0];
    if (!/^\d+$/.test(portText)) {
      continue;
    }
    const port = Number(portText);
    if (port > 65535) {
      continue;
    }

    for (const alias of [name, ...aliases]) {
      if (alias.startsWith("#")) {
        break;
      }
      if (!ports.has(alias)) {
        ports.set(alias, port);
      }
    }
  }

  return ports;
}

let cached: NamedPorts | undefined;

export function namedPorts(): NamedPorts {
  if (!cached) {
    // no services database: only numeric ports resolve
    const text = Result.try({
      try: () => readFileSync(SERVICES_PATH, "utf8"),
      catch: (error) => error,
    }).unwrapOr("");
    cached = parseServices(text);
  }
  return cached;
}
