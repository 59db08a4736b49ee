/**
 * Firewall macros: named bundles of protocol/port templates, e.g. `SSH(ACCEPT)`
 */

import { z } from "zod";
import { Result } from "better-result";
import type { ResourceError } from "@fwsync/errors";
import { loadResource } from "./resources";
import { type Protocol, protocolFromOptions } from "./rule-match";

const macroFileSchema = z.record(
  z.string(),
  z.object({
    desc: z.string(),
    code: z.array(
      z.object({
        proto: z.string().optional(),
        dport: z.string().optional(),
        sport: z.string().optional(),
        "icmp-type": z.string().optional(),
      })
    ),
  })
);

export interface FwMacro {
  name: string;
  description: string;
  code: Protocol[];
}

function buildMacros(data: z.infer<typeof macroFileSchema>): Map<string, FwMacro> {
  const macros = new Map<string, FwMacro>();

  for (const [name, entry] of Object.entries(data)) {
    const code: Protocol[] = [];
    let valid = true;

    for (const template of entry.code) {
      const protocol = protocolFromOptions({
        proto: template.proto,
        dport: template.dport,
        sport: template.sport,
        icmpType: template["icmp-type"],
      });
      // a template without a usable protocol disqualifies the whole macro
      const value = protocol.unwrapOr(undefined);
      if (!value) {
        valid = false;
        break;
      }
      code.push(value);
    }

    if (valid) {
      macros.set(name, { name, description: entry.desc, code });
    }
  }

  return macros;
}

let cached: Result<Map<string, FwMacro>, ResourceError> | undefined;

export function macros(): Result<Map<string, FwMacro>, ResourceError> {
  cached ??= loadResource("macros.json", macroFileSchema).map(buildMacros);
  return cached;
}

export function getMacro(name: string): Result<FwMacro | undefined, ResourceError> {
  return macros().map((table) => table.get(name));
}
