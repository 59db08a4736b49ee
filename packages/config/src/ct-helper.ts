/**
 * Connection-tracking helpers (`nf_conntrack_helpers`)
 */

import { z } from "zod";
import { Result } from "better-result";
import type { ResourceError } from "@fwsync/errors";
import type { Family } from "./address";
import { PortList } from "./port";
import { loadResource } from "./resources";
import type { Protocol } from "./rule-match";

const ctHelperFileSchema = z.array(
  z
    .object({
      name: z.string().min(1),
      v4: z.boolean().optional(),
      v6: z.boolean().optional(),
      tcp: z.number().int().min(0).max(65535).optional(),
      udp: z.number().int().min(0).max(65535).optional(),
    })
    .refine((helper) => helper.tcp !== undefined || helper.udp !== undefined, {
      message: "neither TCP nor UDP port set in ct helper",
    })
    .refine((helper) => helper.v4 === true || helper.v6 === true, {
      message: "neither v4 nor v6 set in ct helper",
    })
);

export interface CtHelperMacro {
  name: string;
  /** Restricted to one family, or undefined for both */
  family?: Family;
  tcp?: Protocol;
  udp?: Protocol;
}

export function helperName(helper: CtHelperMacro, protocol: "tcp" | "udp"): string {
  return `helper-${helper.name}-${protocol}`;
}

function dportProtocol(kind: "tcp" | "udp", port: number): Protocol {
  return { kind, ports: { dport: PortList.of({ kind: "port", port }) } };
}

function buildHelpers(data: z.infer<typeof ctHelperFileSchema>): Map<string, CtHelperMacro> {
  const helpers = new Map<string, CtHelperMacro>();

  for (const entry of data) {
    const helper: CtHelperMacro = { name: entry.name };

    if (!(entry.v4 && entry.v6)) {
      helper.family = entry.v4 ? "v4" : "v6";
    }
    if (entry.tcp !== undefined) {
      helper.tcp = dportProtocol("tcp", entry.tcp);
    }
    if (entry.udp !== undefined) {
      helper.udp = dportProtocol("udp", entry.udp);
    }

    helpers.set(entry.name, helper);
  }

  return helpers;
}

let cached: Result<Map<string, CtHelperMacro>, ResourceError> | undefined;

export function ctHelpers(): Result<Map<string, CtHelperMacro>, ResourceError> {
  cached ??= loadResource("ct-helpers.json", ctHelperFileSchema).map(buildHelpers);
  return cached;
}

export function getCtHelper(name: string): Result<CtHelperMacro | undefined, ResourceError> {
  return ctHelpers().map((table) => table.get(name));
}
