import { z } from "zod";
import { Result } from "better-result";
import { ParseError, type ResourceError } from "@fwsync/errors";
import { lazyResource } from "./resources";

const nameTable = z.record(z.string(), z.number().int().min(0).max(255));

const icmpTablesSchema = z.object({
  icmp: z.object({ types: nameTable, codes: nameTable }),
  icmpv6: z.object({ types: nameTable, codes: nameTable }),
});

export type IcmpTables = z.infer<typeof icmpTablesSchema>;

export const icmpTables: () => Result<IcmpTables, ResourceError> = lazyResource(
  "icmp.json",
  icmpTablesSchema
);

export type IcmpVersion = "icmp" | "icmpv6";

/**
 * An ICMP type or code: a number, or a name the engine understands
 */
export type IcmpValue = number | string;

export interface IcmpMatch {
  type?: IcmpValue;
  code?: IcmpValue;
}

/**
 * Parse an `icmp-type` value: first as a type (numeric or named), then as a named code
 */
export function parseIcmpMatch(
  version: IcmpVersion,
  text: string
): Result<IcmpMatch, ParseError | ResourceError> {
  const trimmed = text.trim();
  if (/^\d+$/.test(trimmed) && Number(trimmed) <= 255) {
    return Result.ok({ type: Number(trimmed) });
  }

  const tables = icmpTables();
  if (tables.isErr()) {
    return Result.err(tables.error);
  }
  const table = tables.unwrap()[version];

  if (Object.hasOwn(table.types, text)) {
    return Result.ok({ type: text });
  }

  if (Object.hasOwn(table.codes, text)) {
    return Result.ok({ code: text });
  }

  return Result.err(
    new ParseError({ message: `"${text}" is neither a valid ${version} type nor code`, input: text })
  );
}
