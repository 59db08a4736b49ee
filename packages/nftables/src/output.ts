/**
 * Validation of `nft -j` list output
 */

import { z } from "zod";

const tableFamilySchema = z.enum(["ip", "ip6", "inet", "bridge", "arp", "netdev"]);

export const listChainSchema = z.object({
  family: tableFamilySchema,
  table: z.string(),
  name: z.string(),
  handle: z.number().int(),
  type: z.string().optional(),
  hook: z.string().optional(),
  prio: z.number().int().optional(),
  policy: z.string().optional(),
});

export const listSetSchema = z
  .object({
    family: tableFamilySchema,
    table: z.string(),
    name: z.string(),
    handle: z.number().int(),
  })
  .passthrough();

const metainfoSchema = z
  .object({
    version: z.string().optional(),
    release_name: z.string().optional(),
    json_schema_version: z.number().optional(),
  })
  .passthrough();

const listObjectSchema = z.union([
  z.object({ metainfo: metainfoSchema }),
  z.object({ chain: listChainSchema }),
  z.object({ set: listSetSchema }),
]);

export const listOutputSchema = z.object({
  nftables: z.array(listObjectSchema),
});

export type ListChain = z.infer<typeof listChainSchema>;
export type ListSet = z.infer<typeof listSetSchema>;
export type ListOutput = z.infer<typeof listOutputSchema>;

export function chainsOf(output: ListOutput): ListChain[] {
  const chains: ListChain[] = [];
  for (const object of output.nftables) {
    if ("chain" in object) {
      chains.push(object.chain);
    }
  }
  return chains;
}
