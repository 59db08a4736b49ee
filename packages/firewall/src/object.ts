/**
 * Named engine objects: the two interval sets behind every ipset, and the
 * conntrack helper objects
 */

import { Result } from "better-result";
import { type CtHelperMacro, type Family, helperName, type Ipset } from "@fwsync/config";
import { CompileError } from "@fwsync/errors";
import {
  add,
  addressFamilies,
  type Command,
  type ElementType,
  type Expression,
  flush,
  type TableRef,
} from "@fwsync/nftables";
import type { FirewallConfig } from "./config";
import { cidrExpression, ipEntryExpression, ipProtocol } from "./expression";
import { chainIn, ipsetSetName } from "./names";

export interface ObjectEnv {
  table: TableRef;
  config: FirewallConfig;
  vmid?: number;
}

const ELEMENT_TYPES: Record<Family, ElementType> = {
  v4: "ipv4_addr",
  v6: "ipv6_addr",
};

function familyElements(
  ipset: Ipset,
  family: Family,
  env: ObjectEnv
): Result<{ elements: Expression[]; nomatch: Expression[] }, CompileError> {
  const elements: Expression[] = [];
  const nomatch: Expression[] = [];

  for (const entry of ipset.entries) {
    let expression: Expression;

    if (entry.address.kind === "ip") {
      if (entry.address.entry.family !== family) {
        continue;
      }
      expression = ipEntryExpression(entry.address.entry);
    } else {
      const alias = env.config.alias(entry.address.alias, env.vmid);
      if (!alias) {
        return Result.err(
          new CompileError({ message: `could not find alias ${entry.address.alias.toString()}` })
        );
      }
      if (alias.address.family !== family) {
        continue;
      }
      expression = cidrExpression(alias.address);
    }

    (entry.nomatch ? nomatch : elements).push(expression);
  }

  return Result.ok({ elements, nomatch });
}

/**
 * Per address family of the table: a member set and a nomatch set, both
 * created, flushed and refilled
 */
export function ipsetObjects(ipset: Ipset, env: ObjectEnv): Result<Command[], CompileError> {
  const commands: Command[] = [];

  for (const family of addressFamilies(env.table.family)) {
    const entries = familyElements(ipset, family, env);
    if (entries.isErr()) {
      return Result.err(entries.error);
    }
    const { elements, nomatch } = entries.unwrap();

    const setRef = chainIn(env.table, ipsetSetName(family, ipset.name, env.vmid, false));
    const nomatchRef = chainIn(env.table, ipsetSetName(family, ipset.name, env.vmid, true));

    commands.push(
      add.intervalSet(setRef, ELEMENT_TYPES[family]),
      flush.set(setRef),
      add.intervalSet(nomatchRef, ELEMENT_TYPES[family]),
      flush.set(nomatchRef)
    );

    if (elements.length > 0) {
      commands.push(add.element(setRef, elements));
    }
    if (nomatch.length > 0) {
      commands.push(add.element(nomatchRef, nomatch));
    }
  }

  return Result.ok(commands);
}

export function ctHelperObjects(helper: CtHelperMacro, table: TableRef): Command[] {
  const l3proto = helper.family === undefined ? undefined : ipProtocol(helper.family);

  return (["tcp", "udp"] as const)
    .filter((protocol) => helper[protocol] !== undefined)
    .map((protocol) =>
      add.ctHelper(chainIn(table, helperName(helper, protocol)), helper.name, protocol, l3proto)
    );
}
