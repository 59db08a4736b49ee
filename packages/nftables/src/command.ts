/**
 * Constructors for batch commands
 *
 * `add`, `flush` and `delete` mirror the nft verbs; each object is addressed by
 * a table reference plus a name.
 */

import type {
  Batch,
  ChainRef,
  Command,
  CtFamily,
  CtHelperProtocol,
  ElementType,
  Expression,
  Statement,
  TableRef,
} from "./types";

export const add = {
  table(ref: TableRef): Command {
    return { add: { table: { family: ref.family, name: ref.table } } };
  },

  chain(ref: ChainRef): Command {
    return { add: { chain: { family: ref.family, table: ref.table, name: ref.name } } };
  },

  rule(ref: ChainRef, expr: Statement[]): Command {
    return { add: { rule: { family: ref.family, table: ref.table, chain: ref.name, expr } } };
  },

  /**
   * An interval set that merges adjacent and overlapping elements
   */
  intervalSet(ref: ChainRef, type: ElementType): Command {
    return {
      add: {
        set: {
          family: ref.family,
          table: ref.table,
          name: ref.name,
          type,
          flags: ["interval"],
          "auto-merge": true,
        },
      },
    };
  },

  element(ref: ChainRef, elem: Expression[]): Command {
    return { add: { element: { family: ref.family, table: ref.table, name: ref.name, elem } } };
  },

  ctHelper(
    ref: ChainRef,
    type: string,
    protocol: CtHelperProtocol,
    l3proto?: CtFamily
  ): Command {
    const helper = { family: ref.family, table: ref.table, name: ref.name, type, protocol };
    return { add: { "ct helper": l3proto === undefined ? helper : { ...helper, l3proto } } };
  },
};

export const flush = {
  table(ref: TableRef): Command {
    return { flush: { table: { family: ref.family, name: ref.table } } };
  },

  chain(ref: ChainRef): Command {
    return { flush: { chain: { family: ref.family, table: ref.table, name: ref.name } } };
  },

  set(ref: ChainRef): Command {
    return { flush: { set: { family: ref.family, table: ref.table, name: ref.name } } };
  },

  map(ref: ChainRef): Command {
    return { flush: { map: { family: ref.family, table: ref.table, name: ref.name } } };
  },

  ruleset(): Command {
    return { flush: { ruleset: null } };
  },
};

export const remove = {
  table(ref: TableRef): Command {
    return { delete: { table: { family: ref.family, name: ref.table } } };
  },

  chain(ref: ChainRef): Command {
    return { delete: { chain: { family: ref.family, table: ref.table, name: ref.name } } };
  },

  set(ref: ChainRef): Command {
    return { delete: { set: { family: ref.family, table: ref.table, name: ref.name } } };
  },
};

export const list = {
  chains(): Command {
    return { list: { chains: null } };
  },

  sets(): Command {
    return { list: { sets: null } };
  },
};

export function batch(commands: Command[]): Batch {
  return { nftables: commands };
}
