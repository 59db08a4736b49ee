import type { CtFamily, Expression, Limit, Log, Operator, Statement, Verdict } from "./types";

export function payload(protocol: string, field: string): Expression {
  return { payload: { protocol, field } };
}

export function meta(key: string): Expression {
  return { meta: { key } };
}

export function ct(key: string, family?: CtFamily): Expression {
  return family === undefined ? { ct: { key } } : { ct: { key, family } };
}

export function prefix(addr: string, len: number): Expression {
  return { prefix: { addr, len } };
}

export function range(begin: Expression, end: Expression): Expression {
  return { range: [begin, end] };
}

export function set(items: Expression[]): Expression {
  return { set: items };
}

export function concat(items: Expression[]): Expression {
  return { concat: items };
}

/**
 * Reference to a named set, as nft writes it (`@name`)
 */
export function setRef(name: string): string {
  return `@${name}`;
}

/**
 * A value list for the right-hand side of a match: one entry stands on its own
 */
export function oneOrSet(items: Expression[]): Expression {
  return items.length === 1 ? items[0] : { set: items };
}

// Statements

export function match(op: Operator, left: Expression, right: Expression): Statement {
  return { match: { op, left, right } };
}

export function limit(options: Limit): Statement {
  return { limit: options };
}

export function log(options: Log): Statement {
  return { log: options };
}

export function ctHelper(name: string): Statement {
  return { "ct helper": name };
}

export const accept: Verdict = { accept: null };

export const drop: Verdict = { drop: null };

export function jump(target: string): Verdict {
  return { jump: { target } };
}

export function goto(target: string): Verdict {
  return { goto: { target } };
}
