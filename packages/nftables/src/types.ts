/**
 * Typed model of the nftables JSON command language (libnftables-json)
 *
 * Only the parts the firewall emits or reads back are modeled.
 */

export type TableFamily = "ip" | "ip6" | "inet" | "bridge" | "arp" | "netdev";

export type AddressFamily = "v4" | "v6";

const TABLE_ADDRESS_FAMILIES: Record<TableFamily, readonly AddressFamily[]> = {
  ip: ["v4"],
  ip6: ["v6"],
  inet: ["v4", "v6"],
  bridge: ["v4", "v6"],
  netdev: ["v4", "v6"],
  arp: ["v4"],
};

/**
 * The address families a table of the given family can carry rules for
 */
export function addressFamilies(family: TableFamily): readonly AddressFamily[] {
  return TABLE_ADDRESS_FAMILIES[family];
}

export function supportsFamily(family: TableFamily, address: AddressFamily): boolean {
  return TABLE_ADDRESS_FAMILIES[family].includes(address);
}

export interface TableRef {
  family: TableFamily;
  table: string;
}

export interface ChainRef extends TableRef {
  name: string;
}

export type SetRef = ChainRef;

// Verdicts

export type Verdict =
  | { accept: null }
  | { drop: null }
  | { continue: null }
  | { return: null }
  | { jump: { target: string } }
  | { goto: { target: string } };

// Expressions

export type CtFamily = "ip" | "ip6";

export type Expression =
  | string
  | number
  | boolean
  | Expression[]
  | { prefix: { addr: Expression; len: number } }
  | { range: [Expression, Expression] }
  | { set: Expression[] }
  | { concat: Expression[] }
  | { payload: { protocol: string; field: string } }
  | { meta: { key: string } }
  | { ct: { key: string; family?: CtFamily } }
  | Verdict;

// Statements

export type Operator = "==" | "!=" | "<" | ">" | "<=" | ">=" | "in" | "&" | "|" | "^" | "<<" | ">>";

export interface Match {
  op: Operator;
  left: Expression;
  right: Expression;
}

export type RateTimescale = "second" | "minute" | "hour" | "day" | "week";

export interface Limit {
  rate: number;
  per: RateTimescale;
  burst?: number;
  inv?: boolean;
}

export type LogLevel = "emerg" | "alert" | "crit" | "err" | "warn" | "notice" | "info" | "debug" | "audit";

export type LogFlag = "tcp sequence" | "tcp options" | "ip options" | "skuid" | "ether" | "all";

export interface Log {
  prefix?: string;
  group?: number;
  level?: LogLevel;
  flags?: LogFlag[];
}

export interface SetStatement {
  op: "add" | "update" | "delete";
  elem: Expression;
  set: string;
  stmt?: Statement[];
}

export interface Vmap {
  key: Expression;
  data: Expression;
}

export type RejectType = "tcp reset" | "icmpx" | "icmp" | "icmpv6";

export interface Reject {
  type?: RejectType;
  expr?: Expression;
}

export type Statement =
  | { match: Match }
  | { limit: Limit }
  | { log: Log }
  | { set: SetStatement }
  | { "ct helper": string }
  | { vmap: Vmap }
  | { reject: Reject }
  | { notrack: null }
  | { comment: string }
  | Verdict;

// Command payloads

export interface Table {
  family: TableFamily;
  name: string;
}

export type ChainType = "filter" | "nat" | "route";

export type ChainHook = "prerouting" | "input" | "forward" | "output" | "postrouting" | "ingress";

export type ChainPolicy = "accept" | "drop";

export interface Chain {
  family: TableFamily;
  table: string;
  name: string;
  type?: ChainType;
  hook?: ChainHook;
  prio?: number;
  policy?: ChainPolicy;
}

export interface Rule {
  family: TableFamily;
  table: string;
  chain: string;
  expr: Statement[];
  comment?: string;
}

export type ElementType = "ipv4_addr" | "ipv6_addr" | "ether_addr" | "inet_proto" | "inet_service" | "ifname" | "mark";

export type SetFlag = "constant" | "interval" | "timeout" | "dynamic";

export interface NamedSet {
  family: TableFamily;
  table: string;
  name: string;
  type: ElementType | ElementType[];
  flags?: SetFlag[];
  "auto-merge"?: boolean;
  comment?: string;
}

export interface NamedMap extends NamedSet {
  map: ElementType | "verdict";
}

export interface Element {
  family: TableFamily;
  table: string;
  name: string;
  elem: Expression[];
}

export type CtHelperProtocol = "tcp" | "udp";

export interface CtHelper {
  family: TableFamily;
  table: string;
  name: string;
  type: string;
  protocol: CtHelperProtocol;
  l3proto?: CtFamily;
}

export type AddObject =
  | { table: Table }
  | { chain: Chain }
  | { rule: Rule }
  | { set: NamedSet }
  | { map: NamedMap }
  | { element: Element }
  | { "ct helper": CtHelper };

export type FlushObject =
  | { table: Table }
  | { chain: ChainRef }
  | { set: SetRef }
  | { map: SetRef }
  | { ruleset: null };

export type DeleteObject = { table: Table } | { chain: ChainRef } | { set: SetRef };

export type ListObject = { chains: null } | { sets: null };

export type Command =
  | { add: AddObject }
  | { flush: FlushObject }
  | { delete: DeleteObject }
  | { list: ListObject };

export interface Batch {
  nftables: Command[];
}
