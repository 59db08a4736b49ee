/**
 * @fwsync/config
 *
 * Address and port value types, the policy data model and its text parsers,
 * the bundled macro/helper/ICMP tables and the SDN snapshots
 */

export * from "./address";
export * from "./alias";
export * from "./bridge";
export * from "./cluster";
export * from "./ct-helper";
export * from "./group";
export * from "./guest";
export * from "./guest-map";
export * from "./host";
export * from "./icmp";
export * from "./ipset";
export * from "./log";
export * from "./mac";
export * from "./macros";
export * from "./network-device";
export * from "./parse";
export * from "./port";
export * from "./rule";
export * from "./rule-match";
export * from "./sdn";
export * from "./section";
export * from "./services";
