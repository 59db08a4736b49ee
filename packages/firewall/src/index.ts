/**
 * @fwsync/firewall
 *
 * Compiles the loaded policy into nftables batches and talks to the engine
 */

export { Candidate, finalize, toAddRules } from "./candidate";
export {
  FirewallConfig,
  loadFirewallConfig,
  type FirewallConfigParts,
  type LoadError,
  type LoadOptions,
} from "./config";
export {
  Firewall,
  type FullHostFwError,
  type HostTunable,
  type TunableWriter,
} from "./firewall";
export {
  MemoryEngineGateway,
  NftEngineGateway,
  parseLinkList,
  type EngineError,
  type EngineGateway,
  type NftEngineGatewayConfig,
} from "./gateway";
export { detectManagementCidrs, hostIps, interfaceCidrs, managementCidrs } from "./host";
export { CLUSTER_TABLE, GUEST_TABLE, HOST_TABLE, chains, ipsetSetName, maps } from "./names";
export { ctHelperObjects, ipsetObjects, type ObjectEnv } from "./object";
export {
  compileCtHelper,
  compileIpfilter,
  compileRule,
  generateVerdict,
  logPrefix,
  logStatements,
  ruleCandidates,
  type RuleCompileError,
  type RuleEnv,
} from "./rule";
export {
  CONFIG_PATHS,
  FsConfigSource,
  MemoryConfigSource,
  type ConfigSource,
  type ReadResult,
} from "./source";
