/**
 * @fwsync/nftables
 *
 * Typed nftables JSON commands and a client for the nft front end
 */

export * from "./types";
export * from "./expression";
export { add, flush, remove, list, batch } from "./command";
export {
  listOutputSchema,
  chainsOf,
  type ListChain,
  type ListSet,
  type ListOutput,
} from "./output";
export { runCommand, type CommandRunner, type ProcessOutput } from "./process";
export { NftClient, parseListOutput, type NftClientConfig } from "./client";
