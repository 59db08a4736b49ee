/* eslint-disable no-redeclare */
import { TaggedError } from "better-result";

// Malformed values or policy lines
export const ParseError = TaggedError("ParseError")<{
  message: string;
  input?: string;
}>();

export type ParseError = InstanceType<typeof ParseError>;

// Well-formed but semantically invalid policy
export const ConfigError = TaggedError("ConfigError")<{
  message: string;
  source?: string;
}>();

export type ConfigError = InstanceType<typeof ConfigError>;

// Unresolvable references while compiling rules or objects
export const CompileError = TaggedError("CompileError")<{
  message: string;
  chain?: string;
}>();

export type CompileError = InstanceType<typeof CompileError>;

// Bundled data that cannot be loaded
export const ResourceError = TaggedError("ResourceError")<{
  message: string;
  resource: string;
}>();

export type ResourceError = InstanceType<typeof ResourceError>;

// I/O failures while reading configuration (not-found is not an error)
export const LoaderError = TaggedError("LoaderError")<{
  message: string;
  path?: string;
  cause?: unknown;
}>();

export type LoaderError = InstanceType<typeof LoaderError>;

// nft reported an error on stderr
export const NftCommandError = TaggedError("NftCommandError")<{
  message: string;
  stderr: string;
}>();

export type NftCommandError = InstanceType<typeof NftCommandError>;

// Spawning or talking to an external command failed
export const NftIoError = TaggedError("NftIoError")<{
  message: string;
  cause?: unknown;
}>();

export type NftIoError = InstanceType<typeof NftIoError>;

// Invalid environment or command line input
export const ValidationError = TaggedError("ValidationError")<{
  message: string;
}>();

export type ValidationError = InstanceType<typeof ValidationError>;

// Errors a policy parse can produce (the ICMP tables are read while parsing)
export type PolicyError = ParseError | ConfigError | ResourceError;

// Union type for all firewall errors
export type FirewallError =
  | ParseError
  | ConfigError
  | CompileError
  | ResourceError
  | LoaderError
  | NftCommandError
  | NftIoError
  | ValidationError;

/**
 * Get the process exit code for an error surfaced by a one-shot command
 */
export function exitCodeFor(error: FirewallError): number {
  switch (error._tag) {
    case "ParseError":
    case "ConfigError":
    case "CompileError":
      return 2;
    case "ResourceError":
    case "LoaderError":
    case "NftIoError":
      return 3;
    case "NftCommandError":
      return 4;
    case "ValidationError":
      return 64;
    default:
      return 1;
  }
}
