/**
 * Command line entry points
 */

import { Result } from "better-result";
import { exitCodeFor, type FirewallError } from "@fwsync/errors";
import {
  type ConfigSource,
  detectManagementCidrs,
  type EngineGateway,
  Firewall,
  FsConfigSource,
  loadFirewallConfig,
  NftEngineGateway,
} from "@fwsync/firewall";
import { createLogger, generateCorrelationId, type Logger } from "@fwsync/logger";
import { NftClient } from "@fwsync/nftables";
import { Daemon } from "./daemon";
import { type Env, parseEnv } from "./env";
import { readSkeleton } from "./skeleton";

export const USAGE = `Usage: fwsync <command>

Commands:
  help      Show this message
  skeleton  Print the base ruleset
  compile   Print the compiled batch without applying it
  start     Keep the firewall in sync until interrupted
  localnet  Print the detected management networks
`;

const EX_USAGE = 64;

export interface CliContext {
  env: Record<string, string | undefined>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  logger?: Logger;
  source?: ConfigSource;
  gateway?: EngineGateway;
  detectManagementCidrs?: typeof detectManagementCidrs;
  /** Called with the running daemon so signals can stop it */
  onStart?: (daemon: Daemon) => void;
}

interface Runtime {
  env: Env;
  logger: Logger;
  source: ConfigSource;
  gateway: EngineGateway;
  detect: typeof detectManagementCidrs;
}

function runtime(context: CliContext): Result<Runtime, FirewallError> {
  const env = parseEnv(context.env);
  if (env.isErr()) {
    return Result.err(env.error);
  }

  const settings = env.unwrap();
  const logger =
    context.logger ??
    createLogger({ correlationId: generateCorrelationId("fwsync"), minLevel: settings.logLevel });
  const gateway =
    context.gateway ??
    new NftEngineGateway(new NftClient({ nftBinary: settings.nftBinary }), { ipBinary: settings.ipBinary });

  return Result.ok({
    env: settings,
    logger,
    source: context.source ?? new FsConfigSource(settings.configRoot),
    gateway,
    detect: context.detectManagementCidrs ?? detectManagementCidrs,
  });
}

async function compile(context: CliContext, rt: Runtime): Promise<Result<void, FirewallError>> {
  const config = await loadFirewallConfig(
    rt.source,
    rt.gateway,
    { nodename: rt.env.nodename, detectManagementCidrs: () => rt.detect(rt.env.nodename) },
    rt.logger
  );
  if (config.isErr()) {
    return Result.err(config.error);
  }

  const commands = new Firewall(config.unwrap(), rt.logger).fullHostFw();
  if (commands.isErr()) {
    return Result.err(commands.error);
  }

  context.stdout(`${JSON.stringify(commands.unwrap(), null, 2)}\n`);
  return Result.ok(undefined);
}

async function localnet(context: CliContext, rt: Runtime): Promise<Result<void, FirewallError>> {
  const cidrs = await rt.detect(rt.env.nodename);
  if (cidrs.isErr()) {
    return Result.err(cidrs.error);
  }

  for (const cidr of cidrs.unwrap()) {
    context.stdout(`${cidr.toString()}\n`);
  }
  return Result.ok(undefined);
}

async function start(context: CliContext, rt: Runtime): Promise<Result<void, FirewallError>> {
  const skeleton = await readSkeleton();
  if (skeleton.isErr()) {
    return Result.err(skeleton.error);
  }

  const daemon = new Daemon({
    source: rt.source,
    gateway: rt.gateway,
    logger: rt.logger,
    skeleton: skeleton.unwrap(),
    nodename: rt.env.nodename,
    stateDir: rt.env.stateDir,
    forceDisableFlag: rt.env.forceDisableFlag,
    intervalMs: rt.env.intervalMs,
    detectManagementCidrs: () => rt.detect(rt.env.nodename),
  });
  context.onStart?.(daemon);

  const stopped = await daemon.run();
  if (stopped.isErr()) {
    return Result.err(stopped.error);
  }
  return Result.ok(undefined);
}

type Command = (context: CliContext, rt: Runtime) => Promise<Result<void, FirewallError>>;

const COMMANDS = new Map<string, Command>([
  ["compile", compile],
  ["localnet", localnet],
  ["start", start],
]);

/**
 * Run one CLI command and resolve to the process exit code
 */
export async function runCli(args: readonly string[], context: CliContext): Promise<number> {
  const [command, ...rest] = args;

  if (command === "help") {
    context.stdout(USAGE);
    return 0;
  }

  if (command === "skeleton") {
    const skeleton = await readSkeleton();
    if (skeleton.isErr()) {
      context.stderr(`${skeleton.error.message}\n`);
      return exitCodeFor(skeleton.error);
    }
    context.stdout(skeleton.unwrap());
    return 0;
  }

  const handler = command === undefined ? undefined : COMMANDS.get(command);
  if (!handler || rest.length > 0) {
    context.stderr(USAGE);
    return EX_USAGE;
  }

  const rt = runtime(context);
  if (rt.isErr()) {
    context.stderr(`${rt.error.message}\n`);
    return exitCodeFor(rt.error);
  }

  const result = await handler(context, rt.unwrap());
  if (result.isErr()) {
    context.stderr(`${command}: ${result.error.message}\n`);
    return exitCodeFor(result.error);
  }
  return 0;
}
