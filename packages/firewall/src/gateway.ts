/**
 * Access to the packet filter engine and the kernel's interface names
 */

import { z } from "zod";
import { Result } from "better-result";
import { type NftCommandError, NftIoError } from "@fwsync/errors";
import {
  type Batch,
  batch,
  chainsOf,
  type CommandRunner,
  list,
  type ListChain,
  type NftClient,
  runCommand,
} from "@fwsync/nftables";

export type EngineError = NftCommandError | NftIoError;

export interface EngineGateway {
  chains(): Promise<Result<ListChain[], EngineError>>;
  apply(batch: Batch): Promise<Result<void, EngineError>>;
  applyText(text: string): Promise<Result<void, EngineError>>;
  /** Every kernel and alternative interface name, to the kernel name */
  interfaceMapping(): Promise<Result<Map<string, string>, EngineError>>;
}

const linkListSchema = z.array(
  z
    .object({
      ifname: z.string(),
      altnames: z.array(z.string()).optional(),
    })
    .passthrough()
);

export function parseLinkList(text: string): Result<Map<string, string>, NftIoError> {
  const json = Result.try({
    try: (): unknown => JSON.parse(text),
    catch: (error) =>
      new NftIoError({ message: `unreadable link list: ${String(error)}`, cause: error }),
  });
  if (json.isErr()) {
    return Result.err(json.error);
  }

  const parsed = linkListSchema.safeParse(json.unwrap());
  if (!parsed.success) {
    return Result.err(new NftIoError({ message: "unexpected link list format", cause: parsed.error }));
  }

  const mapping = new Map<string, string>();
  for (const link of parsed.data) {
    mapping.set(link.ifname, link.ifname);
    for (const altname of link.altnames ?? []) {
      mapping.set(altname, link.ifname);
    }
  }
  return Result.ok(mapping);
}

export interface NftEngineGatewayConfig {
  /**
   * ip binary path (defaults to "ip")
   */
  ipBinary?: string;
  run?: CommandRunner;
}

export class NftEngineGateway implements EngineGateway {
  private ipBinary: string;
  private run: CommandRunner;

  constructor(
    private readonly client: NftClient,
    config: NftEngineGatewayConfig = {}
  ) {
    this.ipBinary = config.ipBinary || "ip";
    this.run = config.run ?? runCommand;
  }

  async chains(): Promise<Result<ListChain[], EngineError>> {
    const output = await this.client.runJsonCommands(batch([list.chains()]));
    if (output.isErr()) {
      return Result.err(output.error);
    }

    const listed = output.unwrap();
    if (!listed) {
      return Result.err(new NftIoError({ message: "no output from nft chain query" }));
    }

    return Result.ok(chainsOf(listed));
  }

  async apply(commands: Batch): Promise<Result<void, EngineError>> {
    const result = await this.client.runJsonCommands(commands);
    return result.map(() => undefined);
  }

  applyText(text: string): Promise<Result<void, EngineError>> {
    return this.client.runCommands(text);
  }

  async interfaceMapping(): Promise<Result<Map<string, string>, EngineError>> {
    const output = await this.run(this.ipBinary, ["-j", "link", "show"]);
    if (output.isErr()) {
      return Result.err(output.error);
    }

    const { stdout, stderr, exitCode } = output.unwrap();
    if (exitCode !== 0) {
      return Result.err(
        new NftIoError({ message: `${this.ipBinary} exited with status ${String(exitCode)}: ${stderr.trim()}` })
      );
    }

    return parseLinkList(stdout);
  }
}

/**
 * Engine stand-in that records what would have been applied
 */
export class MemoryEngineGateway implements EngineGateway {
  readonly applied: Batch[] = [];
  readonly appliedText: string[] = [];
  /** Returned by the next apply or applyText, then cleared */
  failNext?: EngineError;

  constructor(
    public liveChains: ListChain[] = [],
    public interfaces: Map<string, string> = new Map()
  ) {}

  async chains(): Promise<Result<ListChain[], EngineError>> {
    return Result.ok([...this.liveChains]);
  }

  async apply(commands: Batch): Promise<Result<void, EngineError>> {
    const failure = this.takeFailure();
    if (failure) {
      return Result.err(failure);
    }
    this.applied.push(commands);
    return Result.ok(undefined);
  }

  async applyText(text: string): Promise<Result<void, EngineError>> {
    const failure = this.takeFailure();
    if (failure) {
      return Result.err(failure);
    }
    this.appliedText.push(text);
    return Result.ok(undefined);
  }

  async interfaceMapping(): Promise<Result<Map<string, string>, EngineError>> {
    return Result.ok(new Map(this.interfaces));
  }

  private takeFailure(): EngineError | undefined {
    const failure = this.failNext;
    this.failNext = undefined;
    return failure;
  }
}
