/**
 * nftables client
 * Drives the `nft` front end with batches read from stdin
 */

import { Result } from "better-result";
import { NftCommandError, NftIoError } from "@fwsync/errors";
import { listOutputSchema, type ListOutput } from "./output";
import { runCommand, type CommandRunner, type ProcessOutput } from "./process";
import type { Batch } from "./types";

export interface NftClientConfig {
  /**
   * nft binary path (defaults to "nft")
   */
  nftBinary?: string;

  /**
   * Process runner, replaced in tests
   */
  run?: CommandRunner;
}

export class NftClient {
  private nftBinary: string;
  private run: CommandRunner;

  constructor(config: NftClientConfig = {}) {
    this.nftBinary = config.nftBinary || "nft";
    this.run = config.run ?? runCommand;
  }

  private async exec(
    args: string[],
    input: string
  ): Promise<Result<string, NftCommandError | NftIoError>> {
    const result = await this.run(this.nftBinary, [...args, "-f", "-"], input);
    if (result.isErr()) {
      return Result.err(result.error);
    }

    return checkOutput(result.unwrap());
  }

  /**
   * Submit a JSON batch; list commands in it produce the returned output
   */
  async runJsonCommands(
    batch: Batch
  ): Promise<Result<ListOutput | undefined, NftCommandError | NftIoError>> {
    const stdout = await this.exec(["-j"], JSON.stringify(batch));
    if (stdout.isErr()) {
      return Result.err(stdout.error);
    }

    const text = stdout.unwrap();
    if (text.trim() === "") {
      return Result.ok(undefined);
    }

    return parseListOutput(text);
  }

  /**
   * Submit a batch in nft's own text syntax
   */
  async runCommands(text: string): Promise<Result<void, NftCommandError | NftIoError>> {
    const stdout = await this.exec([], text);
    if (stdout.isErr()) {
      return Result.err(stdout.error);
    }
    return Result.ok(undefined);
  }
}

function checkOutput(output: ProcessOutput): Result<string, NftCommandError> {
  if (output.stderr !== "") {
    return Result.err(
      new NftCommandError({ message: "nft reported an error", stderr: output.stderr })
    );
  }

  if (output.exitCode !== 0) {
    return Result.err(
      new NftCommandError({
        message: `nft exited with status ${String(output.exitCode)}`,
        stderr: output.stderr,
      })
    );
  }

  return Result.ok(output.stdout);
}

export function parseListOutput(text: string): Result<ListOutput, NftIoError> {
  const json = Result.try({
    try: (): unknown => JSON.parse(text),
    catch: (error) =>
      new NftIoError({ message: `unreadable nft output: ${String(error)}`, cause: error }),
  });
  if (json.isErr()) {
    return Result.err(json.error);
  }

  const parsed = listOutputSchema.safeParse(json.unwrap());
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    return Result.err(new NftIoError({ message: `unexpected nft output: ${issues}` }));
  }

  return Result.ok(parsed.data);
}
