/**
 * Subprocess execution with piped stdio
 */

import { spawn } from "node:child_process";
import { Result } from "better-result";
import { NftIoError } from "@fwsync/errors";

export interface ProcessOutput {
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

/**
 * Runs a command to completion, feeding `input` to its stdin
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  input?: string
) => Promise<Result<ProcessOutput, NftIoError>>;

export const runCommand: CommandRunner = (command, args, input) =>
  new Promise((resolve) => {
    const proc = spawn(command, [...args], { stdio: ["pipe", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";

    const fail = (error: Error) =>
      resolve(
        Result.err(
          new NftIoError({ message: `cannot run ${command}: ${error.message}`, cause: error })
        )
      );

    proc.stdout.setEncoding("utf8");
    proc.stderr.setEncoding("utf8");
    proc.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    proc.on("error", fail);
    proc.stdin.on("error", fail);
    proc.on("close", (exitCode) => {
      resolve(Result.ok({ stdout, stderr, exitCode }));
    });

    proc.stdin.end(input ?? "");
  });
