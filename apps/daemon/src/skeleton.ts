import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { Result } from "better-result";
import { LoaderError } from "@fwsync/errors";

export const SKELETON_PATH = fileURLToPath(new URL("../resources/skeleton.nft", import.meta.url));

/**
 * The base ruleset that declares every chain and map the compiler refers to
 */
export function readSkeleton(path = SKELETON_PATH): Promise<Result<string, LoaderError>> {
  return Result.tryPromise({
    try: () => readFile(path, "utf8"),
    catch: (error) => new LoaderError({ message: `cannot read skeleton ruleset: ${String(error)}`, path, cause: error }),
  });
}
