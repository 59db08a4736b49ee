/**
 * Bundled data tables under `packages/config/resources`
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { Result } from "better-result";
import { ResourceError } from "@fwsync/errors";

export function resourcePath(name: string): URL {
  return new URL(`../resources/${name}`, import.meta.url);
}

export function loadResource<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Result<T, ResourceError> {
  const json = Result.try({
    try: (): unknown => JSON.parse(readFileSync(resourcePath(name), "utf8")),
    catch: (error) =>
      new ResourceError({ message: `unable to read ${name}: ${String(error)}`, resource: name }),
  });
  if (json.isErr()) {
    return Result.err(json.error);
  }

  const parsed = schema.safeParse(json.unwrap());
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    return Result.err(new ResourceError({ message: `invalid ${name}: ${issues}`, resource: name }));
  }

  return Result.ok(parsed.data);
}

/**
 * Load a resource once and keep the outcome for the lifetime of the process
 */
export function lazyResource<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): () => Result<T, ResourceError> {
  let cached: Result<T, ResourceError> | undefined;
  return () => {
    cached ??= loadResource(name, schema);
    return cached;
  };
}
