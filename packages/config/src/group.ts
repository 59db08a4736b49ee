import { Result } from "better-result";
import type { PolicyError } from "@fwsync/errors";
import { type Rule, parseRule } from "./rule";

export class Group {
  readonly rules: Rule[] = [];

  constructor(readonly comment?: string) {}

  addRule(line: string): Result<void, PolicyError> {
    const rule = parseRule(line);
    if (rule.isErr()) {
      return Result.err(rule.error);
    }
    this.rules.push(rule.unwrap());
    return Result.ok(undefined);
  }
}
