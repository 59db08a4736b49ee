import { Result } from "better-result";
import { ParseError, type PolicyError } from "@fwsync/errors";
import { matchName } from "./parse";
import { type RuleMatch, parseRuleMatch, parseRuleOptions } from "./rule-match";

export interface RuleGroup {
  group: string;
  iface?: string;
}

export type RuleKind = { kind: "group"; group: RuleGroup } | { kind: "match"; match: RuleMatch };

export interface Rule {
  disabled: boolean;
  comment?: string;
  rule: RuleKind;
}

/**
 * Parse `GROUP name [-i iface]`
 */
export function parseRuleGroup(line: string): Result<RuleGroup, ParseError> {
  const keyword = matchName(line);
  if (!keyword) {
    return Result.err(new ParseError({ message: "expected a leading keyword in rule group", input: line }));
  }
  if (keyword[0].toLowerCase() !== "group") {
    return Result.err(new ParseError({ message: "expected keyword GROUP", input: line }));
  }

  const named = matchName(keyword[1].trim());
  if (!named) {
    return Result.err(new ParseError({ message: "expected a name for rule group", input: line }));
  }
  const [group, rest] = named;

  const options = parseRuleOptions(rest);
  if (options.isErr()) {
    return Result.err(options.error);
  }

  const { iface, ...others } = options.unwrap();
  if (Object.keys(others).length > 0) {
    return Result.err(
      new ParseError({ message: "only interface parameter is permitted for group rules", input: line })
    );
  }

  return Result.ok(iface === undefined ? { group } : { group, iface });
}

export function parseRule(input: string): Result<Rule, PolicyError> {
  if (/[\n\r]/.test(input)) {
    return Result.err(new ParseError({ message: "rule must not contain any newlines", input }));
  }

  let line = input.trim();
  let comment: string | undefined;

  const hash = input.lastIndexOf("#");
  if (hash !== -1) {
    const text = input.slice(hash + 1).trim();
    if (text !== "") {
      line = input.slice(0, hash).trim();
      comment = text;
    }
  }

  const disabled = line.startsWith("|");
  if (disabled) {
    line = line.slice(1).trimStart();
  }

  if (line.startsWith("GROUP")) {
    const group = parseRuleGroup(line);
    if (group.isErr()) {
      return Result.err(group.error);
    }
    return Result.ok(withComment({ disabled, rule: { kind: "group", group: group.unwrap() } }, comment));
  }

  const match = parseRuleMatch(line);
  if (match.isErr()) {
    return Result.err(match.error);
  }
  return Result.ok(withComment({ disabled, rule: { kind: "match", match: match.unwrap() } }, comment));
}

function withComment(rule: Rule, comment: string | undefined): Rule {
  return comment === undefined ? rule : { ...rule, comment };
}

export function ruleIface(rule: Rule): string | undefined {
  return rule.rule.kind === "group" ? rule.rule.group.iface : rule.rule.match.iface;
}
