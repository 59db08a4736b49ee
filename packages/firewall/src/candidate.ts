/**
 * Rule candidates
 *
 * A configuration rule compiles to candidates: match statements collected
 * while the rule is translated, the terminal statements (verdict or log) that
 * close it, and the address family once a match pins it. Candidates are
 * immutable; every builder returns a new one.
 */

import type { Family } from "@fwsync/config";
import { add, addressFamilies, type ChainRef, type Command, type Statement, type TableRef } from "@fwsync/nftables";

export class Candidate {
  private constructor(
    readonly family: Family | undefined,
    readonly statements: readonly Statement[],
    readonly terminal: readonly Statement[],
    /** Shared by the per-family clones of one unpinned candidate */
    readonly origin?: number
  ) {}

  static of(...terminal: Statement[]): Candidate {
    return new Candidate(undefined, [], terminal);
  }

  with(...statements: Statement[]): Candidate {
    return new Candidate(this.family, [...this.statements, ...statements], this.terminal, this.origin);
  }

  pin(family: Family): Candidate {
    return new Candidate(family, this.statements, this.terminal, this.origin);
  }

  fromOrigin(origin: number): Candidate {
    return new Candidate(this.family, this.statements, this.terminal, origin);
  }

  /**
   * Whether the candidate may still carry a match of the given family
   */
  accepts(family: Family): boolean {
    return this.family === undefined || this.family === family;
  }

  expr(): Statement[] {
    return [...this.statements, ...this.terminal];
  }
}

/**
 * Fan candidates out over the table's address families: pinned candidates
 * survive if the table carries their family, unpinned ones are cloned per family.
 */
export function finalize(candidates: readonly Candidate[], table: TableRef): Candidate[] {
  const families = addressFamilies(table.family);

  return candidates.flatMap((candidate, index) => {
    if (candidate.family !== undefined) {
      return families.includes(candidate.family) ? [candidate] : [];
    }
    return families.map((family) => candidate.pin(family).fromOrigin(index));
  });
}

/**
 * `add rule` commands for finalized candidates. Clones of one candidate carry
 * the same statements, and a dual-stack table matches both families with a
 * single rule, so each origin is emitted once.
 */
export function toAddRules(chain: ChainRef, candidates: readonly Candidate[]): Command[] {
  const emitted = new Set<number>();
  const commands: Command[] = [];

  for (const candidate of candidates) {
    if (candidate.origin !== undefined) {
      if (emitted.has(candidate.origin)) {
        continue;
      }
      emitted.add(candidate.origin);
    }
    commands.push(add.rule(chain, candidate.expr()));
  }

  return commands;
}
