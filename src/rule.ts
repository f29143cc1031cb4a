import { getVariables, Term, transform, variable } from './term';
import { debugLogger, LogComponent } from './debug-logger';

/**
 * A named inference step, hypotheses ⊢ conclusion. Variables are scoped to
 * the rule, so every use of it during search works on a fresh renaming.
 */
export type Rule = {
  name: string;
  hypotheses: Term[];
  conclusion: Term;
};

export function rule(name: string, hypotheses: Term[], conclusion: Term): Rule {
  return { name, hypotheses, conclusion };
}

/**
 * An axiom, i.e. a rule with no hypotheses.
 */
export function taut(name: string, conclusion: Term): Rule {
  return rule(name, [], conclusion);
}

/**
 * Returns the distinct variables of a rule, hypotheses first.
 */
export function getRuleVariables(r: Rule): string[] {
  const seen: Set<string> = new Set();
  for (const t of [...r.hypotheses, r.conclusion]) {
    for (const name of getVariables(t)) seen.add(name);
  }
  return [...seen];
}

/**
 * Generator of variable names that never repeats itself. Names look like
 * `n_3`, where the counter only ever goes up, and any name in `reserved` (the
 * variables of the goal being searched, usually) is skipped.
 */
export class FreshNames {
  private counter = 0;

  constructor(private readonly reserved: ReadonlySet<string> = new Set()) {}

  next(base: string): string {
    let name: string;
    do {
      name = `${base}_${++this.counter}`;
    } while (this.reserved.has(name));
    return name;
  }
}

/**
 * Consistently renames every variable of a rule with names drawn from
 * `fresh`: within one call the same original name always maps to the same
 * new one.
 */
export function renameRule(r: Rule, fresh: FreshNames): Rule {
  const renaming: Map<string, string> = new Map();
  for (const name of getRuleVariables(r)) {
    renaming.set(name, fresh.next(name));
  }

  debugLogger.trace(
    LogComponent.RENAME,
    `${r.name}: ${[...renaming].map(([from, to]) => `${from}→${to}`).join(', ')}`
  );

  const rename = (t: Term) =>
    transform(t, {
      Var: (v) => variable(renaming.get(v.name) ?? v.name),
    });

  return {
    name: r.name,
    hypotheses: r.hypotheses.map(rename),
    conclusion: rename(r.conclusion),
  };
}
