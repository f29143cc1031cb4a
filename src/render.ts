import { Term, TermKind } from './term';
import type { Rule } from './rule';

/**
 * Renders a term in operator application syntax, i.e. `op(arg1, arg2)`.
 * Variables and constants are rendered as their bare names.
 */
export function renderTerm(t: Term): string {
  switch (t.kind) {
    case TermKind.Var:
      return t.name;
    case TermKind.Const:
      return t.name;
    case TermKind.Compound:
      return `${t.operator}(${t.args.map(renderTerm).join(', ')})`;
  }
}

/**
 * Renders a rule as `name: (h1, h2) ⊢ c`. Axioms have an empty hypothesis
 * list, i.e. `name: () ⊢ c`.
 */
export function renderRule(rule: Rule): string {
  const hyps = rule.hypotheses.map(renderTerm).join(', ');
  return `${rule.name}: (${hyps}) ⊢ ${renderTerm(rule.conclusion)}`;
}
