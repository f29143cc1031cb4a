import { occurs, Term, TermKind, Variable } from './term';
import { renderTerm } from './render';
import { apply, compose, Substitution } from './substitution';
import { debugLogger, LogComponent } from './debug-logger';

/**
 * Reasons a pair of terms can fail to unify:
 */
export enum FailureKind {
  Clash = 'clash', // different operators, constant names or term kinds
  Arity = 'arity', // same operator applied to a different number of arguments
  Cyclic = 'cyclic', // occurs check, variable bound to a term containing it
}

/**
 * Describes the sub-term pair that stopped a unification. This is returned
 * rather than thrown, it's only there for diagnostics.
 */
export class UnificationFailure {
  public readonly message: string;

  constructor(
    public readonly kind: FailureKind,
    public readonly left: Term,
    public readonly right: Term
  ) {
    this.message = describeFailure(kind, renderTerm(left), renderTerm(right));
  }
}

function describeFailure(kind: FailureKind, l: string, r: string): string {
  switch (kind) {
    case FailureKind.Clash:
      return `cannot unify ${l} with ${r}`;
    case FailureKind.Arity:
      return `operator applied with different arities in ${l} and ${r}`;
    case FailureKind.Cyclic:
      return `${l} occurs in ${r}`;
  }
}

/**
 * Returns the most general substitution making the two terms equal, or a
 * failure describing the first mismatching pair. Either side may contain
 * variables. Arguments of compounds are unified left to right, with the
 * bindings found so far applied to each later pair before it is unified.
 *
 * The result is idempotent: no bound variable occurs in any of the values.
 */
export function unify(
  left: Term,
  right: Term,
  sub: Substitution = new Map()
): Substitution | UnificationFailure {
  const a = apply(sub, left);
  const b = apply(sub, right);

  if (a.kind === TermKind.Var) return bindVar(a, b, sub);
  if (b.kind === TermKind.Var) return bindVar(b, a, sub);

  if (a.kind === TermKind.Const && b.kind === TermKind.Const) {
    return a.name === b.name
      ? sub
      : new UnificationFailure(FailureKind.Clash, a, b);
  }

  if (a.kind === TermKind.Compound && b.kind === TermKind.Compound) {
    if (a.operator !== b.operator) {
      return new UnificationFailure(FailureKind.Clash, a, b);
    }
    if (a.args.length !== b.args.length) {
      return new UnificationFailure(FailureKind.Arity, a, b);
    }

    let acc: Substitution = sub;
    for (let i = 0; i < a.args.length; i++) {
      const res = unify(a.args[i], b.args[i], acc);
      if (res instanceof UnificationFailure) return res;
      acc = res;
    }
    return acc;
  }

  // constant against compound
  return new UnificationFailure(FailureKind.Clash, a, b);
}

function bindVar(
  v: Variable,
  t: Term,
  sub: Substitution
): Substitution | UnificationFailure {
  if (t.kind === TermKind.Var && t.name === v.name) return sub;
  if (occurs(v.name, t)) {
    debugLogger.trace(
      LogComponent.UNIFY,
      `occurs check failed for ${v.name} in ${renderTerm(t)}`
    );
    return new UnificationFailure(FailureKind.Cyclic, v, t);
  }
  return compose(sub, new Map([[v.name, t]]));
}

/**
 * Returns true if the two terms unify.
 */
export function unifiable(left: Term, right: Term): boolean {
  return !(unify(left, right) instanceof UnificationFailure);
}
