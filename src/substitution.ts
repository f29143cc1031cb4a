import { equal, Term, transform } from './term';
import { renderTerm } from './render';

/**
 * Represents a mapping from variable names to terms.
 */
export type Substitution = Map<string, Term>;

/**
 * Represents an attempt to bind a variable that is already bound to some
 * other term.
 */
export class BindingConflictError extends Error {
  constructor(
    public readonly variable: string,
    public readonly existing: Term,
    public readonly attempted: Term
  ) {
    super(
      `variable '${variable}' is already bound to ${renderTerm(existing)}, cannot rebind it to ${renderTerm(attempted)}`
    );
  }
}

export function empty(): Substitution {
  return new Map();
}

/**
 * Returns a copy of `sub` with `name` bound to `term`. Rebinding a variable to
 * an equal term is a no-op, rebinding it to anything else throws. Overriding
 * a binding is only possible through `compose`.
 */
export function bind(sub: Substitution, name: string, term: Term): Substitution {
  const existing = sub.get(name);
  if (existing !== undefined) {
    if (!equal(existing, term)) {
      throw new BindingConflictError(name, existing, term);
    }
    return sub;
  }

  const res: Substitution = new Map(sub);
  res.set(name, term);
  return res;
}

/**
 * Applies a substitution to the variables in a term.
 */
export function apply(sub: Substitution, t: Term): Term {
  if (sub.size === 0) return t;
  return transform(t, {
    Var: (v) => sub.get(v.name) ?? v,
  });
}

/**
 * Composes `theta` after `sigma`: `theta` is applied to every value already
 * bound in `sigma`, then `theta`'s own bindings are added, overriding any
 * binding for the same variable.
 */
export function compose(sigma: Substitution, theta: Substitution): Substitution {
  const res: Substitution = new Map();
  for (const [name, term] of sigma) {
    res.set(name, apply(theta, term));
  }
  for (const [name, term] of theta) {
    res.set(name, term);
  }
  return res;
}

/**
 * Renders a substitution as `{x ↦ a, y ↦ f(x)}`, mostly for debug logs.
 */
export function renderSubstitution(sub: Substitution): string {
  const entries = [...sub].map(
    ([name, term]) => `${name} ↦ ${renderTerm(term)}`
  );
  return `{${entries.join(', ')}}`;
}
