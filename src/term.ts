/**
 * Types of nodes in a judgment/term syntax tree:
 */
export enum TermKind {
  Var, // variable x, scoped to a single rule instantiation
  Const, // nullary constant c
  Compound, // operator application op(t_1, ..., t_n)
}

/** Variable term with its name. */
export type Variable = { kind: TermKind.Var; name: string };

/** Constant term with its name. */
export type Constant = { kind: TermKind.Const; name: string };

/**
 * Operator applied to an ordered list of argument terms. The arity is just
 * the length of `args`, it isn't tracked anywhere else.
 */
export type Compound = {
  kind: TermKind.Compound;
  operator: string;
  args: Term[];
};

/**
 * Represents a judgment or expression, which is either a variable, a constant
 * or an operator applied to n subterms.
 */
export type Term = Variable | Constant | Compound;

export function variable(name: string): Variable {
  return { kind: TermKind.Var, name };
}

export function constant(name: string): Constant {
  return { kind: TermKind.Const, name };
}

export function compound(operator: string, args: Term[]): Compound {
  return { kind: TermKind.Compound, operator, args };
}

/**
 * Shorthand for `compound` taking the arguments as rest parameters, so that
 * `op('nat', op('succ', variable('n')))` reads like `nat(succ(n))`.
 */
export function op(operator: string, ...args: Term[]): Compound {
  return compound(operator, args);
}

/**
 * Operator with no arguments, rendered as `name()`. Note that this is a
 * different term to `constant(name)`.
 */
export function atom(name: string): Compound {
  return compound(name, []);
}

/**
 * Callbacks for `transform`.
 */
export type TransformFns = {
  Var?: (t: Variable) => Term;
  Const?: (t: Constant) => Term;
  Compound?: (t: Compound) => Term;
};

/**
 * Helper for rewriting terms. Kinds without a callback are rebuilt
 * structurally (compounds) or returned unchanged (leaves).
 */
export function transform(t: Term, cbs: TransformFns): Term {
  switch (t.kind) {
    case TermKind.Var:
      return cbs.Var ? cbs.Var(t) : t;
    case TermKind.Const:
      return cbs.Const ? cbs.Const(t) : t;
    case TermKind.Compound: {
      if (cbs.Compound) return cbs.Compound(t);
      return {
        ...t,
        args: t.args.map((arg) => transform(arg, cbs)),
      };
    }
    default: {
      const _exhaustive: never = t;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Returns the distinct variable names of a term, in order of first
 * occurrence.
 */
export function getVariables(t: Term): string[] {
  const seen: Set<string> = new Set();

  const visitNode = (t: Term): void => {
    switch (t.kind) {
      case TermKind.Var:
        seen.add(t.name);
        break;
      case TermKind.Const:
        break;
      case TermKind.Compound:
        t.args.forEach(visitNode);
        break;
      default: {
        const _exhaustive: never = t;
        throw new Error(_exhaustive);
      }
    }
  };

  visitNode(t);
  return [...seen];
}

/**
 * Returns true if the variable with the given name appears anywhere in `t`.
 */
export function occurs(name: string, t: Term): boolean {
  switch (t.kind) {
    case TermKind.Var:
      return t.name === name;
    case TermKind.Const:
      return false;
    case TermKind.Compound:
      return t.args.some((arg) => occurs(name, arg));
  }
}

/**
 * Returns true if the term contains no variables.
 */
export function isGround(t: Term): boolean {
  switch (t.kind) {
    case TermKind.Var:
      return false;
    case TermKind.Const:
      return true;
    case TermKind.Compound:
      return t.args.every(isGround);
  }
}

/**
 * Returns true if the given terms are equal syntactically.
 */
export function equal(f: Term, g: Term): boolean {
  switch (f.kind) {
    case TermKind.Var:
      if (g.kind != TermKind.Var) return false;
      return f.name == g.name;
    case TermKind.Const:
      if (g.kind != TermKind.Const) return false;
      return f.name == g.name;
    case TermKind.Compound:
      if (g.kind != TermKind.Compound) return false;
      return (
        f.operator == g.operator &&
        f.args.length == g.args.length &&
        f.args.every((sub, i) => equal(sub, g.args[i]))
      );
    default:
      const _exhaustive: never = f;
      throw new Error(_exhaustive);
  }
}
