import { atom, op, Term, variable } from './term';
import { rule, Rule, taut } from './rule';
import { FormalSystem, SearchConfig } from './formal-system';

const n = variable('n');
const m = variable('m');
const p = variable('p');

export const zero = (): Term => atom('zero');
export const succ = (t: Term): Term => op('succ', t);
export const empty = (): Term => atom('empty');
export const node = (left: Term, right: Term): Term => op('node', left, right);

/**
 * Returns the numeral succ(...succ(zero())...) with k applications of succ.
 */
export function numeral(k: number): Term {
  let t = zero();
  for (let i = 0; i < k; i++) t = succ(t);
  return t;
}

/**
 * Rules for natural numbers, binary trees, addition, maximum and tree height.
 * Order matters, it's the order the search tries them in.
 */
export function naturalsRules(): Rule[] {
  const a1 = variable('a1');
  const a2 = variable('a2');
  const t1 = variable('t1');
  const t2 = variable('t2');
  const n1 = variable('n1');
  const n2 = variable('n2');

  return [
    rule('succ', [op('nat', n)], op('nat', succ(n))),
    taut('zero', op('nat', zero())),
    rule(
      'tree',
      [op('tree', a1), op('tree', a2)],
      op('tree', node(a1, a2))
    ),
    taut('empty', op('tree', empty())),
    taut('s1', op('sum', n, zero(), n)),
    rule('s2', [op('sum', n, m, p)], op('sum', n, succ(m), succ(p))),
    taut('max1', op('max', n, zero(), n)),
    taut('max2', op('max', zero(), n, n)),
    rule(
      'max3',
      [op('max', n, m, p)],
      op('max', succ(n), succ(m), succ(p))
    ),
    taut('h1', op('hgt', empty(), zero())),
    rule(
      'h2',
      [op('hgt', t1, n1), op('hgt', t2, n2), op('max', n1, n2, n)],
      op('hgt', node(t1, t2), succ(n))
    ),
  ];
}

/**
 * Returns the formal system of natural numbers and trees.
 */
export function naturals(maxDepth = 8, cfg?: SearchConfig): FormalSystem {
  return new FormalSystem(naturalsRules(), maxDepth, cfg);
}
