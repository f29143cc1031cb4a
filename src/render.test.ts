import { expect } from 'chai';
import { atom, constant, op, variable } from './term';
import { renderRule, renderTerm } from './render';
import { rule, taut } from './rule';

describe('render.ts', () => {
  it('should render terms in application syntax', () => {
    expect(renderTerm(variable('x'))).to.equal('x');
    expect(renderTerm(constant('a'))).to.equal('a');
    expect(renderTerm(atom('zero'))).to.equal('zero()');
    expect(renderTerm(op('nat', op('succ', atom('zero'))))).to.equal(
      'nat(succ(zero()))'
    );
    expect(renderTerm(op('sum', variable('n'), constant('a'), atom('z')))).to.equal(
      'sum(n, a, z())'
    );
  });

  it('should render rules and axioms', () => {
    const n = variable('n');
    expect(renderRule(taut('zero', op('nat', atom('zero'))))).to.equal(
      'zero: () ⊢ nat(zero())'
    );
    expect(
      renderRule(
        rule('tree', [op('tree', variable('a')), op('tree', variable('b'))], op('tree', n))
      )
    ).to.equal('tree: (tree(a), tree(b)) ⊢ tree(n)');
  });
});
