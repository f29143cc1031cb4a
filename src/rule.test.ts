import { expect } from 'chai';
import { atom, getVariables, op, variable } from './term';
import { FreshNames, getRuleVariables, renameRule, rule, taut } from './rule';

const n = variable('n');
const m = variable('m');
const p = variable('p');

describe('rule.ts', () => {
  it('should build axioms with no hypotheses', () => {
    const r = taut('zero', op('nat', atom('zero')));
    expect(r).to.deep.equal({
      name: 'zero',
      hypotheses: [],
      conclusion: op('nat', atom('zero')),
    });
  });

  it('should list rule variables, hypotheses first', () => {
    const r = rule('r', [op('p', m), op('q', p, m)], op('s', n, p));
    expect(getRuleVariables(r)).to.deep.equal(['m', 'p', 'n']);
    expect(getRuleVariables(taut('s1', op('sum', n, atom('zero'), n)))).to.deep.equal(['n']);
    expect(getRuleVariables(taut('zero', op('nat', atom('zero'))))).to.deep.equal([]);
  });

  describe('FreshNames', () => {
    it('should never repeat a name', () => {
      const fresh = new FreshNames();
      expect(fresh.next('n')).to.equal('n_1');
      expect(fresh.next('n')).to.equal('n_2');
      expect(fresh.next('m')).to.equal('m_3');
    });

    it('should skip reserved names', () => {
      const fresh = new FreshNames(new Set(['n_1', 'n_2']));
      expect(fresh.next('n')).to.equal('n_3');
    });
  });

  describe('renameRule', () => {
    const s2 = rule(
      's2',
      [op('sum', n, m, p)],
      op('sum', n, op('succ', m), op('succ', p))
    );

    it('should rename consistently within an instantiation', () => {
      const renamed = renameRule(s2, new FreshNames());
      const [n1, m2, p3] = ['n_1', 'm_2', 'p_3'].map(variable);
      expect(renamed).to.deep.equal({
        name: 's2',
        hypotheses: [op('sum', n1, m2, p3)],
        conclusion: op('sum', n1, op('succ', m2), op('succ', p3)),
      });
    });

    it('should rename apart across instantiations', () => {
      const fresh = new FreshNames();
      const first = renameRule(s2, fresh);
      const second = renameRule(s2, fresh);
      const firstVars = getVariables(first.conclusion);
      const secondVars = getVariables(second.conclusion);
      expect(firstVars).to.deep.equal(['n_1', 'm_2', 'p_3']);
      expect(secondVars).to.deep.equal(['n_4', 'm_5', 'p_6']);
    });

    it('should leave the original rule untouched', () => {
      renameRule(s2, new FreshNames());
      expect(getRuleVariables(s2)).to.deep.equal(['n', 'm', 'p']);
    });
  });
});
