import { expect } from 'chai';
import { op, variable } from './term';
import { NoProofError } from './formal-system';
import { ProofTree, toStringTree } from './proof-tree';
import { empty, naturals, node, numeral, succ, zero } from './naturals';

// Rule names of a proof in pre-order.
function ruleNames(proof: ProofTree): string[] {
  return [proof.rule, ...proof.children.flatMap(ruleNames)];
}

describe('Naturals and trees', () => {
  const system = naturals();

  it('should build numerals', () => {
    expect(numeral(0)).to.deep.equal(zero());
    expect(numeral(3)).to.deep.equal(succ(succ(succ(zero()))));
  });

  it('should prove natural numbers', () => {
    expect(ruleNames(system.verify(op('nat', zero())))).to.deep.equal(['zero']);
    expect(ruleNames(system.verify(op('nat', numeral(2))))).to.deep.equal([
      'succ',
      'succ',
      'zero',
    ]);
  });

  it('should prove trees', () => {
    const t = node(empty(), node(empty(), empty()));
    expect(ruleNames(system.verify(op('tree', t)))).to.deep.equal([
      'tree',
      'empty',
      'tree',
      'empty',
      'empty',
    ]);
  });

  it('should prove sums and reject wrong ones', () => {
    const zz = system.verify(op('sum', zero(), zero(), zero()));
    expect(ruleNames(zz)).to.deep.equal(['s1']);

    const sum = system.verify(op('sum', numeral(2), numeral(3), numeral(5)));
    expect(ruleNames(sum)).to.deep.equal(['s2', 's2', 's2', 's1']);

    expect(() =>
      system.verify(op('sum', zero(), numeral(1), zero()))
    ).to.throw(NoProofError);
  });

  it('should prove maxima', () => {
    const proof = system.verify(op('max', numeral(1), numeral(2), numeral(2)));
    expect(ruleNames(proof)).to.deep.equal(['max3', 'max2']);
    expect(proof.children[0].judgment).to.deep.equal(
      op('max', numeral(0), numeral(1), numeral(1))
    );
  });

  it('should prove tree heights', () => {
    const small = system.verify(
      op('hgt', node(empty(), empty()), numeral(1))
    );
    expect(ruleNames(small)).to.deep.equal(['h2', 'h1', 'h1', 'max1']);

    const t = node(empty(), node(empty(), empty()));
    expect(system.prove(op('hgt', t, numeral(2)))).to.not.be.undefined;
    expect(system.prove(op('hgt', t, numeral(1)))).to.be.undefined;
  });

  it('should compute a tree height left open in the goal', () => {
    const t = node(empty(), node(empty(), empty()));
    const proof = system.verify(op('hgt', t, variable('x')));
    expect(proof.judgment).to.deep.equal(op('hgt', t, numeral(2)));
    expect(ruleNames(proof)).to.deep.equal([
      'h2',
      'h1',
      'h2',
      'h1',
      'h1',
      'max1',
      'max2',
    ]);
  });

  it('should render a derivation with the judgment at the bottom', () => {
    const proof = system.verify(op('sum', numeral(1), numeral(1), numeral(2)));
    const lines = toStringTree(proof).split('\n');
    expect(lines[lines.length - 1].trim()).to.equal(
      'sum(succ(zero()), succ(zero()), succ(succ(zero())))'
    );
    expect(lines[lines.length - 2].startsWith('s2---')).to.be.true;
    expect(lines[0].trim().startsWith('s1---')).to.be.true;
  });
});
