import { isGround, Term } from './term';
import { renderTerm } from './render';
import { apply, Substitution } from './substitution';

/**
 * A derivation: the rule applied, the judgment it proves and one subproof
 * per hypothesis of the rule, in hypothesis order. Leaves are axioms.
 */
export type ProofTree = {
  readonly rule: string;
  readonly judgment: Term;
  readonly children: readonly ProofTree[];
};

/**
 * Applies a substitution to every judgment in a proof.
 */
export function applyToProof(sub: Substitution, proof: ProofTree): ProofTree {
  if (sub.size === 0) return proof;
  return {
    rule: proof.rule,
    judgment: apply(sub, proof.judgment),
    children: proof.children.map((child) => applyToProof(sub, child)),
  };
}

/**
 * Returns true if every judgment in the proof is free of variables.
 */
export function isGroundProof(proof: ProofTree): boolean {
  return isGround(proof.judgment) && proof.children.every(isGroundProof);
}

export function countNodes(proof: ProofTree): number {
  return proof.children.reduce((n, child) => n + countNodes(child), 1);
}

/**
 * Height of the proof, counting nodes. An axiom has height 1.
 */
export function proofHeight(proof: ProofTree): number {
  return 1 + Math.max(0, ...proof.children.map(proofHeight));
}

function center(s: string, width: number): string {
  const pad = Math.max(0, width - s.length);
  const left = Math.floor(pad / 2);
  return ' '.repeat(left) + s + ' '.repeat(pad - left);
}

/**
 * Lays out a proof bottom-up: the judgment line first, then the bar with the
 * rule name to its left, then the rows of the subproofs side by side. All
 * lines of the result have the same width.
 */
function layout(proof: ProofTree): string[] {
  const judgment = renderTerm(proof.judgment);
  const label = proof.rule;

  const subtrees = proof.children.map((child, i) => {
    const lines = layout(child);
    return i < proof.children.length - 1
      ? lines.map((line) => line + '  ')
      : lines;
  });
  const subtreeWidths = subtrees.map((lines) => lines[0]?.length ?? 0);
  const subtreesWidth = subtreeWidths.reduce((a, b) => a + b, 0);
  const subtreesHeight = Math.max(0, ...subtrees.map((lines) => lines.length));

  let width = Math.max(subtreesWidth, judgment.length + label.length);
  const barWidth = Math.max(width, judgment.length + 2);
  width = Math.max(width, barWidth + label.length);

  const lines: string[] = [
    ' '.repeat(label.length) + center(judgment, width - label.length),
    label + center('-'.repeat(barWidth), width - label.length),
  ];

  for (let row = 0; row < subtreesHeight; row++) {
    let line = '';
    subtrees.forEach((sub, i) => {
      line += sub[row] ?? ' '.repeat(subtreeWidths[i]);
    });
    lines.push(center(line, width));
  }

  return lines;
}

/**
 * Renders a proof as stacked inference bars, conclusions below their bars
 * and subproofs side by side above them, e.g.
 *
 * ```
 * zero---------------
 *       nat(zero())
 * ```
 */
export function toStringTree(proof: ProofTree): string {
  return layout(proof).reverse().join('\n');
}
