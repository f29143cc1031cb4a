export {
  atom,
  compound,
  constant,
  equal,
  getVariables,
  isGround,
  occurs,
  op,
  TermKind,
  transform,
  variable,
} from './term';
export type { Compound, Constant, Term, TransformFns, Variable } from './term';
export { renderRule, renderTerm } from './render';
export {
  apply,
  bind,
  BindingConflictError,
  compose,
  empty,
  renderSubstitution,
} from './substitution';
export type { Substitution } from './substitution';
export { FailureKind, unifiable, unify, UnificationFailure } from './unify';
export { FreshNames, getRuleVariables, renameRule, rule, taut } from './rule';
export type { Rule } from './rule';
export { FormalSystem, MAX_DEPTH_CEILING, NoProofError } from './formal-system';
export type { ApplicableRule, SearchConfig } from './formal-system';
export {
  applyToProof,
  countNodes,
  isGroundProof,
  proofHeight,
  toStringTree,
} from './proof-tree';
export type { ProofTree } from './proof-tree';
export { debugLogger, DebugLogger, LogComponent, LogLevel } from './debug-logger';
export type { LoggerOptions } from './debug-logger';
export { naturals, naturalsRules, numeral } from './naturals';
