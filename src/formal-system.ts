import { getVariables, isGround, Term } from './term';
import { renderRule, renderTerm } from './render';
import { FreshNames, renameRule, Rule } from './rule';
import {
  apply,
  compose,
  renderSubstitution,
  Substitution,
} from './substitution';
import { unify, UnificationFailure } from './unify';
import {
  applyToProof,
  countNodes,
  isGroundProof,
  ProofTree,
  toStringTree,
} from './proof-tree';
import { debugLogger, LogComponent, LogLevel } from './debug-logger';

/**
 * Largest accepted depth bound. Search recurses once per level of the
 * derivation, and unification recurses over terms that can grow by a node per
 * level, so deeper bounds can overflow the call stack on regressing rules.
 */
export const MAX_DEPTH_CEILING = 500;

export interface SearchConfig {
  /**
   * Stops the search once this many rule applications have been attempted
   * in a single call to `prove` or `verify`. Unlimited by default.
   */
  maxSteps?: number;
}

/**
 * Represents a goal for which no derivation was found within the depth
 * bound. This can't tell apart goals that are unprovable from goals that
 * need a deeper search, but `depthExhausted` is set if any branch of the
 * search ran into the bound.
 */
export class NoProofError extends Error {
  constructor(
    public readonly goal: Term,
    public readonly maxDepth: number,
    public readonly depthExhausted: boolean,
    public readonly budgetExhausted: boolean
  ) {
    let reason = '';
    if (budgetExhausted) {
      reason = ' (step budget exhausted)';
    } else if (depthExhausted) {
      reason = ' (depth bound reached)';
    }
    super(
      `no proof found for ${renderTerm(goal)} within depth ${maxDepth}${reason}`
    );
  }
}

/**
 * A rule whose conclusion unifies with some goal, along with the unifier.
 * The rule's variables have already been renamed apart from the goal's.
 */
export type ApplicableRule = {
  rule: Rule;
  substitution: Substitution;
};

/**
 * Mutable bookkeeping for one top-level search. Only the name generator and
 * the diagnostics live here, bindings are always passed around by value.
 */
type SearchState = {
  fresh: FreshNames;
  steps: number;
  depthExhausted: boolean;
  budgetExhausted: boolean;
};

/**
 * An ordered list of inference rules together with a bound on the height of
 * derivations. Rule order is the order in which search tries them.
 */
export class FormalSystem {
  public readonly rules: readonly Rule[];

  constructor(
    rules: Rule[],
    public readonly maxDepth: number,
    private readonly cfg: SearchConfig = {}
  ) {
    if (
      !Number.isInteger(maxDepth) ||
      maxDepth < 1 ||
      maxDepth > MAX_DEPTH_CEILING
    ) {
      throw new RangeError(
        `expected max depth to be an integer between 1 and ${MAX_DEPTH_CEILING}, got ${maxDepth}`
      );
    }
    if (
      cfg.maxSteps != null &&
      (!Number.isInteger(cfg.maxSteps) || cfg.maxSteps < 0)
    ) {
      throw new RangeError(
        `expected max steps to be a non-negative integer, got ${cfg.maxSteps}`
      );
    }
    this.rules = [...rules];
  }

  /**
   * Attempts to derive the goal, returning the first derivation found or
   * throwing a `NoProofError` if there is none within the depth bound.
   */
  verify(goal: Term): ProofTree {
    const state = this.createState(goal);
    const proof = this.search(goal, this.maxDepth, state);

    if (proof === undefined) {
      debugLogger.info(
        LogComponent.SEARCH,
        `No proof of ${renderTerm(goal)} after ${state.steps} steps`
      );
      throw new NoProofError(
        goal,
        this.maxDepth,
        state.depthExhausted,
        state.budgetExhausted
      );
    }

    debugLogger.info(
      LogComponent.SEARCH,
      `Proved ${renderTerm(goal)} with ${countNodes(proof)} nodes after ${state.steps} steps`
    );
    debugLogger.lazy(LogLevel.DEBUG, LogComponent.RENDER, () =>
      toStringTree(proof)
    );
    return proof;
  }

  /**
   * Same as `verify`, but returns undefined instead of throwing.
   */
  prove(goal: Term): ProofTree | undefined {
    return this.search(goal, this.maxDepth, this.createState(goal));
  }

  /**
   * Lists the rules whose conclusion unifies with the goal, in rule order.
   * Nothing is said about whether their hypotheses are provable.
   */
  applicableRules(goal: Term): ApplicableRule[] {
    const fresh = new FreshNames(new Set(getVariables(goal)));
    const res: ApplicableRule[] = [];
    for (const r of this.rules) {
      const renamed = renameRule(r, fresh);
      const sub = unify(renamed.conclusion, goal);
      if (!(sub instanceof UnificationFailure)) {
        res.push({ rule: renamed, substitution: sub });
      }
    }
    return res;
  }

  private createState(goal: Term): SearchState {
    return {
      fresh: new FreshNames(new Set(getVariables(goal))),
      steps: 0,
      depthExhausted: false,
      budgetExhausted: false,
    };
  }

  private search(
    goal: Term,
    depthRemaining: number,
    state: SearchState
  ): ProofTree | undefined {
    if (depthRemaining === 0) {
      state.depthExhausted = true;
      return undefined;
    }

    for (const original of this.rules) {
      if (this.cfg.maxSteps != null && state.steps >= this.cfg.maxSteps) {
        state.budgetExhausted = true;
        return undefined;
      }
      state.steps++;

      const r = renameRule(original, state.fresh);
      const matched = unify(r.conclusion, goal);
      if (matched instanceof UnificationFailure) {
        debugLogger.trace(
          LogComponent.SEARCH,
          `${r.name} does not match ${renderTerm(goal)}: ${matched.message}`
        );
        continue;
      }

      debugLogger.trace(
        LogComponent.SEARCH,
        `Trying ${renderRule(r)} on ${renderTerm(goal)} with ${renderSubstitution(matched)} (depth ${depthRemaining})`
      );

      const derived = this.proveHypotheses(r, matched, depthRemaining, state);
      if (derived === undefined) {
        debugLogger.debug(
          LogComponent.SEARCH,
          `Backtracking from ${r.name} on ${renderTerm(goal)}`
        );
        continue;
      }

      const [sub, children] = derived;
      const proof: ProofTree = {
        rule: r.name,
        judgment: apply(sub, r.conclusion),
        children: children.map((child) => applyToProof(sub, child)),
      };

      // a ground goal only accepts a fully ground derivation
      if (isGround(goal) && !isGroundProof(proof)) {
        debugLogger.debug(
          LogComponent.SEARCH,
          `Backtracking from ${r.name} on ${renderTerm(goal)}: subproofs left variables unbound`
        );
        continue;
      }
      return proof;
    }

    return undefined;
  }

  /**
   * Proves the hypotheses of an already matched rule in order, threading the
   * bindings each subproof discovers into the hypotheses after it.
   */
  private proveHypotheses(
    r: Rule,
    matched: Substitution,
    depthRemaining: number,
    state: SearchState
  ): [Substitution, ProofTree[]] | undefined {
    let sub = matched;
    const children: ProofTree[] = [];

    for (const hypothesis of r.hypotheses) {
      const subgoal = apply(sub, hypothesis);
      const child = this.search(subgoal, depthRemaining - 1, state);
      if (child === undefined) return undefined;

      const discovered = unify(subgoal, child.judgment);
      if (discovered instanceof UnificationFailure) {
        throw new Error(
          `subproof of ${renderTerm(subgoal)} concluded ${renderTerm(child.judgment)}: ${discovered.message}`
        );
      }

      sub = compose(sub, discovered);
      children.push(child);
    }

    return [sub, children];
  }
}
