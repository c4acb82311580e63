/**
 * Rewrite Engine for E-Graph Equality Saturation
 *
 * Each round reads the whole e-graph first (every rule's matches, guards and
 * right-hand-side checks), then applies the surviving matches in one batch
 * and rebuilds once. Runs until no new equivalences are discovered, every
 * proof goal holds, or a budget runs out.
 */

import type { EGraph } from './EGraph.js';
import type { EClassId } from './ENode.js';
import type { Rule, GuardContext } from './Rules.js';
import { searchPattern, instantiatePattern, inferPatternData, Match } from './Pattern.js';
import { RuleError, ShapeError } from '../Errors.js';

export type StopReason = 'saturated' | 'goal-reached' | 'budget-exhausted';

export type SaturationState = 'running' | StopReason;

export type BudgetLimit = 'iterations' | 'time' | 'nodes';

/**
 * Two classes that should end up equal
 */
export interface Goal {
  name: string;
  lhs: EClassId;
  rhs: EClassId;
}

/**
 * Statistics from a saturation run
 */
export interface SaturationStats {
  iterations: number;
  totalMatches: number;
  applications: number;
  skipped: number;                  // Matches dropped by a guard or an ill-typed right side
  merges: number;
  state: StopReason;
  exhausted?: BudgetLimit;          // Which budget ran out, when state is 'budget-exhausted'
  saturated: boolean;
  classCount: number;
  nodeCount: number;
  goalRounds: Map<string, number>;  // Goal name -> round in which it first held
  elapsedMs: number;
}

/**
 * Options for saturation
 */
export interface SaturationOptions {
  maxIterations?: number;    // Default: 30
  timeLimitMs?: number;      // Default: no limit
  nodeLimit?: number;        // Default: 10000 e-nodes
  goals?: Goal[];            // Stop as soon as all of these hold
  verbose?: boolean;         // Log progress
}

/**
 * A rule matched at a class
 */
export interface RuleMatch<D> {
  rule: Rule<D>;
  match: Match;
}

/**
 * Apply equality saturation to an e-graph
 */
export function saturate<D>(
  egraph: EGraph<D>,
  rules: readonly Rule<D>[],
  options: SaturationOptions = {}
): SaturationStats {
  const {
    maxIterations = 30,
    timeLimitMs = Infinity,
    nodeLimit = 10000,
    goals = [],
    verbose = false
  } = options;

  const start = performance.now();
  const provenAt: (number | undefined)[] = goals.map(() => undefined);

  const checkGoals = (round: number): boolean => {
    if (goals.length === 0) return false;
    let all = true;
    goals.forEach((goal, i) => {
      if (provenAt[i] === undefined && egraph.find(goal.lhs) === egraph.find(goal.rhs)) {
        provenAt[i] = round;
      }
      all = all && provenAt[i] !== undefined;
    });
    return all;
  };

  const stats: SaturationStats = {
    iterations: 0,
    totalMatches: 0,
    applications: 0,
    skipped: 0,
    merges: 0,
    state: 'saturated',
    saturated: false,
    classCount: egraph.size,
    nodeCount: egraph.nodeCount,
    goalRounds: new Map(),
    elapsedMs: 0
  };

  egraph.rebuild();

  let state: SaturationState = checkGoals(0) ? 'goal-reached' : 'running';

  while (state === 'running') {
    if (stats.iterations >= maxIterations) {
      state = 'budget-exhausted';
      stats.exhausted = 'iterations';
      break;
    }
    if (performance.now() - start >= timeLimitMs) {
      state = 'budget-exhausted';
      stats.exhausted = 'time';
      break;
    }
    if (egraph.nodeCount > nodeLimit) {
      state = 'budget-exhausted';
      stats.exhausted = 'nodes';
      break;
    }

    const round = stats.iterations + 1;

    // Read phase: nothing is mutated until every match is known
    const planned: RuleMatch<D>[] = [];
    let matchCount = 0;
    for (const rule of rules) {
      for (const match of searchPattern(egraph, rule.lhs)) {
        matchCount++;
        if (isApplicable(egraph, rule, match)) {
          planned.push({ rule, match });
        } else {
          stats.skipped++;
        }
      }
    }

    // Write phase
    const unionsBefore = egraph.unions;
    for (const { rule, match } of planned) {
      applyRhs(egraph, rule, match);
    }
    egraph.rebuild();

    const merges = egraph.unions - unionsBefore;
    stats.iterations = round;
    stats.totalMatches += matchCount;
    stats.applications += planned.length;
    stats.merges += merges;

    if (verbose) {
      console.log(`[saturate] Iter ${round}: ${matchCount} matches, ${merges} merges, ${egraph.size} classes, ${egraph.nodeCount} nodes`);
    }

    if (checkGoals(round)) {
      state = 'goal-reached';
    } else if (merges === 0) {
      state = 'saturated';
    }
  }

  if (verbose) {
    const detail = stats.exhausted ? ` (${stats.exhausted})` : '';
    console.log(`[saturate] Stopped after ${stats.iterations} iterations: ${state}${detail}`);
  }

  stats.state = state;
  stats.saturated = state === 'saturated';
  stats.classCount = egraph.size;
  stats.nodeCount = egraph.nodeCount;
  goals.forEach((goal, i) => {
    const round = provenAt[i];
    if (round !== undefined) stats.goalRounds.set(goal.name, round);
  });
  stats.elapsedMs = performance.now() - start;
  return stats;
}

/**
 * Collect all matches of the given rules, in rule order
 */
export function collectMatches<D>(egraph: EGraph<D>, rules: readonly Rule<D>[]): RuleMatch<D>[] {
  const matches: RuleMatch<D>[] = [];
  for (const rule of rules) {
    for (const match of searchPattern(egraph, rule.lhs)) {
      matches.push({ rule, match });
    }
  }
  return matches;
}

/**
 * Apply one rule's matches as a batch, then rebuild.
 * Matches whose guard fails or whose right side is ill-typed are skipped.
 * Returns the number of applications.
 */
export function applyMatches<D>(
  egraph: EGraph<D>,
  rule: Rule<D>,
  matches: Iterable<Match>
): number {
  const applicable = [...matches].filter(match => isApplicable(egraph, rule, match));
  for (const match of applicable) {
    applyRhs(egraph, rule, match);
  }
  egraph.rebuild();
  return applicable.length;
}

/**
 * Apply a single rule everywhere it matches, returning number of merges
 */
export function applyRuleOnce<D>(egraph: EGraph<D>, rule: Rule<D>): number {
  const unionsBefore = egraph.unions;
  applyMatches(egraph, rule, searchPattern(egraph, rule.lhs));
  return egraph.unions - unionsBefore;
}

/**
 * Guard and right-hand-side check, reading the e-graph only
 */
function isApplicable<D>(egraph: EGraph<D>, rule: Rule<D>, match: Match): boolean {
  try {
    if (rule.guard && !rule.guard(guardContext(egraph, rule, match))) {
      return false;
    }
    inferPatternData(egraph, rule.rhs, match.subst);
    return true;
  } catch (err) {
    if (err instanceof ShapeError) {
      return false;
    }
    throw err;
  }
}

function applyRhs<D>(egraph: EGraph<D>, rule: Rule<D>, match: Match): void {
  const rhsId = instantiatePattern(egraph, rule.rhs, match.subst);
  egraph.union(match.classId, rhsId);
}

function guardContext<D>(egraph: EGraph<D>, rule: Rule<D>, match: Match): GuardContext<D> {
  const lookup = (variable: string): EClassId => {
    const id = match.subst.get(variable);
    if (id === undefined) {
      throw new RuleError(rule.name, `guard reads ?${variable}, which the left-hand side never binds`);
    }
    return id;
  };
  return {
    data: variable => egraph.getData(lookup(variable)),
    classId: lookup
  };
}
