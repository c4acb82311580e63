/**
 * Rule Verification by Equality Saturation
 *
 * Both sides of every axiom and every candidate go into one shared e-graph,
 * with pattern variables as opaque symbols. Only the axioms rewrite; each
 * candidate is a proof goal that holds once its two sides share a class.
 *
 * A candidate left unverified after saturation does not follow from the
 * axioms. One left unverified when a budget ran out is merely unknown.
 */

import { EGraph, Analysis } from './EGraph.js';
import type { EClassId } from './ENode.js';
import type { Rule } from './Rules.js';
import { Pattern, patternToString } from './Pattern.js';
import { addPattern } from './Convert.js';
import { saturate, Goal, SaturationStats, StopReason, BudgetLimit } from './Rewriter.js';
import type { TensorData } from '../tensor/Metadata.js';
import { TensorAnalysis } from '../tensor/Analysis.js';
import { RuleError } from '../Errors.js';

export type Verdict = 'verified' | 'unverified';

/**
 * A rule to be proven. Candidate guards play no part in the proof.
 */
export interface Candidate {
  name: string;
  lhs: Pattern;
  rhs: Pattern;
}

export interface RuleVerdict {
  name: string;
  verdict: Verdict;
  round?: number;   // Round in which the goal first held; 0 when equal on insertion
}

export interface VerificationReport {
  verdicts: RuleVerdict[];
  rounds: number;
  stopReason: StopReason;
  exhausted?: BudgetLimit;
  inconclusive: boolean;   // A budget ran out; unverified means "not proven yet"
  stats: SaturationStats;
}

/**
 * Options for verification
 */
export interface VerifyOptions {
  maxIterations?: number;    // Default: 30
  timeLimitMs?: number;      // Default: no limit
  nodeLimit?: number;        // Default: 10000 e-nodes
  analysis?: Analysis<TensorData>;
  verbose?: boolean;
}

/**
 * Check which candidates follow from the axioms
 */
export function verify(
  axioms: readonly Rule<TensorData>[],
  candidates: readonly Candidate[],
  options: VerifyOptions = {}
): VerificationReport {
  const { analysis = new TensorAnalysis(), verbose = false, ...budget } = options;

  const egraph = new EGraph(analysis);

  for (const axiom of axioms) {
    addPattern(egraph, axiom.lhs);
    addPattern(egraph, axiom.rhs);
  }

  const names = new Set<string>();
  const goals: Goal[] = candidates.map(candidate => {
    if (names.has(candidate.name)) {
      throw new RuleError(candidate.name, 'duplicate rule name');
    }
    names.add(candidate.name);
    const lhs: EClassId = addPattern(egraph, candidate.lhs);
    const rhs: EClassId = addPattern(egraph, candidate.rhs);
    return { name: candidate.name, lhs, rhs };
  });

  if (verbose) {
    console.log(`[verify] ${candidates.length} candidates, ${axioms.length} axioms, ${egraph.size} classes`);
  }

  const stats = saturate(egraph, axioms, { ...budget, goals, verbose });

  const verdicts = goals.map((goal): RuleVerdict => {
    const round = stats.goalRounds.get(goal.name);
    return round !== undefined
      ? { name: goal.name, verdict: 'verified', round }
      : { name: goal.name, verdict: 'unverified' };
  });

  if (verbose) {
    for (const [i, v] of verdicts.entries()) {
      const candidate = candidates[i];
      const when = v.round !== undefined ? ` (round ${v.round})` : '';
      console.log(`[verify] ${v.name}: ${v.verdict}${when}  ${patternToString(candidate.lhs)} => ${patternToString(candidate.rhs)}`);
    }
  }

  const report: VerificationReport = {
    verdicts,
    rounds: stats.iterations,
    stopReason: stats.state,
    inconclusive: stats.state === 'budget-exhausted',
    stats
  };
  if (stats.exhausted) {
    report.exhausted = stats.exhausted;
  }
  return report;
}
