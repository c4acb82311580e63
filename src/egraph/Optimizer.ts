/**
 * E-Graph Optimizer for tensor graphs
 *
 * Saturates a term under the axioms, then extracts the cheapest
 * equivalent term according to the cost oracle.
 */

import { EGraph } from './EGraph.js';
import { Term, isLeaf, termToString } from './ENode.js';
import type { Rule } from './Rules.js';
import { saturate, SaturationStats } from './Rewriter.js';
import { extract } from './Extractor.js';
import type { TensorData } from '../tensor/Metadata.js';
import { CostOracle, Evaluation, AnalyticCostModel } from '../tensor/CostModel.js';
import { TensorAnalysis } from '../tensor/Analysis.js';
import { tensorAxioms, getAxioms, RuleCategory } from '../tensor/Axioms.js';

/**
 * Result from e-graph optimization
 */
export interface OptimizeResult {
  term: Term;
  cost: number;         // Tree cost of the extracted term
  graphCost: number;    // Each distinct subgraph counted once
  inputCost: number;    // Tree cost of the input term
  stats: SaturationStats;
}

/**
 * Options for e-graph optimization
 */
export interface OptimizeOptions {
  /** Rewrite rules (default: the built-in tensor axioms) */
  axioms?: readonly Rule<TensorData>[];

  /** Built-in axiom categories to use when `axioms` is not given */
  ruleSets?: RuleCategory[];

  /** Cost/metadata oracle (default: analytic cost model) */
  oracle?: CostOracle;

  /** Maximum saturation iterations (default: 30) */
  maxIterations?: number;

  /** Wall-clock budget in milliseconds (default: none) */
  timeLimitMs?: number;

  /** E-node budget (default: 10000) */
  nodeLimit?: number;

  /** Print verbose output */
  verbose?: boolean;
}

/**
 * Find the cheapest term equivalent to `term` under the axioms
 */
export function optimize(term: Term, options: OptimizeOptions = {}): OptimizeResult {
  const {
    axioms,
    ruleSets,
    oracle = new AnalyticCostModel(),
    verbose = false,
    ...budget
  } = options;
  const rules = axioms ?? (ruleSets ? getAxioms(ruleSets) : tensorAxioms);

  const analysis = new TensorAnalysis(oracle);
  const egraph = new EGraph(analysis);
  const root = egraph.insert(term);
  const inputCost = evaluateTerm(oracle, term).cost;

  if (verbose) {
    console.log(`[optimize] Input ${termToString(term)}, cost ${inputCost}, ${egraph.size} e-classes`);
  }

  const stats = saturate(egraph, rules, { ...budget, verbose });

  if (verbose) {
    console.log(`[optimize] Saturation: ${stats.iterations} iters, ${stats.merges} merges, ${egraph.size} classes`);
  }

  const extraction = extract(egraph, root, (head, childData) => analysis.cost(head, childData));

  if (verbose) {
    console.log(`[optimize] Extracted cost ${extraction.cost} (graph ${extraction.graphCost})`);
  }

  return {
    term: extraction.term,
    cost: extraction.cost,
    graphCost: extraction.graphCost,
    inputCost,
    stats
  };
}

/**
 * Tree cost and metadata of a term, bottom-up through the oracle.
 * Throws ShapeError for an ill-typed term.
 */
export function evaluateTerm(oracle: CostOracle, term: Term): Evaluation {
  if (isLeaf(term)) {
    return oracle.evaluate(term, []);
  }
  const args = term.args.map(arg => evaluateTerm(oracle, arg));
  const own = oracle.evaluate({ tag: term.tag }, args.map(a => a.meta));
  return {
    cost: own.cost + args.reduce((sum, a) => sum + a.cost, 0),
    meta: own.meta
  };
}
