/**
 * E-Graph Module
 *
 * Equality saturation over tensor graphs: rule verification against axioms
 * and cost-guided optimization of terms.
 */

// Core e-graph
export { EGraph, noAnalysis } from './EGraph.js';
export type { EClass, Analysis, MergeResult } from './EGraph.js';
export {
  OP_ARITY,
  isOp,
  isLeaf,
  enodeKey,
  enodeChildren,
  enodeWithChildren,
  enodeToString,
  termToString
} from './ENode.js';
export type { EClassId, ENode, NodeHead, Term, Op } from './ENode.js';

// Pattern matching
export {
  parsePattern,
  patternVars,
  matchPattern,
  searchPattern,
  instantiatePattern,
  inferPatternData,
  patternToTerm,
  patternToString
} from './Pattern.js';
export type { Pattern, Substitution, Match } from './Pattern.js';

// Rewrite rules
export { rule, biRule, validateRule } from './Rules.js';
export type { Rule, Guard, GuardContext } from './Rules.js';

// Saturation
export { saturate, collectMatches, applyMatches, applyRuleOnce } from './Rewriter.js';
export type {
  SaturationStats,
  SaturationOptions,
  SaturationState,
  StopReason,
  BudgetLimit,
  Goal,
  RuleMatch
} from './Rewriter.js';

// Extraction
export { extract, computeChoices, extractFromChoices } from './Extractor.js';
export type { CostFunction, Choice, Extraction } from './Extractor.js';

// Term conversion
export { parseTerm, addPattern, addTerms, termSize } from './Convert.js';

// Verification and optimization
export { verify } from './Verifier.js';
export type { Verdict, Candidate, RuleVerdict, VerificationReport, VerifyOptions } from './Verifier.js';
export { optimize, evaluateTerm } from './Optimizer.js';
export type { OptimizeResult, OptimizeOptions } from './Optimizer.js';
