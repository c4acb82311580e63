/**
 * Equality saturation for tensor graphs
 *
 * Verifies graph substitution rules against a set of axioms and optimizes
 * tensor terms by extracting the cheapest equivalent after saturation.
 */

// Engine
export * from './egraph/index.js';

// Tensor domain
export {
  PAD_SAME,
  PAD_VALID,
  ACT_NONE,
  ACT_SIGMOID,
  ACT_RELU,
  ACT_TANH,
  OPAQUE,
  parseName,
  shapesEqual,
  numel,
  formatShape,
  dataToString,
  dataEquals,
  mergeData
} from './tensor/Metadata.js';
export type { Shape, SplitPoint, TensorData } from './tensor/Metadata.js';
export { AnalyticCostModel } from './tensor/CostModel.js';
export type { CostOracle, Evaluation, AnalyticCostOptions } from './tensor/CostModel.js';
export { TensorAnalysis } from './tensor/Analysis.js';
export { isTensor, sameShape, hasRank, allOf, ungroupedConv } from './tensor/Guards.js';
export {
  tensorAxioms,
  elementwiseRules,
  linearRules,
  fusionRules,
  concatRules,
  getAxioms
} from './tensor/Axioms.js';
export type { RuleCategory } from './tensor/Axioms.js';

// Rule files and errors
export { parseRuleFile, parseCandidateFile, parseGuard } from './RuleFile.js';
export {
  RuleParseError,
  RuleError,
  ShapeError,
  MetadataConflictError,
  CyclicExtractionError,
  formatError
} from './Errors.js';
export { runCli, parseArgs } from './Commands.js';
export type { CliIO, CliOptions } from './Commands.js';
