/**
 * Default tensor axioms
 *
 * Single-pattern graph substitutions in the style of tensor superoptimizers:
 * - Elementwise: commutativity, associativity, distributivity
 * - Linear algebra: transpose laws, matmul associativity and linearity
 * - Fusion: activations folded into matmul/conv2d
 * - Concat/split: merging parallel operators, undoing a split of a concat
 *
 * Activation 0 means none; padding 0 means SAME.
 */

import { Rule, rule, biRule } from '../egraph/Rules.js';
import type { TensorData } from './Metadata.js';
import { ungroupedConv } from './Guards.js';

// =============================================================================
// ELEMENTWISE
// =============================================================================

export const elementwiseRules: Rule<TensorData>[] = [
  rule('ewadd-comm', '(ewadd ?x ?y)', '(ewadd ?y ?x)'),
  rule('ewmul-comm', '(ewmul ?x ?y)', '(ewmul ?y ?x)'),
  ...biRule('ewadd-assoc', '(ewadd ?x (ewadd ?y ?z))', '(ewadd (ewadd ?x ?y) ?z)'),
  ...biRule('ewmul-assoc', '(ewmul ?x (ewmul ?y ?z))', '(ewmul (ewmul ?x ?y) ?z)'),
  ...biRule('ewmul-dist', '(ewmul (ewadd ?x ?y) ?z)', '(ewadd (ewmul ?x ?z) (ewmul ?y ?z))'),

  // === Scalar multiplication ===
  ...biRule('smul-dist', '(smul (ewadd ?x ?y) ?w)', '(ewadd (smul ?x ?w) (smul ?y ?w))'),
  ...biRule('smul-ewmul', '(smul (ewmul ?x ?y) ?w)', '(ewmul ?x (smul ?y ?w))'),
  rule('smul-one', '(smul ?x 1)', '?x'),
  rule('ewadd-self', '(ewadd ?x ?x)', '(smul ?x 2)'),
];

// =============================================================================
// LINEAR ALGEBRA
// =============================================================================

export const linearRules: Rule<TensorData>[] = [
  rule('transpose-transpose', '(transpose (transpose ?x))', '?x'),
  ...biRule('transpose-ewadd', '(transpose (ewadd ?x ?y))', '(ewadd (transpose ?x) (transpose ?y))'),
  ...biRule('transpose-ewmul', '(transpose (ewmul ?x ?y))', '(ewmul (transpose ?x) (transpose ?y))'),
  ...biRule('transpose-smul', '(smul (transpose ?x) ?w)', '(transpose (smul ?x ?w))'),
  ...biRule('transpose-matmul', '(transpose (matmul 0 ?x ?y))', '(matmul 0 (transpose ?y) (transpose ?x))'),
  ...biRule('matmul-assoc', '(matmul 0 ?x (matmul 0 ?y ?z))', '(matmul 0 (matmul 0 ?x ?y) ?z)'),
  ...biRule('matmul-dist-r', '(matmul 0 ?x (ewadd ?y ?z))', '(ewadd (matmul 0 ?x ?y) (matmul 0 ?x ?z))'),
  ...biRule('matmul-dist-l', '(matmul 0 (ewadd ?x ?y) ?z)', '(ewadd (matmul 0 ?x ?z) (matmul 0 ?y ?z))'),
  ...biRule('matmul-smul', '(smul (matmul 0 ?x ?y) ?w)', '(matmul 0 ?x (smul ?y ?w))'),
  ...biRule('conv-dist-weight',
    '(conv2d ?sh ?sw ?p 0 ?x (ewadd ?w1 ?w2))',
    '(ewadd (conv2d ?sh ?sw ?p 0 ?x ?w1) (conv2d ?sh ?sw ?p 0 ?x ?w2))'),
  ...biRule('conv-dist-input',
    '(conv2d ?sh ?sw ?p 0 (ewadd ?x ?y) ?w)',
    '(ewadd (conv2d ?sh ?sw ?p 0 ?x ?w) (conv2d ?sh ?sw ?p 0 ?y ?w))'),
  ...biRule('conv-smul', '(smul (conv2d ?sh ?sw ?p 0 ?x ?w) ?y)', '(conv2d ?sh ?sw ?p 0 ?x (smul ?w ?y))'),
  rule('conv-enlarge', '(conv2d ?sh ?sw 0 ?a ?x (enlarge ?w ?r))', '(conv2d ?sh ?sw 0 ?a ?x ?w)'),
];

// =============================================================================
// ACTIVATION FUSION
// =============================================================================

export const fusionRules: Rule<TensorData>[] = [
  ...biRule('matmul-sigmoid', '(sigmoid (matmul 0 ?x ?y))', '(matmul 1 ?x ?y)'),
  ...biRule('matmul-relu', '(relu (matmul 0 ?x ?y))', '(matmul 2 ?x ?y)'),
  ...biRule('matmul-tanh', '(tanh (matmul 0 ?x ?y))', '(matmul 3 ?x ?y)'),
  ...biRule('conv-relu', '(relu (conv2d ?sh ?sw ?p 0 ?x ?w))', '(conv2d ?sh ?sw ?p 2 ?x ?w)'),
];

// =============================================================================
// CONCAT / SPLIT
// =============================================================================

export const concatRules: Rule<TensorData>[] = [
  ...biRule('concat-matmul', '(concat 1 2 (matmul 0 ?x ?y) (matmul 0 ?x ?z))', '(matmul 0 ?x (concat 1 2 ?y ?z))'),
  ...biRule('concat-conv',
    '(concat 1 4 (conv2d ?sh ?sw ?p ?a ?x ?w1) (conv2d ?sh ?sw ?p ?a ?x ?w2))',
    '(conv2d ?sh ?sw ?p ?a ?x (concat 0 4 ?w1 ?w2))',
    ungroupedConv('x', 'w1')),
  ...biRule('concat-ewadd',
    '(concat ?axis ?n (ewadd ?x ?y) (ewadd ?z ?w))',
    '(ewadd (concat ?axis ?n ?x ?z) (concat ?axis ?n ?y ?w))'),
  ...biRule('concat-relu', '(concat ?axis ?n (relu ?x) (relu ?y))', '(relu (concat ?axis ?n ?x ?y))'),
  rule('split-concat-0', '(split_0 (split ?axis (concat ?axis ?n ?x ?y)))', '?x'),
  rule('split-concat-1', '(split_1 (split ?axis (concat ?axis ?n ?x ?y)))', '?y'),
];

// =============================================================================
// RULE SETS
// =============================================================================

export type RuleCategory = 'elementwise' | 'linear' | 'fusion' | 'concat';

/**
 * All axioms combined
 */
export const tensorAxioms: Rule<TensorData>[] = [
  ...elementwiseRules,
  ...linearRules,
  ...fusionRules,
  ...concatRules,
];

/**
 * Get axioms by category
 */
export function getAxioms(categories: RuleCategory[]): Rule<TensorData>[] {
  const rules: Rule<TensorData>[] = [];
  if (categories.includes('elementwise')) rules.push(...elementwiseRules);
  if (categories.includes('linear')) rules.push(...linearRules);
  if (categories.includes('fusion')) rules.push(...fusionRules);
  if (categories.includes('concat')) rules.push(...concatRules);
  return rules;
}
