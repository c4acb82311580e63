/**
 * Guard predicates and the built-in axiom set
 */

import { describe, it, expect } from 'vitest';
import { patternVars } from '../../src/egraph/Pattern.js';
import { parseTerm } from '../../src/egraph/Convert.js';
import { saturate } from '../../src/egraph/Rewriter.js';
import { isTensor, sameShape, hasRank, allOf, ungroupedConv } from '../../src/tensor/Guards.js';
import { tensorAxioms, getAxioms, elementwiseRules, fusionRules, concatRules } from '../../src/tensor/Axioms.js';
import { OPAQUE } from '../../src/tensor/Metadata.js';
import { tensorGraph, tensor, scalar, guardContext } from '../helpers.js';

describe('Guards', () => {
  it('should compare shapes of bound classes', () => {
    expect(sameShape('x', 'y')(guardContext({ x: tensor(2, 3), y: tensor(2, 3) }))).toBe(true);
    expect(sameShape('x', 'y')(guardContext({ x: tensor(2, 3), y: tensor(3, 2) }))).toBe(false);
  });

  it('should check rank and kind', () => {
    expect(hasRank('x', 2)(guardContext({ x: tensor(2, 3) }))).toBe(true);
    expect(hasRank('x', 4)(guardContext({ x: tensor(2, 3) }))).toBe(false);
    expect(isTensor('x')(guardContext({ x: scalar(1) }))).toBe(false);
  });

  it('should never hold for unknown data', () => {
    const ctx = guardContext({ x: OPAQUE, y: OPAQUE });
    expect(sameShape('x', 'y')(ctx)).toBe(false);
    expect(isTensor('x')(ctx)).toBe(false);
    expect(hasRank('x', 2)(ctx)).toBe(false);
  });

  it('should combine guards', () => {
    const guard = allOf(isTensor('x'), hasRank('x', 2));
    expect(guard(guardContext({ x: tensor(2, 3) }))).toBe(true);
    expect(guard(guardContext({ x: tensor(2) }))).toBe(false);
  });

  it('should recognize ungrouped convolutions', () => {
    expect(ungroupedConv('x', 'w')(guardContext({ x: tensor(1, 4, 8, 8), w: tensor(8, 4, 3, 3) }))).toBe(true);
    expect(ungroupedConv('x', 'w')(guardContext({ x: tensor(1, 4, 8, 8), w: tensor(8, 2, 3, 3) }))).toBe(false);
  });
});

describe('Built-in Axioms', () => {
  it('should have unique names', () => {
    const names = tensorAxioms.map(r => r.name);
    expect(new Set(names).size).toBe(names.length);
  });

  it('should only use variables bound on the left', () => {
    for (const axiom of tensorAxioms) {
      const bound = new Set(patternVars(axiom.lhs));
      expect(patternVars(axiom.rhs).filter(v => !bound.has(v))).toEqual([]);
    }
  });

  it('should select axioms by category', () => {
    expect(getAxioms(['elementwise'])).toEqual(elementwiseRules);
    expect(getAxioms(['fusion', 'concat']).length).toBe(fusionRules.length + concatRules.length);
    expect(getAxioms(['elementwise', 'linear', 'fusion', 'concat']).length).toBe(tensorAxioms.length);
  });

  it('should undo a split of a concat', () => {
    const eg = tensorGraph();
    const first = eg.insert(parseTerm('(split_0 (split 1 (concat 1 2 (input a@2_3) (input b@2_5))))'));
    const a = eg.insert(parseTerm('(input a@2_3)'));

    saturate(eg, concatRules, { maxIterations: 3 });

    expect(eg.find(first)).toBe(eg.find(a));
  });

  it('should merge two matmuls sharing an operand', () => {
    const eg = tensorGraph();
    const parallel = eg.insert(parseTerm('(concat 1 2 (matmul 0 (input x@2_3) (weight y@3_4)) (matmul 0 (input x@2_3) (weight z@3_5)))'));
    const merged = eg.insert(parseTerm('(matmul 0 (input x@2_3) (concat 1 2 (weight y@3_4) (weight z@3_5)))'));

    saturate(eg, concatRules, { maxIterations: 1 });

    expect(eg.find(parallel)).toBe(eg.find(merged));
    expect(eg.getData(parallel)).toEqual({ kind: 'tensor', shape: [2, 9], split: { axis: 1, at: 4 } });
  });
});
