/**
 * Rules and saturation tests
 */

import { describe, it, expect } from 'vitest';
import { EGraph, noAnalysis } from '../../src/egraph/EGraph.js';
import { rule, biRule } from '../../src/egraph/Rules.js';
import { saturate, collectMatches, applyRuleOnce } from '../../src/egraph/Rewriter.js';
import { parseTerm } from '../../src/egraph/Convert.js';
import type { TensorData } from '../../src/tensor/Metadata.js';
import { sameShape } from '../../src/tensor/Guards.js';
import { RuleError, MetadataConflictError } from '../../src/Errors.js';
import { tensorGraph } from '../helpers.js';

describe('Rules', () => {
  it('should create named rules from pattern strings', () => {
    const r = rule('ewadd-comm', '(ewadd ?x ?y)', '(ewadd ?y ?x)');

    expect(r.name).toBe('ewadd-comm');
    expect(r.lhs.tag).toBe('papp');
    expect(r.guard).toBeUndefined();
  });

  it('should create both directions of a bidirectional rule', () => {
    const [l, r] = biRule('assoc', '(ewadd ?x (ewadd ?y ?z))', '(ewadd (ewadd ?x ?y) ?z)');

    expect(l.name).toBe('assoc-l');
    expect(r.name).toBe('assoc-r');
    expect(r.lhs).toEqual(l.rhs);
    expect(r.rhs).toEqual(l.lhs);
  });

  it('should reject right-hand variables the left side never binds', () => {
    expect(() => rule('bad', '(relu ?x)', '(ewadd ?x ?z)')).toThrow(RuleError);
    expect(() => rule('bad', '(relu ?x)', '(ewadd ?x ?z)')).toThrow(
      "Invalid rule 'bad': right-hand side uses ?z, which the left-hand side never binds"
    );
  });

  it('should reject a bare variable on the left', () => {
    expect(() => rule('everything', '?x', '(relu ?x)')).toThrow(
      "Invalid rule 'everything': left-hand side must not be a bare variable"
    );
  });
});

describe('Saturation', () => {
  const smulOne = rule<TensorData>('smul-one', '(smul ?x 1)', '?x');

  it('should collapse identities and stop when saturated', () => {
    const eg = tensorGraph();
    const root = eg.insert(parseTerm('(smul (smul (input a@4_4) 1) 1)'));
    const input = eg.insert(parseTerm('(input a@4_4)'));

    const stats = saturate(eg, [smulOne]);

    expect(eg.find(root)).toBe(eg.find(input));
    expect(stats.state).toBe('saturated');
    expect(stats.saturated).toBe(true);
    expect(stats.iterations).toBe(2);
    expect(stats.merges).toBe(2);
    expect(stats.totalMatches).toBe(3);
    expect(stats.applications).toBe(3);
    expect(stats.classCount).toBe(3);
    expect(stats.exhausted).toBeUndefined();
  });

  it('should match each round against the graph as it was before the round', () => {
    const chain = [
      rule('relu-tanh', '(relu ?x)', '(tanh ?x)'),
      rule('tanh-sigmoid', '(tanh ?x)', '(sigmoid ?x)')
    ];
    const run = (maxIterations: number) => {
      const eg = new EGraph(noAnalysis);
      const root = eg.insert(parseTerm('(relu a)'));
      const stats = saturate(eg, chain, { maxIterations });
      return { eg, root, stats };
    };

    const one = run(1);
    expect(one.eg.lookupTerm(parseTerm('(tanh a)'))).toBe(one.eg.find(one.root));
    expect(one.eg.lookupTerm(parseTerm('(sigmoid a)'))).toBeUndefined();
    expect(one.stats.totalMatches).toBe(1);
    expect(one.stats.applications).toBe(1);
    expect(one.stats.state).toBe('budget-exhausted');

    const two = run(2);
    expect(two.eg.lookupTerm(parseTerm('(sigmoid a)'))).toBe(two.eg.find(two.root));
    expect(two.stats.totalMatches).toBe(3);
    expect(two.stats.merges).toBe(2);

    const full = run(30);
    expect(full.stats.state).toBe('saturated');
    expect(full.stats.iterations).toBe(3);
    expect(full.stats.totalMatches).toBe(5);
  });

  it('should stop as soon as every goal holds', () => {
    const eg = tensorGraph();
    const root = eg.insert(parseTerm('(smul (smul (input a@4_4) 1) 1)'));
    const input = eg.insert(parseTerm('(input a@4_4)'));

    const stats = saturate(eg, [smulOne], { goals: [{ name: 'id', lhs: root, rhs: input }] });

    expect(stats.state).toBe('goal-reached');
    expect(stats.iterations).toBe(1);
    expect(stats.goalRounds.get('id')).toBe(1);
  });

  it('should report goals that hold before any rewriting as round 0', () => {
    const eg = tensorGraph();
    const a = eg.insert(parseTerm('(input a@4_4)'));

    const stats = saturate(eg, [smulOne], { goals: [{ name: 'refl', lhs: a, rhs: a }] });

    expect(stats.state).toBe('goal-reached');
    expect(stats.iterations).toBe(0);
    expect(stats.goalRounds.get('refl')).toBe(0);
  });

  it('should report an exhausted round budget', () => {
    const eg = new EGraph(noAnalysis);
    eg.insert(parseTerm('(ewadd a b)'));

    const stats = saturate(eg, [rule('comm', '(ewadd ?x ?y)', '(ewadd ?y ?x)')], { maxIterations: 0 });

    expect(stats.state).toBe('budget-exhausted');
    expect(stats.exhausted).toBe('iterations');
    expect(stats.iterations).toBe(0);
    expect(stats.saturated).toBe(false);
  });

  it('should report an exhausted node budget', () => {
    const eg = new EGraph(noAnalysis);
    eg.insert(parseTerm('(ewadd a b)'));

    const stats = saturate(eg, [rule('comm', '(ewadd ?x ?y)', '(ewadd ?y ?x)')], { nodeLimit: 2 });

    expect(stats.state).toBe('budget-exhausted');
    expect(stats.exhausted).toBe('nodes');
  });

  it('should report an exhausted time budget', () => {
    const eg = new EGraph(noAnalysis);
    eg.insert(parseTerm('(ewadd a b)'));

    const stats = saturate(eg, [rule('comm', '(ewadd ?x ?y)', '(ewadd ?y ?x)')], { timeLimitMs: 0 });

    expect(stats.state).toBe('budget-exhausted');
    expect(stats.exhausted).toBe('time');
  });

  it('should skip matches whose right side is ill-typed', () => {
    const eg = tensorGraph();
    const root = eg.insert(parseTerm('(ewadd (input a@2_3) (input b@2_3))'));
    const toMatmul = rule<TensorData>('to-matmul', '(ewadd ?x ?y)', '(matmul 0 ?x ?y)');

    const stats = saturate(eg, [toMatmul]);

    expect(stats.state).toBe('saturated');
    expect(stats.iterations).toBe(1);
    expect(stats.skipped).toBe(1);
    expect(stats.applications).toBe(0);
    expect(eg.getNodes(root).length).toBe(1);
  });

  it('should skip matches whose guard fails', () => {
    const eg = tensorGraph();
    eg.insert(parseTerm('(concat 1 2 (input a@2_3) (input b@2_5))'));
    const swap = rule('swap', '(concat ?axis ?n ?x ?y)', '(concat ?axis ?n ?y ?x)', sameShape('x', 'y'));

    const stats = saturate(eg, [swap]);

    expect(stats.skipped).toBe(1);
    expect(stats.merges).toBe(0);
  });

  it('should raise metadata conflicts from unsound rules', () => {
    const eg = tensorGraph();
    eg.insert(parseTerm('(transpose (input a@2_3))'));
    const dropTranspose = rule<TensorData>('drop-transpose', '(transpose ?x)', '?x');

    expect(() => saturate(eg, [dropTranspose])).toThrow(MetadataConflictError);
  });

  it('should apply a single rule everywhere it matches', () => {
    const eg = new EGraph(noAnalysis);
    const ab = eg.insert(parseTerm('(ewadd a b)'));
    const cd = eg.insert(parseTerm('(ewadd c d)'));
    const comm = rule('comm', '(ewadd ?x ?y)', '(ewadd ?y ?x)');

    expect(collectMatches(eg, [comm]).length).toBe(2);
    expect(applyRuleOnce(eg, comm)).toBe(2);
    expect(eg.find(ab)).toBe(eg.lookupTerm(parseTerm('(ewadd b a)')));
    expect(eg.find(cd)).toBe(eg.lookupTerm(parseTerm('(ewadd d c)')));
  });
});
