/**
 * Rule verification tests
 */

import { describe, it, expect } from 'vitest';
import { rule, biRule } from '../../src/egraph/Rules.js';
import { verify } from '../../src/egraph/Verifier.js';
import type { TensorData } from '../../src/tensor/Metadata.js';
import { tensorAxioms } from '../../src/tensor/Axioms.js';
import { RuleError } from '../../src/Errors.js';
import { candidate } from '../helpers.js';

const comm = rule<TensorData>('ewadd-comm', '(ewadd ?x ?y)', '(ewadd ?y ?x)');
const assoc = biRule<TensorData>('ewadd-assoc', '(ewadd ?x (ewadd ?y ?z))', '(ewadd (ewadd ?x ?y) ?z)');

describe('Verifier', () => {
  it('should verify commutativity in the first round', () => {
    const report = verify([comm], [candidate('swap', '(ewadd ?x ?y)', '(ewadd ?y ?x)')]);

    expect(report.verdicts).toEqual([{ name: 'swap', verdict: 'verified', round: 1 }]);
    expect(report.stopReason).toBe('goal-reached');
    expect(report.rounds).toBe(1);
    expect(report.inconclusive).toBe(false);
  });

  it('should verify a reordering that needs associativity and commutativity', () => {
    const report = verify(
      [comm, ...assoc],
      [candidate('reorder', '(ewadd (ewadd ?x ?y) ?z)', '(ewadd (ewadd ?z ?y) ?x)')]
    );

    const [verdict] = report.verdicts;
    expect(verdict.verdict).toBe('verified');
    expect(verdict.round).toBeLessThanOrEqual(3);
    expect(report.stopReason).toBe('goal-reached');
  });

  it('should not verify a rule the axioms do not imply', () => {
    const report = verify(
      [comm, ...assoc],
      [candidate('add-is-mul', '(ewadd ?x ?y)', '(ewmul ?x ?y)')],
      { maxIterations: 100 }
    );

    expect(report.verdicts).toEqual([{ name: 'add-is-mul', verdict: 'unverified' }]);
    expect(report.stopReason).toBe('saturated');
    expect(report.inconclusive).toBe(false);
  });

  it('should give the same verdicts together as alone', () => {
    const axioms = [comm, ...assoc];
    const r1 = candidate('reorder', '(ewadd (ewadd ?x ?y) ?z)', '(ewadd ?y (ewadd ?z ?x))');
    const r2 = candidate('add-is-mul', '(ewadd ?x ?y)', '(ewmul ?x ?y)');

    const together = verify(axioms, [r1, r2], { maxIterations: 100 });
    const alone1 = verify(axioms, [r1], { maxIterations: 100 });
    const alone2 = verify(axioms, [r2], { maxIterations: 100 });

    expect(together.verdicts.map(v => v.verdict)).toEqual(['verified', 'unverified']);
    expect(alone1.verdicts[0].verdict).toBe(together.verdicts[0].verdict);
    expect(alone2.verdicts[0].verdict).toBe(together.verdicts[1].verdict);
  });

  it('should mark unverified rules inconclusive when the budget runs out', () => {
    const report = verify(
      [comm, ...assoc],
      [candidate('add-is-mul', '(ewadd ?x ?y)', '(ewmul ?x ?y)')],
      { maxIterations: 1 }
    );

    expect(report.verdicts[0].verdict).toBe('unverified');
    expect(report.stopReason).toBe('budget-exhausted');
    expect(report.exhausted).toBe('iterations');
    expect(report.inconclusive).toBe(true);
    expect(report.rounds).toBe(1);
  });

  it('should never rewrite with the candidates themselves', () => {
    const report = verify([], [candidate('swap', '(ewadd ?x ?y)', '(ewadd ?y ?x)')]);

    expect(report.verdicts[0].verdict).toBe('unverified');
    expect(report.stopReason).toBe('saturated');
    expect(report.rounds).toBe(1);
  });

  it('should verify activation fusion with the built-in axioms', () => {
    const report = verify(tensorAxioms, [
      candidate('fuse', '(relu (matmul 0 ?a ?b))', '(matmul 2 ?a ?b)'),
      candidate('transpose-twice', '(transpose (transpose (ewadd ?a ?b)))', '(ewadd ?b ?a)')
    ]);

    expect(report.verdicts.map(v => v.verdict)).toEqual(['verified', 'verified']);
  });

  it('should reject duplicate candidate names', () => {
    const c = candidate('same', '(relu ?x)', '(relu ?x)');
    expect(() => verify([comm], [c, c])).toThrow(RuleError);
  });
});
