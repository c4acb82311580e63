/**
 * Error formatting tests
 */

import { describe, it, expect } from 'vitest';
import {
  RuleParseError,
  RuleError,
  ShapeError,
  MetadataConflictError,
  CyclicExtractionError,
  formatError
} from '../src/Errors.js';

describe('Errors', () => {
  it('should expose structured fields', () => {
    const err = new RuleParseError('unknown operator', 3, 7, 'add');

    expect(err.name).toBe('RuleParseError');
    expect(err.line).toBe(3);
    expect(err.column).toBe(7);
    expect(err.message).toBe('Parse error at 3:7: unknown operator');
    expect(err).toBeInstanceOf(Error);
  });

  it('should format parse errors with the offending token', () => {
    expect(formatError(new RuleParseError('unknown operator', 3, 7, 'add'))).toBe(
      "Error: Parse error at 3:7: unknown operator\n  near 'add'"
    );
  });

  it('should format rule and shape errors', () => {
    expect(formatError(new RuleError('comm', 'duplicate rule name'))).toBe(
      "Error: Invalid rule 'comm': duplicate rule name"
    );
    expect(formatError(new ShapeError('relu', 'operand must be a tensor, got scalar 1'))).toBe(
      "Error: Shape error in 'relu': operand must be a tensor, got scalar 1"
    );
  });

  it('should add a hint to metadata conflicts', () => {
    const err = new MetadataConflictError(1, 3, '(input a@2_2)', '(input b@3_3)', 'tensor [2, 2] vs tensor [3, 3]');

    expect(formatError(err)).toBe(
      'Error: Metadata conflict merging e1 (input a@2_2) with e3 (input b@3_3): tensor [2, 2] vs tensor [3, 3]' +
      '\n\nThis usually means a rule is unsound or ill-typed for these operands.'
    );
  });

  it('should add a hint to extraction failures', () => {
    expect(formatError(new CyclicExtractionError(7))).toBe(
      'Error: Cannot extract e7: no e-node resolves without a cycle\n\nThe input graph must be acyclic.'
    );
  });

  it('should format non-errors and include stacks when verbose', () => {
    expect(formatError('plain')).toBe('Error: plain');
    expect(formatError(new Error('boom'), true)).toContain('\n\nStack trace:\n');
  });
});
