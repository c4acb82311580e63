/**
 * Error classes for rule input, metadata analysis and extraction
 */

import type { EClassId } from './egraph/ENode.js';

export class RuleParseError extends Error {
  constructor(
    message: string,
    public line: number,
    public column: number,
    public token?: string
  ) {
    super(`Parse error at ${line}:${column}: ${message}`);
    this.name = 'RuleParseError';
  }
}

/**
 * A rule that cannot be applied as written (unbound right-hand variable, wrong arity)
 */
export class RuleError extends Error {
  constructor(
    public ruleName: string,
    public reason: string
  ) {
    super(`Invalid rule '${ruleName}': ${reason}`);
    this.name = 'RuleError';
  }
}

/**
 * Raised by the cost/metadata oracle when operands are ill-typed
 */
export class ShapeError extends Error {
  constructor(
    public op: string,
    public reason: string
  ) {
    super(`Shape error in '${op}': ${reason}`);
    this.name = 'ShapeError';
  }
}

/**
 * Two e-classes were unified but their analysis data disagree
 */
export class MetadataConflictError extends Error {
  constructor(
    public classA: EClassId,
    public classB: EClassId,
    public termA: string,
    public termB: string,
    public reason: string
  ) {
    super(`Metadata conflict merging e${classA} ${termA} with e${classB} ${termB}: ${reason}`);
    this.name = 'MetadataConflictError';
  }
}

export class CyclicExtractionError extends Error {
  constructor(public classId: EClassId) {
    super(`Cannot extract e${classId}: no e-node resolves without a cycle`);
    this.name = 'CyclicExtractionError';
  }
}

/**
 * Format an error for terminal output
 */
export function formatError(error: unknown, verbose: boolean = false): string {
  if (!(error instanceof Error)) {
    return `Error: ${String(error)}`;
  }

  let output = `Error: ${error.message}`;

  if (error instanceof RuleParseError && error.token !== undefined) {
    output += `\n  near '${error.token}'`;
  } else if (error instanceof MetadataConflictError) {
    output += '\n\nThis usually means a rule is unsound or ill-typed for these operands.';
  } else if (error instanceof CyclicExtractionError) {
    output += '\n\nThe input graph must be acyclic.';
  }

  if (verbose && error.stack) {
    output += '\n\nStack trace:\n' + error.stack;
  }

  return output;
}
