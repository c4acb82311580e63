/**
 * Test helper utilities shared by the engine and tensor tests
 */

import { EGraph } from '../src/egraph/EGraph.js';
import { parsePattern } from '../src/egraph/Pattern.js';
import type { Candidate } from '../src/egraph/Verifier.js';
import type { GuardContext } from '../src/egraph/Rules.js';
import { TensorAnalysis } from '../src/tensor/Analysis.js';
import type { TensorData } from '../src/tensor/Metadata.js';
import type { CliIO } from '../src/Commands.js';

export function tensorGraph(): EGraph<TensorData> {
  return new EGraph(new TensorAnalysis());
}

export function tensor(...shape: number[]): TensorData {
  return { kind: 'tensor', shape };
}

export function scalar(value: number): TensorData {
  return { kind: 'scalar', value };
}

export function candidate(name: string, lhs: string, rhs: string): Candidate {
  return { name, lhs: parsePattern(lhs), rhs: parsePattern(rhs) };
}

/**
 * Guard context over fixed data, for calling guards directly
 */
export function guardContext(data: Record<string, TensorData>): GuardContext<TensorData> {
  return {
    data: variable => data[variable] ?? { kind: 'opaque' },
    classId: () => 0
  };
}

/**
 * In-memory files and captured output for command tests
 */
export function memoryIO(files: Record<string, string>): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    readFile: path => {
      const content = files[path];
      if (content === undefined) {
        throw new Error(`ENOENT: no such file '${path}'`);
      }
      return content;
    },
    log: line => { out.push(line); },
    error: line => { err.push(line); }
  };
}
