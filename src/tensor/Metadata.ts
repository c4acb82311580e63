/**
 * Tensor metadata carried by every e-class
 */

import type { MergeResult } from '../egraph/EGraph.js';

// Operator parameters
export const PAD_SAME = 0;
export const PAD_VALID = 1;

export const ACT_NONE = 0;
export const ACT_SIGMOID = 1;
export const ACT_RELU = 2;
export const ACT_TANH = 3;

export type Shape = readonly number[];

/**
 * Where the most recent concat joined its operands, so split can undo it
 */
export interface SplitPoint {
  axis: number;
  at: number;
}

export type TensorData =
  | { kind: 'name'; name: string; dims?: Shape }
  | { kind: 'scalar'; value: number }
  | { kind: 'tensor'; shape: Shape; split?: SplitPoint }
  | { kind: 'tuple'; first: Shape; second: Shape }
  | { kind: 'opaque' };

export const OPAQUE: TensorData = { kind: 'opaque' };

/**
 * Parse `name@d1_d2_...` into its dimensions
 */
export function parseName(name: string): TensorData {
  const at = name.lastIndexOf('@');
  if (at < 0) {
    return { kind: 'name', name };
  }
  const dims = name.slice(at + 1).split('_').map(Number);
  if (dims.length === 0 || dims.some(d => !Number.isInteger(d) || d <= 0)) {
    return { kind: 'name', name };
  }
  return { kind: 'name', name, dims };
}

export function shapesEqual(a: Shape, b: Shape): boolean {
  return a.length === b.length && a.every((d, i) => d === b[i]);
}

export function numel(shape: Shape): number {
  return shape.reduce((n, d) => n * d, 1);
}

export function formatShape(shape: Shape): string {
  return `[${shape.join(', ')}]`;
}

export function dataToString(data: TensorData): string {
  switch (data.kind) {
    case 'name': return `name ${data.name}`;
    case 'scalar': return `scalar ${data.value}`;
    case 'tensor': return `tensor ${formatShape(data.shape)}`;
    case 'tuple': return `tuple ${formatShape(data.first)} ${formatShape(data.second)}`;
    case 'opaque': return 'opaque';
  }
}

export function dataEquals(a: TensorData, b: TensorData): boolean {
  switch (a.kind) {
    case 'name':
      return b.kind === 'name' && a.name === b.name;
    case 'scalar':
      return b.kind === 'scalar' && a.value === b.value;
    case 'tensor':
      return (
        b.kind === 'tensor' &&
        shapesEqual(a.shape, b.shape) &&
        a.split?.axis === b.split?.axis &&
        a.split?.at === b.split?.at
      );
    case 'tuple':
      return b.kind === 'tuple' && shapesEqual(a.first, b.first) && shapesEqual(a.second, b.second);
    case 'opaque':
      return b.kind === 'opaque';
  }
}

/**
 * Combine the data of two classes being unified.
 * Opaque yields to known data; known data must agree.
 */
export function mergeData(a: TensorData, b: TensorData): MergeResult<TensorData> {
  if (a.kind === 'opaque') return { ok: true, data: b };
  if (b.kind === 'opaque') return { ok: true, data: a };

  const conflict = (): MergeResult<TensorData> => ({
    ok: false,
    reason: `${dataToString(a)} vs ${dataToString(b)}`
  });

  switch (a.kind) {
    case 'name':
    case 'scalar':
    case 'tuple':
      return dataEquals(a, b) ? { ok: true, data: a } : conflict();

    case 'tensor': {
      if (b.kind !== 'tensor' || !shapesEqual(a.shape, b.shape)) {
        return conflict();
      }
      const split = a.split ?? b.split;
      return { ok: true, data: split ? { kind: 'tensor', shape: a.shape, split } : a };
    }
  }
}
