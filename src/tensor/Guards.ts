/**
 * Guard predicates over the tensor metadata of bound pattern variables.
 * Unknown (opaque) metadata never satisfies a guard.
 */

import type { Guard } from '../egraph/Rules.js';
import { TensorData, Shape, shapesEqual } from './Metadata.js';

function shapeOf(data: TensorData): Shape | undefined {
  return data.kind === 'tensor' ? data.shape : undefined;
}

export function isTensor(variable: string): Guard<TensorData> {
  return ctx => ctx.data(variable).kind === 'tensor';
}

export function sameShape(a: string, b: string): Guard<TensorData> {
  return ctx => {
    const shapeA = shapeOf(ctx.data(a));
    const shapeB = shapeOf(ctx.data(b));
    return shapeA !== undefined && shapeB !== undefined && shapesEqual(shapeA, shapeB);
  };
}

export function hasRank(variable: string, rank: number): Guard<TensorData> {
  return ctx => shapeOf(ctx.data(variable))?.length === rank;
}

export function allOf(...guards: Guard<TensorData>[]): Guard<TensorData> {
  return ctx => guards.every(guard => guard(ctx));
}

/**
 * The convolution of `input` by `weight` uses a single group
 */
export function ungroupedConv(input: string, weight: string): Guard<TensorData> {
  return ctx => {
    const x = shapeOf(ctx.data(input));
    const w = shapeOf(ctx.data(weight));
    return x !== undefined && w !== undefined && x.length === 4 && w.length === 4 && x[1] === w[1];
  };
}
