/**
 * Cost/metadata oracle
 *
 * Given an operator and its operands' metadata, the oracle returns the output
 * metadata and a scalar execution cost. It must be deterministic and
 * synchronous, and signals ill-typed operands with ShapeError.
 *
 * AnalyticCostModel is an in-process oracle: shapes follow the usual
 * tensor-compiler semantics and cost counts elements touched or
 * multiply-accumulates, plus a fixed per-kernel launch cost.
 */

import { NodeHead, Op, isLeaf } from '../egraph/ENode.js';
import { ShapeError } from '../Errors.js';
import {
  TensorData,
  Shape,
  OPAQUE,
  PAD_SAME,
  PAD_VALID,
  ACT_NONE,
  ACT_TANH,
  parseName,
  shapesEqual,
  numel,
  formatShape,
  dataToString
} from './Metadata.js';

export interface Evaluation {
  cost: number;
  meta: TensorData;
}

export interface CostOracle {
  evaluate(head: NodeHead, operands: readonly TensorData[]): Evaluation;
}

export interface AnalyticCostOptions {
  /** Cost charged once per kernel (default: 1) */
  launchCost?: number;
}

export class AnalyticCostModel implements CostOracle {
  private readonly launchCost: number;

  constructor(options: AnalyticCostOptions = {}) {
    this.launchCost = options.launchCost ?? 1;
  }

  evaluate(head: NodeHead, operands: readonly TensorData[]): Evaluation {
    if (isLeaf(head)) {
      return evaluateLeaf(head);
    }

    // Anything computed from an unknown operand is unknown
    if (operands.some(d => d.kind === 'opaque')) {
      return { cost: 0, meta: OPAQUE };
    }

    return this.evaluateOp(head.tag, operands);
  }

  private evaluateOp(op: Op, x: readonly TensorData[]): Evaluation {
    const kernel = (shape: Shape, work: number = numel(shape)): Evaluation => ({
      cost: this.launchCost + work,
      meta: { kind: 'tensor', shape }
    });

    switch (op) {
      case 'input':
      case 'weight': {
        const name = x[0];
        if (name.kind !== 'name' || !name.dims) {
          throw new ShapeError(op, `expected a name of the form name@d1_d2, got ${dataToString(name)}`);
        }
        return { cost: 0, meta: { kind: 'tensor', shape: name.dims } };
      }

      case 'ewadd':
      case 'ewmul': {
        const a = tensorShape(op, x[0]);
        const b = tensorShape(op, x[1]);
        if (!shapesEqual(a, b)) {
          throw new ShapeError(op, `operand shapes differ: ${formatShape(a)} vs ${formatShape(b)}`);
        }
        return kernel(a);
      }

      case 'smul': {
        const a = tensorShape(op, x[0]);
        scalarValue(op, x[1]);
        return kernel(a);
      }

      case 'transpose': {
        const a = tensorShape(op, x[0]);
        if (a.length < 2) {
          throw new ShapeError(op, `needs rank >= 2, got ${formatShape(a)}`);
        }
        return kernel([...a.slice(0, -2), a[a.length - 1], a[a.length - 2]]);
      }

      case 'relu':
      case 'tanh':
      case 'sigmoid':
        return kernel(tensorShape(op, x[0]));

      case 'matmul': {
        activation(op, x[0]);
        const a = tensorShape(op, x[1]);
        const b = tensorShape(op, x[2]);
        if (a.length < 2 || a.length !== b.length) {
          throw new ShapeError(op, `operand ranks must match and be >= 2: ${formatShape(a)} vs ${formatShape(b)}`);
        }
        const batch = a.slice(0, -2);
        if (!shapesEqual(batch, b.slice(0, -2))) {
          throw new ShapeError(op, `batch dimensions differ: ${formatShape(a)} vs ${formatShape(b)}`);
        }
        const [m, k] = a.slice(-2);
        const [k2, n] = b.slice(-2);
        if (k !== k2) {
          throw new ShapeError(op, `inner dimensions differ: ${formatShape(a)} vs ${formatShape(b)}`);
        }
        return kernel([...batch, m, n], numel(batch) * m * n * k);
      }

      case 'conv2d': {
        const strideH = positive(op, x[0], 'stride_h');
        const strideW = positive(op, x[1], 'stride_w');
        const pad = padding(op, x[2]);
        activation(op, x[3]);
        const [n, c, h, w] = rank4(op, x[4], 'input');
        const [o, cg, kh, kw] = rank4(op, x[5], 'weight');
        if (c % cg !== 0 || o % (c / cg) !== 0) {
          throw new ShapeError(op, `${c} input channels cannot be grouped by weight with ${cg} channels and ${o} outputs`);
        }
        const oh = outputSize(op, h, kh, strideH, pad);
        const ow = outputSize(op, w, kw, strideW, pad);
        return kernel([n, o, oh, ow], n * o * oh * ow * cg * kh * kw);
      }

      case 'enlarge': {
        const [o, c, kh, kw] = rank4(op, x[0], 'kernel');
        const [, , rh, rw] = rank4(op, x[1], 'reference');
        if (kh > rh || kw > rw) {
          throw new ShapeError(op, `kernel ${kh}x${kw} is larger than reference ${rh}x${rw}`);
        }
        return kernel([o, c, rh, rw]);
      }

      case 'poolavg':
      case 'poolmax': {
        const [n, c, h, w] = rank4(op, x[0], 'input');
        const kh = positive(op, x[1], 'kernel_h');
        const kw = positive(op, x[2], 'kernel_w');
        const strideH = positive(op, x[3], 'stride_h');
        const strideW = positive(op, x[4], 'stride_w');
        const pad = padding(op, x[5]);
        activation(op, x[6]);
        const shape = [n, c, outputSize(op, h, kh, strideH, pad), outputSize(op, w, kw, strideW, pad)];
        return kernel(shape, numel(shape) * kh * kw);
      }

      case 'concat': {
        const axis = scalarValue(op, x[0]);
        const ndim = scalarValue(op, x[1]);
        const a = tensorShape(op, x[2]);
        const b = tensorShape(op, x[3]);
        if (a.length !== ndim || b.length !== ndim) {
          throw new ShapeError(op, `operands must have rank ${ndim}: ${formatShape(a)} vs ${formatShape(b)}`);
        }
        if (!Number.isInteger(axis) || axis < 0 || axis >= ndim) {
          throw new ShapeError(op, `axis ${axis} out of range for rank ${ndim}`);
        }
        if (a.some((d, i) => i !== axis && d !== b[i])) {
          throw new ShapeError(op, `shapes differ off axis ${axis}: ${formatShape(a)} vs ${formatShape(b)}`);
        }
        const shape = a.map((d, i) => (i === axis ? d + b[i] : d));
        return {
          cost: this.launchCost + numel(shape),
          meta: { kind: 'tensor', shape, split: { axis, at: a[axis] } }
        };
      }

      case 'split': {
        const axis = scalarValue(op, x[0]);
        const t = x[1];
        if (t.kind !== 'tensor') {
          throw new ShapeError(op, `input must be a tensor, got ${dataToString(t)}`);
        }
        if (!t.split || t.split.axis !== axis) {
          throw new ShapeError(op, `no concat boundary along axis ${axis}`);
        }
        const { at } = t.split;
        const first = t.shape.map((d, i) => (i === axis ? at : d));
        const second = t.shape.map((d, i) => (i === axis ? d - at : d));
        return { cost: this.launchCost, meta: { kind: 'tuple', first, second } };
      }

      case 'split_0':
      case 'split_1': {
        const t = x[0];
        if (t.kind !== 'tuple') {
          throw new ShapeError(op, `input must come from split, got ${dataToString(t)}`);
        }
        return { cost: 0, meta: { kind: 'tensor', shape: op === 'split_0' ? t.first : t.second } };
      }

      case 'merge': {
        const [o, c, kh, kw] = rank4(op, x[0], 'weight');
        const count = positive(op, x[1], 'count');
        return kernel([o, c * count, kh, kw]);
      }
    }
  }
}

function evaluateLeaf(head: Extract<NodeHead, { tag: 'num' | 'var' | 'sym' }>): Evaluation {
  switch (head.tag) {
    case 'num': return { cost: 0, meta: { kind: 'scalar', value: head.value } };
    case 'var': return { cost: 0, meta: parseName(head.name) };
    case 'sym': return { cost: 0, meta: OPAQUE };
  }
}

function tensorShape(op: Op, data: TensorData, role: string = 'operand'): Shape {
  if (data.kind !== 'tensor') {
    throw new ShapeError(op, `${role} must be a tensor, got ${dataToString(data)}`);
  }
  return data.shape;
}

function rank4(op: Op, data: TensorData, role: string): [number, number, number, number] {
  const shape = tensorShape(op, data, role);
  if (shape.length !== 4) {
    throw new ShapeError(op, `${role} must have rank 4, got ${formatShape(shape)}`);
  }
  return [shape[0], shape[1], shape[2], shape[3]];
}

function scalarValue(op: Op, data: TensorData, role: string = 'parameter'): number {
  if (data.kind !== 'scalar') {
    throw new ShapeError(op, `${role} must be a scalar, got ${dataToString(data)}`);
  }
  return data.value;
}

function positive(op: Op, data: TensorData, role: string): number {
  const value = scalarValue(op, data, role);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ShapeError(op, `${role} must be a positive integer, got ${value}`);
  }
  return value;
}

function activation(op: Op, data: TensorData): number {
  const value = scalarValue(op, data, 'activation');
  if (!Number.isInteger(value) || value < ACT_NONE || value > ACT_TANH) {
    throw new ShapeError(op, `unknown activation ${value}`);
  }
  return value;
}

function padding(op: Op, data: TensorData): number {
  const value = scalarValue(op, data, 'padding');
  if (value !== PAD_SAME && value !== PAD_VALID) {
    throw new ShapeError(op, `unknown padding ${value}`);
  }
  return value;
}

function outputSize(op: Op, size: number, kernel: number, stride: number, pad: number): number {
  if (pad === PAD_SAME) {
    return Math.ceil(size / stride);
  }
  const out = Math.floor((size - kernel) / stride) + 1;
  if (out <= 0) {
    throw new ShapeError(op, `kernel ${kernel} does not fit input size ${size}`);
  }
  return out;
}
