/**
 * E-class analysis for tensor graphs, backed by a cost/metadata oracle
 */

import type { Analysis, MergeResult } from '../egraph/EGraph.js';
import type { NodeHead } from '../egraph/ENode.js';
import { CostOracle, AnalyticCostModel } from './CostModel.js';
import { TensorData, mergeData, dataEquals } from './Metadata.js';

export class TensorAnalysis implements Analysis<TensorData> {
  constructor(readonly oracle: CostOracle = new AnalyticCostModel()) {}

  make(head: NodeHead, childData: TensorData[]): TensorData {
    return this.oracle.evaluate(head, childData).meta;
  }

  merge(a: TensorData, b: TensorData): MergeResult<TensorData> {
    return mergeData(a, b);
  }

  equals(a: TensorData, b: TensorData): boolean {
    return dataEquals(a, b);
  }

  /**
   * Local cost of a node given its operands' metadata
   */
  cost(head: NodeHead, childData: TensorData[]): number {
    return this.oracle.evaluate(head, childData).cost;
  }
}
