/**
 * E-Node: operator applications in an e-graph
 *
 * E-nodes are hash-consed (deduplicated) and reference e-classes by ID,
 * so two equal subgraphs are interchangeable as operands.
 */

export type EClassId = number;

/**
 * Operator vocabulary with fixed arities.
 * Scalar parameters (activation, padding, strides, axes) are ordinary children.
 */
export const OP_ARITY = {
  input: 1,      // name@d1_d2...
  weight: 1,     // name@d1_d2...
  ewadd: 2,
  ewmul: 2,
  smul: 2,       // tensor, scalar
  transpose: 1,
  matmul: 3,     // activation, a, b
  conv2d: 6,     // stride_h, stride_w, padding, activation, input, weight
  enlarge: 2,    // kernel to enlarge, reference kernel
  relu: 1,
  tanh: 1,
  sigmoid: 1,
  poolavg: 7,    // input, kernel_h, kernel_w, stride_h, stride_w, padding, activation
  poolmax: 7,
  concat: 4,     // axis, ndim, a, b
  split: 2,      // axis, input
  split_0: 1,
  split_1: 1,
  merge: 2,      // grouped conv weight, count
} as const;

export type Op = keyof typeof OP_ARITY;

export function isOp(name: string): name is Op {
  return Object.prototype.hasOwnProperty.call(OP_ARITY, name);
}

/**
 * E-node variants
 */
export type ENode =
  | { tag: 'num'; value: number }
  | { tag: 'var'; name: string }
  | { tag: 'sym'; name: string }   // Opaque free variable
  | { tag: Op; children: EClassId[] };

/**
 * An e-node without its children: what the analysis and cost oracle see
 */
export type NodeHead =
  | { tag: 'num'; value: number }
  | { tag: 'var'; name: string }
  | { tag: 'sym'; name: string }
  | { tag: Op };

/**
 * A tree of operator applications
 */
export type Term =
  | { tag: 'num'; value: number }
  | { tag: 'var'; name: string }
  | { tag: 'sym'; name: string }
  | { tag: Op; args: Term[] };

export function isLeaf<T extends ENode | Term | NodeHead>(
  node: T
): node is Extract<T, { tag: 'num' | 'var' | 'sym' }> {
  return node.tag === 'num' || node.tag === 'var' || node.tag === 'sym';
}

/**
 * Create a canonical string key for an e-node (for hash-consing)
 */
export function enodeKey(node: ENode): string {
  switch (node.tag) {
    case 'num':
      return `num:${node.value}`;
    case 'var':
      return `var:${node.name}`;
    case 'sym':
      return `sym:${node.name}`;
    default:
      return `${node.tag}(${node.children.join(',')})`;
  }
}

/**
 * Get all e-class IDs that this node references
 */
export function enodeChildren(node: ENode): EClassId[] {
  return isLeaf(node) ? [] : node.children;
}

/**
 * Create a new e-node with updated children (after canonicalization)
 */
export function enodeWithChildren(node: ENode, newChildren: EClassId[]): ENode {
  return isLeaf(node) ? node : { tag: node.tag, children: newChildren };
}

export function enodeToString(node: ENode): string {
  switch (node.tag) {
    case 'num': return `${node.value}`;
    case 'var': return node.name;
    case 'sym': return `?${node.name}`;
    default: return `(${node.tag} ${node.children.map(c => `e${c}`).join(' ')})`;
  }
}

export function termToString(term: Term): string {
  switch (term.tag) {
    case 'num': return `${term.value}`;
    case 'var': return term.name;
    case 'sym': return `?${term.name}`;
    default: return `(${term.tag} ${term.args.map(termToString).join(' ')})`;
  }
}
