/**
 * E-Graph: Equality Graph with an e-class analysis
 *
 * An e-graph efficiently represents equivalence classes of expressions.
 * It supports:
 * - Adding e-nodes and whole terms (returns e-class ID)
 * - Merging e-classes (union), combining their analysis data
 * - Finding canonical e-class (find)
 * - Rebuilding after a batch of merges (restores congruence and hash-consing)
 */

import {
  ENode,
  EClassId,
  NodeHead,
  Term,
  enodeKey,
  enodeChildren,
  enodeWithChildren,
  enodeToString,
  isLeaf
} from './ENode.js';
import { MetadataConflictError } from '../Errors.js';

export type MergeResult<D> =
  | { ok: true; data: D }
  | { ok: false; reason: string };

/**
 * Data attached to every e-class, computed from its e-nodes.
 * `merge` must be pure and never drop information; a conflict is reported, not resolved.
 */
export interface Analysis<D> {
  make(head: NodeHead, childData: D[]): D;
  merge(a: D, b: D): MergeResult<D>;
  equals(a: D, b: D): boolean;
}

/**
 * Analysis for graphs that carry no data
 */
export const noAnalysis: Analysis<null> = {
  make: () => null,
  merge: () => ({ ok: true, data: null }),
  equals: () => true
};

interface ClassNode {
  node: ENode;
  seq: number;  // Creation order, used for deterministic tie-breaks
}

/**
 * E-Class: An equivalence class of e-nodes
 */
export interface EClass<D> {
  id: EClassId;
  nodes: ClassNode[];
  parents: Array<[ENode, EClassId]>;  // E-nodes that reference this class, and their classes
  data: D;
}

export class EGraph<D> {
  private parent: EClassId[] = [];                        // Union-find arena
  private classes: Map<EClassId, EClass<D>> = new Map();  // Canonical classes only
  private hashcons: Map<string, EClassId> = new Map();    // E-node key -> e-class
  private pending: Array<[ENode, EClassId]> = [];         // Parents needing congruence recheck
  private analysisPending: Array<[ENode, EClassId]> = []; // Parents whose data may refine
  private nextSeq = 0;
  private unionCount = 0;

  constructor(readonly analysis: Analysis<D>) {}

  /**
   * Find the canonical e-class ID (with path compression)
   */
  find(id: EClassId): EClassId {
    let root = id;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }
    let current = id;
    while (this.parent[current] !== root) {
      const next = this.parent[current];
      this.parent[current] = root;
      current = next;
    }
    return root;
  }

  /**
   * Add an e-node to the e-graph, returning its e-class ID.
   * If the node already exists, returns the existing class.
   * Throws whatever the analysis throws for ill-typed operands, before any mutation.
   */
  add(node: ENode): EClassId {
    const canonNode = this.canonicalize(node);
    const key = enodeKey(canonNode);

    const existing = this.hashcons.get(key);
    if (existing !== undefined) {
      return this.find(existing);
    }

    const data = this.makeData(canonNode);

    const id = this.parent.length;
    this.parent.push(id);
    this.classes.set(id, {
      id,
      nodes: [{ node: canonNode, seq: this.nextSeq++ }],
      parents: [],
      data
    });
    this.hashcons.set(key, id);

    for (const childId of enodeChildren(canonNode)) {
      this.classOf(childId).parents.push([canonNode, id]);
    }

    return id;
  }

  /**
   * Insert a term bottom-up, returning the e-class of its root
   */
  insert(term: Term): EClassId {
    if (isLeaf(term)) {
      return this.add(term);
    }
    const children = term.args.map(arg => this.insert(arg));
    return this.add({ tag: term.tag, children });
  }

  /**
   * Merge two e-classes, returning the new canonical ID.
   * Congruence is restored lazily by rebuild().
   */
  union(id1: EClassId, id2: EClassId): EClassId {
    const a = this.find(id1);
    const b = this.find(id2);

    if (a === b) {
      return a;
    }

    const classA = this.classOf(a);
    const classB = this.classOf(b);

    // The class with more parents stays canonical; ties keep the older class
    let root = classA;
    let other = classB;
    if (
      classB.parents.length > classA.parents.length ||
      (classB.parents.length === classA.parents.length && b < a)
    ) {
      root = classB;
      other = classA;
    }

    const merged = this.analysis.merge(root.data, other.data);
    if (!merged.ok) {
      throw new MetadataConflictError(
        root.id,
        other.id,
        this.describe(root.id),
        this.describe(other.id),
        merged.reason
      );
    }

    this.parent[other.id] = root.id;
    this.unionCount++;

    for (const p of root.parents) this.pending.push(p);
    for (const p of other.parents) this.pending.push(p);

    if (!this.analysis.equals(root.data, merged.data)) {
      for (const p of root.parents) this.analysisPending.push(p);
    }
    if (!this.analysis.equals(other.data, merged.data)) {
      for (const p of other.parents) this.analysisPending.push(p);
    }

    root.nodes = root.nodes.concat(other.nodes).sort((x, y) => x.seq - y.seq);
    root.parents = root.parents.concat(other.parents);
    root.data = merged.data;
    this.classes.delete(other.id);

    return root.id;
  }

  /**
   * Rebuild the e-graph to restore congruence and hash-cons invariants.
   * Must be called after a batch of merges; idempotent.
   */
  rebuild(): void {
    while (this.pending.length > 0 || this.analysisPending.length > 0) {
      while (this.pending.length > 0) {
        const todo = this.pending;
        this.pending = [];

        for (const [node, classId] of todo) {
          const key = enodeKey(this.canonicalize(node));
          const id = this.find(classId);
          const existing = this.hashcons.get(key);
          this.hashcons.set(key, id);
          if (existing !== undefined && this.find(existing) !== id) {
            this.union(existing, id);
          }
        }
      }

      const todo = this.analysisPending;
      this.analysisPending = [];

      for (const [node, classId] of todo) {
        const eclass = this.classOf(classId);
        const canonNode = this.canonicalize(node);
        const merged = this.analysis.merge(eclass.data, this.makeData(canonNode));
        if (!merged.ok) {
          throw new MetadataConflictError(
            eclass.id,
            eclass.id,
            this.describe(eclass.id),
            this.nodeToString(canonNode),
            merged.reason
          );
        }
        if (!this.analysis.equals(eclass.data, merged.data)) {
          eclass.data = merged.data;
          for (const p of eclass.parents) this.analysisPending.push(p);
        }
      }
    }

    this.rebuildClasses();
  }

  /**
   * Canonicalize and deduplicate the nodes and parent lists of every class
   */
  private rebuildClasses(): void {
    for (const eclass of this.classes.values()) {
      const seen = new Set<string>();
      const nodes: ClassNode[] = [];
      for (const { node, seq } of eclass.nodes) {
        const canonNode = this.canonicalize(node);
        const key = enodeKey(canonNode);
        if (!seen.has(key)) {
          seen.add(key);
          nodes.push({ node: canonNode, seq });
        }
      }
      eclass.nodes = nodes;

      const parents = new Map<string, [ENode, EClassId]>();
      for (const [node, classId] of eclass.parents) {
        const canonNode = this.canonicalize(node);
        parents.set(enodeKey(canonNode), [canonNode, this.find(classId)]);
      }
      eclass.parents = [...parents.values()];
    }
  }

  private makeData(node: ENode): D {
    const childData = enodeChildren(node).map(id => this.classOf(id).data);
    return this.analysis.make(node, childData);
  }

  private classOf(id: EClassId): EClass<D> {
    const eclass = this.classes.get(this.find(id));
    if (!eclass) {
      throw new Error(`Unknown e-class ${id}`);
    }
    return eclass;
  }

  /**
   * Canonicalize an e-node (update children to canonical IDs)
   */
  private canonicalize(node: ENode): ENode {
    const children = enodeChildren(node);
    if (children.length === 0) {
      return node;
    }
    return enodeWithChildren(node, children.map(id => this.find(id)));
  }

  /**
   * Get all canonical e-class IDs, in creation order
   */
  getClassIds(): EClassId[] {
    return [...this.classes.keys()];
  }

  getClass(id: EClassId): EClass<D> | undefined {
    return this.classes.get(this.find(id));
  }

  /**
   * Get all e-nodes in an e-class, in creation order
   */
  getNodes(classId: EClassId): ENode[] {
    const eclass = this.classes.get(this.find(classId));
    if (!eclass) return [];
    return eclass.nodes.map(({ node }) => this.canonicalize(node));
  }

  getData(classId: EClassId): D {
    return this.classOf(classId).data;
  }

  /**
   * Number of e-classes
   */
  get size(): number {
    return this.classes.size;
  }

  /**
   * Number of e-nodes across all classes
   */
  get nodeCount(): number {
    let count = 0;
    for (const eclass of this.classes.values()) {
      count += eclass.nodes.length;
    }
    return count;
  }

  /**
   * Total successful unions so far, including those found by rebuild()
   */
  get unions(): number {
    return this.unionCount;
  }

  /**
   * True when no merge is waiting for rebuild()
   */
  get isClean(): boolean {
    return this.pending.length === 0 && this.analysisPending.length === 0;
  }

  /**
   * Lookup e-class by node (if it exists)
   */
  lookup(node: ENode): EClassId | undefined {
    const id = this.hashcons.get(enodeKey(this.canonicalize(node)));
    return id !== undefined ? this.find(id) : undefined;
  }

  /**
   * Lookup e-class of a whole term without inserting anything
   */
  lookupTerm(term: Term): EClassId | undefined {
    if (isLeaf(term)) {
      return this.lookup(term);
    }
    const children: EClassId[] = [];
    for (const arg of term.args) {
      const id = this.lookupTerm(arg);
      if (id === undefined) return undefined;
      children.push(id);
    }
    return this.lookup({ tag: term.tag, children });
  }

  /**
   * Render the term a class originated from, cut off below `depth`
   */
  describe(id: EClassId, depth: number = 3): string {
    const eclass = this.classes.get(this.find(id));
    if (!eclass) return `e${id}`;

    const node = this.canonicalize(eclass.nodes[0].node);
    if (isLeaf(node)) return enodeToString(node);
    if (depth <= 0) return `e${eclass.id}`;
    return `(${node.tag} ${node.children.map(c => this.describe(c, depth - 1)).join(' ')})`;
  }

  /**
   * Debug: print e-graph state
   */
  dump(): string {
    const lines: string[] = ['E-Graph:'];
    for (const eclass of this.classes.values()) {
      const nodeStrs = eclass.nodes.map(({ node }) => this.nodeToString(node));
      lines.push(`  [${eclass.id}]: ${nodeStrs.join(' = ')}`);
    }
    return lines.join('\n');
  }

  private nodeToString(node: ENode): string {
    return enodeToString(this.canonicalize(node));
  }
}
