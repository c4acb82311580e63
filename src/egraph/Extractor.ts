/**
 * Cost-Based Extraction from E-Graphs
 *
 * Picks one e-node per e-class, bottom-up: a class is resolved once the
 * cheapest of its e-nodes whose children are all resolved is known. Classes
 * resolve in increasing cost order, so every class is settled exactly once.
 * Among e-nodes of equal cost the earliest created wins.
 * The choice is local (greedy), not a global optimum over shared subgraphs.
 */

import type { EGraph } from './EGraph.js';
import { ENode, EClassId, NodeHead, Term, enodeChildren, isLeaf } from './ENode.js';
import { CyclicExtractionError } from '../Errors.js';

/**
 * Local cost of an e-node given its children's analysis data
 */
export type CostFunction<D> = (head: NodeHead, childData: D[]) => number;

/**
 * The e-node chosen for a class
 */
export interface Choice {
  node: ENode;
  localCost: number;
  cost: number;       // Local cost plus the chosen children's costs
}

export interface Extraction {
  term: Term;
  cost: number;       // Tree cost: shared subterms counted once per use
  graphCost: number;  // Each distinct chosen class counted once
}

interface Candidate {
  classId: EClassId;
  node: ENode;
  seq: number;
  localCost: number;
  childIds: EClassId[];   // Canonical, one per operand
  waiting: number;        // Distinct child classes not yet resolved
  cost: number;
}

interface Ready {
  candidate: Candidate;
  cost: number;
}

/**
 * Compute the chosen e-node for every class that can be resolved.
 * Costs are settled first; each class then takes its earliest-created e-node
 * of that cost whose children can be built without a cycle.
 */
export function computeChoices<D>(
  egraph: EGraph<D>,
  costFn: CostFunction<D>
): Map<EClassId, Choice> {
  egraph.rebuild();

  const candidates: Candidate[] = [];
  for (const classId of egraph.getClassIds()) {
    const eclass = egraph.getClass(classId);
    if (!eclass) continue;

    for (const { node, seq } of eclass.nodes) {
      const childIds = enodeChildren(node).map(id => egraph.find(id));
      candidates.push({
        classId: eclass.id,
        node,
        seq,
        localCost: costFn(node, childIds.map(id => egraph.getData(id))),
        childIds,
        waiting: 0,
        cost: Infinity
      });
    }
  }

  const best = settleCosts(candidates);
  return chooseNodes(candidates, best);
}

/**
 * Cheapest cost of every resolvable class, in increasing cost order
 */
function settleCosts(candidates: Candidate[]): Map<EClassId, number> {
  const best = new Map<EClassId, number>();
  const heap = new ReadyHeap();
  const dependents = waitOnChildren(candidates);

  for (const candidate of candidates) {
    if (candidate.waiting === 0) {
      heap.push({ candidate, cost: candidate.localCost });
    }
  }

  for (let ready = heap.pop(); ready; ready = heap.pop()) {
    const { candidate, cost } = ready;
    if (best.has(candidate.classId)) continue;
    best.set(candidate.classId, cost);

    for (const dependent of dependents.get(candidate.classId) ?? []) {
      dependent.waiting--;
      if (dependent.waiting === 0 && !best.has(dependent.classId)) {
        heap.push({ candidate: dependent, cost: costFrom(dependent, best) });
      }
    }
  }

  return best;
}

/**
 * Pick one e-node per class among those reaching the class's best cost.
 * A class takes its first such e-node once that node's children are chosen;
 * when every class left is waiting on another, the cheapest, then earliest,
 * buildable e-node is taken instead.
 */
function chooseNodes(candidates: Candidate[], best: Map<EClassId, number>): Map<EClassId, Choice> {
  const tight = candidates.filter(candidate => {
    candidate.cost = costFrom(candidate, best);
    return candidate.cost === best.get(candidate.classId);
  });

  const preferred = new Map<EClassId, Candidate>();
  for (const candidate of tight) {
    if (!preferred.has(candidate.classId)) preferred.set(candidate.classId, candidate);
  }

  const choices = new Map<EClassId, Choice>();
  const dependents = waitOnChildren(tight);
  const ready: Candidate[] = [];
  const fallback = new ReadyHeap();

  const offer = (candidate: Candidate): void => {
    if (choices.has(candidate.classId)) return;
    if (preferred.get(candidate.classId) === candidate) {
      ready.push(candidate);
    } else {
      fallback.push({ candidate, cost: candidate.cost });
    }
  };

  for (const candidate of tight) {
    if (candidate.waiting === 0) offer(candidate);
  }

  for (let next = ready.pop() ?? fallback.pop()?.candidate; next; next = ready.pop() ?? fallback.pop()?.candidate) {
    if (choices.has(next.classId)) continue;
    choices.set(next.classId, { node: next.node, localCost: next.localCost, cost: next.cost });

    for (const dependent of dependents.get(next.classId) ?? []) {
      dependent.waiting--;
      if (dependent.waiting === 0) offer(dependent);
    }
  }

  return choices;
}

/**
 * Reset each candidate's wait count, returning the candidates waiting on each class
 */
function waitOnChildren(candidates: Candidate[]): Map<EClassId, Candidate[]> {
  const dependents = new Map<EClassId, Candidate[]>();
  for (const candidate of candidates) {
    const distinct = new Set(candidate.childIds);
    candidate.waiting = distinct.size;
    for (const childId of distinct) {
      const list = dependents.get(childId);
      if (list) list.push(candidate);
      else dependents.set(childId, [candidate]);
    }
  }
  return dependents;
}

function costFrom(candidate: Candidate, best: Map<EClassId, number>): number {
  return candidate.localCost + candidate.childIds.reduce((sum, id) => sum + (best.get(id) ?? Infinity), 0);
}

/**
 * Extract the cheapest term rooted at a class.
 * Throws CyclicExtractionError when the root cannot be resolved.
 */
export function extract<D>(
  egraph: EGraph<D>,
  rootId: EClassId,
  costFn: CostFunction<D>
): Extraction {
  const choices = computeChoices(egraph, costFn);
  return extractFromChoices(egraph, rootId, choices);
}

/**
 * Build the term for a class from precomputed choices
 */
export function extractFromChoices<D>(
  egraph: EGraph<D>,
  rootId: EClassId,
  choices: Map<EClassId, Choice>
): Extraction {
  const root = egraph.find(rootId);
  const rootChoice = choices.get(root);
  if (!rootChoice) {
    throw new CyclicExtractionError(root);
  }

  const terms = new Map<EClassId, Term>();
  const build = (classId: EClassId): Term => {
    const cached = terms.get(classId);
    if (cached) return cached;

    const { node } = choiceOf(choices, classId);
    const term: Term = isLeaf(node)
      ? node
      : { tag: node.tag, args: node.children.map(id => build(egraph.find(id))) };
    terms.set(classId, term);
    return term;
  };

  const term = build(root);

  // Every class in `terms` is a distinct class of the extracted graph
  let graphCost = 0;
  for (const classId of terms.keys()) {
    graphCost += choiceOf(choices, classId).localCost;
  }

  return { term, cost: rootChoice.cost, graphCost };
}

function choiceOf(choices: Map<EClassId, Choice>, classId: EClassId): Choice {
  const choice = choices.get(classId);
  if (!choice) {
    throw new CyclicExtractionError(classId);
  }
  return choice;
}

/**
 * Binary min-heap ordered by cost, then e-node creation order
 */
class ReadyHeap {
  private items: Ready[] = [];

  push(item: Ready): void {
    const items = this.items;
    items.push(item);
    let i = items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(items[i], items[parent])) break;
      [items[i], items[parent]] = [items[parent], items[i]];
      i = parent;
    }
  }

  pop(): Ready | undefined {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (top === undefined || last === undefined || items.length === 0) {
      return top;
    }
    items[0] = last;
    let i = 0;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < items.length && before(items[left], items[smallest])) smallest = left;
      if (right < items.length && before(items[right], items[smallest])) smallest = right;
      if (smallest === i) break;
      [items[i], items[smallest]] = [items[smallest], items[i]];
      i = smallest;
    }
    return top;
  }
}

function before(a: Ready, b: Ready): boolean {
  return a.cost < b.cost || (a.cost === b.cost && a.candidate.seq < b.candidate.seq);
}
