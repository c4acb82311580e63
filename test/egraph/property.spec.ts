import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { EGraph, noAnalysis } from '../../src/egraph/EGraph.js';
import { enodeKey } from '../../src/egraph/ENode.js';
import type { ENode, EClassId } from '../../src/egraph/ENode.js';

type Command =
  | { kind: 'leaf'; name: string }
  | { kind: 'relu'; a: number }
  | { kind: 'ewadd'; a: number; b: number }
  | { kind: 'union'; a: number; b: number };

const commandArb: fc.Arbitrary<Command> = fc.oneof(
  fc.constantFrom('a', 'b', 'c').map((name): Command => ({ kind: 'leaf', name })),
  fc.nat().map((a): Command => ({ kind: 'relu', a })),
  fc.tuple(fc.nat(), fc.nat()).map(([a, b]): Command => ({ kind: 'ewadd', a, b })),
  fc.tuple(fc.nat(), fc.nat()).map(([a, b]): Command => ({ kind: 'union', a, b })),
);

const commandsArb = fc.array(commandArb, { minLength: 1, maxLength: 40 });

interface Run {
  egraph: EGraph<null>;
  added: Array<[ENode, EClassId]>;
  unioned: Array<[EClassId, EClassId]>;
}

function applyCommands(commands: Command[]): Run {
  const egraph = new EGraph(noAnalysis);
  const ids: EClassId[] = [egraph.add({ tag: 'var', name: 'a' })];
  const added: Array<[ENode, EClassId]> = [];
  const unioned: Array<[EClassId, EClassId]> = [];
  const pick = (n: number): EClassId => ids[n % ids.length];

  for (const command of commands) {
    let node: ENode | undefined;
    if (command.kind === 'leaf') {
      node = { tag: 'var', name: command.name };
    } else if (command.kind === 'relu') {
      node = { tag: 'relu', children: [pick(command.a)] };
    } else if (command.kind === 'ewadd') {
      node = { tag: 'ewadd', children: [pick(command.a), pick(command.b)] };
    } else {
      const pair: [EClassId, EClassId] = [pick(command.a), pick(command.b)];
      egraph.union(pair[0], pair[1]);
      unioned.push(pair);
    }
    if (node) {
      const id = egraph.add(node);
      ids.push(id);
      added.push([node, id]);
    }
  }

  egraph.rebuild();
  return { egraph, added, unioned };
}

describe('e-graph properties', () => {
  it('restores congruence after rebuild', () => {
    fc.assert(
      fc.property(commandsArb, (commands) => {
        const { egraph, added } = applyCommands(commands);
        for (const [node, id] of added) {
          expect(egraph.lookup(node)).toBe(egraph.find(id));
        }
      }),
    );
  });

  it('keeps canonical e-nodes unique across classes', () => {
    fc.assert(
      fc.property(commandsArb, (commands) => {
        const { egraph } = applyCommands(commands);
        const owner = new Map<string, EClassId>();
        for (const id of egraph.getClassIds()) {
          for (const node of egraph.getNodes(id)) {
            const key = enodeKey(node);
            expect(owner.get(key) ?? id).toBe(id);
            owner.set(key, id);
          }
        }
      }),
    );
  });

  it('never separates unioned classes', () => {
    fc.assert(
      fc.property(commandsArb, (commands) => {
        const { egraph, unioned } = applyCommands(commands);
        for (const [a, b] of unioned) {
          expect(egraph.find(a)).toBe(egraph.find(b));
          expect(egraph.find(egraph.find(a))).toBe(egraph.find(a));
        }
      }),
    );
  });

  it('is unaffected by an extra rebuild', () => {
    fc.assert(
      fc.property(commandsArb, (commands) => {
        const { egraph } = applyCommands(commands);
        const before = egraph.dump();
        egraph.rebuild();
        expect(egraph.dump()).toBe(before);
      }),
    );
  });
});
