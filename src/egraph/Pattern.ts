/**
 * Pattern Matching for E-Graph Rewrite Rules
 *
 * Patterns are term templates with variables (?x, ?w, etc.)
 * that can match against e-classes in the e-graph.
 */

import { EGraph } from './EGraph.js';
import { ENode, EClassId, Op, OP_ARITY, Term, isOp, isLeaf } from './ENode.js';
import { SExpr, parseSExpr, isNumberAtom } from './Syntax.js';
import { RuleParseError } from '../Errors.js';

/**
 * Pattern AST
 */
export type Pattern =
  | { tag: 'pvar'; name: string }                 // ?x - matches any e-class
  | { tag: 'pnum'; value: number }                // 0, 1, 2 - matches literal
  | { tag: 'pname'; name: string }                // a@2_3 - matches a named leaf
  | { tag: 'papp'; op: Op; args: Pattern[] };

/**
 * A substitution mapping pattern variables to e-class IDs
 */
export type Substitution = Map<string, EClassId>;

/**
 * A pattern matched at classId with substitution
 */
export interface Match {
  classId: EClassId;
  subst: Substitution;
}

/**
 * Parse a pattern into a Pattern AST
 *
 * Syntax:
 *   ?x, ?w           - pattern variables
 *   0, 1, -1         - number literals
 *   x@4_4            - named leaves
 *   (ewadd ?x ?y)    - operator application, arity checked
 */
export function parsePattern(input: string | SExpr): Pattern {
  const expr = typeof input === 'string' ? parseSExpr(input) : input;

  if (expr.kind === 'atom') {
    if (expr.text.startsWith('?')) {
      if (expr.text.length === 1) {
        throw new RuleParseError('empty pattern variable', expr.line, expr.column, expr.text);
      }
      return { tag: 'pvar', name: expr.text.slice(1) };
    }
    if (isNumberAtom(expr.text)) {
      return { tag: 'pnum', value: parseFloat(expr.text) };
    }
    return { tag: 'pname', name: expr.text };
  }

  const [head, ...rest] = expr.items;
  if (!head || head.kind !== 'atom') {
    throw new RuleParseError('expected operator name', expr.line, expr.column);
  }
  if (!isOp(head.text)) {
    throw new RuleParseError(`unknown operator '${head.text}'`, head.line, head.column, head.text);
  }
  if (rest.length !== OP_ARITY[head.text]) {
    throw new RuleParseError(
      `'${head.text}' takes ${OP_ARITY[head.text]} operands, got ${rest.length}`,
      head.line,
      head.column,
      head.text
    );
  }

  return { tag: 'papp', op: head.text, args: rest.map(item => parsePattern(item)) };
}

/**
 * Pattern variables in order of first occurrence
 */
export function patternVars(pattern: Pattern): string[] {
  const vars: string[] = [];
  const visit = (p: Pattern): void => {
    if (p.tag === 'pvar') {
      if (!vars.includes(p.name)) vars.push(p.name);
    } else if (p.tag === 'papp') {
      p.args.forEach(visit);
    }
  };
  visit(pattern);
  return vars;
}

/**
 * Match a pattern against an e-class, returning all valid substitutions
 */
export function matchPattern<D>(
  egraph: EGraph<D>,
  pattern: Pattern,
  classId: EClassId
): Substitution[] {
  return [...matchClass(egraph, pattern, classId, new Map())];
}

/**
 * Lazily search every e-class for matches.
 * The result can be iterated more than once; each pass restarts the search.
 * Order is fixed by class creation order, then node creation order.
 */
export function searchPattern<D>(egraph: EGraph<D>, pattern: Pattern): Iterable<Match> {
  return {
    *[Symbol.iterator](): Generator<Match> {
      for (const classId of egraph.getClassIds()) {
        for (const subst of matchClass(egraph, pattern, classId, new Map())) {
          yield { classId, subst };
        }
      }
    }
  };
}

function* matchClass<D>(
  egraph: EGraph<D>,
  pattern: Pattern,
  classId: EClassId,
  subst: Substitution
): Generator<Substitution> {
  const canonId = egraph.find(classId);

  // Pattern variable - bind or check existing binding
  if (pattern.tag === 'pvar') {
    const existing = subst.get(pattern.name);
    if (existing === undefined) {
      yield new Map(subst).set(pattern.name, canonId);
    } else if (egraph.find(existing) === canonId) {
      yield subst;
    }
    return;
  }

  // Try every alternative node in the class
  for (const node of egraph.getNodes(canonId)) {
    yield* matchNode(egraph, pattern, node, subst);
  }
}

function* matchNode<D>(
  egraph: EGraph<D>,
  pattern: Exclude<Pattern, { tag: 'pvar' }>,
  node: ENode,
  subst: Substitution
): Generator<Substitution> {
  switch (pattern.tag) {
    case 'pnum':
      if (node.tag === 'num' && node.value === pattern.value) {
        yield subst;
      }
      return;

    case 'pname':
      if (node.tag === 'var' && node.name === pattern.name) {
        yield subst;
      }
      return;

    case 'papp':
      if (!isLeaf(node) && node.tag === pattern.op) {
        yield* matchChildren(egraph, pattern.args, node.children, 0, subst);
      }
      return;
  }
}

function* matchChildren<D>(
  egraph: EGraph<D>,
  patterns: Pattern[],
  children: EClassId[],
  index: number,
  subst: Substitution
): Generator<Substitution> {
  if (index === patterns.length) {
    yield subst;
    return;
  }
  for (const next of matchClass(egraph, patterns[index], children[index], subst)) {
    yield* matchChildren(egraph, patterns, children, index + 1, next);
  }
}

/**
 * Instantiate a pattern with a substitution, adding nodes to the e-graph.
 * Returns the e-class ID of the instantiated pattern.
 */
export function instantiatePattern<D>(
  egraph: EGraph<D>,
  pattern: Pattern,
  subst: Substitution
): EClassId {
  switch (pattern.tag) {
    case 'pvar':
      return boundClass(pattern.name, subst);
    case 'pnum':
      return egraph.add({ tag: 'num', value: pattern.value });
    case 'pname':
      return egraph.add({ tag: 'var', name: pattern.name });
    case 'papp': {
      const children = pattern.args.map(arg => instantiatePattern(egraph, arg, subst));
      return egraph.add({ tag: pattern.op, children });
    }
  }
}

/**
 * Compute the analysis data an instantiation would get, without touching the e-graph.
 * Throws whatever the analysis throws for ill-typed operands.
 */
export function inferPatternData<D>(
  egraph: EGraph<D>,
  pattern: Pattern,
  subst: Substitution
): D {
  switch (pattern.tag) {
    case 'pvar':
      return egraph.getData(boundClass(pattern.name, subst));
    case 'pnum':
      return egraph.analysis.make({ tag: 'num', value: pattern.value }, []);
    case 'pname':
      return egraph.analysis.make({ tag: 'var', name: pattern.name }, []);
    case 'papp': {
      const childData = pattern.args.map(arg => inferPatternData(egraph, arg, subst));
      return egraph.analysis.make({ tag: pattern.op }, childData);
    }
  }
}

function boundClass(name: string, subst: Substitution): EClassId {
  const id = subst.get(name);
  if (id === undefined) {
    throw new Error(`Unbound pattern variable: ?${name}`);
  }
  return id;
}

/**
 * Turn a pattern into a term, with each variable as an opaque symbol
 */
export function patternToTerm(pattern: Pattern): Term {
  switch (pattern.tag) {
    case 'pvar': return { tag: 'sym', name: pattern.name };
    case 'pnum': return { tag: 'num', value: pattern.value };
    case 'pname': return { tag: 'var', name: pattern.name };
    case 'papp': return { tag: pattern.op, args: pattern.args.map(patternToTerm) };
  }
}

/**
 * Convert pattern to string for debugging
 */
export function patternToString(pattern: Pattern): string {
  switch (pattern.tag) {
    case 'pvar': return `?${pattern.name}`;
    case 'pnum': return `${pattern.value}`;
    case 'pname': return pattern.name;
    case 'papp': return `(${pattern.op} ${pattern.args.map(patternToString).join(' ')})`;
  }
}
