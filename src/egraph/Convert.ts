/**
 * Conversion between term text, terms and the e-graph
 */

import type { EGraph } from './EGraph.js';
import { EClassId, Term, OP_ARITY, isOp, isLeaf } from './ENode.js';
import { SExpr, parseSExpr, isNumberAtom } from './Syntax.js';
import { Pattern, patternToTerm } from './Pattern.js';
import { RuleParseError } from '../Errors.js';

/**
 * Parse a concrete term: numbers, names and operator applications.
 * Pattern variables are rejected; a term has no free variables.
 */
export function parseTerm(input: string | SExpr): Term {
  const expr = typeof input === 'string' ? parseSExpr(input) : input;

  if (expr.kind === 'atom') {
    if (expr.text.startsWith('?')) {
      throw new RuleParseError('pattern variable in a concrete term', expr.line, expr.column, expr.text);
    }
    if (isNumberAtom(expr.text)) {
      return { tag: 'num', value: parseFloat(expr.text) };
    }
    return { tag: 'var', name: expr.text };
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

  return { tag: head.text, args: rest.map(item => parseTerm(item)) };
}

/**
 * Add a pattern to the e-graph with each variable as an opaque symbol
 */
export function addPattern<D>(egraph: EGraph<D>, pattern: Pattern): EClassId {
  return egraph.insert(patternToTerm(pattern));
}

/**
 * Add multiple terms, returning a map of original keys to e-class IDs
 */
export function addTerms<D, K extends string>(
  egraph: EGraph<D>,
  terms: Map<K, Term>
): Map<K, EClassId> {
  const result = new Map<K, EClassId>();
  for (const [key, term] of terms) {
    result.set(key, egraph.insert(term));
  }
  return result;
}

/**
 * Number of operator applications and leaves in a term
 */
export function termSize(term: Term): number {
  return isLeaf(term) ? 1 : 1 + term.args.reduce((n, arg) => n + termSize(arg), 0);
}
