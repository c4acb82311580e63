/**
 * Rewrite Rules for E-Graph Saturation
 *
 * A rule pairs two patterns. The left side is searched for; the right side is
 * instantiated with the bindings and merged with the matched class.
 * An optional guard inspects the bound classes' analysis data.
 */

import type { EClassId } from './ENode.js';
import { Pattern, parsePattern, patternVars } from './Pattern.js';
import { RuleError } from '../Errors.js';

/**
 * What a guard can see of a match
 */
export interface GuardContext<D> {
  data(variable: string): D;
  classId(variable: string): EClassId;
}

export type Guard<D> = (ctx: GuardContext<D>) => boolean;

/**
 * A rewrite rule: if LHS matches (and the guard passes), RHS is equivalent
 */
export interface Rule<D = unknown> {
  name: string;
  lhs: Pattern;
  rhs: Pattern;
  guard?: Guard<D>;
}

/**
 * Create a rule from patterns or pattern strings.
 * Throws RuleError when the right side uses a variable the left side never binds.
 */
export function rule<D = unknown>(
  name: string,
  lhs: string | Pattern,
  rhs: string | Pattern,
  guard?: Guard<D>
): Rule<D> {
  const result: Rule<D> = {
    name,
    lhs: typeof lhs === 'string' ? parsePattern(lhs) : lhs,
    rhs: typeof rhs === 'string' ? parsePattern(rhs) : rhs,
  };
  if (guard) {
    result.guard = guard;
  }
  validateRule(result);
  return result;
}

/**
 * Create bidirectional rules (both directions)
 */
export function biRule<D = unknown>(
  name: string,
  a: string | Pattern,
  b: string | Pattern,
  guard?: Guard<D>
): Rule<D>[] {
  return [
    rule(`${name}-l`, a, b, guard),
    rule(`${name}-r`, b, a, guard)
  ];
}

export function validateRule<D>(r: Rule<D>): void {
  if (r.lhs.tag === 'pvar') {
    throw new RuleError(r.name, 'left-hand side must not be a bare variable');
  }
  const bound = new Set(patternVars(r.lhs));
  for (const v of patternVars(r.rhs)) {
    if (!bound.has(v)) {
      throw new RuleError(r.name, `right-hand side uses ?${v}, which the left-hand side never binds`);
    }
  }
}
