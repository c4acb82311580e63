/**
 * Rule file reader
 *
 * One rule per line:
 *
 *   [name:] lhs => rhs [if guard]
 *   [name:] lhs <=> rhs [if guard]     # both directions, named name-l / name-r
 *
 * Read as verification candidates, each line is one goal instead.
 *
 * Guards: (same-shape ?a ?b), (rank ?a n), (tensor ?a), (and g...).
 * Unnamed rules are called rule-<line>.
 */

import { rule, biRule } from './egraph/Rules.js';
import type { Rule, Guard } from './egraph/Rules.js';
import { parsePattern, patternVars } from './egraph/Pattern.js';
import type { Pattern } from './egraph/Pattern.js';
import type { Candidate } from './egraph/Verifier.js';
import { TokenStream, tokenize, readSExpr, isNumberAtom } from './egraph/Syntax.js';
import type { SExpr, Token } from './egraph/Syntax.js';
import type { TensorData } from './tensor/Metadata.js';
import { sameShape, hasRank, isTensor, allOf } from './tensor/Guards.js';
import { RuleParseError, RuleError } from './Errors.js';

/**
 * One line of a rule file, before it becomes rules or candidates
 */
interface RuleLine {
  name: string;
  lhs: Pattern;
  rhs: Pattern;
  bidirectional: boolean;
  guard?: SExpr;
}

/**
 * Parse a rule file into rewrite rules, in file order
 */
export function parseRuleFile(source: string): Rule<TensorData>[] {
  return readRuleLines(source, entry => {
    const guard = entry.guard && parseGuard(entry.guard, boundBy(entry, [entry.lhs]));
    return entry.bidirectional
      ? biRule(entry.name, entry.lhs, entry.rhs, guard)
      : [rule(entry.name, entry.lhs, entry.rhs, guard)];
  });
}

/**
 * Parse a rule file into proof goals for the verifier.
 * Candidates never rewrite, so either side may be a bare variable or use
 * variables the other side lacks; `<=>` states a single equality.
 * Guards are checked for syntax only.
 */
export function parseCandidateFile(source: string): Candidate[] {
  return readRuleLines(source, entry => {
    if (entry.guard) {
      parseGuard(entry.guard, boundBy(entry, [entry.lhs, entry.rhs]));
    }
    return [{ name: entry.name, lhs: entry.lhs, rhs: entry.rhs }];
  });
}

function readRuleLines<T extends { name: string }>(
  source: string,
  build: (entry: RuleLine) => T[]
): T[] {
  const results: T[] = [];
  const names = new Set<string>();

  source.split(/\r?\n/).forEach((text, index) => {
    const line = index + 1;
    const tokens = tokenize(text, line);
    if (tokens.length === 0) return;

    for (const parsed of build(parseRuleLine(tokens, line))) {
      if (names.has(parsed.name)) {
        throw new RuleError(parsed.name, `duplicate rule name on line ${line}`);
      }
      names.add(parsed.name);
      results.push(parsed);
    }
  });

  return results;
}

function boundBy(entry: RuleLine, sides: Pattern[]): (variable: string) => void {
  const bound = new Set(sides.flatMap(side => patternVars(side)));
  const where = sides.length === 1 ? 'the left-hand side never binds' : 'neither side binds';
  return variable => {
    if (!bound.has(variable)) {
      throw new RuleError(entry.name, `guard reads ?${variable}, which ${where}`);
    }
  };
}

function parseRuleLine(tokens: Token[], line: number): RuleLine {
  const stream = new TokenStream(tokens);

  let name = `rule-${line}`;
  const first = tokens[0];
  if (first.text.length > 1 && first.text.endsWith(':')) {
    name = first.text.slice(0, -1);
    stream.next();
  }

  const lhs = parsePattern(readSExpr(stream));

  const arrow = stream.next();
  if (!arrow || (arrow.text !== '=>' && arrow.text !== '<=>')) {
    const { line: l, column } = arrow ?? stream.end;
    throw new RuleParseError("expected '=>' or '<=>'", l, column, arrow?.text);
  }

  const rhs = parsePattern(readSExpr(stream));
  const entry: RuleLine = { name, lhs, rhs, bidirectional: arrow.text === '<=>' };

  const keyword = stream.next();
  if (keyword) {
    if (keyword.text !== 'if') {
      throw new RuleParseError("expected 'if' or end of line", keyword.line, keyword.column, keyword.text);
    }
    entry.guard = readSExpr(stream);
    const extra = stream.next();
    if (extra) {
      throw new RuleParseError('unexpected token after guard', extra.line, extra.column, extra.text);
    }
  }

  return entry;
}

/**
 * Parse a guard expression. `checkVariable` sees every variable it reads.
 */
export function parseGuard(
  expr: SExpr,
  checkVariable: (variable: string) => void = () => {}
): Guard<TensorData> {
  if (expr.kind === 'atom') {
    throw new RuleParseError('expected a guard like (same-shape ?a ?b)', expr.line, expr.column, expr.text);
  }

  const [head, ...args] = expr.items;
  if (!head || head.kind !== 'atom') {
    throw new RuleParseError('expected guard name', expr.line, expr.column);
  }
  const guardName = head.text;

  const variable = (arg: SExpr | undefined): string => {
    if (!arg || arg.kind !== 'atom' || !arg.text.startsWith('?') || arg.text.length === 1) {
      const at = arg ?? head;
      throw new RuleParseError(`'${guardName}' expects a pattern variable`, at.line, at.column, arg?.kind === 'atom' ? arg.text : undefined);
    }
    const name = arg.text.slice(1);
    checkVariable(name);
    return name;
  };

  const arity = (n: number): void => {
    if (args.length !== n) {
      throw new RuleParseError(`'${guardName}' takes ${n} arguments, got ${args.length}`, head.line, head.column, guardName);
    }
  };

  switch (guardName) {
    case 'same-shape':
      arity(2);
      return sameShape(variable(args[0]), variable(args[1]));

    case 'rank': {
      arity(2);
      const v = variable(args[0]);
      const n = args[1];
      if (n.kind !== 'atom' || !isNumberAtom(n.text) || !Number.isInteger(parseFloat(n.text))) {
        throw new RuleParseError("'rank' expects an integer", n.line, n.column, n.kind === 'atom' ? n.text : undefined);
      }
      return hasRank(v, parseInt(n.text, 10));
    }

    case 'tensor':
      arity(1);
      return isTensor(variable(args[0]));

    case 'and':
      return allOf(...args.map(arg => parseGuard(arg, checkVariable)));

    default:
      throw new RuleParseError(`unknown guard '${guardName}'`, head.line, head.column, guardName);
  }
}
