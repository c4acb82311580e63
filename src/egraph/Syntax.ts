/**
 * S-expression reader shared by patterns, terms and rule files
 */

import { RuleParseError } from '../Errors.js';

export interface Token {
  text: string;
  line: number;
  column: number;
}

export type SExpr =
  | { kind: 'atom'; text: string; line: number; column: number }
  | { kind: 'list'; items: SExpr[]; line: number; column: number };

/**
 * Tokenize into parens and whitespace-separated atoms.
 * `#` starts a comment that runs to the end of the line.
 */
export function tokenize(input: string, firstLine: number = 1): Token[] {
  const tokens: Token[] = [];
  let line = firstLine;
  let column = 1;
  let i = 0;

  while (i < input.length) {
    const ch = input[i];

    if (ch === '\n') {
      line++;
      column = 1;
      i++;
      continue;
    }

    if (/\s/.test(ch)) {
      i++;
      column++;
      continue;
    }

    if (ch === '#') {
      while (i < input.length && input[i] !== '\n') {
        i++;
      }
      continue;
    }

    if (ch === '(' || ch === ')') {
      tokens.push({ text: ch, line, column });
      i++;
      column++;
      continue;
    }

    const start = column;
    let text = '';
    while (i < input.length && !/[\s()#]/.test(input[i])) {
      text += input[i];
      i++;
      column++;
    }
    tokens.push({ text, line, column: start });
  }

  return tokens;
}

/**
 * Cursor over a token list
 */
export class TokenStream {
  private pos = 0;

  constructor(private tokens: Token[]) {}

  peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  next(): Token | undefined {
    return this.tokens[this.pos++];
  }

  get done(): boolean {
    return this.pos >= this.tokens.length;
  }

  /**
   * Position to blame when input ends early
   */
  get end(): { line: number; column: number } {
    const last = this.tokens[this.tokens.length - 1];
    return last ? { line: last.line, column: last.column + last.text.length } : { line: 1, column: 1 };
  }
}

export function readSExpr(stream: TokenStream): SExpr {
  const token = stream.next();
  if (!token) {
    const { line, column } = stream.end;
    throw new RuleParseError('unexpected end of input', line, column);
  }

  if (token.text === ')') {
    throw new RuleParseError("unexpected ')'", token.line, token.column, token.text);
  }

  if (token.text !== '(') {
    return { kind: 'atom', text: token.text, line: token.line, column: token.column };
  }

  const items: SExpr[] = [];
  for (;;) {
    const next = stream.peek();
    if (!next) {
      const { line, column } = stream.end;
      throw new RuleParseError("expected ')'", line, column);
    }
    if (next.text === ')') {
      stream.next();
      break;
    }
    items.push(readSExpr(stream));
  }

  return { kind: 'list', items, line: token.line, column: token.column };
}

/**
 * Parse exactly one s-expression from a string
 */
export function parseSExpr(input: string): SExpr {
  const stream = new TokenStream(tokenize(input));
  const expr = readSExpr(stream);
  const extra = stream.peek();
  if (extra) {
    throw new RuleParseError('unexpected token after expression', extra.line, extra.column, extra.text);
  }
  return expr;
}

export function isNumberAtom(text: string): boolean {
  return /^-?\d+(\.\d+)?$/.test(text);
}
