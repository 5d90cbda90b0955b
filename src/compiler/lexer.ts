/**
 * Lazy tokenizer for condition expressions.
 *
 * The tokenizer holds only a cursor and the current token; callers pull
 * tokens one at a time with {@link Tokenizer.advance}.
 *
 * @module compiler/lexer
 */

import { ParseError } from './errors.js';

export type TokenType =
  | 'LPAREN'
  | 'RPAREN'
  | 'AND'
  | 'OR'
  | 'OPERATOR'
  | 'LITERAL'
  | 'EOF';

export interface Token {
  type: TokenType;
  value: string;
  pos: number;
}

/**
 * Operator symbols in match order. Longer symbols come before their
 * prefixes so that `!>>` is never read as `!` followed by `>>`.
 */
export const OPERATOR_SYMBOLS: readonly string[] = [
  '!>>',
  '!<<',
  '>=',
  '<=',
  '==',
  '!=',
  '>>',
  '<<',
  '>',
  '<',
  '=',
];

export class Tokenizer {
  private readonly input: string;
  private pos = 0;
  private token: Token;

  constructor(input: string | null | undefined) {
    if (input === null || input === undefined) {
      throw new ParseError('Expression is empty', 0);
    }
    this.input = input;
    this.token = this.readToken();
  }

  current(): Token {
    return this.token;
  }

  advance(): Token {
    this.token = this.readToken();
    return this.token;
  }

  private readToken(): Token {
    this.skipWhitespace();
    const start = this.pos;

    if (this.pos >= this.input.length) {
      return { type: 'EOF', value: '', pos: start };
    }

    const ch = this.input[this.pos];
    if (ch === '(') { this.pos++; return { type: 'LPAREN', value: '(', pos: start }; }
    if (ch === ')') { this.pos++; return { type: 'RPAREN', value: ')', pos: start }; }

    if (this.startsWith('&&')) { this.pos += 2; return { type: 'AND', value: '&&', pos: start }; }
    if (this.startsWith('||')) { this.pos += 2; return { type: 'OR', value: '||', pos: start }; }

    const op = this.matchOperator();
    if (op !== null) {
      this.pos += op.length;
      return { type: 'OPERATOR', value: op, pos: start };
    }

    return { type: 'LITERAL', value: this.readLiteral(), pos: start };
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
      this.pos++;
    }
  }

  private startsWith(text: string): boolean {
    return this.input.startsWith(text, this.pos);
  }

  private matchOperator(): string | null {
    for (const op of OPERATOR_SYMBOLS) {
      if (this.startsWith(op)) return op;
    }
    return null;
  }

  private atLiteralBoundary(): boolean {
    const ch = this.input[this.pos];
    return /\s/.test(ch)
      || ch === '('
      || ch === ')'
      || this.startsWith('&&')
      || this.startsWith('||')
      || this.matchOperator() !== null;
  }

  private readLiteral(): string {
    let text = '';
    while (this.pos < this.input.length) {
      const ch = this.input[this.pos];
      if (ch === '"' || ch === "'") {
        text += this.readQuoted(ch);
        continue;
      }
      if (this.atLiteralBoundary()) break;
      text += ch;
      this.pos++;
    }
    return text;
  }

  // Quote characters are dropped; a backslash keeps the next character as-is.
  private readQuoted(quote: string): string {
    const start = this.pos;
    this.pos++;
    let text = '';
    while (this.pos < this.input.length) {
      const ch = this.input[this.pos];
      if (ch === '\\') {
        if (this.pos + 1 >= this.input.length) break;
        text += this.input[this.pos + 1];
        this.pos += 2;
        continue;
      }
      if (ch === quote) {
        this.pos++;
        return text;
      }
      text += ch;
      this.pos++;
    }
    throw new ParseError('Unterminated quoted literal', start, this.input.slice(start));
  }
}

/**
 * Drain a tokenizer into an array, EOF included. Used by diagnostics and
 * tests; the parser itself consumes tokens lazily.
 */
export function tokenize(input: string): Token[] {
  const tokenizer = new Tokenizer(input);
  const tokens: Token[] = [tokenizer.current()];
  while (tokenizer.current().type !== 'EOF') {
    tokens.push(tokenizer.advance());
  }
  return tokens;
}
