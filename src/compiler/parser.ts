/**
 * Recursive descent parser for condition expressions.
 *
 * Grammar:
 *   expr       -> or_expr
 *   or_expr    -> and_expr ('||' and_expr)*
 *   and_expr   -> primary ('&&' primary)*
 *   primary    -> '(' expr ')' | comparison
 *   comparison -> LITERAL OPERATOR LITERAL
 *
 * @module compiler/parser
 */

import type { Token, TokenType, Tokenizer } from './lexer.js';
import type { ConditionNode, ComparisonNode } from './ast.js';
import { comparatorFromSymbol } from './ast.js';
import { ParseError } from './errors.js';

export { ParseError } from './errors.js';

const MAX_DEPTH = 50;

function describeToken(tok: Token): string {
  if (tok.type === 'EOF') return 'end of input';
  return `${tok.type} '${tok.value}'`;
}

/**
 * Parse one expression starting at the tokenizer's current token. The
 * cursor is left on the first token after the expression. Returned nodes
 * are frozen, so a compiled AST can be shared between callers.
 */
export function parseExpression(tokenizer: Tokenizer): ConditionNode {
  let depth = 0;

  function expect(type: TokenType, reason: string): Token {
    const tok = tokenizer.current();
    if (tok.type !== type) {
      throw new ParseError(`${reason}, got ${describeToken(tok)}`, tok.pos, tok.value);
    }
    tokenizer.advance();
    return tok;
  }

  function orExpr(): ConditionNode {
    let left = andExpr();
    while (tokenizer.current().type === 'OR') {
      tokenizer.advance();
      const right = andExpr();
      left = Object.freeze({ kind: 'or', left, right });
    }
    return left;
  }

  function andExpr(): ConditionNode {
    let left = primary();
    while (tokenizer.current().type === 'AND') {
      tokenizer.advance();
      const right = primary();
      left = Object.freeze({ kind: 'and', left, right });
    }
    return left;
  }

  function primary(): ConditionNode {
    const tok = tokenizer.current();
    if (tok.type !== 'LPAREN') {
      return comparison();
    }

    depth++;
    if (depth > MAX_DEPTH) {
      throw new ParseError(`Expression exceeds maximum nesting depth of ${MAX_DEPTH}`, tok.pos, tok.value);
    }
    tokenizer.advance();
    const node = orExpr();
    expect('RPAREN', 'Missing closing parenthesis');
    depth--;
    return node;
  }

  function comparison(): ComparisonNode {
    const left = expect('LITERAL', 'Missing left operand');
    const op = expect('OPERATOR', 'Missing comparison operator');
    const right = expect('LITERAL', 'Missing right operand');
    return Object.freeze({
      kind: 'comparison',
      left: left.value,
      comparator: comparatorFromSymbol(op.value, op.pos),
      right: right.value,
    });
  }

  return orExpr();
}

/**
 * Parse a complete expression; anything left before EOF is an error.
 */
export function parse(tokenizer: Tokenizer): ConditionNode {
  const result = parseExpression(tokenizer);
  const tok = tokenizer.current();
  if (tok.type !== 'EOF') {
    throw new ParseError(`Unexpected trailing content ${describeToken(tok)}`, tok.pos, tok.value);
  }
  return result;
}
