/**
 * Condition expression compiler.
 *
 * Provides compile() to turn a condition string into an AST, and
 * evaluate() to run it against a caller context and placeholder resolver.
 *
 * @module compiler
 *
 * @example
 * ```typescript
 * import { compile, evaluate } from 'condition-gate/compiler';
 *
 * const ast = compile('%level% >= 10 && %rank% == gold');
 * const ok = evaluate(ast, player, resolver);
 * ```
 */

export { Tokenizer, tokenize, OPERATOR_SYMBOLS } from './lexer.js';
export type { Token, TokenType } from './lexer.js';

export { parse, parseExpression } from './parser.js';
export { ParseError } from './errors.js';

export { evaluate, compareValues, parseNumber, isBooleanLiteral } from './evaluator.js';

export { comparatorFromSymbol, isNumericComparator } from './ast.js';
export type {
  Comparator,
  NumericComparator,
  ConditionNode,
  OrNode,
  AndNode,
  ComparisonNode,
} from './ast.js';

import { Tokenizer } from './lexer.js';
import { parse } from './parser.js';
import type { ConditionNode } from './ast.js';

/**
 * Compile a condition string into an AST.
 */
export function compile(expression: string): ConditionNode {
  return parse(new Tokenizer(expression));
}
