/**
 * AST node types for condition expressions.
 *
 * @module compiler/ast
 */

import { ParseError } from './errors.js';

export type NumericComparator = '>' | '>=' | '<' | '<=';

export type Comparator =
  | NumericComparator
  | '=='
  | '!='
  | '>>'
  | '!>>'
  | '<<'
  | '!<<';

const COMPARATORS: readonly Comparator[] = [
  '>', '>=', '<', '<=', '==', '!=', '>>', '!>>', '<<', '!<<',
];

export function isNumericComparator(cmp: Comparator): cmp is NumericComparator {
  return cmp === '>' || cmp === '>=' || cmp === '<' || cmp === '<=';
}

/**
 * Map an operator token to its comparator. Symbols the tokenizer accepts
 * without a meaning (the lone `=`) are rejected here, at parse time.
 */
export function comparatorFromSymbol(symbol: string, pos = 0): Comparator {
  const cmp = COMPARATORS.find((c) => c === symbol);
  if (cmp === undefined) {
    throw new ParseError(`Unknown comparison operator '${symbol}'`, pos, symbol);
  }
  return cmp;
}

export interface OrNode {
  readonly kind: 'or';
  readonly left: ConditionNode;
  readonly right: ConditionNode;
}

export interface AndNode {
  readonly kind: 'and';
  readonly left: ConditionNode;
  readonly right: ConditionNode;
}

/** Operands are kept as raw text and resolved on every evaluation. */
export interface ComparisonNode {
  readonly kind: 'comparison';
  readonly left: string;
  readonly comparator: Comparator;
  readonly right: string;
}

export type ConditionNode = OrNode | AndNode | ComparisonNode;
