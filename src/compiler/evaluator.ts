/**
 * Tree-walking evaluator for condition ASTs.
 *
 * Comparison operands are resolved through the placeholder resolver on
 * every call, so one AST can serve any number of contexts.
 *
 * @module compiler/evaluator
 */

import type { Comparator, ConditionNode, NumericComparator } from './ast.js';
import { isNumericComparator } from './ast.js';
import type { PlaceholderResolver } from '../core/placeholders.js';

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function parseNumber(value: string): number | null {
  const trimmed = value.trim();
  if (!DECIMAL.test(trimmed)) return null;
  return Number(trimmed);
}

export function isBooleanLiteral(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === 'false';
}

function toBoolean(value: string): boolean {
  return value.trim().toLowerCase() === 'true';
}

export function evaluate<TContext>(
  node: ConditionNode,
  context: TContext,
  resolver: PlaceholderResolver<TContext>,
): boolean {
  switch (node.kind) {
    case 'and':
      return evaluate(node.left, context, resolver) && evaluate(node.right, context, resolver);

    case 'or':
      return evaluate(node.left, context, resolver) || evaluate(node.right, context, resolver);

    case 'comparison': {
      const left = resolver.resolve(context, node.left);
      const right = resolver.resolve(context, node.right);
      return compareValues(left, right, node.comparator);
    }
  }
}

/**
 * Compare two resolved operands. Ordering comparators require both sides
 * to be numbers and are false otherwise, so they never fall through to text
 * ordering. A boolean on either side switches to boolean equality;
 * everything else compares as text.
 */
export function compareValues(left: string, right: string, cmp: Comparator): boolean {
  if (isNumericComparator(cmp)) {
    const a = parseNumber(left);
    const b = parseNumber(right);
    if (a === null || b === null) return false;
    return compareNumbers(a, b, cmp);
  }

  if (isBooleanLiteral(left) || isBooleanLiteral(right)) {
    return compareBooleans(toBoolean(left), toBoolean(right), cmp);
  }

  return compareStrings(left, right, cmp);
}

type TextComparator = Exclude<Comparator, NumericComparator>;

function compareNumbers(a: number, b: number, cmp: NumericComparator): boolean {
  switch (cmp) {
    case '>': return a > b;
    case '>=': return a >= b;
    case '<': return a < b;
    case '<=': return a <= b;
  }
}

function compareBooleans(a: boolean, b: boolean, cmp: TextComparator): boolean {
  switch (cmp) {
    case '==': return a === b;
    case '!=': return a !== b;
    default: return false;
  }
}

function compareStrings(left: string, right: string, cmp: TextComparator): boolean {
  switch (cmp) {
    case '==': return left === right;
    case '!=': return left !== right;
    case '>>': return left.includes(right);
    case '!>>': return !left.includes(right);
    case '<<': return right.includes(left);
    case '!<<': return !right.includes(left);
  }
}
