import type { ConditionNode } from '../compiler/index.js';

/**
 * Bounded least-recently-used map from expression text to its AST.
 * ASTs hold raw operand text only, so sharing them across contexts is safe.
 */
export class CompileCache {
  private readonly entries = new Map<string, ConditionNode>();

  constructor(private readonly maxEntries: number) {}

  get size(): number {
    return this.entries.size;
  }

  get(expression: string): ConditionNode | undefined {
    const node = this.entries.get(expression);
    if (node === undefined) return undefined;
    // re-insert to mark as most recently used
    this.entries.delete(expression);
    this.entries.set(expression, node);
    return node;
  }

  set(expression: string, node: ConditionNode): void {
    if (this.maxEntries <= 0) return;
    this.entries.delete(expression);
    this.entries.set(expression, node);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
