/**
 * Execution coordinator for condition expressions.
 *
 * Wraps compile and evaluate with logging, an optional compile cache, and
 * a non-blocking surface that runs work on an injected worker and settles
 * results through an injected callback executor.
 *
 * @module core/condition-evaluator
 */

import { compile, evaluate, ParseError } from '../compiler/index.js';
import type { ConditionNode } from '../compiler/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { PlaceholderResolver } from './placeholders.js';
import { immediateExecutor, inlineExecutor, type Executor } from './executor.js';
import { CompileCache } from './compile-cache.js';

export interface ConditionEvaluatorOptions<TContext> {
  resolver: PlaceholderResolver<TContext>;
  logger?: Logger;
  /** Where async evaluations run. Defaults to `setImmediate`. */
  worker?: Executor;
  /** Where async results are delivered. Defaults to inline on the worker. */
  callbackExecutor?: Executor;
  /** Maximum cached ASTs; 0 or omitted disables caching. */
  cacheSize?: number;
}

export interface AsyncEvaluationOptions {
  signal?: AbortSignal;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ConditionEvaluator<TContext> {
  private readonly resolver: PlaceholderResolver<TContext>;
  private readonly logger: Logger;
  private readonly worker: Executor;
  private readonly callbackExecutor: Executor;
  private readonly cache: CompileCache | null;

  constructor(options: ConditionEvaluatorOptions<TContext>) {
    this.resolver = options.resolver;
    this.logger = options.logger ?? createLogger('warn');
    this.worker = options.worker ?? immediateExecutor;
    this.callbackExecutor = options.callbackExecutor ?? inlineExecutor;
    this.cache = options.cacheSize && options.cacheSize > 0
      ? new CompileCache(options.cacheSize)
      : null;
    this.logger.debug('Condition evaluator initialized', {
      cacheSize: options.cacheSize ?? 0,
    });
  }

  compile(expression: string): ConditionNode {
    if (!this.cache) return compile(expression);

    let ast = this.cache.get(expression);
    if (!ast) {
      ast = compile(expression);
      this.cache.set(expression, ast);
    }
    return ast;
  }

  /**
   * Evaluate a single expression. Malformed input throws {@link ParseError}.
   */
  evaluate(context: TContext, expression: string): boolean {
    const ast = this.compile(expression);
    const result = evaluate(ast, context, this.resolver);
    this.logger.debug('Evaluated condition', { expression, result });
    return result;
  }

  /**
   * Evaluate every line as an implicit AND. Stops at the first line that is
   * false or fails to parse; an empty list is true.
   */
  evaluateAll(context: TContext, expressions: readonly string[] | null | undefined): boolean {
    if (!expressions || expressions.length === 0) return true;

    for (const expression of expressions) {
      try {
        if (!this.evaluate(context, expression)) {
          this.logger.debug('Condition line not satisfied', { expression });
          return false;
        }
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        this.logger.warn('Failed to parse condition line', {
          expression,
          error: error.message,
        });
        return false;
      }
    }
    return true;
  }

  /**
   * Evaluate on the worker. Errors of any kind, including a worker that
   * refuses the task, are logged and resolve to `false`; the promise only
   * rejects when `signal` aborts, and it does so as soon as the abort fires.
   */
  evaluateAsync(
    context: TContext,
    expression: string,
    options: AsyncEvaluationOptions = {},
  ): Promise<boolean> {
    const { signal } = options;

    return new Promise<boolean>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      let settled = false;
      const settle = (finish: () => void): void => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        finish();
      };
      const onAbort = (): void => settle(() => reject(signal?.reason));
      signal?.addEventListener('abort', onAbort, { once: true });

      const deliver = (result: boolean): void => {
        try {
          this.callbackExecutor(() => settle(() => resolve(result)));
        } catch (error) {
          this.logger.warn('Async condition callback failed', {
            expression,
            error: describeError(error),
          });
          settle(() => resolve(result));
        }
      };

      try {
        this.worker(() => {
          if (settled) return;

          let result: boolean;
          try {
            result = this.evaluate(context, expression);
          } catch (error) {
            this.logger.warn('Async condition evaluation failed', {
              expression,
              error: describeError(error),
            });
            result = false;
          }
          deliver(result);
        });
      } catch (error) {
        this.logger.warn('Async condition evaluation failed', {
          expression,
          error: describeError(error),
        });
        settle(() => resolve(false));
      }
    });
  }

  /**
   * Sequential async AND: each line is scheduled only after the previous
   * one resolved true.
   */
  async evaluateAllAsync(
    context: TContext,
    expressions: readonly string[] | null | undefined,
    options: AsyncEvaluationOptions = {},
  ): Promise<boolean> {
    if (!expressions || expressions.length === 0) return true;

    for (const expression of expressions) {
      options.signal?.throwIfAborted();
      const pass = await this.evaluateAsync(context, expression, options);
      if (!pass) {
        this.logger.debug('Async condition line not satisfied', { expression });
        return false;
      }
    }
    return true;
  }

  clearCache(): void {
    this.cache?.clear();
  }
}

export function createConditionEvaluator<TContext>(
  options: ConditionEvaluatorOptions<TContext>,
): ConditionEvaluator<TContext> {
  return new ConditionEvaluator(options);
}
