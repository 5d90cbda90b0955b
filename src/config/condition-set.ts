/**
 * Named condition groups loaded from a conditions file.
 *
 * @module config/condition-set
 */

import { ParseError } from '../compiler/index.js';
import {
  ConditionEvaluator,
  type AsyncEvaluationOptions,
} from '../core/condition-evaluator.js';
import { createStaticResolver } from '../core/placeholders.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { ConfigError } from './loader.js';
import type { ConditionDefinition, ConditionsConfig } from './schema.js';

export interface LintIssue {
  condition: string;
  index: number;
  expression: string;
  error: string;
}

export interface ConditionSetOverrides {
  /** Extra `%name%` values; these win over the file's placeholders. */
  values?: Record<string, string>;
  logger?: Logger;
}

export class ConditionSet<TContext> {
  constructor(
    private readonly config: ConditionsConfig,
    private readonly evaluator: ConditionEvaluator<TContext>,
  ) {}

  /**
   * Build a set whose placeholders come from the file plus `overrides.values`.
   */
  static fromConfig(
    config: ConditionsConfig,
    overrides: ConditionSetOverrides = {},
  ): ConditionSet<unknown> {
    const logger = overrides.logger ?? createLogger(config.settings.logLevel);
    const evaluator = new ConditionEvaluator<unknown>({
      resolver: createStaticResolver({ ...config.placeholders, ...overrides.values }, logger),
      logger,
      cacheSize: config.settings.cacheSize,
    });
    return new ConditionSet(config, evaluator);
  }

  names(): string[] {
    return [...this.config.conditions.keys()];
  }

  has(name: string): boolean {
    return this.config.conditions.has(name);
  }

  get(name: string): ConditionDefinition {
    const def = this.config.conditions.get(name);
    if (!def) {
      throw new ConfigError(this.config.source, [
        { path: `/conditions/${name}`, message: 'Unknown condition' },
      ]);
    }
    return def;
  }

  check(name: string, context: TContext): boolean {
    return this.evaluator.evaluateAll(context, this.get(name).all);
  }

  checkAsync(name: string, context: TContext, options?: AsyncEvaluationOptions): Promise<boolean> {
    return this.evaluator.evaluateAllAsync(context, this.get(name).all, options);
  }

  /**
   * Compile every line without evaluating it and report the ones that fail.
   */
  lint(): LintIssue[] {
    const issues: LintIssue[] = [];
    for (const def of this.config.conditions.values()) {
      def.all.forEach((expression, index) => {
        try {
          this.evaluator.compile(expression);
        } catch (err) {
          if (!(err instanceof ParseError)) throw err;
          issues.push({ condition: def.name, index, expression, error: err.message });
        }
      });
    }
    return issues;
  }
}
