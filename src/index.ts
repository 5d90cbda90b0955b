/**
 * condition-gate: boolean condition expressions over placeholder values.
 *
 * @module condition-gate
 *
 * @example
 * ```typescript
 * import { createConditionEvaluator } from 'condition-gate';
 *
 * const conditions = createConditionEvaluator<Player>({
 *   resolver: { resolve: (player, text) => expandPlaceholders(player, text) },
 * });
 *
 * conditions.evaluate(player, '%level% >= 10 && %world% == overworld');
 * await conditions.evaluateAllAsync(player, ['%online% == true', '%rank% >> gold']);
 * ```
 */

export * from './compiler/index.js';

export {
  ConditionEvaluator,
  createConditionEvaluator,
  type ConditionEvaluatorOptions,
  type AsyncEvaluationOptions,
} from './core/condition-evaluator.js';
export { CompileCache } from './core/compile-cache.js';
export { immediateExecutor, inlineExecutor, type Executor } from './core/executor.js';
export {
  passthroughResolver,
  createStaticResolver,
  type PlaceholderResolver,
} from './core/placeholders.js';

export {
  createLogger,
  parseLogLevel,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LogMeta,
  type LoggerOptions,
} from './utils/logger.js';

export {
  loadConditionsFile,
  parseConditionsConfig,
  ConfigError,
  type ConfigIssue,
} from './config/loader.js';
export {
  ConditionSet,
  type ConditionSetOverrides,
  type LintIssue,
} from './config/condition-set.js';
export {
  CONDITIONS_SCHEMA,
  DEFAULT_SETTINGS,
  type ConditionDefinition,
  type ConditionsConfig,
  type ConditionsSettings,
  type RawConditionsConfig,
} from './config/schema.js';
