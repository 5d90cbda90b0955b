import { ParseError } from '../../compiler/index.js';
import { ConditionEvaluator } from '../../core/condition-evaluator.js';
import { createStaticResolver } from '../../core/placeholders.js';
import { createLogger } from '../../utils/logger.js';
import { parseVars, UsageError } from '../vars.js';

export interface EvalOptions {
  expression?: string;
  vars?: string[];
  json?: boolean;
  verbose?: boolean;
}

export interface EvalResult {
  status: 'true' | 'false' | 'error';
  expression: string;
  error?: string;
}

export async function evalExpression(options: EvalOptions): Promise<EvalResult> {
  const expression = options.expression ?? '';
  let result: EvalResult;

  try {
    if (!options.expression) {
      throw new UsageError('Missing expression');
    }
    const logger = createLogger(options.verbose ? 'debug' : 'silent');
    const evaluator = new ConditionEvaluator<undefined>({
      resolver: createStaticResolver(parseVars(options.vars), logger),
      logger,
    });
    const value = evaluator.evaluate(undefined, options.expression);
    result = { status: value ? 'true' : 'false', expression };
  } catch (err) {
    if (!(err instanceof ParseError) && !(err instanceof UsageError)) throw err;
    result = { status: 'error', expression, error: err.message };
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else if (result.status === 'error') {
    console.error(`ERROR ${result.error}`);
  } else {
    console.log(result.status);
  }

  return result;
}
