import { resolve } from 'node:path';
import { loadConditionsFile, ConfigError } from '../../config/loader.js';
import { ConditionSet } from '../../config/condition-set.js';
import { createLogger, type LogLevel } from '../../utils/logger.js';
import { parseVars, UsageError } from '../vars.js';

export interface CheckOptions {
  path?: string;
  name?: string;
  vars?: string[];
  json?: boolean;
  verbose?: boolean;
}

export interface CheckResult {
  status: 'true' | 'false' | 'error';
  condition: string;
  lines: number;
  error?: string;
}

export async function check(options: CheckOptions): Promise<CheckResult> {
  const condition = options.name ?? '';
  let result: CheckResult;

  try {
    if (!options.path || !options.name) {
      throw new UsageError('Usage: check <file> <name>');
    }
    const config = loadConditionsFile(resolve(options.path));
    const level: LogLevel = options.verbose ? 'debug' : config.settings.logLevel;
    const set = ConditionSet.fromConfig(config, {
      values: parseVars(options.vars),
      logger: createLogger(level),
    });
    const lines = set.get(options.name).all.length;
    const passed = set.check(options.name, undefined);
    result = { status: passed ? 'true' : 'false', condition, lines };
  } catch (err) {
    if (!(err instanceof ConfigError) && !(err instanceof UsageError)) throw err;
    result = { status: 'error', condition, lines: 0, error: err.message };
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else if (result.status === 'error') {
    console.error(`ERROR ${result.error}`);
  } else {
    console.log(`${condition}: ${result.status}`);
  }

  return result;
}
