import { resolve } from 'node:path';
import { loadConditionsFile, ConfigError } from '../../config/loader.js';
import { ConditionSet, type LintIssue } from '../../config/condition-set.js';
import { createLogger } from '../../utils/logger.js';
import { UsageError } from '../vars.js';

export interface LintOptions {
  path?: string;
  json?: boolean;
}

export interface LintResult {
  valid: boolean;
  conditionsChecked: number;
  issues: LintIssue[];
  error?: string;
}

export async function lint(options: LintOptions): Promise<LintResult> {
  let result: LintResult;

  try {
    if (!options.path) {
      throw new UsageError('Usage: lint <file>');
    }
    const config = loadConditionsFile(resolve(options.path));
    const set = ConditionSet.fromConfig(config, { logger: createLogger('silent') });
    const issues = set.lint();
    result = { valid: issues.length === 0, conditionsChecked: set.names().length, issues };
  } catch (err) {
    if (!(err instanceof ConfigError) && !(err instanceof UsageError)) throw err;
    result = { valid: false, conditionsChecked: 0, issues: [], error: err.message };
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else if (result.error) {
    console.error(`ERROR ${result.error}`);
  } else if (result.valid) {
    console.log(`Checked ${result.conditionsChecked} condition(s): all valid`);
  } else {
    for (const issue of result.issues) {
      console.error(`ERROR ${issue.condition}[${issue.index}]: ${issue.error}`);
    }
    console.log('');
    console.log(`${result.conditionsChecked} condition(s), ${result.issues.length} error(s)`);
  }

  return result;
}
