#!/usr/bin/env node

import { evalExpression } from './commands/eval.js';
import { check } from './commands/check.js';
import { lint } from './commands/lint.js';
import { parseArgs } from './args.js';

const VERSION = '0.1.0';

function printHelp(): void {
  console.log(`
condition-gate - boolean condition expressions for configuration

Usage:
  condition-gate <command> [options]

Commands:
  eval <expression>                 Evaluate a single expression
  check <file> <name>               Evaluate a named condition from a conditions file
  lint <file>                       Compile every condition line in a file
  version                           Show version information
  help                              Show this help message

Options:
  --var <name=value>  Placeholder value for %name% (repeatable)
  --json              Output as JSON
  --verbose           Debug logging
  --help, -h          Show help

Exit Codes:
  0  Condition true / file valid
  1  Condition false / lint errors
  2  Usage, parse or config error

Examples:
  condition-gate eval "%level% >= 10" --var level=12
  condition-gate check conditions.yaml vip --var rank=gold
  condition-gate lint conditions.yaml
`);
}

function printVersion(): void {
  console.log(`condition-gate v${VERSION}`);
}

async function main(): Promise<void> {
  const { command, positionals, flags, vars } = parseArgs(process.argv.slice(2));

  if (flags['help'] || command === 'help' || !command) {
    printHelp();
    process.exit(0);
  }

  if (flags['version'] || command === 'version') {
    printVersion();
    process.exit(0);
  }

  switch (command) {
    case 'eval': {
      const result = await evalExpression({
        expression: positionals[0],
        vars,
        json: flags['json'],
        verbose: flags['verbose'],
      });
      process.exit(result.status === 'true' ? 0 : result.status === 'false' ? 1 : 2);
      break;
    }

    case 'check': {
      const result = await check({
        path: positionals[0],
        name: positionals[1],
        vars,
        json: flags['json'],
        verbose: flags['verbose'],
      });
      process.exit(result.status === 'true' ? 0 : result.status === 'false' ? 1 : 2);
      break;
    }

    case 'lint': {
      const result = await lint({ path: positionals[0], json: flags['json'] });
      process.exit(result.error ? 2 : result.valid ? 0 : 1);
      break;
    }

    default:
      console.error(`Unknown command: ${command}`);
      console.error('Run "condition-gate help" for usage information.');
      process.exit(2);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(2);
});
