/**
 * Minimal argv parser: first positional is the command, `--var` takes a
 * value and may repeat, every other `--flag` is boolean.
 */

export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, boolean>;
  vars: string[];
}

export function parseArgs(args: string[]): ParsedArgs {
  const flags: Record<string, boolean> = {};
  const positionals: string[] = [];
  const vars: string[] = [];
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--var' && i + 1 < args.length) {
      vars.push(args[++i]);
    } else if (arg.startsWith('--var=')) {
      vars.push(arg.slice('--var='.length));
    } else if (arg.startsWith('--')) {
      flags[arg.slice(2)] = true;
    } else if (arg === '-h') {
      flags['help'] = true;
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags, vars };
}
