import type { PlaceholderResolver } from '../src/core/placeholders.js';
import type { Executor } from '../src/core/executor.js';

/**
 * Resolver that records every operand it is asked for and substitutes
 * `%name%` from the context object.
 */
export function recordingResolver(): {
  resolver: PlaceholderResolver<Record<string, string>>;
  calls: string[];
} {
  const calls: string[] = [];
  const resolver: PlaceholderResolver<Record<string, string>> = {
    resolve(context, text) {
      calls.push(text);
      return text.replace(/%(\w+)%/g, (match: string, name: string) => context[name] ?? match);
    },
  };
  return { resolver, calls };
}

/** Executor that queues tasks until the test runs them. */
export function manualExecutor(): { executor: Executor; tasks: Array<() => void> } {
  const tasks: Array<() => void> = [];
  return { executor: (task) => { tasks.push(task); }, tasks };
}

/** Let pending promise continuations run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
