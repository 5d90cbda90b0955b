export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Turn repeated `--var name=value` arguments into a placeholder table.
 * The value may itself contain `=`.
 */
export function parseVars(entries: readonly string[] = []): Record<string, string> {
  const values: Record<string, string> = {};
  for (const entry of entries) {
    const eq = entry.indexOf('=');
    if (eq <= 0) {
      throw new UsageError(`Invalid --var '${entry}', expected name=value`);
    }
    values[entry.slice(0, eq)] = entry.slice(eq + 1);
  }
  return values;
}
