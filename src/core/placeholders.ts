/**
 * Placeholder resolution seam.
 *
 * The engine never looks values up itself. Hosts inject a resolver that
 * substitutes the references it knows and leaves the rest untouched.
 *
 * @module core/placeholders
 */

import type { Logger } from '../utils/logger.js';

export interface PlaceholderResolver<TContext> {
  resolve(context: TContext, text: string): string;
}

export const passthroughResolver: PlaceholderResolver<unknown> = {
  resolve: (_context, text) => text,
};

const MAX_PASSES = 10;
const PLACEHOLDER = /%([^%\s]+)%/g;

/**
 * Resolver backed by a fixed table of `%name%` values (names are matched
 * case-insensitively). Values may reference other names; substitution is
 * repeated until the text stops changing, up to ten passes; text that is
 * still changing after that is returned as-is with a warning.
 */
export function createStaticResolver(
  values: Readonly<Record<string, string>>,
  logger?: Logger,
): PlaceholderResolver<unknown> {
  const table = new Map<string, string>();
  for (const [name, value] of Object.entries(values)) {
    table.set(name.toLowerCase(), value);
  }

  const substitute = (text: string): string =>
    text.replace(PLACEHOLDER, (match: string, name: string) => table.get(name.toLowerCase()) ?? match);

  return {
    resolve(_context, text) {
      let current = text;
      for (let pass = 0; pass < MAX_PASSES; pass++) {
        const next = substitute(current);
        if (next === current) return next;
        current = next;
      }
      logger?.warn('Placeholder expansion did not settle', { text, passes: MAX_PASSES });
      return current;
    },
  };
}
