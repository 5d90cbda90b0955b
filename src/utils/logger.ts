/**
 * Leveled console logger shared by the evaluator, config loader and CLI.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export interface LoggerOptions {
  prefix?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse a level name from configuration, falling back when it is unknown.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

function formatLine(prefix: string, level: string, message: string, meta?: LogMeta): string {
  const head = `[${prefix}] ${level.toUpperCase()} ${message}`;
  if (!meta || Object.keys(meta).length === 0) return head;
  return `${head} ${JSON.stringify(meta)}`;
}

export function createLogger(level: LogLevel, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = options.prefix ?? 'condition-gate';

  const enabled = (l: Exclude<LogLevel, 'silent'>): boolean => LEVEL_ORDER[l] >= threshold;

  return {
    debug(message, meta) {
      if (enabled('debug')) console.log(formatLine(prefix, 'debug', message, meta));
    },
    info(message, meta) {
      if (enabled('info')) console.log(formatLine(prefix, 'info', message, meta));
    },
    warn(message, meta) {
      if (enabled('warn')) console.warn(formatLine(prefix, 'warn', message, meta));
    },
    error(message, meta) {
      if (enabled('error')) console.error(formatLine(prefix, 'error', message, meta));
    },
  };
}
