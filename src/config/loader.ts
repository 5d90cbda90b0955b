// src/config/loader.ts
// Load, validate and normalize conditions files

import { existsSync, readFileSync } from 'node:fs';
import { createRequire } from 'node:module';
import { parse as parseYaml } from 'yaml';
import type { ErrorObject, Options, ValidateFunction } from 'ajv';
import {
  CONDITIONS_SCHEMA,
  DEFAULT_SETTINGS,
  type ConditionDefinition,
  type ConditionsConfig,
  type RawConditionsConfig,
} from './schema.js';

const require = createRequire(import.meta.url);

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(source: string, issues: ConfigIssue[]) {
    const summary = issues
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');
    super(`Invalid conditions config (${source}):\n${summary}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

type Ajv2020Constructor = new (opts: Options) => {
  compile<T>(schema: object): ValidateFunction<T>;
};

let validateConfig: ValidateFunction<RawConditionsConfig> | null = null;

function getValidator(): ValidateFunction<RawConditionsConfig> {
  if (!validateConfig) {
    const { Ajv2020 } = require('ajv/dist/2020') as { Ajv2020: Ajv2020Constructor };
    validateConfig = new Ajv2020({ allErrors: true }).compile<RawConditionsConfig>(CONDITIONS_SCHEMA);
  }
  return validateConfig;
}

function toIssues(errors: readonly ErrorObject[]): ConfigIssue[] {
  return errors.map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'is invalid',
  }));
}

function normalize(raw: RawConditionsConfig, source: string): ConditionsConfig {
  const placeholders: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw.placeholders ?? {})) {
    placeholders[name] = String(value);
  }

  const conditions = new Map<string, ConditionDefinition>();
  for (const [name, def] of Object.entries(raw.conditions)) {
    conditions.set(name, { name, description: def.description, all: [...def.all] });
  }

  return {
    version: 1,
    source,
    settings: {
      logLevel: raw.settings?.log_level ?? DEFAULT_SETTINGS.logLevel,
      cacheSize: raw.settings?.cache_size ?? DEFAULT_SETTINGS.cacheSize,
    },
    placeholders,
    conditions,
  };
}

/**
 * Parse conditions YAML (JSON is valid YAML too) and validate it.
 */
export function parseConditionsConfig(content: string, source = '<inline>'): ConditionsConfig {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (err) {
    throw new ConfigError(source, [{
      path: '/',
      message: `YAML parse error: ${err instanceof Error ? err.message : String(err)}`,
    }]);
  }

  const validate = getValidator();
  if (!validate(data)) {
    throw new ConfigError(source, toIssues(validate.errors ?? []));
  }
  return normalize(data, source);
}

export function loadConditionsFile(path: string): ConditionsConfig {
  if (!existsSync(path)) {
    throw new ConfigError(path, [{ path: '/', message: 'File not found' }]);
  }
  return parseConditionsConfig(readFileSync(path, 'utf-8'), path);
}
