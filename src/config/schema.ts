// src/config/schema.ts
// Conditions file schema, types and defaults

import type { LogLevel } from '../utils/logger.js';

export interface RawConditionDefinition {
  description?: string;
  all: string[];
}

/** Shape of a conditions file as written on disk. */
export interface RawConditionsConfig {
  version: 1;
  settings?: {
    log_level?: LogLevel;
    cache_size?: number;
  };
  placeholders?: Record<string, string | number | boolean>;
  conditions: Record<string, RawConditionDefinition>;
}

export interface ConditionDefinition {
  name: string;
  description?: string;
  all: string[];
}

export interface ConditionsSettings {
  logLevel: LogLevel;
  cacheSize: number;
}

export interface ConditionsConfig {
  version: 1;
  source: string;
  settings: ConditionsSettings;
  placeholders: Record<string, string>;
  conditions: Map<string, ConditionDefinition>;
}

export const DEFAULT_SETTINGS: ConditionsSettings = {
  logLevel: 'warn',
  cacheSize: 256,
};

export const CONDITIONS_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  required: ['version', 'conditions'],
  additionalProperties: false,
  properties: {
    version: { const: 1 },
    settings: {
      type: 'object',
      additionalProperties: false,
      properties: {
        log_level: { enum: ['debug', 'info', 'warn', 'error', 'silent'] },
        cache_size: { type: 'integer', minimum: 0 },
      },
    },
    placeholders: {
      type: 'object',
      additionalProperties: { type: ['string', 'number', 'boolean'] },
    },
    conditions: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['all'],
        additionalProperties: false,
        properties: {
          description: { type: 'string' },
          all: { type: 'array', items: { type: 'string' } },
        },
      },
    },
  },
} as const;
