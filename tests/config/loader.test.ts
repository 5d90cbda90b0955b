import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseConditionsConfig, loadConditionsFile, ConfigError } from '../../src/config/loader.js';
import { VIP_CONDITIONS } from '../fixtures.js';

function configErrorOf(content: string): ConfigError {
  try {
    parseConditionsConfig(content);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('Expected config to be rejected');
}

describe('parseConditionsConfig', () => {
  it('should normalize a valid file', () => {
    const config = parseConditionsConfig(VIP_CONDITIONS);

    expect(config.version).toBe(1);
    expect(config.source).toBe('<inline>');
    expect(config.settings).toEqual({ logLevel: 'silent', cacheSize: 16 });
    expect(config.placeholders).toEqual({ rank: 'gold', level: '12' });
    expect(config.conditions.get('vip')).toEqual({
      name: 'vip',
      description: 'Gold members above level ten',
      all: ['%rank% == gold', '%level% >= 10'],
    });
    expect(config.conditions.get('open')?.all).toEqual([]);
  });

  it('should apply default settings', () => {
    const config = parseConditionsConfig('version: 1\nconditions: {}\n');
    expect(config.settings).toEqual({ logLevel: 'warn', cacheSize: 256 });
    expect(config.placeholders).toEqual({});
    expect(config.conditions.size).toBe(0);
  });

  it('should accept JSON input', () => {
    const config = parseConditionsConfig('{"version": 1, "conditions": {"a": {"all": ["1 > 0"]}}}');
    expect(config.conditions.get('a')?.all).toEqual(['1 > 0']);
  });

  it('should report a missing conditions map', () => {
    const err = configErrorOf('version: 1\n');
    expect(err.issues).toContainEqual({
      path: '/',
      message: "must have required property 'conditions'",
    });
  });

  it('should report an unsupported version', () => {
    const err = configErrorOf('version: 2\nconditions: {}\n');
    expect(err.issues).toContainEqual({ path: '/version', message: 'must be equal to constant' });
  });

  it('should report non-string condition lines with their path', () => {
    const err = configErrorOf('version: 1\nconditions:\n  a:\n    all: [1]\n');
    expect(err.issues).toContainEqual({ path: '/conditions/a/all/0', message: 'must be string' });
  });

  it('should report an empty document', () => {
    const err = configErrorOf('');
    expect(err.issues).toContainEqual({ path: '/', message: 'must be object' });
  });

  it('should wrap YAML syntax errors', () => {
    const err = configErrorOf('conditions: [unclosed\n');
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0].path).toBe('/');
    expect(err.issues[0].message.startsWith('YAML parse error: ')).toBe(true);
  });

  it('should list issues in the error message', () => {
    const err = configErrorOf('version: 2\nconditions: {}\n');
    expect(err.message).toBe('Invalid conditions config (<inline>):\n  - /version: must be equal to constant');
  });
});

describe('loadConditionsFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'condition-gate-loader-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load a file from disk', () => {
    const path = join(dir, 'conditions.yaml');
    writeFileSync(path, VIP_CONDITIONS, 'utf-8');

    const config = loadConditionsFile(path);
    expect(config.source).toBe(path);
    expect([...config.conditions.keys()]).toEqual(['vip', 'open']);
  });

  it('should reject a missing file', () => {
    const path = join(dir, 'missing.yaml');
    expect(() => loadConditionsFile(path)).toThrow(ConfigError);
    expect(() => loadConditionsFile(path)).toThrow(`Invalid conditions config (${path}):\n  - /: File not found`);
  });
});
