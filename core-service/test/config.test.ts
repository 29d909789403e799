/**
 * Configuration Loader - Test Suite
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeAll, describe, expect, it } from 'vitest';
import { configureLogger, deepMerge, loadConfig, loadConfigFromEnv, parseEnvValue } from '../src/index.js';

beforeAll(() => {
  configureLogger({ output: false });
});

let tempDir: string | null = null;

afterEach(async () => {
  if (tempDir) {
    await rm(tempDir, { recursive: true, force: true });
    tempDir = null;
  }
});

async function writeFiles(files: Record<string, string>): Promise<string> {
  tempDir = await mkdtemp(path.join(tmpdir(), 'core-config-'));
  for (const [name, content] of Object.entries(files)) {
    await writeFile(path.join(tempDir, name), content);
  }
  return tempDir;
}

describe('deepMerge', () => {
  it('should merge nested objects and replace scalars and arrays', () => {
    const merged = deepMerge(
      { a: 1, nested: { x: 1, y: 2 }, list: [1, 2] },
      { nested: { y: 3 }, list: [9] }
    );

    expect(merged).toEqual({ a: 1, nested: { x: 1, y: 3 }, list: [9] });
  });

  it('should leave both inputs untouched', () => {
    const base = { nested: { x: 1 } };

    deepMerge(base, { nested: { x: 2 } });

    expect(base).toEqual({ nested: { x: 1 } });
  });
});

describe('parseEnvValue', () => {
  it('should parse booleans, numbers and JSON', () => {
    expect(parseEnvValue('true')).toBe(true);
    expect(parseEnvValue('false')).toBe(false);
    expect(parseEnvValue('42')).toBe(42);
    expect(parseEnvValue('-1.5')).toBe(-1.5);
    expect(parseEnvValue('{"a":1}')).toEqual({ a: 1 });
    expect(parseEnvValue('[1,2]')).toEqual([1, 2]);
  });

  it('should keep anything else as a string', () => {
    expect(parseEnvValue('mongodb://localhost:27017')).toBe('mongodb://localhost:27017');
    expect(parseEnvValue('{broken')).toBe('{broken');
  });
});

describe('loadConfigFromEnv', () => {
  it('should map prefixed variables to camel-cased nested keys', () => {
    const config = loadConfigFromEnv('auth-service', {
      AUTH_SERVICE_SESSION_LIFETIME_MS: '60000',
      AUTH_SERVICE_SMTP__HOST: 'mail.example.test',
      AUTH_SERVICE_SMTP__PORT: '25',
      OTHER_SERVICE_VALUE: 'ignored',
    });

    expect(config).toEqual({
      sessionLifetimeMs: 60000,
      smtp: { host: 'mail.example.test', port: 25 },
    });
  });
});

describe('loadConfig', () => {
  it('should layer base file, environment file and variables', async () => {
    const dir = await writeFiles({
      'default.json': JSON.stringify({ a: 1, b: 1, c: 1 }),
      'default.production.json': JSON.stringify({ b: 2, c: 2 }),
    });

    const config = await loadConfig({
      serviceName: 'demo',
      configFile: path.join(dir, 'default.json'),
      environment: 'production',
      env: { DEMO_C: '3' },
    });

    expect(config).toEqual({ a: 1, b: 2, c: 3 });
  });

  it('should treat missing files as empty', async () => {
    const config = await loadConfig({
      serviceName: 'demo',
      configFile: path.join(tmpdir(), 'no-such-dir', 'default.json'),
      env: {},
    });

    expect(config).toEqual({});
  });

  it('should reject a file that is not valid JSON', async () => {
    const dir = await writeFiles({ 'default.json': '{ not json' });

    await expect(loadConfig({
      serviceName: 'demo',
      configFile: path.join(dir, 'default.json'),
      env: {},
    })).rejects.toThrow(/Invalid JSON in config file/);
  });
});
