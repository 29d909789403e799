/**
 * Authentication Service Configuration
 *
 * Priority order (lowest to highest):
 * 1. Registered defaults (config-defaults.ts)
 * 2. config/default.json, then config/default.<NODE_ENV>.json
 * 3. Environment variables (AUTH_SERVICE_SESSION_LIFETIME_MS, AUTH_SERVICE_SMTP__HOST, ...)
 * 4. Explicit overrides passed by the caller
 *
 * The merged result is validated with arktype; policy values such as the
 * session lifetime are never hard-coded in the components.
 */

import { fileURLToPath } from 'node:url';
import {
  ValidationError,
  assertValid,
  deepMerge,
  loadConfig,
  type,
  type ConfigRecord,
} from 'core-service';
import { getDefaultValues, getSensitivePaths } from './config-defaults.js';

// Service name constant
export const SERVICE_NAME = 'auth-service';

export const DEFAULT_CONFIG_FILE = fileURLToPath(new URL('../config/default.json', import.meta.url));
export const DEFAULT_ACCESS_MODEL_FILE = fileURLToPath(new URL('../config/access-model.json', import.meta.url));

export const authConfigSchema = type({
  serviceName: 'string > 0',
  sessionLifetimeMs: 'number.integer > 0',
  sessionRefreshMs: 'number.integer >= 0',
  maxLoginAttempts: 'number.integer > 0',
  activationWindowMs: 'number.integer > 0',
  bcryptRounds: 'number.integer >= 4',
  defaultRoleId: 'string > 0',
  anonymousRoleId: 'string > 0',
  accessModelFile: 'string',
  baseUrl: 'string > 0',
  mongoUri: 'string',
  dbName: 'string > 0',
  smtp: {
    host: 'string',
    port: 'number.integer > 0',
    secure: 'boolean',
    user: 'string',
    password: 'string',
    from: 'string',
  },
  log: {
    level: "'debug' | 'info' | 'warn' | 'error' | 'critical'",
    format: "'json' | 'text' | 'pretty'",
  },
});

export type AuthConfig = typeof authConfigSchema.infer;

export interface LoadAuthConfigOptions {
  /** Base config file (default: the bundled config/default.json) */
  configFile?: string;
  /** Environment name for the env-specific file (default: NODE_ENV) */
  environment?: string;
  /** Environment variables (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Highest-priority values, e.g. from tests or a CLI */
  overrides?: ConfigRecord;
}

/**
 * Load and validate the auth-service configuration
 */
export async function loadAuthConfig(options: LoadAuthConfigOptions = {}): Promise<AuthConfig> {
  const loaded = await loadConfig({
    serviceName: SERVICE_NAME,
    configFile: options.configFile ?? DEFAULT_CONFIG_FILE,
    environment: options.environment,
    env: options.env,
  });

  const merged = deepMerge(deepMerge(getDefaultValues(), loaded), options.overrides ?? {});
  return validateAuthConfig(merged);
}

/**
 * Validate a raw config object (already merged over the defaults)
 */
export function validateAuthConfig(raw: ConfigRecord): AuthConfig {
  const config = assertValid(authConfigSchema(raw), 'auth-service configuration');

  if (config.sessionRefreshMs >= config.sessionLifetimeMs) {
    throw new ValidationError('Invalid auth-service configuration: sessionRefreshMs must be lower than sessionLifetimeMs', {
      sessionRefreshMs: config.sessionRefreshMs,
      sessionLifetimeMs: config.sessionLifetimeMs,
    });
  }
  return config;
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function maskPath(record: ConfigRecord, keys: string[]): ConfigRecord {
  const [head, ...rest] = keys;
  const value = record[head];
  if (rest.length === 0) {
    return value ? { ...record, [head]: '***' } : record;
  }
  return isRecord(value) ? { ...record, [head]: maskPath(value, rest) } : record;
}

/**
 * Copy of the config safe for logging: non-empty sensitive values are masked
 */
export function redactConfig(config: AuthConfig): ConfigRecord {
  let copy: ConfigRecord = { ...config };
  for (const path of getSensitivePaths()) {
    copy = maskPath(copy, path.split('.'));
  }
  return copy;
}
