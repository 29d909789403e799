/**
 * Unified Configuration Management
 *
 * Supports multiple configuration sources:
 * - JSON files (base + environment-specific)
 * - Environment variables (for k8s/docker)
 *
 * Priority order (lowest to highest):
 * 1. Base config file
 * 2. Environment-specific config file
 * 3. Environment variables (highest priority - overrides everything)
 *
 * The loader returns plain data; each service validates it into its own
 * typed config (see `assertValid`).
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { logger } from '../logger.js';
import { getErrorMessage } from '../errors.js';

export type ConfigRecord = Record<string, unknown>;

export interface ConfigLoaderOptions {
  /** Service name (e.g., 'auth-service'); also the env var prefix */
  serviceName: string;
  /** Base config file path (relative to cwd or absolute) */
  configFile?: string;
  /** Environment (development, staging, production) */
  environment?: string;
  /** Whether to use environment variables (default: true) */
  useEnvVars?: boolean;
  /** Environment to read variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from every source, merged by priority
 *
 * @example
 * const raw = await loadConfig({
 *   serviceName: 'auth-service',
 *   configFile: './config/default.json',
 * });
 */
export async function loadConfig(options: ConfigLoaderOptions): Promise<ConfigRecord> {
  const {
    serviceName,
    configFile,
    env = process.env,
    environment = env.NODE_ENV || 'development',
    useEnvVars = true,
  } = options;

  let mergedConfig: ConfigRecord = {};

  // 1. Base config file
  if (configFile) {
    const baseConfig = await loadOptionalConfigFile(configFile);
    if (baseConfig) {
      mergedConfig = deepMerge(mergedConfig, baseConfig);
      logger.debug('Loaded base config file', { serviceName, configFile });
    }
  }

  // 2. Environment-specific config file
  if (environment && configFile) {
    const envConfigPath = configFile.replace(/\.json$/, `.${environment}.json`);
    const envConfig = envConfigPath === configFile ? null : await loadOptionalConfigFile(envConfigPath);
    if (envConfig) {
      mergedConfig = deepMerge(mergedConfig, envConfig);
      logger.debug('Loaded environment-specific config', { serviceName, environment, envConfigPath });
    }
  }

  // 3. Environment variables (highest priority)
  if (useEnvVars) {
    const envConfig = loadConfigFromEnv(serviceName, env);
    mergedConfig = deepMerge(mergedConfig, envConfig);
    logger.debug('Applied environment variable overrides', { serviceName, keys: Object.keys(envConfig) });
  }

  return mergedConfig;
}

function isPlainObject(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` into `base`. Nested objects merge key by key; arrays and
 * scalars replace.
 */
export function deepMerge(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return result;
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load config from a JSON file. A missing file yields null; a malformed one throws.
 */
async function loadOptionalConfigFile(filePath: string): Promise<ConfigRecord | null> {
  const resolvedPath = path.isAbsolute(filePath)
    ? filePath
    : path.resolve(process.cwd(), filePath);

  let content: string;
  try {
    content = await readFile(resolvedPath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) return null;
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid JSON in config file ${resolvedPath}: ${getErrorMessage(error)}`);
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file ${resolvedPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Load config from environment variables
 * Converts env vars to config object using naming convention:
 * - SERVICE_NAME_CONFIG_KEY -> configKey
 * - SERVICE_NAME_CONFIG_KEY__NESTED_KEY -> configKey.nestedKey
 *
 * @example
 * AUTH_SERVICE_MAX_LOGIN_ATTEMPTS=3 -> { maxLoginAttempts: 3 }
 * AUTH_SERVICE_SMTP__HOST=localhost -> { smtp: { host: 'localhost' } }
 */
export function loadConfigFromEnv(serviceName: string, env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const prefix = serviceName.toUpperCase().replace(/-/g, '_') + '_';
  const config: ConfigRecord = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(prefix) || value === undefined) continue;

    const configPath = key
      .slice(prefix.length)
      .split('__')
      .map(toCamelCase);

    let current = config;
    for (const part of configPath.slice(0, -1)) {
      const next = current[part];
      if (isPlainObject(next)) {
        current = next;
      } else {
        const created: ConfigRecord = {};
        current[part] = created;
        current = created;
      }
    }
    current[configPath[configPath.length - 1]] = parseEnvValue(value);
  }

  return config;
}

/** SESSION_LIFETIME_MS -> sessionLifetimeMs */
function toCamelCase(segment: string): string {
  return segment
    .toLowerCase()
    .split('_')
    .filter(Boolean)
    .map((word, idx) => (idx === 0 ? word : word.charAt(0).toUpperCase() + word.slice(1)))
    .join('');
}

/**
 * Parse environment variable value (handle booleans, numbers, JSON)
 */
export function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;

  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d*\.\d+$/.test(value)) return parseFloat(value);

  if ((value.startsWith('{') && value.endsWith('}')) ||
      (value.startsWith('[') && value.endsWith(']'))) {
    try {
      return JSON.parse(value);
    } catch {
      // Not valid JSON, keep the raw string
      return value;
    }
  }

  return value;
}
