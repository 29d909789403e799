/**
 * Configurable Logger - Zero dependencies
 * Supports log streaming to subscribers (for real-time monitoring and tests)
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical';
export type LogFormat = 'json' | 'text' | 'pretty';

// ═══════════════════════════════════════════════════════════════════
// Log Entry Type (for streaming)
// ═══════════════════════════════════════════════════════════════════

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  correlationId?: string;
  data?: Record<string, unknown>;
}

export type LogSubscriber = (entry: LogEntry) => void;

// ═══════════════════════════════════════════════════════════════════
// Correlation ID Management (request-scoped)
// ═══════════════════════════════════════════════════════════════════

const correlationStore = new AsyncLocalStorage<string>();

/**
 * Get current correlation ID
 */
export function getCorrelationId(): string | undefined {
  return correlationStore.getStore();
}

/**
 * Generate a new correlation ID
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Run function with correlation ID context
 */
export function withCorrelationId<T>(id: string, fn: () => Promise<T>): Promise<T> {
  return correlationStore.run(id, fn);
}

// ═══════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════

export interface LoggerConfig {
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Output format (default: 'json') */
  format?: LogFormat;
  /** Include timestamp (default: true) */
  timestamp?: boolean;
  /** Service name to include in logs */
  service?: string;
  /** Custom metadata to include in every log */
  metadata?: Record<string, unknown>;
  /** Write to stdout/stderr (default: true). Subscribers are notified either way. */
  output?: boolean;
}

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, critical: 4 };

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in levels;
}

type ResolvedLoggerConfig = Required<Omit<LoggerConfig, 'metadata'>> & { metadata?: Record<string, unknown> };

let config: ResolvedLoggerConfig = {
  level: 'info',
  format: 'json',
  timestamp: true,
  service: '',
  output: true,
};

// ═══════════════════════════════════════════════════════════════════
// Log Subscribers (for streaming)
// ═══════════════════════════════════════════════════════════════════

const subscribers = new Set<LogSubscriber>();

export function subscribeToLogs(subscriber: LogSubscriber): () => void {
  subscribers.add(subscriber);
  return () => {
    subscribers.delete(subscriber);
  };
}

function notifySubscribers(level: LogLevel, service: string, message: string, data?: Record<string, unknown>): void {
  if (subscribers.size === 0) return;

  const correlationId = getCorrelationId();
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    service: service || 'unknown',
    message,
    ...(correlationId && { correlationId }),
    data,
  };

  for (const subscriber of subscribers) {
    try {
      subscriber(entry);
    } catch (error) {
      // A failing subscriber is dropped so it cannot break every later log call
      subscribers.delete(subscriber);
      process.stderr.write(`Log subscriber removed after error: ${String(error)}\n`);
    }
  }
}

// ═══════════════════════════════════════════════════════════════════
// Formatters
// ═══════════════════════════════════════════════════════════════════

const colors: Record<LogLevel | 'reset', string> = {
  reset: '\x1b[0m',
  debug: '\x1b[36m',    // cyan
  info: '\x1b[32m',     // green
  warn: '\x1b[33m',     // yellow
  error: '\x1b[31m',    // red
  critical: '\x1b[35m', // magenta
};

type Formatter = (level: LogLevel, service: string, message: string, data?: Record<string, unknown>) => string;

const formatJson: Formatter = (level, service, message, data) => {
  const correlationId = getCorrelationId();
  return JSON.stringify({
    ...(config.timestamp && { timestamp: new Date().toISOString() }),
    level,
    ...(service && { service }),
    ...(correlationId && { correlationId }),
    message,
    ...config.metadata,
    ...data,
  });
};

const formatText: Formatter = (level, service, message, data) => {
  const parts: string[] = [];
  if (config.timestamp) parts.push(new Date().toISOString());
  parts.push(`[${level.toUpperCase()}]`);
  if (service) parts.push(`[${service}]`);
  const correlationId = getCorrelationId();
  if (correlationId) parts.push(`[${correlationId}]`);
  parts.push(message);
  if (data && Object.keys(data).length > 0) {
    parts.push(JSON.stringify(data));
  }
  return parts.join(' ');
};

const formatPretty: Formatter = (level, service, message, data) => {
  const color = colors[level];
  const parts: string[] = [];
  if (config.timestamp) parts.push(`\x1b[90m${new Date().toISOString()}\x1b[0m`);
  parts.push(`${color}${level.toUpperCase().padEnd(8)}${colors.reset}`);
  if (service) parts.push(`\x1b[90m[${service}]\x1b[0m`);
  const correlationId = getCorrelationId();
  if (correlationId) parts.push(`\x1b[90m[${correlationId}]\x1b[0m`);
  parts.push(message);
  if (data && Object.keys(data).length > 0) {
    parts.push(`\x1b[90m${JSON.stringify(data)}\x1b[0m`);
  }
  return parts.join(' ');
};

const formatters: Record<LogFormat, Formatter> = {
  json: formatJson,
  text: formatText,
  pretty: formatPretty,
};

// ═══════════════════════════════════════════════════════════════════
// Core Logger
// ═══════════════════════════════════════════════════════════════════

function log(level: LogLevel, service: string, message: string, data?: Record<string, unknown>): void {
  if (levels[level] < levels[config.level]) return;

  if (config.output) {
    const formatted = formatters[config.format](level, service, message, data);
    const stream = levels[level] >= levels.error ? process.stderr : process.stdout;
    stream.write(formatted + '\n');
  }

  notifySubscribers(level, service, message, data);
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  critical(msg: string, data?: Record<string, unknown>): void;
}

export const logger: Logger & {
  configure(cfg: LoggerConfig): void;
  getConfig(): ResolvedLoggerConfig;
} = {
  debug: (msg, data) => log('debug', config.service, msg, data),
  info: (msg, data) => log('info', config.service, msg, data),
  warn: (msg, data) => log('warn', config.service, msg, data),
  error: (msg, data) => log('error', config.service, msg, data),
  critical: (msg, data) => log('critical', config.service, msg, data),

  /** Configure logger settings */
  configure: (cfg: LoggerConfig) => {
    config = { ...config, ...cfg };
  },

  /** Get current configuration */
  getConfig: () => ({ ...config }),
};

// ═══════════════════════════════════════════════════════════════════
// Convenience Functions
// ═══════════════════════════════════════════════════════════════════

export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

export function configureLogger(cfg: LoggerConfig): void {
  logger.configure(cfg);
}

// ═══════════════════════════════════════════════════════════════════
// Child Logger (for creating scoped loggers)
// ═══════════════════════════════════════════════════════════════════

export function createChildLogger(childConfig: { service?: string; metadata?: Record<string, unknown> }): Logger {
  const childMeta = childConfig.metadata ?? {};
  const service = () => childConfig.service || config.service;

  return {
    debug: (msg, data) => log('debug', service(), msg, { ...childMeta, ...data }),
    info: (msg, data) => log('info', service(), msg, { ...childMeta, ...data }),
    warn: (msg, data) => log('warn', service(), msg, { ...childMeta, ...data }),
    error: (msg, data) => log('error', service(), msg, { ...childMeta, ...data }),
    critical: (msg, data) => log('critical', service(), msg, { ...childMeta, ...data }),
  };
}
