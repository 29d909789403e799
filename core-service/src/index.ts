/**
 * Service-Core
 *
 * Shared infrastructure for the auth services: logging, typed errors,
 * configuration, resilience, locking and MongoDB access.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * API ORGANIZATION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   - Logger: logger, createChildLogger, subscribeToLogs
 *   - Errors: ServiceError and its kinds, withStorage, error code registry
 *   - Configuration: loadConfig, deepMerge
 *   - Resilience: retry
 *   - Concurrency: KeyedMutex, RwLock
 *   - MongoDB: connectDatabase, getDatabase, withMongo
 *   - Utilities: tokens, e-mail normalisation, clocks
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

// ═══════════════════════════════════════════════════════════════════
// Logger
// ═══════════════════════════════════════════════════════════════════
export {
  logger,
  setLogLevel,
  configureLogger,
  createChildLogger,
  subscribeToLogs,
  isLogLevel,
  getCorrelationId,
  generateCorrelationId,
  withCorrelationId,
} from './common/logger.js';
export type { Logger, LogLevel, LogFormat, LoggerConfig, LogEntry, LogSubscriber } from './common/logger.js';

// ═══════════════════════════════════════════════════════════════════
// Error Handling
// ═══════════════════════════════════════════════════════════════════
export {
  getErrorMessage,
  normalizeError,
  ServiceError,
  NotFoundError,
  DuplicateError,
  CycleError,
  AuthError,
  LockedError,
  ExpiredError,
  StorageError,
  ValidationError,
  isServiceError,
  isRetryableError,
  withStorage,
  registerServiceErrorCodes,
  getAllErrorCodes,
  extractServiceFromCode,
} from './common/errors.js';
export type { ServiceErrorKind } from './common/errors.js';

// ═══════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════
export { loadConfig, loadConfigFromEnv, deepMerge, parseEnvValue } from './common/config/loader.js';
export type { ConfigLoaderOptions, ConfigRecord } from './common/config/loader.js';

// ═══════════════════════════════════════════════════════════════════
// Retry
// ═══════════════════════════════════════════════════════════════════
export { retry, calculateDelay, STORAGE_READ_RETRY } from './common/resilience/retry.js';
export type { RetryConfig, RetryResult, RetryStrategy } from './common/resilience/retry.js';

// ═══════════════════════════════════════════════════════════════════
// Concurrency
// ═══════════════════════════════════════════════════════════════════
export { KeyedMutex, RwLock } from './common/locks.js';

// ═══════════════════════════════════════════════════════════════════
// Validation
// ═══════════════════════════════════════════════════════════════════
export { assertValid } from './common/validation/arktype.js';
export type { ValidationErrors } from './common/validation/arktype.js';
export { type } from 'arktype';

// ═══════════════════════════════════════════════════════════════════
// MongoDB
// ═══════════════════════════════════════════════════════════════════
export {
  connectDatabase,
  getDatabase,
  closeDatabase,
  checkDatabaseHealth,
  DEFAULT_MONGO_CONFIG,
} from './databases/mongodb/connection.js';
export type { MongoConfig } from './databases/mongodb/connection.js';
export { isDuplicateKeyError, withMongo } from './common/mongodb-errors.js';
export type { Db, Collection, Document, Filter } from 'mongodb';

// ═══════════════════════════════════════════════════════════════════
// Generic Utilities
// ═══════════════════════════════════════════════════════════════════
export {
  generateToken,
  maskToken,
  normalizeEmail,
  systemClock,
  addMilliseconds,
  hasExpired,
} from './common/utils.js';
export type { Clock } from './common/utils.js';
