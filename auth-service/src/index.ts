/**
 * Authentication Service
 *
 * Account registration with e-mail activation, password login with lockout,
 * absolute-expiry sessions and role-based authorization of object ids over
 * an inheriting role graph.
 *
 * `createAuthServer` is the composition root: it picks the storage backend,
 * hydrates and seeds the access model and wires the components behind the
 * AuthServer front controller.
 */

import { AccessEngine } from 'access-engine';
import {
  checkDatabaseHealth,
  closeDatabase,
  configureLogger,
  connectDatabase,
  logger,
  registerServiceErrorCodes,
  type Clock,
  type Db,
} from 'core-service';
import { DEFAULT_ACCESS_MODEL_FILE, redactConfig, type AuthConfig } from './config.js';
import { AUTH_ERROR_CODES } from './error-codes.js';
import { EmailActivationNotifier, NoopActivationNotifier } from './notifications/activation-mailer.js';
import {
  createInMemoryRepositories,
  createMongoRepositories,
  ensureAuthIndexes,
  type AuthRepositories,
} from './repositories/index.js';
import { loadAccessModel, seedAccessModel, type AccessModel } from './seed.js';
import { AuthServer } from './server.js';
import { AccountStore } from './services/accounts.js';
import { ActivationManager } from './services/activations.js';
import { SessionManager } from './services/sessions.js';
import type { ActivationNotifier, PasswordHasher } from './types.js';
import { BcryptPasswordHasher } from './utils.js';

export interface CreateAuthServerOptions {
  /** Use this database instead of connecting with config.mongoUri */
  db?: Db;
  /** Use these stores directly (takes precedence over db and mongoUri) */
  repositories?: AuthRepositories;
  hasher?: PasswordHasher;
  notifier?: ActivationNotifier;
  clock?: Clock;
  /** Roles and permissions to seed instead of the configured file */
  accessModel?: AccessModel;
}

export interface AuthService {
  server: AuthServer;
  accounts: AccountStore;
  sessions: SessionManager;
  activations: ActivationManager;
  engine: AccessEngine;
  config: AuthConfig;
  /** Ping the MongoDB backend; other backends report healthy */
  health(): Promise<{ storage: string; healthy: boolean; latencyMs: number }>;
  /** Release the database connection opened for this service, if any */
  close(): Promise<void>;
}

interface ResolvedStorage {
  repositories: AuthRepositories;
  db: Db | null;
  /** Whether the connection was opened here (and is closed by close()) */
  connected: boolean;
  storage: 'provided' | 'mongodb' | 'memory';
}

async function resolveRepositories(
  config: AuthConfig,
  options: CreateAuthServerOptions
): Promise<ResolvedStorage> {
  if (options.repositories) {
    return { repositories: options.repositories, db: null, connected: false, storage: 'provided' };
  }

  let db = options.db;
  let connected = false;
  if (!db && config.mongoUri) {
    db = await connectDatabase(config.mongoUri, { dbName: config.dbName });
    connected = true;
  }
  if (db) {
    await ensureAuthIndexes(db);
    return { repositories: createMongoRepositories(db), db, connected, storage: 'mongodb' };
  }

  logger.warn('No MongoDB configured, using in-memory storage');
  return { repositories: createInMemoryRepositories(), db: null, connected: false, storage: 'memory' };
}

/**
 * Build a ready-to-serve auth service from a validated config
 */
export async function createAuthServer(
  config: AuthConfig,
  options: CreateAuthServerOptions = {}
): Promise<AuthService> {
  configureLogger({ level: config.log.level, format: config.log.format, service: config.serviceName });
  registerServiceErrorCodes(AUTH_ERROR_CODES);
  logger.info('Starting auth service', { config: redactConfig(config) });

  const { repositories, db, connected, storage } = await resolveRepositories(config, options);
  const { clock } = options;

  // Access model: stored roles and permissions first, then the seed on top
  const engine = new AccessEngine({
    roleRepository: repositories.roles,
    permissionRepository: repositories.permissions,
  });
  await engine.hydrate();
  const accessModel = options.accessModel
    ?? await loadAccessModel(config.accessModelFile || DEFAULT_ACCESS_MODEL_FILE);
  await seedAccessModel(engine, accessModel);

  const notifier = options.notifier ?? (config.smtp.host
    ? new EmailActivationNotifier(config.smtp, config.baseUrl)
    : new NoopActivationNotifier());

  const accounts: AccountStore = new AccountStore(repositories.users, {
    roles: engine.roles,
    clock,
    onRegistered: async user => {
      await activations.issue(user.id);
    },
  });
  const activations = new ActivationManager(
    repositories.activations,
    accounts,
    { activationWindowMs: config.activationWindowMs },
    { notifier, clock }
  );

  const hasher = options.hasher ?? new BcryptPasswordHasher(config.bcryptRounds);
  const sessions = new SessionManager(
    repositories.logins,
    accounts,
    hasher,
    {
      sessionLifetimeMs: config.sessionLifetimeMs,
      maxLoginAttempts: config.maxLoginAttempts,
      sessionRefreshMs: config.sessionRefreshMs,
    },
    { clock }
  );

  const server = new AuthServer({
    accounts,
    sessions,
    activations,
    engine,
    hasher,
    defaultRoleId: config.defaultRoleId,
    anonymousRoleId: config.anonymousRoleId,
  });

  logger.info('Auth service ready', { storage });

  return {
    server,
    accounts,
    sessions,
    activations,
    engine,
    config,
    async health() {
      if (!db) {
        return { storage, healthy: true, latencyMs: 0 };
      }
      return { storage, ...(await checkDatabaseHealth(db)) };
    },
    async close() {
      if (connected) {
        await closeDatabase();
      }
    },
  };
}

// ═══════════════════════════════════════════════════════════════════
// Public API
// ═══════════════════════════════════════════════════════════════════

export { AuthServer, REQUEST_TYPES } from './server.js';
export type { AuthRequestType, AuthResponse, AuthResponseData, AuthServerComponents } from './server.js';
export { AccountStore } from './services/accounts.js';
export { ActivationManager } from './services/activations.js';
export type { ActivationManagerOptions } from './services/activations.js';
export { SessionManager } from './services/sessions.js';
export type { SessionManagerOptions } from './services/sessions.js';
export {
  SERVICE_NAME,
  DEFAULT_CONFIG_FILE,
  DEFAULT_ACCESS_MODEL_FILE,
  authConfigSchema,
  loadAuthConfig,
  validateAuthConfig,
  redactConfig,
} from './config.js';
export type { AuthConfig, LoadAuthConfigOptions } from './config.js';
export { AUTH_CONFIG_DEFAULTS, getDefaultValues, getSensitivePaths } from './config-defaults.js';
export { AUTH_ERRORS, AUTH_ERROR_CODES, ERROR_CODE_BY_KIND } from './error-codes.js';
export type { AuthErrorCode } from './error-codes.js';
export { accessModelSchema, loadAccessModel, seedAccessModel } from './seed.js';
export type { AccessModel } from './seed.js';
export {
  ACTIVATION_SUBJECT,
  EmailActivationNotifier,
  NoopActivationNotifier,
} from './notifications/activation-mailer.js';
export type { SmtpSettings, EmailActivationNotifierOptions } from './notifications/activation-mailer.js';
export * from './repositories/index.js';
export { BCRYPT_ROUNDS, BcryptPasswordHasher, TOKEN_BYTES, generateSessionToken, buildActivationLink } from './utils.js';
export * from './types.js';
