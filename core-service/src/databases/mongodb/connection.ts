/**
 * MongoDB Connection
 *
 * Features:
 * - Connection pooling
 * - Write concern (configurable)
 * - Retryable reads/writes
 * - Health checks
 * - Pool exhaustion protection (waitQueueTimeoutMS)
 */

import { MongoClient, WriteConcern, type Db, type MongoClientOptions } from 'mongodb';
import { logger } from '../../common/logger.js';
import { StorageError, getErrorMessage } from '../../common/errors.js';

let client: MongoClient | null = null;
let db: Db | null = null;

// ═══════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════

export interface MongoConfig {
  uri: string;
  dbName?: string;
  maxPoolSize?: number;
  minPoolSize?: number;
  maxIdleTimeMS?: number;
  waitQueueTimeoutMS?: number;
  connectTimeoutMS?: number;
  socketTimeoutMS?: number;
  serverSelectionTimeoutMS?: number;
  writeConcern?: 'majority' | number;
  retryWrites?: boolean;
  retryReads?: boolean;
}

/** Default MongoDB configuration - can be used as base for customization */
export const DEFAULT_MONGO_CONFIG: Omit<Required<MongoConfig>, 'uri' | 'dbName'> = {
  maxPoolSize: 100,              // Max connections per node
  minPoolSize: 10,               // Keep warm connections
  maxIdleTimeMS: 30000,          // Close idle connections after 30s
  waitQueueTimeoutMS: 10000,     // Fail fast if pool exhausted
  connectTimeoutMS: 10000,
  socketTimeoutMS: 45000,
  serverSelectionTimeoutMS: 30000,
  writeConcern: 'majority',
  retryWrites: true,
  retryReads: true,
};

// ═══════════════════════════════════════════════════════════════════
// Connection
// ═══════════════════════════════════════════════════════════════════

function resolveDbName(uri: string, dbName?: string): string {
  if (dbName) return dbName.trim();
  const path = new URL(uri).pathname.slice(1);
  return path.split('?')[0].trim() || 'default';
}

export async function connectDatabase(uri: string, config: Partial<Omit<MongoConfig, 'uri'>> = {}): Promise<Db> {
  if (client && db) {
    logger.debug('Reusing MongoDB client', { database: db.databaseName });
    return db;
  }

  const cfg = { ...DEFAULT_MONGO_CONFIG, ...config };
  const clientOptions: MongoClientOptions = {
    maxPoolSize: cfg.maxPoolSize,
    minPoolSize: cfg.minPoolSize,
    maxIdleTimeMS: cfg.maxIdleTimeMS,
    waitQueueTimeoutMS: cfg.waitQueueTimeoutMS,
    connectTimeoutMS: cfg.connectTimeoutMS,
    socketTimeoutMS: cfg.socketTimeoutMS,
    serverSelectionTimeoutMS: cfg.serverSelectionTimeoutMS,
    writeConcern: new WriteConcern(cfg.writeConcern),
    retryWrites: cfg.retryWrites,
    retryReads: cfg.retryReads,
  };

  const dbName = resolveDbName(uri, config.dbName);
  const candidate = new MongoClient(uri, clientOptions);

  try {
    await candidate.connect();
  } catch (error) {
    logger.error('MongoDB connection failed', { error: getErrorMessage(error) });
    throw new StorageError('Could not connect to MongoDB', { database: dbName }, { cause: error });
  }

  client = candidate;
  db = client.db(dbName);
  logger.info('Connected to MongoDB', { database: dbName, maxPoolSize: cfg.maxPoolSize });
  return db;
}

export function getDatabase(): Db {
  if (!db) {
    throw new StorageError('Database not connected. Call connectDatabase() first.');
  }
  return db;
}

export async function closeDatabase(): Promise<void> {
  if (client) {
    await client.close();
    logger.info('MongoDB connection closed');
  }
  client = null;
  db = null;
}

/**
 * Ping `database` (default: the connected one)
 */
export async function checkDatabaseHealth(database?: Db): Promise<{ healthy: boolean; latencyMs: number }> {
  const start = Date.now();
  try {
    await (database ?? getDatabase()).command({ ping: 1 });
    return { healthy: true, latencyMs: Date.now() - start };
  } catch (error) {
    logger.warn('MongoDB health check failed', { error: getErrorMessage(error) });
    return { healthy: false, latencyMs: Date.now() - start };
  }
}
