/**
 * Repositories
 *
 * MongoDB and in-memory implementations of every auth-service store, and the
 * index definitions the MongoDB ones rely on.
 */

import { InMemoryPermissionRepository, InMemoryRoleRepository } from 'access-engine';
import type { PermissionRepository, RoleRepository } from 'access-engine';
import { logger, withMongo, type Db } from 'core-service';
import type { ActivationRepository, LoginRepository, UserRepository } from '../types.js';
import { MongoPermissionRepository, MongoRoleRepository } from './access-repository.js';
import { MongoActivationRepository } from './activation-repository.js';
import {
  InMemoryActivationRepository,
  InMemoryLoginRepository,
  InMemoryUserRepository,
} from './in-memory.js';
import { MongoLoginRepository } from './login-repository.js';
import { MongoUserRepository } from './user-repository.js';

export interface AuthRepositories {
  users: UserRepository;
  activations: ActivationRepository;
  logins: LoginRepository;
  roles: RoleRepository;
  permissions: PermissionRepository;
}

export function createMongoRepositories(db: Db): AuthRepositories {
  return {
    users: new MongoUserRepository(db),
    activations: new MongoActivationRepository(db),
    logins: new MongoLoginRepository(db),
    roles: new MongoRoleRepository(db),
    permissions: new MongoPermissionRepository(db),
  };
}

export function createInMemoryRepositories(): AuthRepositories {
  return {
    users: new InMemoryUserRepository(),
    activations: new InMemoryActivationRepository(),
    logins: new InMemoryLoginRepository(),
    roles: new InMemoryRoleRepository(),
    permissions: new InMemoryPermissionRepository(),
  };
}

/**
 * Create the indexes backing the uniqueness and lookup guarantees
 */
export async function ensureAuthIndexes(db: Db): Promise<void> {
  await withMongo('ensureAuthIndexes', async () => {
    await db.collection(MongoUserRepository.collectionName)
      .createIndex({ email: 1 }, { unique: true });
    await db.collection(MongoActivationRepository.collectionName)
      .createIndex({ token: 1 }, { unique: true });
    // Many rows carry a null token, so only string tokens take part
    await db.collection(MongoLoginRepository.collectionName)
      .createIndex({ sessionToken: 1 }, { unique: true, partialFilterExpression: { sessionToken: { $type: 'string' } } });
    await db.collection(MongoPermissionRepository.collectionName)
      .createIndex({ roleId: 1 });
  });
  logger.info('Auth indexes ensured', { database: db.databaseName });
}

export { MongoUserRepository, toUser, toUserDocument } from './user-repository.js';
export { MongoActivationRepository } from './activation-repository.js';
export { MongoLoginRepository } from './login-repository.js';
export { MongoRoleRepository, MongoPermissionRepository } from './access-repository.js';
export { InMemoryUserRepository, InMemoryActivationRepository, InMemoryLoginRepository } from './in-memory.js';
