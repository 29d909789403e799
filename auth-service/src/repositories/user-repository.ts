/**
 * User Repository
 *
 * MongoDB data access for users. The e-mail is unique (see ensureAuthIndexes);
 * a clash on insert surfaces as DuplicateError, any other driver failure as
 * StorageError.
 */

import { DuplicateError, withMongo, type Collection, type Db } from 'core-service';
import type { User, UserRepository, UserStatus } from '../types.js';

export interface UserDocument {
  _id: string;
  email: string;
  passwordHash: string;
  status: UserStatus;
  roleId: string;
  createdAt: Date;
  updatedAt: Date;
}

export function toUser(doc: UserDocument): User {
  return {
    id: doc._id,
    email: doc.email,
    passwordHash: doc.passwordHash,
    status: doc.status,
    roleId: doc.roleId,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function toUserDocument(user: User): UserDocument {
  return {
    _id: user.id,
    email: user.email,
    passwordHash: user.passwordHash,
    status: user.status,
    roleId: user.roleId,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}

export class MongoUserRepository implements UserRepository {
  static readonly collectionName = 'users';
  private collection: Collection<UserDocument>;

  constructor(db: Db) {
    this.collection = db.collection<UserDocument>(MongoUserRepository.collectionName);
  }

  async findById(userId: string): Promise<User | null> {
    const doc = await withMongo('users.findById', () => this.collection.findOne({ _id: userId }));
    return doc ? toUser(doc) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const doc = await withMongo('users.findByEmail', () => this.collection.findOne({ email }));
    return doc ? toUser(doc) : null;
  }

  async insert(user: User): Promise<void> {
    await withMongo(
      'users.insert',
      () => this.collection.insertOne(toUserDocument(user)),
      () => new DuplicateError('Email already registered', { email: user.email })
    );
  }

  async updateStatus(userId: string, status: UserStatus, updatedAt: Date): Promise<User | null> {
    const doc = await withMongo('users.updateStatus', () =>
      this.collection.findOneAndUpdate(
        { _id: userId },
        { $set: { status, updatedAt } },
        { returnDocument: 'after' }
      )
    );
    return doc ? toUser(doc) : null;
  }

  async updateRole(userId: string, roleId: string, updatedAt: Date): Promise<User | null> {
    const doc = await withMongo('users.updateRole', () =>
      this.collection.findOneAndUpdate(
        { _id: userId },
        { $set: { roleId, updatedAt } },
        { returnDocument: 'after' }
      )
    );
    return doc ? toUser(doc) : null;
  }

  async deleteById(userId: string): Promise<boolean> {
    const result = await withMongo('users.deleteById', () => this.collection.deleteOne({ _id: userId }));
    return result.deletedCount > 0;
  }
}
