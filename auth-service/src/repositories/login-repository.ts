/**
 * Login Repository
 *
 * One document per user holding the session token and the failed-attempt
 * counter. Counter updates are single atomic operations so concurrent
 * service instances cannot lose an increment.
 */

import { withMongo, type Collection, type Db } from 'core-service';
import type { Login, LoginRepository } from '../types.js';

export interface LoginDocument {
  /** user id */
  _id: string;
  sessionToken: string | null;
  attempts: number;
  createdAt: Date;
}

function toLogin(doc: LoginDocument): Login {
  return {
    userId: doc._id,
    sessionToken: doc.sessionToken,
    attempts: doc.attempts,
    createdAt: doc.createdAt,
  };
}

export class MongoLoginRepository implements LoginRepository {
  static readonly collectionName = 'logins';
  private collection: Collection<LoginDocument>;

  constructor(db: Db) {
    this.collection = db.collection<LoginDocument>(MongoLoginRepository.collectionName);
  }

  async findByUserId(userId: string): Promise<Login | null> {
    const doc = await withMongo('logins.findByUserId', () => this.collection.findOne({ _id: userId }));
    return doc ? toLogin(doc) : null;
  }

  async findBySessionToken(sessionToken: string): Promise<Login | null> {
    const doc = await withMongo('logins.findBySessionToken', () => this.collection.findOne({ sessionToken }));
    return doc ? toLogin(doc) : null;
  }

  async save(login: Login): Promise<void> {
    await withMongo('logins.save', () =>
      this.collection.replaceOne(
        { _id: login.userId },
        { sessionToken: login.sessionToken, attempts: login.attempts, createdAt: login.createdAt },
        { upsert: true }
      )
    );
  }

  async incrementAttempts(userId: string, at: Date): Promise<number> {
    const doc = await withMongo('logins.incrementAttempts', () =>
      this.collection.findOneAndUpdate(
        { _id: userId },
        { $inc: { attempts: 1 }, $set: { sessionToken: null, createdAt: at } },
        { upsert: true, returnDocument: 'after' }
      )
    );
    return doc?.attempts ?? 1;
  }

  async resetAttempts(userId: string): Promise<void> {
    await withMongo('logins.resetAttempts', () =>
      this.collection.updateOne({ _id: userId }, { $set: { attempts: 0 } })
    );
  }

  async clearSession(userId: string): Promise<void> {
    await withMongo('logins.clearSession', () =>
      this.collection.updateOne({ _id: userId }, { $set: { sessionToken: null } })
    );
  }

  async clearSessionsCreatedBefore(cutoff: Date): Promise<number> {
    const result = await withMongo('logins.clearSessionsCreatedBefore', () =>
      this.collection.updateMany(
        { sessionToken: { $type: 'string' }, createdAt: { $lte: cutoff } },
        { $set: { sessionToken: null } }
      )
    );
    return result.modifiedCount;
  }
}
