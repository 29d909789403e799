/**
 * Activation Repository
 *
 * One document per pending activation, keyed by user id. Tokens are unique.
 */

import { DuplicateError, withMongo, type Collection, type Db } from 'core-service';
import type { Activation, ActivationRepository } from '../types.js';

export interface ActivationDocument {
  /** user id */
  _id: string;
  token: string;
  createdAt: Date;
}

function toActivation(doc: ActivationDocument): Activation {
  return { userId: doc._id, token: doc.token, createdAt: doc.createdAt };
}

export class MongoActivationRepository implements ActivationRepository {
  static readonly collectionName = 'activations';
  private collection: Collection<ActivationDocument>;

  constructor(db: Db) {
    this.collection = db.collection<ActivationDocument>(MongoActivationRepository.collectionName);
  }

  async findByUserId(userId: string): Promise<Activation | null> {
    const doc = await withMongo('activations.findByUserId', () => this.collection.findOne({ _id: userId }));
    return doc ? toActivation(doc) : null;
  }

  async findByToken(token: string): Promise<Activation | null> {
    const doc = await withMongo('activations.findByToken', () => this.collection.findOne({ token }));
    return doc ? toActivation(doc) : null;
  }

  async insert(activation: Activation): Promise<void> {
    await withMongo(
      'activations.insert',
      () => this.collection.insertOne({
        _id: activation.userId,
        token: activation.token,
        createdAt: activation.createdAt,
      }),
      () => new DuplicateError('Activation already pending', { userId: activation.userId })
    );
  }

  async deleteByUserId(userId: string): Promise<boolean> {
    const result = await withMongo('activations.deleteByUserId', () => this.collection.deleteOne({ _id: userId }));
    return result.deletedCount > 0;
  }

  async deleteCreatedBefore(cutoff: Date): Promise<number> {
    const result = await withMongo('activations.deleteCreatedBefore', () =>
      this.collection.deleteMany({ createdAt: { $lte: cutoff } })
    );
    return result.deletedCount;
  }
}
