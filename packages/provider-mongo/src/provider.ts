import mongoose, { Model } from 'mongoose';
import type { PersistenceStore } from '@occupancy-meter/types';
import { type IRecordDocument, getRecordModel } from './schema';

export interface MongoStoreConfig {
  /** Existing Mongoose connection. If omitted, uses the default connection. */
  connection?: mongoose.Connection;
  /** Collection name for record documents. Default: "occupancy_records". */
  collectionName?: string;
}

/**
 * MongoDB persistence store for occupancy records.
 *
 * One document per key. Writes are single-document upserts, which MongoDB
 * applies atomically, so a read after a completed write sees it.
 */
export class MongoStore implements PersistenceStore {
  private model: Model<IRecordDocument>;

  constructor(config: MongoStoreConfig = {}) {
    this.model = getRecordModel(config.connection, config.collectionName);
  }

  /** Retrieve the stored value for a key. */
  async get(key: string): Promise<string | null> {
    const doc = await this.model.findOne({ key }).select('value').lean();
    return doc?.value ?? null;
  }

  /** Upsert the value for a key. */
  async set(key: string, value: string): Promise<void> {
    await this.model.updateOne(
      { key },
      { $set: { value }, $setOnInsert: { key } },
      { upsert: true }
    );
  }

  /** Delete a key entirely. */
  async delete(key: string): Promise<void> {
    await this.model.deleteOne({ key });
  }

  async initialize(): Promise<void> {
    await this.model.ensureIndexes();
  }

  async close(): Promise<void> {
    // The caller owns the mongoose connection
  }
}
