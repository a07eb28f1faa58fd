import mongoose, { Schema, Document, Model } from 'mongoose';

export const DEFAULT_COLLECTION = 'occupancy_records';

export interface IRecordDocument extends Document {
  key: string;
  value: string;
  updatedAt: Date;
}

const recordSchema = new Schema<IRecordDocument>(
  {
    key: { type: String, required: true, unique: true, index: true },
    value: { type: String, required: true },
  },
  {
    timestamps: true,
    collection: DEFAULT_COLLECTION,
  }
);

export function getRecordModel(
  connection?: mongoose.Connection,
  collectionName = DEFAULT_COLLECTION
): Model<IRecordDocument> {
  const modelName = `OccupancyRecord_${collectionName}`;

  if (connection) {
    try {
      return connection.model<IRecordDocument>(modelName);
    } catch {
      const schema = recordSchema.clone();
      schema.set('collection', collectionName);
      return connection.model<IRecordDocument>(modelName, schema);
    }
  }

  // Use default mongoose connection
  try {
    return mongoose.model<IRecordDocument>(modelName);
  } catch {
    const schema = recordSchema.clone();
    schema.set('collection', collectionName);
    return mongoose.model<IRecordDocument>(modelName, schema);
  }
}
