export { MongoStore } from './provider';
export type { MongoStoreConfig } from './provider';
export { getRecordModel, DEFAULT_COLLECTION } from './schema';
export type { IRecordDocument } from './schema';
