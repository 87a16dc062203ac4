export { createMemoryTokenRecordStore } from './memory-token-record-store.js';
export {
  createMongoTokenRecordStore,
  toDocument,
  fromDocument,
} from './mongo-token-record-store.js';
export type {
  MongoTokenRecordStoreOptions,
  TokenDocument,
  TokenRecordCollection,
  TokenRecordDocument,
  TokenRecordKey,
} from './mongo-token-record-store.js';
export { createMongoConnection } from './mongo-connection.js';
export type { MongoConnection, MongoConnectionOptions } from './mongo-connection.js';
export type { TokenRecordStore } from './types.js';
