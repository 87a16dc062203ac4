import { MongoClient, type Collection } from 'mongodb';
import type { Logger } from 'pino';
import { computeOnce } from '../cache/compute-once.js';
import { createSilentLogger } from '../logging/logger.js';
import type { TokenRecordDocument } from './mongo-token-record-store.js';

export interface MongoConnectionOptions {
  readonly url: string;
  readonly dbName: string;
  readonly collectionName: string;
  /** Server selection timeout (default: 2000ms) */
  readonly serverSelectionTimeoutMs?: number | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * A lazily opened MongoDB connection to the token collection.
 */
export interface MongoConnection {
  /** Connects on first use; concurrent first callers share one connect */
  readonly getCollection: () => Promise<Collection<TokenRecordDocument>>;
  /** Closes the client if one was opened */
  readonly close: () => Promise<void>;
}

/**
 * Creates a MongoDB connection that opens on first use.
 *
 * A failed connect is not remembered; the next call tries again.
 */
export const createMongoConnection = (options: MongoConnectionOptions): MongoConnection => {
  const {
    url,
    dbName,
    collectionName,
    serverSelectionTimeoutMs = 2000,
    logger = createSilentLogger(),
  } = options;

  const client = computeOnce(async (): Promise<MongoClient> => {
    const mongo = new MongoClient(url, { serverSelectionTimeoutMS: serverSelectionTimeoutMs });
    await mongo.connect();
    logger.info({ dbName, collectionName }, 'connected to token store');
    return mongo;
  });

  const getCollection = async (): Promise<Collection<TokenRecordDocument>> => {
    const mongo = await client.get();
    return mongo.db(dbName).collection<TokenRecordDocument>(collectionName);
  };

  const close = async (): Promise<void> => {
    if (!client.isComputed() && !client.isPending()) {
      return;
    }

    // A connect still in progress is awaited so its client gets closed too
    let mongo: MongoClient;
    try {
      mongo = await client.get();
    } catch (error) {
      logger.warn(
        { dbName, error: error instanceof Error ? error.message : String(error) },
        'token store never connected; nothing to close'
      );
      return;
    }

    try {
      await mongo.close();
    } finally {
      client.reset();
      logger.info({ dbName }, 'token store connection closed');
    }
  };

  return { getCollection, close };
};
