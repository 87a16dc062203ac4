/**
 * MongoDB-backed token record store.
 *
 * One document per `(provider, referringSubject)`. Epoch millisecond times
 * are stored as BSON dates.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import { StoreUnavailableError } from '../errors.js';
import { createSilentLogger } from '../logging/logger.js';
import type { Token, TokenRecord } from '../tokens/types.js';
import type { TokenRecordStore } from './types.js';

export type TokenDocument = {
  value: string;
  expiresAt?: Date;
  issuedAt?: Date;
};

export type TokenRecordDocument = {
  provider: string;
  subject: string;
  referringSubject: string;
  referringEmail?: string;
  email?: string;
  issuer?: string;
  audience: string;
  accessToken?: TokenDocument;
  idToken?: TokenDocument;
  refreshToken?: TokenDocument;
  exchanged?: Record<string, TokenDocument>;
  created: Date;
  updated?: Date;
  refreshed?: Date;
};

export type TokenRecordKey = {
  provider: string;
  referringSubject: string;
};

/**
 * The part of a MongoDB collection the store uses.
 * A `Collection<TokenRecordDocument>` from the driver satisfies it.
 */
export interface TokenRecordCollection {
  findOne(filter: TokenRecordKey): Promise<TokenRecordDocument | null>;
  replaceOne(
    filter: TokenRecordKey,
    replacement: TokenRecordDocument,
    options: { upsert: boolean }
  ): Promise<unknown>;
  deleteOne(filter: TokenRecordKey): Promise<{ deletedCount: number }>;
}

export interface MongoTokenRecordStoreOptions {
  /** Resolves the collection, connecting on first use */
  readonly getCollection: () => Promise<TokenRecordCollection>;
  readonly logger?: Logger | undefined;
}

const toTokenDocument = (token: Token): TokenDocument => ({
  value: token.value,
  ...(token.expiresAt !== undefined ? { expiresAt: new Date(token.expiresAt) } : {}),
  ...(token.issuedAt !== undefined ? { issuedAt: new Date(token.issuedAt) } : {}),
});

const fromTokenDocument = (document: TokenDocument): Token => ({
  value: document.value,
  expiresAt: document.expiresAt?.getTime(),
  issuedAt: document.issuedAt?.getTime(),
});

/**
 * Converts a record to its document. Absent fields are left out rather than
 * written as null.
 */
export const toDocument = (record: TokenRecord): TokenRecordDocument => {
  const exchanged =
    record.exchanged === undefined
      ? undefined
      : Object.fromEntries(
          Object.entries(record.exchanged).map(([audience, token]) => [
            audience,
            toTokenDocument(token),
          ])
        );

  return {
    provider: record.provider,
    subject: record.subject,
    referringSubject: record.referringSubject,
    audience: record.audience,
    created: new Date(record.created),
    ...(record.referringEmail !== undefined ? { referringEmail: record.referringEmail } : {}),
    ...(record.email !== undefined ? { email: record.email } : {}),
    ...(record.issuer !== undefined ? { issuer: record.issuer } : {}),
    ...(record.accessToken !== undefined ? { accessToken: toTokenDocument(record.accessToken) } : {}),
    ...(record.idToken !== undefined ? { idToken: toTokenDocument(record.idToken) } : {}),
    ...(record.refreshToken !== undefined
      ? { refreshToken: toTokenDocument(record.refreshToken) }
      : {}),
    ...(exchanged !== undefined ? { exchanged } : {}),
    ...(record.updated !== undefined ? { updated: new Date(record.updated) } : {}),
    ...(record.refreshed !== undefined ? { refreshed: new Date(record.refreshed) } : {}),
  };
};

/**
 * Converts a stored document back to a record.
 */
export const fromDocument = (document: TokenRecordDocument): TokenRecord => ({
  provider: document.provider,
  subject: document.subject,
  referringSubject: document.referringSubject,
  referringEmail: document.referringEmail,
  email: document.email,
  issuer: document.issuer,
  audience: document.audience,
  accessToken: document.accessToken && fromTokenDocument(document.accessToken),
  idToken: document.idToken && fromTokenDocument(document.idToken),
  refreshToken: document.refreshToken && fromTokenDocument(document.refreshToken),
  exchanged:
    document.exchanged &&
    Object.fromEntries(
      Object.entries(document.exchanged).map(([audience, token]) => [
        audience,
        fromTokenDocument(token),
      ])
    ),
  created: document.created.getTime(),
  updated: document.updated?.getTime(),
  refreshed: document.refreshed?.getTime(),
});

/**
 * Creates a token record store over a MongoDB collection.
 *
 * Upserts go through `replaceOne` with `upsert: true`, which is atomic per
 * key. Driver failures become `StoreUnavailableError`.
 *
 * @example
 * ```typescript
 * const connection = createMongoConnection({ url, dbName, collectionName: 'tokens' });
 * const store = createMongoTokenRecordStore({ getCollection: connection.getCollection });
 * ```
 */
export const createMongoTokenRecordStore = (
  options: MongoTokenRecordStoreOptions
): TokenRecordStore => {
  const { getCollection, logger = createSilentLogger() } = options;

  const attempt = async <T>(
    operation: 'find' | 'upsert' | 'delete',
    key: TokenRecordKey,
    run: (collection: TokenRecordCollection) => Promise<T>
  ): Promise<Result<T, StoreUnavailableError>> => {
    try {
      return ok(await run(await getCollection()));
    } catch (error) {
      logger.error(
        {
          operation,
          provider: key.provider,
          referringSubject: key.referringSubject,
          error: error instanceof Error ? error.message : String(error),
        },
        'token store operation failed'
      );
      return err(new StoreUnavailableError(operation, error));
    }
  };

  return {
    find: (provider, referringSubject) =>
      attempt('find', { provider, referringSubject }, async (collection) => {
        const document = await collection.findOne({ provider, referringSubject });
        return document === null ? undefined : fromDocument(document);
      }),

    upsert: (record) => {
      const key = { provider: record.provider, referringSubject: record.referringSubject };
      return attempt('upsert', key, async (collection) => {
        await collection.replaceOne(key, toDocument(record), { upsert: true });
      });
    },

    delete: (provider, referringSubject) =>
      attempt('delete', { provider, referringSubject }, async (collection) => {
        const result = await collection.deleteOne({ provider, referringSubject });
        return result.deletedCount > 0;
      }),
  };
};
