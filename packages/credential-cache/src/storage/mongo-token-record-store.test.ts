import { describe, it, expect } from 'vitest';
import { StoreUnavailableError } from '../errors.js';
import { createTestRecord } from '../test/fixtures.js';
import { createFakeTokenCollection } from '../test/mocks.js';
import {
  createMongoTokenRecordStore,
  fromDocument,
  toDocument,
} from './mongo-token-record-store.js';

describe('toDocument', () => {
  it('stores times as dates and leaves absent fields out', () => {
    const record = createTestRecord({
      created: 1_000,
      updated: 2_000,
      accessToken: { value: 'access-1', expiresAt: 5_000 },
      refreshToken: { value: 'refresh-1' },
      idToken: undefined,
      email: undefined,
    });

    const document = toDocument(record);

    expect(document.created).toEqual(new Date(1_000));
    expect(document.updated).toEqual(new Date(2_000));
    expect(document.accessToken).toEqual({ value: 'access-1', expiresAt: new Date(5_000) });
    expect(document.refreshToken).toEqual({ value: 'refresh-1' });
    expect('idToken' in document).toBe(false);
    expect('email' in document).toBe(false);
    expect('refreshed' in document).toBe(false);
  });

  it('converts exchanged tokens per audience', () => {
    const record = createTestRecord({
      exchanged: { 'billing-api': { value: 'exchanged-1', expiresAt: 9_000, issuedAt: 8_000 } },
    });

    expect(toDocument(record).exchanged).toEqual({
      'billing-api': { value: 'exchanged-1', expiresAt: new Date(9_000), issuedAt: new Date(8_000) },
    });
  });
});

describe('fromDocument', () => {
  it('restores epoch milliseconds', () => {
    const record = createTestRecord({
      created: 1_000,
      refreshed: 3_000,
      accessToken: { value: 'access-1', expiresAt: 5_000, issuedAt: 1_000 },
      exchanged: { 'billing-api': { value: 'exchanged-1', expiresAt: 9_000 } },
    });

    expect(fromDocument(toDocument(record))).toEqual(record);
  });
});

describe('createMongoTokenRecordStore', () => {
  it('upserts by key and finds the record again', async () => {
    const collection = createFakeTokenCollection();
    const store = createMongoTokenRecordStore({ getCollection: () => Promise.resolve(collection) });
    const record = createTestRecord();

    await store.upsert(record);
    await store.upsert({ ...record, audience: 'replaced' });
    const found = await store.find(record.provider, record.referringSubject);

    expect(collection.documents.size).toBe(1);
    expect(found._unsafeUnwrap()?.audience).toBe('replaced');
  });

  it('returns undefined when nothing is stored', async () => {
    const collection = createFakeTokenCollection();
    const store = createMongoTokenRecordStore({ getCollection: () => Promise.resolve(collection) });

    const found = await store.find('example', 'nobody');

    expect(found._unsafeUnwrap()).toBeUndefined();
  });

  it('reports whether delete removed a record', async () => {
    const collection = createFakeTokenCollection();
    const store = createMongoTokenRecordStore({ getCollection: () => Promise.resolve(collection) });
    await store.upsert(createTestRecord());

    expect((await store.delete('example', 'user-1'))._unsafeUnwrap()).toBe(true);
    expect((await store.delete('example', 'user-1'))._unsafeUnwrap()).toBe(false);
  });

  it('maps a driver failure to StoreUnavailableError', async () => {
    const cause = new Error('server selection timed out');
    const collection = createFakeTokenCollection({ failWith: cause });
    const store = createMongoTokenRecordStore({ getCollection: () => Promise.resolve(collection) });

    const result = await store.find('example', 'user-1');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(StoreUnavailableError);
      expect(result.error.operation).toBe('find');
      expect(result.error.cause).toBe(cause);
    }
  });

  it('maps a connection failure to StoreUnavailableError', async () => {
    const store = createMongoTokenRecordStore({
      getCollection: () => Promise.reject(new Error('ECONNREFUSED')),
    });

    const result = await store.upsert(createTestRecord());

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.operation).toBe('upsert');
    }
  });
});
