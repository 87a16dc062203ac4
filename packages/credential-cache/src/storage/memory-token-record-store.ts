import { ok } from 'neverthrow';
import type { TokenRecord } from '../tokens/types.js';
import type { TokenRecordStore } from './types.js';

const toKey = (provider: string, referringSubject: string): string =>
  JSON.stringify([provider, referringSubject]);

/**
 * Creates an in-memory token record store.
 *
 * Records are copied on the way in and out, so callers never share a mutable
 * record with the store. Values are lost when the process exits.
 *
 * @example
 * ```typescript
 * const store = createMemoryTokenRecordStore();
 * await store.upsert(record);
 * const found = await store.find('example', 'user-1');
 * ```
 */
export const createMemoryTokenRecordStore = (): TokenRecordStore => {
  const records = new Map<string, TokenRecord>();

  return {
    find: (provider, referringSubject) => {
      const record = records.get(toKey(provider, referringSubject));
      return Promise.resolve(ok(record === undefined ? undefined : structuredClone(record)));
    },

    upsert: (record) => {
      records.set(toKey(record.provider, record.referringSubject), structuredClone(record));
      return Promise.resolve(ok(undefined));
    },

    delete: (provider, referringSubject) =>
      Promise.resolve(ok(records.delete(toKey(provider, referringSubject)))),
  };
};
