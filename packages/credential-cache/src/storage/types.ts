import type { Result } from 'neverthrow';
import type { StoreUnavailableError } from '../errors.js';
import type { TokenRecord } from '../tokens/types.js';

/**
 * Durable storage for token records.
 *
 * Records are keyed by `(provider, referringSubject)`; an upsert replaces the
 * whole record and the last writer wins. Implementations do no caching.
 */
export interface TokenRecordStore {
  /**
   * Finds the record for a key.
   * @returns The record, or undefined when none exists
   */
  readonly find: (
    provider: string,
    referringSubject: string
  ) => Promise<Result<TokenRecord | undefined, StoreUnavailableError>>;

  /**
   * Creates or replaces the record for its key.
   */
  readonly upsert: (record: TokenRecord) => Promise<Result<void, StoreUnavailableError>>;

  /**
   * Deletes the record for a key.
   * @returns true if a record existed, false otherwise
   */
  readonly delete: (
    provider: string,
    referringSubject: string
  ) => Promise<Result<boolean, StoreUnavailableError>>;
}
