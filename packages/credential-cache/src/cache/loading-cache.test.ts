import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createExpiringCache } from './expiring-cache.js';
import { createLoadingCache } from './loading-cache.js';
import { LockTimeoutError } from '../errors.js';

class LoadFailure extends Error {}

const toLoadFailure = (cause: unknown): LoadFailure =>
  new LoadFailure(cause instanceof Error ? cause.message : 'unknown');

describe('createLoadingCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('given an empty cache', () => {
    it('loads, caches and returns the value', async () => {
      const cache = createExpiringCache<string>({ ttlSeconds: 60 });
      const load = vi.fn(() => Promise.resolve('loaded'));
      const loading = createLoadingCache({ cache, load, toError: toLoadFailure });

      const result = await loading.get();

      expect(result._unsafeUnwrap()).toBe('loaded');
      expect(cache.get()).toBe('loaded');
      expect(load).toHaveBeenCalledTimes(1);
    });
  });

  describe('given a valid cached value', () => {
    it('returns it without loading', async () => {
      const cache = createExpiringCache({ ttlSeconds: 60, initValue: 'cached' });
      const load = vi.fn(() => Promise.resolve('loaded'));
      const loading = createLoadingCache({ cache, load, toError: toLoadFailure });

      const result = await loading.get();

      expect(result._unsafeUnwrap()).toBe('cached');
      expect(load).not.toHaveBeenCalled();
    });
  });

  describe('given a loader failure', () => {
    it('returns the mapped error and caches nothing', async () => {
      const cache = createExpiringCache<string>({ ttlSeconds: 60 });
      const loading = createLoadingCache({
        cache,
        load: () => Promise.reject(new Error('bucket unreachable')),
        toError: toLoadFailure,
      });

      const result = await loading.get();

      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(LoadFailure);
      expect(error.message).toBe('bucket unreachable');
      expect(cache.isValid()).toBe(false);
    });

    it('retries on the next call', async () => {
      const cache = createExpiringCache<string>({ ttlSeconds: 60 });
      const load = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error('transient'))
        .mockResolvedValueOnce('recovered');
      const loading = createLoadingCache({ cache, load, toError: toLoadFailure });

      await loading.get();
      const result = await loading.get();

      expect(result._unsafeUnwrap()).toBe('recovered');
      expect(load).toHaveBeenCalledTimes(2);
    });
  });

  describe('given a loader slower than the lock timeout', () => {
    it('fails the waiter fast and still caches the late value', async () => {
      const cache = createExpiringCache<string>({ ttlSeconds: 60 });
      const load = (): Promise<string> =>
        new Promise((resolve) => {
          setTimeout(() => {
            resolve('late');
          }, 1000);
        });
      const loading = createLoadingCache({ cache, load, toError: toLoadFailure, lockTimeoutMs: 100 });

      const pending = loading.get();
      await vi.advanceTimersByTimeAsync(100);
      const result = await pending;

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(LockTimeoutError);

      await vi.advanceTimersByTimeAsync(900);
      expect(cache.get()).toBe('late');
    });
  });

  describe('invalidate', () => {
    it('forces a reload', async () => {
      const cache = createExpiringCache<number>({ ttlSeconds: 60 });
      let loads = 0;
      const loading = createLoadingCache({
        cache,
        load: () => Promise.resolve(++loads),
        toError: toLoadFailure,
      });

      await loading.get();
      loading.invalidate();
      const result = await loading.get();

      expect(loading.isValid()).toBe(true);
      expect(result._unsafeUnwrap()).toBe(2);
    });
  });
});
