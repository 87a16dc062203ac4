import { describe, it, expect, vi } from 'vitest';
import { computeOnce } from './compute-once.js';

describe('computeOnce', () => {
  it('runs the factory once across sequential calls', async () => {
    const factory = vi.fn(() => Promise.resolve({ connected: true }));
    const once = computeOnce(factory);

    const first = await once.get();
    const second = await once.get();

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(once.isComputed()).toBe(true);
  });

  it('runs the factory once for concurrent first callers', async () => {
    const factory = vi.fn(() => Promise.resolve('value'));
    const once = computeOnce(factory);

    const results = await Promise.all([once.get(), once.get(), once.get()]);

    expect(results).toEqual(['value', 'value', 'value']);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('reports a run in progress as pending', async () => {
    const once = computeOnce(() => Promise.resolve('value'));

    const pending = once.get();
    expect(once.isPending()).toBe(true);
    expect(once.isComputed()).toBe(false);

    await pending;
    expect(once.isPending()).toBe(false);
    expect(once.isComputed()).toBe(true);
  });

  describe('given the factory fails', () => {
    it('does not memoize the failure', async () => {
      const factory = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error('connect refused'))
        .mockResolvedValueOnce('connected');
      const once = computeOnce(factory);

      await expect(once.get()).rejects.toThrow('connect refused');
      await expect(once.get()).resolves.toBe('connected');
      expect(factory).toHaveBeenCalledTimes(2);
    });
  });

  describe('reset', () => {
    it('makes the next call run the factory again', async () => {
      let calls = 0;
      const once = computeOnce(() => Promise.resolve(++calls));

      await once.get();
      once.reset();

      await expect(once.get()).resolves.toBe(2);
    });
  });
});
