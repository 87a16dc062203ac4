import { createSingleFlight } from './single-flight.js';
import type { WaitOptions } from './types.js';

/**
 * A memoized asynchronous initializer.
 */
export interface ComputeOnce<T> {
  /** Returns the computed value, running the factory on first use */
  readonly get: (options?: WaitOptions) => Promise<T>;
  /** Forgets the computed value so the next `get` runs the factory again */
  readonly reset: () => void;
  /** Whether a value has been computed */
  readonly isComputed: () => boolean;
  /** Whether a factory run is in progress */
  readonly isPending: () => boolean;
}

/** The only key this single-flight group ever sees */
const ONCE_KEY = 'once';

/**
 * Wraps `factory` so it runs once for the lifetime of the returned object.
 *
 * Concurrent first callers share one factory run. A failed run is not
 * memoized: the error goes to the callers of that run and the next call tries
 * again.
 *
 * @example
 * ```typescript
 * const connection = computeOnce(() => client.connect());
 * const db = await connection.get();
 * ```
 */
export const computeOnce = <T>(factory: () => Promise<T>): ComputeOnce<T> => {
  const flight = createSingleFlight<string, T>({ name: 'compute-once' });
  let computed: { readonly value: T } | undefined;

  const get = async (options?: WaitOptions): Promise<T> => {
    if (computed !== undefined) {
      return computed.value;
    }

    return flight.run(
      ONCE_KEY,
      async () => {
        if (computed !== undefined) {
          return computed.value;
        }
        const value = await factory();
        computed = { value };
        return value;
      },
      options
    );
  };

  const reset = (): void => {
    computed = undefined;
  };

  const isComputed = (): boolean => computed !== undefined;

  const isPending = (): boolean => flight.isInFlight(ONCE_KEY);

  return { get, reset, isComputed, isPending };
};
