/**
 * Decorator for adding caching to Result-returning loaders.
 */

import { ok, type Result } from 'neverthrow';

import type { CacheSetOptions, SilentCachePort } from './ports.js';

export interface WithCacheOptions<TArgs extends unknown[]> {
  /** TTL in milliseconds. Default: the cache's own default */
  ttlMs?: number;
  /** Function to generate cache key from the call arguments */
  keyGenerator: (args: TArgs) => string;
}

/**
 * Wrap a Result-returning function with caching.
 *
 * Only Ok values are stored. Concurrent calls for the same key share one
 * in-flight execution, so each key has a single writer.
 *
 * @example
 * ```typescript
 * const cached = withCacheResult(loadBundle, cache, {
 *   ttlMs: 3600000,
 *   keyGenerator: ([request]) => keyBuilder.fromFilter(CacheNamespace.CPI_BUNDLE, request),
 * });
 * ```
 */
export const withCacheResult = <TArgs extends unknown[], T, E>(
  fn: (...args: TArgs) => Promise<Result<T, E>>,
  cache: SilentCachePort<T>,
  options: WithCacheOptions<TArgs>
): ((...args: TArgs) => Promise<Result<T, E>>) => {
  const { ttlMs, keyGenerator } = options;
  const setOptions: CacheSetOptions | undefined = ttlMs !== undefined ? { ttlMs } : undefined;
  const inFlight = new Map<string, Promise<Result<T, E>>>();

  const load = async (key: string, args: TArgs): Promise<Result<T, E>> => {
    const cached = await cache.get(key);
    if (cached !== undefined) {
      return ok(cached);
    }

    const result = await fn(...args);
    if (result.isOk()) {
      await cache.set(key, result.value, setOptions);
    }
    return result;
  };

  return (...args: TArgs) => {
    const key = keyGenerator(args);

    const pending = inFlight.get(key);
    if (pending !== undefined) return pending;

    const promise = load(key, args).finally(() => {
      inFlight.delete(key);
    });
    inFlight.set(key, promise);
    return promise;
  };
};
