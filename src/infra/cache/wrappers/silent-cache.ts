/**
 * Keeps a broken cache backend from failing a bundle request: every
 * failed operation is logged once and answered as if the cache were empty.
 */

import type { CacheError, CachePort, CacheStats, SilentCachePort } from '../ports.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

export interface SilentCacheOptions {
  logger: Logger;
}

export const createSilentCache = <T>(
  cache: CachePort<T>,
  options: SilentCacheOptions
): SilentCachePort<T> => {
  const log = options.logger.child({ component: 'bundle-cache' });

  const orElse = <V>(
    result: Result<V, CacheError>,
    fallback: V,
    operation: string,
    context: Record<string, unknown> = {}
  ): V => {
    if (result.isOk()) return result.value;
    log.warn(
      { err: result.error, operation, ...context },
      `Cache ${operation} failed, continuing without cache: ${result.error.message}`
    );
    return fallback;
  };

  return {
    async get(key) {
      return orElse<T | undefined>(await cache.get(key), undefined, 'get', { key });
    },

    async set(key, value, setOptions) {
      orElse(await cache.set(key, value, setOptions), undefined, 'set', { key });
    },

    async delete(key) {
      return orElse(await cache.delete(key), false, 'delete', { key });
    },

    async clearByPrefix(prefix) {
      return orElse(await cache.clearByPrefix(prefix), 0, 'clearByPrefix', { prefix });
    },

    async clear() {
      orElse(await cache.clear(), undefined, 'clear');
    },

    async stats(): Promise<CacheStats> {
      return cache.stats();
    },
  };
};
