/**
 * In-memory LRU cache with TTL expiration.
 *
 * Values are held by reference. Callers cache immutable values only.
 */

import { ok } from 'neverthrow';

import type { CachePort, CacheSetOptions, CacheStats } from '../ports.js';

interface CacheEntry<T> {
  value: T;
  /** Expiration timestamp (ms since epoch) */
  expiresAt: number;
}

export interface MemoryCacheOptions {
  /** Maximum number of entries. Default: 100 */
  maxEntries?: number;
  /** Default TTL in milliseconds. Default: 3600000 (1 hour) */
  defaultTtlMs?: number;
  /** Injected for tests. Default: Date.now */
  now?: () => number;
}

export const createMemoryCache = <T>(options: MemoryCacheOptions = {}): CachePort<T> => {
  const maxEntries = Math.max(1, options.maxEntries ?? 100);
  const defaultTtlMs = options.defaultTtlMs ?? 3_600_000;
  const now = options.now ?? Date.now;

  // Map keeps insertion order, so the first key is the least recently used
  const store = new Map<string, CacheEntry<T>>();

  let hits = 0;
  let misses = 0;

  const isExpired = (entry: CacheEntry<T>): boolean => now() >= entry.expiresAt;

  const evictLru = (): void => {
    const lruKey = store.keys().next().value;
    if (lruKey !== undefined) {
      store.delete(lruKey);
    }
  };

  return {
    get(key: string) {
      const entry = store.get(key);

      if (entry === undefined || isExpired(entry)) {
        store.delete(key);
        misses++;
        return Promise.resolve(ok(undefined));
      }

      // Refresh LRU order
      store.delete(key);
      store.set(key, entry);

      hits++;
      return Promise.resolve(ok(entry.value));
    },

    set(key: string, value: T, setOptions?: CacheSetOptions) {
      const ttlMs = setOptions?.ttlMs ?? defaultTtlMs;

      if (store.has(key)) {
        store.delete(key);
      } else if (store.size >= maxEntries) {
        evictLru();
      }

      store.set(key, { value, expiresAt: now() + ttlMs });
      return Promise.resolve(ok(undefined));
    },

    delete(key: string) {
      return Promise.resolve(ok(store.delete(key)));
    },

    clearByPrefix(prefix: string) {
      let count = 0;
      for (const key of [...store.keys()]) {
        if (key.startsWith(prefix)) {
          store.delete(key);
          count++;
        }
      }
      return Promise.resolve(ok(count));
    },

    clear() {
      store.clear();
      hits = 0;
      misses = 0;
      return Promise.resolve(ok(undefined));
    },

    stats(): Promise<CacheStats> {
      return Promise.resolve({ hits, misses, size: store.size });
    },
  };
};
