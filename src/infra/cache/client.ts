/**
 * Cache client factory - creates and configures cache instances.
 */

import { createMemoryCache, createNoopCache } from './adapters/index.js';
import { createKeyBuilder, type KeyBuilder } from './key-builder.js';
import { createSilentCache } from './wrappers/silent-cache.js';

import type { CachePort, SilentCachePort } from './ports.js';
import type { Logger } from 'pino';

export type CacheBackend = 'disabled' | 'memory';

export interface CacheConfig {
  backend: CacheBackend;
  /** Default TTL in milliseconds */
  defaultTtlMs: number;
  /** Max entries for the memory backend */
  maxEntries: number;
  /** Key prefix for all cache keys. Default: 'cpi-aggregator' */
  keyPrefix?: string;
}

export interface CacheClient<T = unknown> {
  /** Silent cache port for application use */
  cache: SilentCachePort<T>;
  keyBuilder: KeyBuilder;
  /** Low-level cache port (for testing/advanced use) */
  rawCache: CachePort<T>;
}

export interface InitCacheOptions {
  config: CacheConfig;
  logger: Logger;
}

export const initCache = <T = unknown>(options: InitCacheOptions): CacheClient<T> => {
  const { config, logger } = options;

  const keyBuilder = createKeyBuilder(
    config.keyPrefix !== undefined ? { globalPrefix: config.keyPrefix } : {}
  );

  const createBackend = (): CachePort<T> => {
    if (config.backend === 'disabled') {
      logger.info('[Cache] Using NoOp cache (disabled)');
      return createNoopCache<T>();
    }

    logger.info(
      { maxEntries: config.maxEntries, defaultTtlMs: config.defaultTtlMs },
      '[Cache] Using in-memory LRU cache'
    );
    return createMemoryCache<T>({
      maxEntries: config.maxEntries,
      defaultTtlMs: config.defaultTtlMs,
    });
  };

  const rawCache = createBackend();
  const cache = createSilentCache<T>(rawCache, { logger });

  return { cache, keyBuilder, rawCache };
};
