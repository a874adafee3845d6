/**
 * Cache Infrastructure
 *
 * A pluggable caching layer with silent degradation.
 * Cache failures never cause request failures.
 *
 * @example
 * ```typescript
 * const { cache, keyBuilder } = initCache<CompleteCpiBundle>({ config, logger });
 *
 * const cachedLoad = withCacheResult(load, cache, {
 *   ttlMs: config.defaultTtlMs,
 *   keyGenerator: ([request]) => keyBuilder.fromFilter(CacheNamespace.CPI_BUNDLE, request),
 * });
 * ```
 */

// Ports (interfaces)
export type {
  CachePort,
  SilentCachePort,
  CacheError,
  CacheSetOptions,
  CacheStats,
} from './ports.js';
export { createCacheError } from './ports.js';

// Key generation
export {
  CacheNamespace,
  createKeyBuilder,
  hashFilter,
  type KeyBuilder,
  type KeyBuilderOptions,
} from './key-builder.js';

// Adapters
export { createNoopCache, createMemoryCache, type MemoryCacheOptions } from './adapters/index.js';

// Wrappers
export { createSilentCache, type SilentCacheOptions } from './wrappers/silent-cache.js';

// Decorator
export { withCacheResult, type WithCacheOptions } from './with-cache.js';

// Client factory
export {
  initCache,
  type CacheBackend,
  type CacheConfig,
  type CacheClient,
  type InitCacheOptions,
} from './client.js';
