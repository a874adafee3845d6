/**
 * Cache key generation with namespaces for targeted invalidation.
 */

import { createHash } from 'node:crypto';

export const CacheNamespace = {
  /** Assembled CPI bundles, keyed by request */
  CPI_BUNDLE: 'cpi:bundle',
} as const;

export type CacheNamespace = (typeof CacheNamespace)[keyof typeof CacheNamespace];

export interface KeyBuilder {
  /**
   * Format: `{globalPrefix}:{namespace}:{identifier}`
   */
  build(namespace: CacheNamespace, identifier: string): string;

  /**
   * Build a key from a filter object by hashing it.
   * Produces identical keys for filters that differ only in property order.
   */
  fromFilter(namespace: CacheNamespace, filter: Record<string, unknown>): string;

  /**
   * Format: `{globalPrefix}:{namespace}:`
   */
  getPrefix(namespace: CacheNamespace): string;
}

/**
 * Recursively sorts object keys so serialization is deterministic.
 */
const sortObjectKeys = (value: unknown): unknown => {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(sortObjectKeys);
  }

  return Object.fromEntries(
    Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, entry]) => [key, sortObjectKeys(entry)])
  );
};

/**
 * SHA-256 of the key-sorted JSON, truncated to 16 hex characters.
 */
export const hashFilter = (filter: Record<string, unknown>): string =>
  createHash('sha256')
    .update(JSON.stringify(sortObjectKeys(filter)))
    .digest('hex')
    .substring(0, 16);

export interface KeyBuilderOptions {
  /** Global prefix for all keys. Defaults to 'cpi-aggregator'. */
  globalPrefix?: string;
}

export const createKeyBuilder = (options: KeyBuilderOptions = {}): KeyBuilder => {
  const globalPrefix = options.globalPrefix ?? 'cpi-aggregator';

  return {
    build(namespace, identifier) {
      return `${globalPrefix}:${namespace}:${identifier}`;
    },

    fromFilter(namespace, filter) {
      return `${globalPrefix}:${namespace}:${hashFilter(filter)}`;
    },

    getPrefix(namespace) {
      return `${globalPrefix}:${namespace}:`;
    },
  };
};
