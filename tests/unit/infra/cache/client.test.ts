/**
 * Unit tests for cache client configuration
 */

import { describe, expect, it } from 'vitest';

import { CacheNamespace, initCache } from '@/infra/cache/index.js';

import { makeCapturingLogger } from '../../../fixtures/fakes.js';

describe('initCache', () => {
  it('uses the in-memory LRU cache for the memory backend', async () => {
    const capture = makeCapturingLogger();
    const { cache, keyBuilder } = initCache<string>({
      config: { backend: 'memory', defaultTtlMs: 1000, maxEntries: 2 },
      logger: capture.logger,
    });

    await cache.set('a', '1');
    await cache.set('b', '2');
    await cache.set('c', '3');

    expect(await cache.get('a')).toBeUndefined();
    expect(await cache.get('c')).toBe('3');
    expect(keyBuilder.getPrefix(CacheNamespace.CPI_BUNDLE)).toBe('cpi-aggregator:cpi:bundle:');
    expect(capture.messages('info')).toEqual(['[Cache] Using in-memory LRU cache']);
  });

  it('drops every write when disabled', async () => {
    const capture = makeCapturingLogger();
    const { cache } = initCache<string>({
      config: { backend: 'disabled', defaultTtlMs: 1000, maxEntries: 2 },
      logger: capture.logger,
    });

    await cache.set('a', '1');

    expect(await cache.get('a')).toBeUndefined();
    expect(capture.messages('info')).toEqual(['[Cache] Using NoOp cache (disabled)']);
  });

  it('applies a custom key prefix', () => {
    const { keyBuilder } = initCache({
      config: { backend: 'memory', defaultTtlMs: 1000, maxEntries: 2, keyPrefix: 'test' },
      logger: makeCapturingLogger().logger,
    });

    expect(keyBuilder.build(CacheNamespace.CPI_BUNDLE, 'x')).toBe('test:cpi:bundle:x');
  });
});
