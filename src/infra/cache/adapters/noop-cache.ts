/**
 * No-op cache adapter for when caching is disabled.
 * Every lookup misses; writes are dropped.
 */

import { ok } from 'neverthrow';

import type { CachePort, CacheStats } from '../ports.js';

export const createNoopCache = <T>(): CachePort<T> => {
  let misses = 0;

  return {
    get() {
      misses++;
      return Promise.resolve(ok(undefined));
    },

    set() {
      return Promise.resolve(ok(undefined));
    },

    delete() {
      return Promise.resolve(ok(false));
    },

    clearByPrefix() {
      return Promise.resolve(ok(0));
    },

    clear() {
      return Promise.resolve(ok(undefined));
    },

    stats(): Promise<CacheStats> {
      return Promise.resolve({ hits: 0, misses, size: 0 });
    },
  };
};
