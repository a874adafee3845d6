/**
 * Cache-aware entry point for bundle requests.
 *
 * Requests that normalize to the same countries (in any order), start date
 * and periods share one cache entry and one in-flight load.
 */

import { err } from 'neverthrow';

import {
  CacheNamespace,
  withCacheResult,
  type KeyBuilder,
  type SilentCachePort,
} from '@/infra/cache/index.js';

import { parseCpiBundleRequest } from '../core/request.js';
import { getCompleteCpiData } from '../core/usecases/get-complete-cpi-data.js';

import type { CpiBundleDeps } from '../core/ports.js';
import type { CompleteCpiBundle, CpiBundleError, CpiBundleRequest } from '../core/types.js';
import type { Result } from 'neverthrow';

export interface CachedCpiBundleLoaderOptions {
  deps: CpiBundleDeps;
  cache: SilentCachePort<CompleteCpiBundle>;
  keyBuilder: KeyBuilder;
  /** Default: the cache's own default */
  ttlMs?: number;
}

export interface CpiBundleLoader {
  load(input: unknown): Promise<Result<CompleteCpiBundle, CpiBundleError>>;
  /** Drops every cached bundle; returns how many were removed */
  invalidate(): Promise<number>;
}

export const bundleCacheKey = (keyBuilder: KeyBuilder, request: CpiBundleRequest): string =>
  keyBuilder.fromFilter(CacheNamespace.CPI_BUNDLE, {
    countries: [...request.countries].sort(),
    startDate: request.startDate,
    periods: request.periods.map((period) => [period.label, period.startYear, period.endYear]),
  });

export const createCachedCpiBundleLoader = (
  options: CachedCpiBundleLoaderOptions
): CpiBundleLoader => {
  const { deps, cache, keyBuilder } = options;

  const cachedLoad = withCacheResult(
    (request: CpiBundleRequest) => getCompleteCpiData(deps, request),
    cache,
    {
      ...(options.ttlMs !== undefined && { ttlMs: options.ttlMs }),
      keyGenerator: ([request]) => bundleCacheKey(keyBuilder, request),
    }
  );

  return {
    async load(input) {
      const request = parseCpiBundleRequest(input);
      if (request.isErr()) return err(request.error);
      return cachedLoad(request.value);
    },

    invalidate() {
      return cache.clearByPrefix(keyBuilder.getPrefix(CacheNamespace.CPI_BUNDLE));
    },
  };
};
