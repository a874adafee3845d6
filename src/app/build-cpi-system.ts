/**
 * Composition root
 * Wires HTTP, retry, sources, routing and cache from the application config.
 */

import { initCache, type CacheClient } from '../infra/cache/index.js';
import {
  createHttpClient,
  createRetryPolicy,
  linearBackoff,
  type HttpClient,
  type RetryPolicy,
} from '../infra/http/index.js';
import {
  createCachedCpiBundleLoader,
  createRoutingStrategy,
  type CompleteCpiBundle,
  type CpiBundleDeps,
  type CpiBundleLoader,
} from '../modules/cpi-bundle/index.js';
import {
  createEurostatHicpSource,
  createFredSeriesSource,
  createOnsSeriesSource,
  type PrimaryIndexSource,
} from '../modules/index-series/index.js';
import {
  createEurostatWeightsSource,
  createOnsWorkbookSource,
  ONS_CPI_WEIGHTS_LAYOUT,
} from '../modules/weights/index.js';

import type { AppConfig, PrimaryIndexConfig } from '../infra/config/index.js';
import type { Logger } from 'pino';

export interface BuildCpiSystemOptions {
  config: AppConfig;
  logger: Logger;
  /** Replaces the fetch-based client (tests) */
  http?: HttpClient;
  /** Replaces the retry sleep (tests) */
  sleep?: (ms: number) => Promise<void>;
  /** Clock used to bound weight years */
  clock?: () => Date;
}

export interface CpiSystem {
  loader: CpiBundleLoader;
  deps: CpiBundleDeps;
  cache: CacheClient<CompleteCpiBundle>;
}

const buildPrimaryIndex = (
  config: PrimaryIndexConfig,
  shared: { http: HttpClient; retry: RetryPolicy; logger: Logger; country: string }
): PrimaryIndexSource => {
  switch (config.kind) {
    case 'fred':
      return createFredSeriesSource({
        ...shared,
        baseUrl: config.baseUrl,
        apiKey: config.apiKey,
        seriesId: config.seriesId,
      });
    case 'ons':
      return createOnsSeriesSource({ ...shared, baseUrl: config.baseUrl });
  }
};

export const buildCpiSystem = (options: BuildCpiSystemOptions): CpiSystem => {
  const { config, logger } = options;
  const country = config.routing.primaryCountry;

  const http = options.http ?? createHttpClient({ timeoutMs: config.http.timeoutMs });
  const retry = createRetryPolicy({
    maxAttempts: config.http.retry.maxAttempts,
    backoff: linearBackoff(config.http.retry.delayMs),
    logger,
    ...(options.sleep !== undefined && { sleep: options.sleep }),
  });
  const clock = options.clock !== undefined ? { clock: options.clock } : {};

  const deps: CpiBundleDeps = {
    sources: {
      primary: {
        index: buildPrimaryIndex(config.sources.primaryIndex, { http, retry, logger, country }),
        weights: createOnsWorkbookSource({
          http,
          retry,
          logger,
          url: config.sources.ons.weightsUrl,
          country,
          layout: { ...ONS_CPI_WEIGHTS_LAYOUT, sheetName: config.sources.ons.weightsSheet },
          ...clock,
        }),
      },
      secondary: {
        index: createEurostatHicpSource({
          http,
          retry,
          logger,
          baseUrl: config.sources.eurostat.baseUrl,
        }),
        weights: createEurostatWeightsSource({
          http,
          retry,
          logger,
          baseUrl: config.sources.eurostat.baseUrl,
          ...clock,
        }),
      },
    },
    routing: createRoutingStrategy(country),
    logger,
  };

  const cache = initCache<CompleteCpiBundle>({
    config: {
      backend: config.cache.backend,
      defaultTtlMs: config.cache.ttlMs,
      maxEntries: config.cache.maxEntries,
    },
    logger,
  });

  const loader = createCachedCpiBundleLoader({
    deps,
    cache: cache.cache,
    keyBuilder: cache.keyBuilder,
  });

  return { loader, deps, cache };
};
