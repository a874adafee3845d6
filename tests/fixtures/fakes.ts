/**
 * Test fakes and mocks
 */

import { err, ok, type Result } from 'neverthrow';
import pinoLogger from 'pino';

import {
  createNetworkError,
  type DataAcquisitionError,
  type DataValidationError,
  type NetworkError,
} from '@/common/types/errors.js';
import {
  createRetryPolicy,
  type HttpClient,
  type QueryParams,
  type RetryPolicy,
} from '@/infra/http/index.js';

import { makeJanuarySeries, makeWeightRows } from './builders.js';

import type { CachePort, CacheError, CacheSetOptions, CacheStats } from '@/infra/cache/index.js';
import type { CpiSources } from '@/modules/cpi-bundle/index.js';
import type { CanonicalIndexRow } from '@/modules/index-series/index.js';
import type { CanonicalWeightRow } from '@/modules/weights/index.js';
import type { Logger } from 'pino';

// =============================================================================
// Logging
// =============================================================================

export const makeTestLogger = (): Logger => pinoLogger({ level: 'silent' });

const LEVELS = { trace: 10, debug: 20, info: 30, warn: 40, error: 50 } as const;

export interface LogRecord {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/**
 * Logger that keeps every record it writes, for assertions on messages and fields.
 */
export const makeCapturingLogger = () => {
  const records: LogRecord[] = [];
  const logger = pinoLogger(
    { level: 'trace' },
    {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (
          typeof parsed === 'object' &&
          parsed !== null &&
          'level' in parsed &&
          typeof parsed.level === 'number' &&
          'msg' in parsed &&
          typeof parsed.msg === 'string'
        ) {
          records.push({ ...parsed, level: parsed.level, msg: parsed.msg });
        }
      },
    }
  );

  const at = (level: keyof typeof LEVELS): LogRecord[] =>
    records.filter((record) => record.level === LEVELS[level]);

  return {
    logger,
    records,
    at,
    messages: (level: keyof typeof LEVELS): string[] => at(level).map((record) => record.msg),
  };
};

// =============================================================================
// Retry
// =============================================================================

export const noSleep = (): Promise<void> => Promise.resolve();

export const makeTestRetry = (logger: Logger = makeTestLogger(), maxAttempts = 3): RetryPolicy =>
  createRetryPolicy({ maxAttempts, logger, sleep: noSleep });

// =============================================================================
// HTTP
// =============================================================================

export interface FakeHttpCall {
  kind: 'json' | 'buffer';
  url: string;
  query: QueryParams | undefined;
}

type JsonHandler = (
  url: string,
  query: QueryParams | undefined
) => Result<unknown, NetworkError | DataValidationError>;

type BufferHandler = (url: string, query: QueryParams | undefined) => Result<Buffer, NetworkError>;

export interface FakeHttpClientOptions {
  json?: JsonHandler;
  buffer?: BufferHandler;
}

export interface FakeHttpClient extends HttpClient {
  calls: FakeHttpCall[];
}

export const notFound = (url: string): NetworkError =>
  createNetworkError(url, `Request to ${url} failed with status 404 Not Found`, { status: 404 });

/**
 * HttpClient that answers from handlers and records every call.
 * Unhandled requests fail with a non-retryable 404.
 */
export const makeFakeHttpClient = (options: FakeHttpClientOptions = {}): FakeHttpClient => {
  const calls: FakeHttpCall[] = [];
  const json: JsonHandler = options.json ?? ((url) => err(notFound(url)));
  const buffer: BufferHandler = options.buffer ?? ((url) => err(notFound(url)));

  return {
    calls,
    getJson(url, query) {
      calls.push({ kind: 'json', url, query });
      return Promise.resolve(json(url, query));
    },
    getBuffer(url, query) {
      calls.push({ kind: 'buffer', url, query });
      return Promise.resolve(buffer(url, query));
    },
  };
};

/**
 * Handler that returns the given results in order, repeating the last one.
 */
export const sequence = <T, E>(...results: Result<T, E>[]): (() => Result<T, E>) => {
  let index = 0;
  return () => {
    const result = results[Math.min(index, results.length - 1)];
    index++;
    if (result === undefined) throw new Error('sequence() needs at least one result');
    return result;
  };
};

// =============================================================================
// Cache
// =============================================================================

interface FakeCachePortOptions {
  /** If provided, all operations will fail with this error */
  failWithError?: CacheError;
}

/**
 * Creates a fake CachePort with controllable failure.
 */
export const makeFakeCachePort = <T = unknown>(
  options: FakeCachePortOptions = {}
): CachePort<T> & { store: Map<string, T> } => {
  const { failWithError } = options;
  const store = new Map<string, T>();
  let hits = 0;
  let misses = 0;

  return {
    store,
    get: (key: string) => {
      if (failWithError !== undefined) return Promise.resolve(err(failWithError));
      const value = store.get(key);
      if (value === undefined) {
        misses++;
        return Promise.resolve(ok(undefined));
      }
      hits++;
      return Promise.resolve(ok(value));
    },
    set: (key: string, value: T, _options?: CacheSetOptions) => {
      if (failWithError !== undefined) return Promise.resolve(err(failWithError));
      store.set(key, value);
      return Promise.resolve(ok(undefined));
    },
    delete: (key: string) => {
      if (failWithError !== undefined) return Promise.resolve(err(failWithError));
      return Promise.resolve(ok(store.delete(key)));
    },
    clearByPrefix: (prefix: string) => {
      if (failWithError !== undefined) return Promise.resolve(err(failWithError));
      let deleted = 0;
      for (const key of [...store.keys()]) {
        if (key.startsWith(prefix)) {
          store.delete(key);
          deleted++;
        }
      }
      return Promise.resolve(ok(deleted));
    },
    clear: () => {
      if (failWithError !== undefined) return Promise.resolve(err(failWithError));
      store.clear();
      hits = 0;
      misses = 0;
      return Promise.resolve(ok(undefined));
    },
    stats: (): Promise<CacheStats> => Promise.resolve({ hits, misses, size: store.size }),
  };
};

// =============================================================================
// CPI sources
// =============================================================================

type SourceResult<T> = Result<T, NetworkError | DataValidationError>;

export interface FakeSourcesOptions {
  primaryIndex?: SourceResult<CanonicalIndexRow[]>;
  primaryWeights?: SourceResult<CanonicalWeightRow[]>;
  /** Default: two January observations per requested country */
  secondaryIndex?: (
    countries: readonly string[]
  ) => Result<CanonicalIndexRow[], DataAcquisitionError>;
  /** Default: a full year of division weights per requested country */
  secondaryWeights?: (
    countries: readonly string[]
  ) => Result<CanonicalWeightRow[], DataAcquisitionError>;
}

export interface FakeSourceCalls {
  primaryIndex: string[];
  primaryWeights: number;
  secondaryIndex: { countries: string[]; startDate: string }[];
  secondaryWeights: string[][];
}

/**
 * In-process sources with canned data; UK is served by the primary pair.
 */
export const makeFakeSources = (options: FakeSourcesOptions = {}) => {
  const calls: FakeSourceCalls = {
    primaryIndex: [],
    primaryWeights: 0,
    secondaryIndex: [],
    secondaryWeights: [],
  };

  const secondaryIndex =
    options.secondaryIndex ??
    ((countries: readonly string[]) =>
      ok(
        countries.flatMap((country) =>
          makeJanuarySeries(
            country,
            { 2020: 100, 2024: 110 },
            { source: 'Eurostat', measure: 'ma12_rate' }
          )
        )
      ));
  const secondaryWeights =
    options.secondaryWeights ??
    ((countries: readonly string[]) =>
      ok(countries.flatMap((country) => makeWeightRows({ country, source: 'Eurostat' }))));

  const sources: CpiSources = {
    primary: {
      index: {
        fetchSeries(startDate) {
          calls.primaryIndex.push(startDate);
          return Promise.resolve(
            options.primaryIndex ?? ok(makeJanuarySeries('UK', { 2020: 100, 2024: 120 }))
          );
        },
      },
      weights: {
        fetchWeights() {
          calls.primaryWeights++;
          return Promise.resolve(options.primaryWeights ?? ok(makeWeightRows()));
        },
      },
    },
    secondary: {
      index: {
        fetchSeries(countries, startDate) {
          calls.secondaryIndex.push({ countries: [...countries], startDate });
          return Promise.resolve(secondaryIndex(countries));
        },
      },
      weights: {
        fetchWeights(countries) {
          calls.secondaryWeights.push([...countries]);
          return Promise.resolve(secondaryWeights(countries));
        },
      },
    },
  };

  return { sources, calls };
};
