/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export const DEFAULT_ONS_WEIGHTS_URL =
  'https://www.ons.gov.uk/file?uri=/economy/inflationandpriceindices/datasets/consumerpriceinflationupdatingweightsannexatablesw1tow3/annexatablesw1tow3weights2024/annexaw1w3weights2024.xlsx';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Upstream sources
  FRED_API_KEY: Type.Optional(Type.String({ minLength: 1 })),
  FRED_BASE_URL: Type.String({ minLength: 1 }),
  FRED_SERIES_ID: Type.String({ minLength: 1 }),
  EUROSTAT_BASE_URL: Type.String({ minLength: 1 }),
  ONS_API_BASE_URL: Type.String({ minLength: 1 }),
  ONS_WEIGHTS_URL: Type.String({ minLength: 1 }),
  ONS_WEIGHTS_SHEET: Type.String({ minLength: 1 }),

  // Routing
  PRIMARY_COUNTRY: Type.String({ minLength: 1 }),
  PRIMARY_INDEX_SOURCE: Type.Union([Type.Literal('fred'), Type.Literal('ons')]),

  // Network
  HTTP_TIMEOUT_MS: Type.Number({ minimum: 1 }),
  RETRY_MAX_ATTEMPTS: Type.Number({ minimum: 1, maximum: 10 }),
  RETRY_DELAY_MS: Type.Number({ minimum: 0 }),

  // Cache
  CACHE_BACKEND: Type.Union([Type.Literal('memory'), Type.Literal('disabled')]),
  CACHE_TTL_MS: Type.Number({ minimum: 1 }),
  CACHE_MAX_ENTRIES: Type.Number({ minimum: 1 }),
});

export type Env = Static<typeof EnvSchema>;

const parseNumber = (value: string | undefined, defaultValue: number): number =>
  value !== undefined && value !== '' ? Number.parseInt(value, 10) : defaultValue;

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value !== '' ? value : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    FRED_API_KEY: nonEmpty(env['FRED_API_KEY']),
    FRED_BASE_URL: env['FRED_BASE_URL'] ?? 'https://api.stlouisfed.org/fred',
    FRED_SERIES_ID: env['FRED_SERIES_ID'] ?? 'GBRCPIALLMINMEI',
    EUROSTAT_BASE_URL:
      env['EUROSTAT_BASE_URL'] ??
      'https://ec.europa.eu/eurostat/api/dissemination/statistics/1.0/data',
    ONS_API_BASE_URL: env['ONS_API_BASE_URL'] ?? 'https://api.beta.ons.gov.uk/v1',
    ONS_WEIGHTS_URL: env['ONS_WEIGHTS_URL'] ?? DEFAULT_ONS_WEIGHTS_URL,
    ONS_WEIGHTS_SHEET: env['ONS_WEIGHTS_SHEET'] ?? 'W1-CPI',
    PRIMARY_COUNTRY: env['PRIMARY_COUNTRY'] ?? 'UK',
    PRIMARY_INDEX_SOURCE: env['PRIMARY_INDEX_SOURCE'] ?? 'fred',
    HTTP_TIMEOUT_MS: parseNumber(env['HTTP_TIMEOUT_MS'], 30_000),
    RETRY_MAX_ATTEMPTS: parseNumber(env['RETRY_MAX_ATTEMPTS'], 3),
    RETRY_DELAY_MS: parseNumber(env['RETRY_DELAY_MS'], 1000),
    CACHE_BACKEND: env['CACHE_BACKEND'] ?? 'memory',
    CACHE_TTL_MS: parseNumber(env['CACHE_TTL_MS'], 60 * 60 * 1000),
    CACHE_MAX_ENTRIES: parseNumber(env['CACHE_MAX_ENTRIES'], 100),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  if (rawEnv.PRIMARY_INDEX_SOURCE === 'fred' && rawEnv.FRED_API_KEY === undefined) {
    throw new Error(
      'Invalid environment configuration: /FRED_API_KEY: required when PRIMARY_INDEX_SOURCE is fred'
    );
  }

  return rawEnv;
};

/**
 * Primary index settings, resolved from PRIMARY_INDEX_SOURCE.
 * FRED settings only exist when FRED is selected, so the key is always present.
 */
export type PrimaryIndexConfig =
  | { kind: 'fred'; baseUrl: string; apiKey: string; seriesId: string }
  | { kind: 'ons'; baseUrl: string };

const resolvePrimaryIndex = (env: Env): PrimaryIndexConfig => {
  if (env.PRIMARY_INDEX_SOURCE === 'ons') {
    return { kind: 'ons', baseUrl: env.ONS_API_BASE_URL };
  }
  if (env.FRED_API_KEY === undefined) {
    throw new Error(
      'Invalid environment configuration: /FRED_API_KEY: required when PRIMARY_INDEX_SOURCE is fred'
    );
  }
  return {
    kind: 'fred',
    baseUrl: env.FRED_BASE_URL,
    apiKey: env.FRED_API_KEY,
    seriesId: env.FRED_SERIES_ID,
  };
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development',
  },
  sources: {
    primaryIndex: resolvePrimaryIndex(env),
    eurostat: {
      baseUrl: env.EUROSTAT_BASE_URL,
    },
    ons: {
      weightsUrl: env.ONS_WEIGHTS_URL,
      weightsSheet: env.ONS_WEIGHTS_SHEET,
    },
  },
  routing: {
    primaryCountry: env.PRIMARY_COUNTRY,
  },
  http: {
    timeoutMs: env.HTTP_TIMEOUT_MS,
    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      delayMs: env.RETRY_DELAY_MS,
    },
  },
  cache: {
    backend: env.CACHE_BACKEND,
    ttlMs: env.CACHE_TTL_MS,
    maxEntries: env.CACHE_MAX_ENTRIES,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
