/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { parseEnv, createConfig, DEFAULT_ONS_WEIGHTS_URL } from '@/infra/config/index.js';

const withKey = { FRED_API_KEY: 'test-secret' };

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when only the FRED key is set', () => {
      const env = parseEnv(withKey);

      expect(env.NODE_ENV).toBe('development');
      expect(env.LOG_LEVEL).toBe('info');
      expect(env.FRED_BASE_URL).toBe('https://api.stlouisfed.org/fred');
      expect(env.FRED_SERIES_ID).toBe('GBRCPIALLMINMEI');
      expect(env.ONS_WEIGHTS_URL).toBe(DEFAULT_ONS_WEIGHTS_URL);
      expect(env.ONS_WEIGHTS_SHEET).toBe('W1-CPI');
      expect(env.PRIMARY_COUNTRY).toBe('UK');
      expect(env.PRIMARY_INDEX_SOURCE).toBe('fred');
      expect(env.HTTP_TIMEOUT_MS).toBe(30_000);
      expect(env.RETRY_MAX_ATTEMPTS).toBe(3);
      expect(env.RETRY_DELAY_MS).toBe(1000);
      expect(env.CACHE_BACKEND).toBe('memory');
      expect(env.CACHE_TTL_MS).toBe(3_600_000);
      expect(env.CACHE_MAX_ENTRIES).toBe(100);
    });

    it('parses numeric settings as numbers', () => {
      const env = parseEnv({ ...withKey, HTTP_TIMEOUT_MS: '5000', RETRY_MAX_ATTEMPTS: '5' });

      expect(env.HTTP_TIMEOUT_MS).toBe(5000);
      expect(env.RETRY_MAX_ATTEMPTS).toBe(5);
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        const env = parseEnv({ ...withKey, LOG_LEVEL: level });
        expect(env.LOG_LEVEL).toBe(level);
      }
    });

    it('treats an empty FRED_API_KEY as missing', () => {
      expect(() => parseEnv({ FRED_API_KEY: '' })).toThrow(
        'Invalid environment configuration: /FRED_API_KEY: required when PRIMARY_INDEX_SOURCE is fred'
      );
    });

    it('does not need a FRED key when ONS is the primary index source', () => {
      const env = parseEnv({ PRIMARY_INDEX_SOURCE: 'ons' });

      expect(env.PRIMARY_INDEX_SOURCE).toBe('ons');
      expect(env.FRED_API_KEY).toBeUndefined();
    });

    it('throws on invalid NODE_ENV', () => {
      expect(() => parseEnv({ ...withKey, NODE_ENV: 'invalid' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on unknown primary index source', () => {
      expect(() => parseEnv({ ...withKey, PRIMARY_INDEX_SOURCE: 'bls' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on non-numeric timeouts', () => {
      expect(() => parseEnv({ ...withKey, HTTP_TIMEOUT_MS: 'soon' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws when retry attempts are out of range', () => {
      expect(() => parseEnv({ ...withKey, RETRY_MAX_ATTEMPTS: '0' })).toThrow(
        'Invalid environment configuration'
      );
      expect(() => parseEnv({ ...withKey, RETRY_MAX_ATTEMPTS: '11' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on unknown cache backend', () => {
      expect(() => parseEnv({ ...withKey, CACHE_BACKEND: 'redis' })).toThrow(
        'Invalid environment configuration'
      );
    });
  });

  describe('createConfig', () => {
    it('resolves FRED as the primary index source with its key', () => {
      const config = createConfig(parseEnv({ ...withKey, FRED_SERIES_ID: 'CPIAUCSL' }));

      expect(config.sources.primaryIndex).toEqual({
        kind: 'fred',
        baseUrl: 'https://api.stlouisfed.org/fred',
        apiKey: 'test-secret',
        seriesId: 'CPIAUCSL',
      });
    });

    it('resolves ONS as the primary index source', () => {
      const config = createConfig(
        parseEnv({ PRIMARY_INDEX_SOURCE: 'ons', ONS_API_BASE_URL: 'https://ons.test/v1' })
      );

      expect(config.sources.primaryIndex).toEqual({ kind: 'ons', baseUrl: 'https://ons.test/v1' });
    });

    it('enables pretty logging only in development', () => {
      expect(createConfig(parseEnv(withKey)).logger.pretty).toBe(true);
      expect(createConfig(parseEnv({ ...withKey, NODE_ENV: 'production' })).logger.pretty).toBe(
        false
      );
    });

    it('groups network and cache settings', () => {
      const config = createConfig(
        parseEnv({
          ...withKey,
          RETRY_DELAY_MS: '250',
          CACHE_BACKEND: 'disabled',
          CACHE_TTL_MS: '1000',
          CACHE_MAX_ENTRIES: '5',
          PRIMARY_COUNTRY: 'GB',
        })
      );

      expect(config.http).toEqual({ timeoutMs: 30_000, retry: { maxAttempts: 3, delayMs: 250 } });
      expect(config.cache).toEqual({ backend: 'disabled', ttlMs: 1000, maxEntries: 5 });
      expect(config.routing.primaryCountry).toBe('GB');
    });
  });
});
