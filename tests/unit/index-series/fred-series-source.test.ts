import { ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { createFredSeriesSource, toIndexLevelRows } from '@/modules/index-series/index.js';

import { makeFredPage } from '../../fixtures/builders.js';
import { makeFakeHttpClient, makeTestLogger, makeTestRetry } from '../../fixtures/fakes.js';

import type { FakeHttpClientOptions } from '../../fixtures/fakes.js';

const OBSERVATIONS_URL = 'https://fred.test/fred/series/observations';

const makeSource = (
  json: FakeHttpClientOptions['json'],
  options: { pageSize?: number; deriveYearOverYear?: boolean } = {}
) => {
  const http = makeFakeHttpClient({ json });
  const logger = makeTestLogger();
  const source = createFredSeriesSource({
    http,
    retry: makeTestRetry(logger),
    logger,
    baseUrl: 'https://fred.test/fred/',
    apiKey: 'test-secret',
    ...options,
  });
  return { source, http };
};

describe('createFredSeriesSource', () => {
  it('pages through observations and derives year-over-year changes', async () => {
    const pages = [
      makeFredPage(
        [
          { date: '2023-01-01', value: '100' },
          { date: '2023-02-01', value: '.' },
        ],
        { count: 4, limit: 2 }
      ),
      makeFredPage(
        [
          { date: '2024-01-01', value: '105' },
          { date: '2024-02-01', value: '110' },
        ],
        { count: 4, offset: 2, limit: 2 }
      ),
    ];
    const { source, http } = makeSource((_url, query) => ok(pages[Number(query?.['offset']) / 2]), {
      pageSize: 2,
    });

    const rows = (await source.fetchSeries('2024-01-01'))._unsafeUnwrap();

    expect(http.calls.map((call) => call.query)).toEqual([
      {
        series_id: 'GBRCPIALLMINMEI',
        api_key: 'test-secret',
        file_type: 'json',
        frequency: 'm',
        observation_start: '2023-01-01',
        limit: 2,
        offset: 0,
      },
      {
        series_id: 'GBRCPIALLMINMEI',
        api_key: 'test-secret',
        file_type: 'json',
        frequency: 'm',
        observation_start: '2023-01-01',
        limit: 2,
        offset: 2,
      },
    ]);
    expect(http.calls[0]?.url).toBe(OBSERVATIONS_URL);
    expect(rows.map((row) => [row.date, row.value.toString(), row.measure])).toEqual([
      ['2024-01-01', '5', 'yoy_percent'],
    ]);
    expect(rows[0]).toMatchObject({ country: 'UK', source: 'FRED' });
  });

  it('returns index levels from the start date when derivation is off', async () => {
    const page = makeFredPage([
      { date: '2024-02-01', value: '131.2' },
      { date: '2024-01-01', value: '130.5' },
    ]);
    const { source, http } = makeSource(() => ok(page), { deriveYearOverYear: false });

    const rows = (await source.fetchSeries('2024-01-01'))._unsafeUnwrap();

    expect(http.calls[0]?.query?.['observation_start']).toBe('2024-01-01');
    expect(rows.map((row) => [row.date, row.value.toString(), row.measure])).toEqual([
      ['2024-01-01', '130.5', 'index_level'],
      ['2024-02-01', '131.2', 'index_level'],
    ]);
  });

  it('stops on an empty page', async () => {
    const { source, http } = makeSource(() => ok(makeFredPage([], { count: 50 })));

    const rows = (await source.fetchSeries('2024-01-01'))._unsafeUnwrap();

    expect(rows).toEqual([]);
    expect(http.calls).toHaveLength(1);
  });

  it('rejects a malformed start date before calling out', async () => {
    const { source, http } = makeSource(() => ok(makeFredPage([])));

    const error = (await source.fetchSeries('2024-13-01'))._unsafeUnwrapErr();

    expect(error.message).toBe("Start date '2024-13-01' is not a YYYY-MM-DD date");
    expect(http.calls).toEqual([]);
  });

  it('rejects payloads that are not observation pages', async () => {
    const { source } = makeSource(() => ok({ error_code: 400 }));

    const error = (await source.fetchSeries('2024-01-01'))._unsafeUnwrapErr();

    expect(error.message).toBe('Response does not match the observations page shape');
  });

  it('passes upstream failures through', async () => {
    const { source } = makeSource(undefined);

    const error = (await source.fetchSeries('2024-01-01'))._unsafeUnwrapErr();

    expect(error).toMatchObject({ type: 'NetworkError', status: 404, url: OBSERVATIONS_URL });
  });
});

describe('toIndexLevelRows', () => {
  it('drops missing months and reports malformed ones', () => {
    const error = toIndexLevelRows(
      [
        { date: '2024-01-01', value: '.' },
        { date: '2024-02-01', value: 'n/a' },
        { date: '2024-3-01', value: '1' },
      ],
      'UK'
    )._unsafeUnwrapErr();

    expect(error.message).toBe('Malformed observations');
    expect(error.issues).toEqual(["2024-02-01: 'n/a'", "2024-3-01: '1'"]);
  });
});
