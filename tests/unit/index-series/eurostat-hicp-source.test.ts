import { err, ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { createEurostatHicpSource, parseHicpCube } from '@/modules/index-series/index.js';

import { makeJsonStatCube } from '../../fixtures/builders.js';
import {
  makeCapturingLogger,
  makeFakeHttpClient,
  makeTestRetry,
  notFound,
} from '../../fixtures/fakes.js';

const DATASET_URL = 'https://eurostat.test/data/prc_hicp_mv12r';

const makeSource = (countries: readonly string[]) => {
  const capture = makeCapturingLogger();
  const http = makeFakeHttpClient({
    json: (url, query) =>
      countries.includes(String(query?.['geo']))
        ? ok(makeJsonStatCube({ '2023-12': 6.1, '2024-01': 5.7, '2024-02': null, '2024-03': 5.4 }))
        : err(notFound(url)),
  });
  const source = createEurostatHicpSource({
    http,
    retry: makeTestRetry(capture.logger),
    logger: capture.logger,
    baseUrl: 'https://eurostat.test/data',
  });
  return { source, http, capture };
};

describe('createEurostatHicpSource', () => {
  it('fetches the all-items moving-average rate per country', async () => {
    const { source, http } = makeSource(['DE', 'FR']);

    const rows = (await source.fetchSeries(['DE', 'FR'], '2024-01-01'))._unsafeUnwrap();

    expect(http.calls[0]).toEqual({
      kind: 'json',
      url: DATASET_URL,
      query: { format: 'JSON', lang: 'en', unit: 'RCH_MV12MAVR', coicop: 'CP00', geo: 'DE' },
    });
    expect(rows.map((row) => [row.country, row.date, row.value.toString()])).toEqual([
      ['DE', '2024-01-01', '5.7'],
      ['DE', '2024-03-01', '5.4'],
      ['FR', '2024-01-01', '5.7'],
      ['FR', '2024-03-01', '5.4'],
    ]);
    expect(rows[0]).toMatchObject({ source: 'Eurostat', measure: 'ma12_rate' });
  });

  it('skips countries that fail', async () => {
    const { source, capture } = makeSource(['DE']);

    const rows = (await source.fetchSeries(['DE', 'FR'], '2024-01-01'))._unsafeUnwrap();

    expect(new Set(rows.map((row) => row.country))).toEqual(new Set(['DE']));
    expect(capture.messages('warn')).toEqual([
      `Skipping country series: Request to ${DATASET_URL} failed with status 404 Not Found`,
    ]);
    expect(capture.at('warn')[0]?.['country']).toBe('FR');
  });

  it('fails when no country could be fetched', async () => {
    const { source } = makeSource([]);

    const error = (await source.fetchSeries(['FR'], '2024-01-01'))._unsafeUnwrapErr();

    expect(error).toMatchObject({
      type: 'DataAcquisitionError',
      pipeline: 'eurostat-hicp',
      message: 'No HICP series could be fetched for any of: FR',
    });
  });
});

describe('parseHicpCube', () => {
  it('rejects periods that are not months', () => {
    const cube = makeJsonStatCube({ '2024Q1': 1, '2024M02': 2 });

    const error = parseHicpCube(cube, 'DE')._unsafeUnwrapErr();

    expect(error.message).toBe('Unexpected time labels for DE');
    expect(error.issues).toEqual(["unrecognised period '2024Q1'"]);
  });
});
