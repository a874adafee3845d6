/**
 * Secondary index adapter over the Eurostat `prc_hicp_mv12r` dataset:
 * the all-items HICP as a 12-month moving average rate of change.
 */

import { err, ok, type Result } from 'neverthrow';

import { parseJsonStatTimeSeries } from '@/common/schemas/json-stat.js';
import {
  createDataAcquisitionError,
  createDataValidationError,
  type DataValidationError,
  type NetworkError,
} from '@/common/types/errors.js';
import { createComponentLogger, type Logger } from '@/infra/logger/index.js';

import { parseEurostatMonth } from '../../core/months.js';
import { fromStartDate } from '../../core/series.js';

import type { SecondaryIndexSource } from '../../core/ports.js';
import type { CanonicalIndexRow } from '../../core/types.js';
import type { HttpClient, RetryPolicy } from '@/infra/http/index.js';

const SOURCE = 'eurostat-hicp';

export const HICP_DATASET = 'prc_hicp_mv12r';

export interface EurostatHicpSourceOptions {
  http: HttpClient;
  retry: RetryPolicy;
  logger: Logger;
  baseUrl: string;
}

export const parseHicpCube = (
  payload: unknown,
  country: string
): Result<CanonicalIndexRow[], DataValidationError> =>
  parseJsonStatTimeSeries(payload, SOURCE).andThen((observations) => {
    const rows: CanonicalIndexRow[] = [];
    const issues: string[] = [];

    for (const { period, value } of observations) {
      const date = parseEurostatMonth(period);
      if (date === undefined) {
        issues.push(`unrecognised period '${period}'`);
        continue;
      }
      rows.push({ date, value, country, source: 'Eurostat', measure: 'ma12_rate' });
    }

    return issues.length > 0
      ? err(createDataValidationError(SOURCE, `Unexpected time labels for ${country}`, issues))
      : ok(rows);
  });

export const createEurostatHicpSource = (
  options: EurostatHicpSourceOptions
): SecondaryIndexSource => {
  const { http, retry } = options;
  const url = `${options.baseUrl.replace(/\/+$/, '')}/${HICP_DATASET}`;
  const log = createComponentLogger(options.logger, 'eurostat-hicp-source');

  const fetchCountry = async (
    country: string
  ): Promise<Result<CanonicalIndexRow[], NetworkError | DataValidationError>> => {
    const response = await retry.execute(`eurostat-hicp ${country}`, () =>
      http.getJson(url, {
        format: 'JSON',
        lang: 'en',
        unit: 'RCH_MV12MAVR',
        coicop: 'CP00',
        geo: country,
      })
    );
    return response.andThen((payload) => parseHicpCube(payload, country));
  };

  return {
    async fetchSeries(countries, startDate) {
      const collected: CanonicalIndexRow[] = [];

      for (const country of countries) {
        const result = await fetchCountry(country);
        if (result.isErr()) {
          log.warn(
            { country, errorType: result.error.type },
            `Skipping country series: ${result.error.message}`
          );
          continue;
        }

        const rows = fromStartDate(result.value, startDate);
        log.info({ country, rows: rows.length }, 'Loaded HICP series');
        collected.push(...rows);
      }

      if (collected.length === 0) {
        return err(
          createDataAcquisitionError(
            SOURCE,
            `No HICP series could be fetched for any of: ${countries.join(', ')}`
          )
        );
      }
      return ok(collected);
    },
  };
};
