/**
 * Secondary weights adapter over the Eurostat `prc_hicp_inw` dataset.
 * One request per country and COICOP division, issued sequentially.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createDataAcquisitionError,
  createDataValidationError,
  type DataValidationError,
  type NetworkError,
} from '@/common/types/errors.js';
import { createComponentLogger, type Logger } from '@/infra/logger/index.js';

import { logValidationWarnings } from './log-warnings.js';
import { CATEGORIES } from '../../core/categories.js';
import { parseWeightsCube, sortWeightRows } from '../../core/parse-weights-cube.js';
import { MIN_YEAR, validateWeights } from '../../core/validate-weights.js';

import type { SecondaryWeightsSource } from '../../core/ports.js';
import type { CanonicalWeightRow } from '../../core/types.js';
import type { HttpClient, RetryPolicy } from '@/infra/http/index.js';

export const WEIGHTS_DATASET = 'prc_hicp_inw';

export interface EurostatWeightsSourceOptions {
  http: HttpClient;
  retry: RetryPolicy;
  logger: Logger;
  baseUrl: string;
  /** Decides which year gets full precision. Default: () => new Date() */
  clock?: () => Date;
}

export const createEurostatWeightsSource = (
  options: EurostatWeightsSourceOptions
): SecondaryWeightsSource => {
  const { http, retry } = options;
  const clock = options.clock ?? (() => new Date());
  const log = createComponentLogger(options.logger, 'eurostat-weights-source');
  const url = `${options.baseUrl.replace(/\/+$/, '')}/${WEIGHTS_DATASET}`;

  const fetchCountry = async (
    country: string,
    currentYear: number
  ): Promise<Result<CanonicalWeightRow[], NetworkError | DataValidationError>> => {
    const rows: CanonicalWeightRow[] = [];
    let lastError: NetworkError | DataValidationError | undefined;

    for (const category of CATEGORIES) {
      const response = await retry.execute(`eurostat-weights ${country} ${category.coicop}`, () =>
        http.getJson(url, { format: 'JSON', lang: 'en', geo: country, coicop: category.coicop })
      );
      const parsed = response.andThen((payload) =>
        parseWeightsCube(payload, category, country, currentYear)
      );

      if (parsed.isErr()) {
        lastError = parsed.error;
        log.error(
          { country, coicop: category.coicop, errorType: parsed.error.type },
          `Skipping category: ${parsed.error.message}`
        );
        continue;
      }
      rows.push(...parsed.value);
    }

    // Published from 1996 onward; earlier years fail validation
    const earlyYears = new Set(rows.filter((row) => row.year < MIN_YEAR).map((row) => row.year));
    for (const year of [...earlyYears].sort((a, b) => a - b)) {
      log.info({ country, year }, `Dropping weights for ${String(year)}, before ${String(MIN_YEAR)}`);
    }
    const kept = rows.filter((row) => row.year >= MIN_YEAR);

    if (kept.length === 0) {
      return err(
        lastError ??
          createDataValidationError('eurostat-weights', `No weight observations for ${country}`)
      );
    }

    const sorted = sortWeightRows(kept);
    const report = validateWeights(sorted, { source: 'Eurostat', country, currentYear });
    if (report.isErr()) return err(report.error);

    logValidationWarnings(log, report.value.warnings);
    return ok(sorted);
  };

  return {
    async fetchWeights(countries) {
      const currentYear = clock().getUTCFullYear();
      const collected: CanonicalWeightRow[] = [];
      const failed: string[] = [];

      for (const country of countries) {
        const result = await fetchCountry(country, currentYear);
        if (result.isErr()) {
          failed.push(country);
          log.warn(
            { country, errorType: result.error.type },
            `Skipping country weights: ${result.error.message}`
          );
          continue;
        }
        log.info({ country, rows: result.value.length }, 'Loaded country weights');
        collected.push(...result.value);
      }

      if (collected.length === 0) {
        return err(
          createDataAcquisitionError(
            'eurostat-weights',
            `No weights could be fetched for any of: ${countries.join(', ')}`
          )
        );
      }

      if (failed.length > 0) {
        log.warn({ failed }, 'Some countries have no weights');
      }
      return ok(collected);
    },
  };
};
