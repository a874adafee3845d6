/**
 * Primary index adapter over the FRED observations endpoint.
 *
 * FRED serves the UK CPI as index levels; by default the adapter turns them
 * into year-over-year percent changes, fetching one extra year so the first
 * requested month has a base.
 */

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { isIsoDate, shiftMonths } from '@/common/calendar.js';
import {
  createDataValidationError,
  type DataValidationError,
  type NetworkError,
} from '@/common/types/errors.js';
import { createComponentLogger, type Logger } from '@/infra/logger/index.js';

import { deriveYearOverYear, fromStartDate } from '../../core/series.js';

import type { PrimaryIndexSource } from '../../core/ports.js';
import type { CanonicalIndexRow } from '../../core/types.js';
import type { HttpClient, RetryPolicy } from '@/infra/http/index.js';

const SOURCE = 'fred';
const MISSING_VALUE = '.';
const NUMERIC_RE = /^-?\d+(?:\.\d+)?$/;
const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export const FredObservationsPageSchema = Type.Object({
  count: Type.Integer({ minimum: 0 }),
  offset: Type.Integer({ minimum: 0 }),
  limit: Type.Integer({ minimum: 1 }),
  observations: Type.Array(
    Type.Object({
      date: Type.String(),
      value: Type.String(),
    })
  ),
});

export type FredObservationsPage = Static<typeof FredObservationsPageSchema>;

const pageValidator = TypeCompiler.Compile(FredObservationsPageSchema);

export interface FredSeriesSourceOptions {
  http: HttpClient;
  retry: RetryPolicy;
  logger: Logger;
  baseUrl: string;
  apiKey: string;
  /** Default: GBRCPIALLMINMEI */
  seriesId?: string;
  /** Default: 'UK' */
  country?: string;
  /** Observations per request. Default: 1000 */
  pageSize?: number;
  /** Derive year-over-year percent changes from index levels. Default: true */
  deriveYearOverYear?: boolean;
}

export const parseFredPage = (
  payload: unknown
): Result<FredObservationsPage, DataValidationError> => {
  if (!pageValidator.Check(payload)) {
    const issues = [...pageValidator.Errors(payload)].map((e) => `${e.path}: ${e.message}`);
    return err(
      createDataValidationError(SOURCE, 'Response does not match the observations page shape', issues)
    );
  }
  return ok(payload);
};

/**
 * Converts raw observations to index-level rows. "." marks a missing month and is dropped.
 */
export const toIndexLevelRows = (
  observations: FredObservationsPage['observations'],
  country: string
): Result<CanonicalIndexRow[], DataValidationError> => {
  const rows: CanonicalIndexRow[] = [];
  const issues: string[] = [];

  for (const { date, value } of observations) {
    if (value === MISSING_VALUE) continue;
    if (!DATE_RE.test(date) || !NUMERIC_RE.test(value)) {
      issues.push(`${date}: '${value}'`);
      continue;
    }
    rows.push({ date, value: new Decimal(value), country, source: 'FRED', measure: 'index_level' });
  }

  if (issues.length > 0) {
    return err(createDataValidationError(SOURCE, 'Malformed observations', issues));
  }
  return ok(rows);
};

export const createFredSeriesSource = (options: FredSeriesSourceOptions): PrimaryIndexSource => {
  const { http, retry, apiKey } = options;
  const seriesId = options.seriesId ?? 'GBRCPIALLMINMEI';
  const country = options.country ?? 'UK';
  const pageSize = options.pageSize ?? 1000;
  const derive = options.deriveYearOverYear ?? true;
  const url = `${options.baseUrl.replace(/\/+$/, '')}/series/observations`;
  const log = createComponentLogger(options.logger, 'fred-series-source', { seriesId });

  const fetchAll = async (
    observationStart: string
  ): Promise<Result<FredObservationsPage['observations'], NetworkError | DataValidationError>> => {
    const collected: FredObservationsPage['observations'] = [];
    let offset = 0;

    for (;;) {
      const response = await retry.execute(`fred ${seriesId} offset ${String(offset)}`, () =>
        http.getJson(url, {
          series_id: seriesId,
          api_key: apiKey,
          file_type: 'json',
          frequency: 'm',
          observation_start: observationStart,
          limit: pageSize,
          offset,
        })
      );
      const page = response.andThen(parseFredPage);
      if (page.isErr()) return err(page.error);

      collected.push(...page.value.observations);
      offset += page.value.observations.length;

      if (page.value.observations.length === 0 || collected.length >= page.value.count) {
        return ok(collected);
      }
    }
  };

  return {
    async fetchSeries(startDate) {
      const observationStart = !isIsoDate(startDate)
        ? undefined
        : derive
          ? shiftMonths(startDate, -12)
          : startDate;
      if (observationStart === undefined) {
        return err(
          createDataValidationError(SOURCE, `Start date '${startDate}' is not a YYYY-MM-DD date`)
        );
      }

      const observations = await fetchAll(observationStart);
      if (observations.isErr()) return err(observations.error);

      const levels = toIndexLevelRows(observations.value, country);
      if (levels.isErr()) return err(levels.error);

      const rows = fromStartDate(derive ? deriveYearOverYear(levels.value) : levels.value, startDate);
      log.info({ country, rows: rows.length, derived: derive }, 'Loaded FRED series');
      return ok(rows);
    },
  };
};
