/**
 * Primary alternative index adapter over the ONS beta API.
 *
 * Datasets are versioned: the edition document points at the latest version,
 * whose observations endpoint returns one row per month keyed "Jan-15".
 */

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler, type TypeCheck } from '@sinclair/typebox/compiler';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  createDataValidationError,
  type DataValidationError,
  type NetworkError,
} from '@/common/types/errors.js';
import { createComponentLogger, type Logger } from '@/infra/logger/index.js';

import { parseMonthToken } from '../../core/months.js';
import { fromStartDate } from '../../core/series.js';

import type { PrimaryIndexSource } from '../../core/ports.js';
import type { CanonicalIndexRow } from '../../core/types.js';
import type { HttpClient, RetryPolicy } from '@/infra/http/index.js';
import type { TSchema } from '@sinclair/typebox';

const SOURCE = 'ons-observations';
const NUMERIC_RE = /^-?\d+(?:\.\d+)?$/;

export const OnsEditionSchema = Type.Object({
  links: Type.Object({
    latest_version: Type.Object({
      id: Type.Union([Type.String({ minLength: 1 }), Type.Integer()]),
    }),
  }),
});

export const OnsObservationsSchema = Type.Object({
  observations: Type.Array(
    Type.Object({
      dimensions: Type.Object({
        Time: Type.Object({ id: Type.String() }),
      }),
      observation: Type.String(),
    })
  ),
});

export type OnsObservations = Static<typeof OnsObservationsSchema>;

const editionValidator = TypeCompiler.Compile(OnsEditionSchema);
const observationsValidator = TypeCompiler.Compile(OnsObservationsSchema);

const check = <T extends TSchema>(
  validator: TypeCheck<T>,
  payload: unknown,
  what: string
): Result<Static<T>, DataValidationError> => {
  if (validator.Check(payload)) return ok(payload);
  const issues = [...validator.Errors(payload)].map((e) => `${e.path}: ${e.message}`);
  return err(createDataValidationError(SOURCE, `Response does not match the ${what} shape`, issues));
};

export interface OnsSeriesSourceOptions {
  http: HttpClient;
  retry: RetryPolicy;
  logger: Logger;
  baseUrl: string;
  /** Default: 'cpih01' */
  dataset?: string;
  /** Default: 'time-series' */
  edition?: string;
  /** Default: 'K02000001' (United Kingdom) */
  geography?: string;
  /** Default: 'cpih1dim1A0' (all items) */
  aggregate?: string;
  /** Default: 'UK' */
  country?: string;
}

/**
 * Observations come back unordered; rows are returned as published and
 * ordered later.
 */
export const toOnsIndexRows = (
  payload: OnsObservations,
  country: string
): Result<CanonicalIndexRow[], DataValidationError> => {
  const rows: CanonicalIndexRow[] = [];
  const issues: string[] = [];

  for (const { dimensions, observation } of payload.observations) {
    const date = parseMonthToken(dimensions.Time.id);
    const value = observation.trim();
    if (date === undefined || !NUMERIC_RE.test(value)) {
      issues.push(`${dimensions.Time.id}: '${observation}'`);
      continue;
    }
    rows.push({ date, value: new Decimal(value), country, source: 'ONS', measure: 'index_level' });
  }

  if (issues.length > 0) {
    return err(createDataValidationError(SOURCE, 'Malformed observations', issues));
  }
  return ok(rows);
};

export const createOnsSeriesSource = (options: OnsSeriesSourceOptions): PrimaryIndexSource => {
  const { http, retry } = options;
  const dataset = options.dataset ?? 'cpih01';
  const edition = options.edition ?? 'time-series';
  const geography = options.geography ?? 'K02000001';
  const aggregate = options.aggregate ?? 'cpih1dim1A0';
  const country = options.country ?? 'UK';
  const editionUrl = `${options.baseUrl.replace(/\/+$/, '')}/datasets/${dataset}/editions/${edition}`;
  const log = createComponentLogger(options.logger, 'ons-series-source', { dataset });

  const latestVersion = async (): Promise<
    Result<string, NetworkError | DataValidationError>
  > => {
    const response = await retry.execute(`ons ${dataset} latest version`, () =>
      http.getJson(editionUrl)
    );
    return response
      .andThen((payload) => check(editionValidator, payload, 'edition'))
      .map((doc) => String(doc.links.latest_version.id));
  };

  return {
    async fetchSeries(startDate) {
      const version = await latestVersion();
      if (version.isErr()) return err(version.error);

      const observationsUrl = `${editionUrl}/versions/${encodeURIComponent(version.value)}/observations`;
      const response = await retry.execute(`ons ${dataset} v${version.value} observations`, () =>
        http.getJson(observationsUrl, { time: '*', geography, aggregate })
      );
      const rows = response
        .andThen((payload) => check(observationsValidator, payload, 'observations'))
        .andThen((payload) => toOnsIndexRows(payload, country));
      if (rows.isErr()) return err(rows.error);

      const series = fromStartDate(rows.value, startDate);
      log.info({ country, version: version.value, rows: series.length }, 'Loaded ONS series');
      return ok(series);
    },
  };
};
