import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { parseJsonStatTimeSeries } from '@/common/schemas/json-stat.js';
import { createDataValidationError, type DataValidationError } from '@/common/types/errors.js';

import type { CategoryDefinition } from './categories.js';
import type { CanonicalWeightRow } from './types.js';

const SOURCE = 'eurostat-weights';
const YEAR_RE = /^\d{4}$/;

/**
 * Eurostat publishes the current year's weights with four decimals and
 * historical years with one.
 */
export const roundCubeWeight = (weight: Decimal, year: number, currentYear: number): Decimal =>
  weight.toDecimalPlaces(year === currentYear ? 4 : 1, Decimal.ROUND_HALF_EVEN);

/**
 * Turns one category's weights cube for one country into canonical rows,
 * one per year with a nonzero value.
 */
export const parseWeightsCube = (
  payload: unknown,
  category: CategoryDefinition,
  country: string,
  currentYear: number
): Result<CanonicalWeightRow[], DataValidationError> => {
  const observations = parseJsonStatTimeSeries(payload, SOURCE);
  if (observations.isErr()) return err(observations.error);

  const badPeriods = observations.value
    .filter((observation) => !YEAR_RE.test(observation.period))
    .map((observation) => observation.period);
  if (badPeriods.length > 0) {
    return err(
      createDataValidationError(SOURCE, `Expected yearly periods for ${category.coicop}`, badPeriods)
    );
  }

  return ok(
    observations.value
      .filter((observation) => !observation.value.isZero())
      .map((observation) => {
        const year = Number.parseInt(observation.period, 10);
        return {
          categoryCode: category.code,
          categoryDescription: category.description,
          year,
          weight: roundCubeWeight(observation.value, year, currentYear),
          source: 'Eurostat' as const,
          country,
        };
      })
  );
};

/**
 * Orders rows by year, then category code.
 */
export const sortWeightRows = (rows: readonly CanonicalWeightRow[]): CanonicalWeightRow[] =>
  [...rows].sort(
    (a, b) =>
      a.year - b.year ||
      (a.categoryCode < b.categoryCode ? -1 : a.categoryCode > b.categoryCode ? 1 : 0)
  );
