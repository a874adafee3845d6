import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { parseIsoDate } from '@/common/calendar.js';
import { createInvalidInputError, type InvalidInputError } from '@/common/types/errors.js';

import type {
  RateOfChangeMatrix,
  RateOfChangeResult,
  RateOfChangeWarning,
  RatePeriod,
  RateSample,
} from './types.js';

const JANUARY = 1;

interface JanuarySample {
  year: number;
  date: string;
  value: Decimal;
}

/**
 * Returns the first problem with a period list, or undefined when every window
 * is labelled, unique and spans startYear < endYear.
 */
export const validatePeriods = (
  periods: readonly RatePeriod[]
): InvalidInputError | undefined => {
  if (periods.length === 0) {
    return createInvalidInputError('At least one period is required', 'periods');
  }

  const labels = new Set<string>();
  for (const period of periods) {
    if (period.label.trim() === '') {
      return createInvalidInputError('Period labels must not be empty', 'periods');
    }
    if (labels.has(period.label)) {
      return createInvalidInputError(`Duplicate period label '${period.label}'`, 'periods');
    }
    labels.add(period.label);

    if (
      !Number.isInteger(period.startYear) ||
      !Number.isInteger(period.endYear) ||
      period.startYear >= period.endYear
    ) {
      return createInvalidInputError(
        `Period '${period.label}' must span whole years with startYear < endYear, got ${String(period.startYear)}-${String(period.endYear)}`,
        'periods'
      );
    }
  }
  return undefined;
};

/**
 * Groups January observations by country, keeping first-appearance order of countries.
 */
const collectJanuarySamples = (
  rows: readonly RateSample[]
): Result<Map<string, JanuarySample[]>, InvalidInputError> => {
  const byCountry = new Map<string, JanuarySample[]>();

  for (const [index, row] of rows.entries()) {
    const date = parseIsoDate(row.date);
    if (date === undefined) {
      return err(
        createInvalidInputError(`Row ${String(index)} has a malformed date '${row.date}'`, 'rows')
      );
    }
    if (!(row.value instanceof Decimal) || !row.value.isFinite()) {
      return err(createInvalidInputError(`Row ${String(index)} has a non-finite value`, 'rows'));
    }

    let samples = byCountry.get(row.country);
    if (samples === undefined) {
      samples = [];
      byCountry.set(row.country, samples);
    }
    if (date.month === JANUARY) {
      samples.push({ year: date.year, date: row.date, value: row.value });
    }
  }

  for (const samples of byCountry.values()) {
    samples.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  }
  return ok(byCountry);
};

/**
 * Average annual change over each period, measured between the first and
 * last January observation inside the window:
 *
 *   (last - first) / first / (endYear - startYear)
 *
 * The rate is simple, not compounded. Cells with fewer than two January
 * samples, or a zero first sample, are null and reported as warnings.
 */
export const calculateRateOfChange = (
  rows: readonly RateSample[],
  periods: readonly RatePeriod[]
): Result<RateOfChangeResult, InvalidInputError> => {
  if (rows.length === 0) {
    return err(createInvalidInputError('No index rows to compute rates from', 'rows'));
  }

  const periodError = validatePeriods(periods);
  if (periodError !== undefined) return err(periodError);

  const grouped = collectJanuarySamples(rows);
  if (grouped.isErr()) return err(grouped.error);

  // Maps, so labels such as __proto__ become ordinary keys in the result
  const matrix = new Map<string, Record<string, Decimal | null>>();
  const warnings: RateOfChangeWarning[] = [];

  for (const [country, samples] of grouped.value) {
    const cells = new Map<string, Decimal | null>();

    for (const period of periods) {
      const inWindow = samples.filter(
        (sample) => sample.year >= period.startYear && sample.year <= period.endYear
      );
      const first = inWindow[0];
      const last = inWindow.at(-1);

      if (first === undefined || last === undefined || inWindow.length < 2) {
        cells.set(period.label, null);
        warnings.push({
          type: 'InsufficientData',
          message: `Insufficient data for ${country} in ${period.label}: ${String(inWindow.length)} January sample(s)`,
          country,
          period: period.label,
          samples: inWindow.length,
        });
        continue;
      }

      if (first.value.isZero()) {
        cells.set(period.label, null);
        warnings.push({
          type: 'ZeroBase',
          message: `Cannot compute rate for ${country} in ${period.label}: first January value is zero`,
          country,
          period: period.label,
        });
        continue;
      }

      cells.set(
        period.label,
        last.value.minus(first.value).div(first.value).div(period.endYear - period.startYear)
      );
    }

    matrix.set(country, Object.fromEntries(cells));
  }

  const result: RateOfChangeMatrix = Object.fromEntries(matrix);
  return ok({ matrix: result, warnings });
};
