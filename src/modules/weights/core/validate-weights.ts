import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createDataValidationError, type DataValidationError } from '@/common/types/errors.js';

import { CANONICAL_CATEGORY_CODES, CANONICAL_CATEGORY_COUNT } from './categories.js';

import type {
  CanonicalWeightRow,
  WeightsValidationOptions,
  WeightsValidationReport,
  WeightsValidationWarning,
} from './types.js';

/** Weights are expressed in parts per thousand */
export const WEIGHT_TOTAL = 1000;
export const WEIGHT_SUM_TOLERANCE = 5;
/** No single weight may exceed the whole basket */
export const MAX_WEIGHT = 1000;
/** Historically no division has exceeded this; higher values are suspicious */
export const WEIGHT_SANITY_CEILING = 200;
export const MIN_YEAR = 2000;

const DESCRIPTION_RE = /^\s*(?:\d+\s+)?[A-Za-z, ]+/;

const VALIDATOR_SOURCE = 'weights-validator';

const fail = (message: string, issues: string[]): Result<never, DataValidationError> =>
  err(createDataValidationError(VALIDATOR_SOURCE, message, issues));

const label = (row: CanonicalWeightRow): string =>
  `${row.country}/${row.categoryCode}/${String(row.year)}`;

const missingFields = (row: CanonicalWeightRow): string[] => {
  const missing: string[] = [];
  if (typeof row.categoryCode !== 'string' || row.categoryCode.trim() === '') {
    missing.push('categoryCode');
  }
  if (typeof row.categoryDescription !== 'string' || row.categoryDescription.trim() === '') {
    missing.push('categoryDescription');
  }
  if (!Number.isInteger(row.year)) missing.push('year');
  if (!(row.weight instanceof Decimal) || !row.weight.isFinite()) missing.push('weight');
  if (typeof row.source !== 'string') missing.push('source');
  if (typeof row.country !== 'string' || row.country.trim() === '') missing.push('country');
  return missing;
};

interface GroupStats {
  country: string;
  year: number;
  codes: Set<string>;
  total: Decimal;
}

const groupByCountryYear = (rows: readonly CanonicalWeightRow[]): GroupStats[] => {
  const groups = new Map<string, GroupStats>();

  for (const row of rows) {
    const key = `${row.country}|${String(row.year)}`;
    let group = groups.get(key);
    if (group === undefined) {
      group = { country: row.country, year: row.year, codes: new Set(), total: new Decimal(0) };
      groups.set(key, group);
    }
    group.codes.add(row.categoryCode);
    group.total = group.total.plus(row.weight);
  }

  return [...groups.values()];
};

const collectWarnings = (rows: readonly CanonicalWeightRow[]): WeightsValidationWarning[] => {
  const warnings: WeightsValidationWarning[] = [];

  for (const group of groupByCountryYear(rows)) {
    if (group.codes.size !== CANONICAL_CATEGORY_COUNT) {
      warnings.push({
        type: 'CategoryCount',
        message: `Missing categories for ${group.country} in ${String(group.year)}: found ${String(group.codes.size)} of ${String(CANONICAL_CATEGORY_COUNT)}`,
        country: group.country,
        year: group.year,
        found: group.codes.size,
        expected: CANONICAL_CATEGORY_COUNT,
      });
    }

    const deviation = group.total.minus(WEIGHT_TOTAL).abs();
    if (deviation.gt(WEIGHT_SUM_TOLERANCE)) {
      warnings.push({
        type: 'WeightSum',
        message: `Weights for ${group.country} in ${String(group.year)} sum to ${group.total.toFixed(1)}, expected ~${String(WEIGHT_TOTAL)}`,
        country: group.country,
        year: group.year,
        total: group.total.toString(),
      });
    }
  }

  for (const row of rows) {
    if (row.weight.gt(WEIGHT_SANITY_CEILING)) {
      warnings.push({
        type: 'HighWeight',
        message: `Unusually high weight detected for ${label(row)}: ${row.weight.toString()}`,
        country: row.country,
        year: row.year,
        categoryCode: row.categoryCode,
        weight: row.weight.toString(),
      });
    }
  }

  const descriptions = new Set(rows.map((row) => row.categoryDescription));
  for (const description of descriptions) {
    if (!DESCRIPTION_RE.test(description)) {
      warnings.push({
        type: 'DescriptionFormat',
        message: `Potentially invalid category description: '${description}'`,
        description,
      });
    }
  }

  const codes = new Set(rows.map((row) => row.categoryCode));
  for (const code of codes) {
    if (!CANONICAL_CATEGORY_CODES.has(code)) {
      warnings.push({
        type: 'UnknownCategory',
        message: `Category code '${code}' is not one of the canonical COICOP divisions`,
        categoryCode: code,
      });
    }
  }

  return warnings;
};

/**
 * Shared post-parse check for weight batches from any source.
 *
 * Structural and domain-rule violations are fatal. Deviations that upstream
 * publications legitimately show (incomplete years, sums slightly off 1000)
 * come back as warnings for the caller to log.
 */
export const validateWeights = (
  rows: readonly CanonicalWeightRow[],
  options: WeightsValidationOptions
): Result<WeightsValidationReport, DataValidationError> => {
  if (rows.length === 0) {
    return fail('No weight rows to validate', []);
  }

  const incomplete = rows.flatMap((row, index) => {
    const missing = missingFields(row);
    return missing.length > 0 ? [`row ${String(index)}: ${missing.join(', ')}`] : [];
  });
  if (incomplete.length > 0) {
    return fail('Missing required fields', incomplete);
  }

  const wrongSource = rows.filter((row) => row.source !== options.source).map(label);
  if (wrongSource.length > 0) {
    return fail(`Inconsistent data source detected, expected ${options.source}`, wrongSource);
  }

  const expectedCountry = options.country;
  if (expectedCountry !== undefined) {
    const wrongCountry = rows.filter((row) => row.country !== expectedCountry).map(label);
    if (wrongCountry.length > 0) {
      return fail(`Inconsistent country detected, expected ${expectedCountry}`, wrongCountry);
    }
  }

  const negative = rows.filter((row) => row.weight.lt(0));
  if (negative.length > 0) {
    return fail(
      'Negative weights detected',
      negative.map((row) => `${label(row)}: ${row.weight.toString()}`)
    );
  }

  const oversized = rows.filter((row) => row.weight.gt(MAX_WEIGHT));
  if (oversized.length > 0) {
    return fail(
      `Invalid weights detected (outside range 0-${String(MAX_WEIGHT)})`,
      oversized.map((row) => `${label(row)}: ${row.weight.toString()}`)
    );
  }

  const years = rows.map((row) => row.year);
  const minYear = Math.min(...years);
  const maxYear = Math.max(...years);
  if (minYear < MIN_YEAR || maxYear > options.currentYear + 1) {
    return fail(`Invalid year range: ${String(minYear)} to ${String(maxYear)}`, [
      `allowed: ${String(MIN_YEAR)} to ${String(options.currentYear + 1)}`,
    ]);
  }

  const seen = new Map<string, number>();
  for (const row of rows) {
    const key = `${row.country}/${row.categoryCode}/${String(row.year)}`;
    seen.set(key, (seen.get(key) ?? 0) + 1);
  }
  const duplicates = [...seen.entries()]
    .filter(([, count]) => count > 1)
    .map(([key, count]) => `${key} (x${String(count)})`);
  if (duplicates.length > 0) {
    return fail('Duplicate entries found for category-year combinations', duplicates);
  }

  if (options.requireAllCategories === true) {
    const present = new Set(rows.map((row) => row.categoryCode));
    const missingCodes = [...CANONICAL_CATEGORY_CODES].filter((code) => !present.has(code)).sort();
    if (missingCodes.length > 0) {
      return fail('Missing expected category codes', missingCodes);
    }
  }

  return ok({ rowCount: rows.length, warnings: collectWarnings(rows) });
};
