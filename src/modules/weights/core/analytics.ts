import { Decimal } from 'decimal.js';

import type { CanonicalWeightRow } from './types.js';

const LEADING_NUMBER_RE = /^\s*\d+\s+/;

/**
 * "01    Food and non-alcoholic beverages" -> "Food and non-alcoholic beverages"
 */
export const cleanCategoryLabel = (description: string): string =>
  description.replace(LEADING_NUMBER_RE, '').trim();

export interface CountryWeightComparison {
  categoryCode: string;
  category: string;
  weight: Decimal;
  otherWeight: Decimal;
  /** weight - otherWeight */
  difference: Decimal;
}

export interface CompareCountryWeightsInput {
  country: string;
  otherCountry: string;
  year: number;
}

const weightsFor = (
  rows: readonly CanonicalWeightRow[],
  country: string,
  year: number
): Map<string, CanonicalWeightRow> =>
  new Map(
    rows
      .filter((row) => row.country === country && row.year === year)
      .map((row) => [row.categoryCode, row])
  );

/**
 * Side-by-side category weights of two countries for one year. Only
 * categories both countries publish are returned, heaviest first for `country`.
 */
export const compareCountryWeights = (
  rows: readonly CanonicalWeightRow[],
  input: CompareCountryWeightsInput
): CountryWeightComparison[] => {
  const own = weightsFor(rows, input.country, input.year);
  const other = weightsFor(rows, input.otherCountry, input.year);

  const comparisons: CountryWeightComparison[] = [];
  for (const [code, row] of own) {
    const match = other.get(code);
    if (match === undefined) continue;
    comparisons.push({
      categoryCode: code,
      category: cleanCategoryLabel(row.categoryDescription),
      weight: row.weight,
      otherWeight: match.weight,
      difference: row.weight.minus(match.weight),
    });
  }

  return comparisons.sort((a, b) => b.weight.comparedTo(a.weight));
};

export interface CategoryWeightSummary {
  categoryCode: string;
  year: number;
  count: number;
  mean: Decimal;
  min: { country: string; weight: Decimal };
  max: { country: string; weight: Decimal };
  /** Sample standard deviation; null with a single country */
  stdDev: Decimal | null;
}

/**
 * Cross-country spread of one category's weight in one year.
 */
export const summarizeCategoryWeights = (
  rows: readonly CanonicalWeightRow[],
  input: { categoryCode: string; year: number }
): CategoryWeightSummary | null => {
  const matching = rows.filter(
    (row) => row.categoryCode === input.categoryCode && row.year === input.year
  );
  const [first, ...rest] = matching;
  if (first === undefined) return null;

  let min = first;
  let max = first;
  let total = first.weight;
  for (const row of rest) {
    if (row.weight.lt(min.weight)) min = row;
    if (row.weight.gt(max.weight)) max = row;
    total = total.plus(row.weight);
  }

  const count = matching.length;
  const mean = total.div(count);

  let stdDev: Decimal | null = null;
  if (count > 1) {
    const squares = matching.reduce(
      (sum, row) => sum.plus(row.weight.minus(mean).pow(2)),
      new Decimal(0)
    );
    stdDev = squares.div(count - 1).sqrt();
  }

  return {
    categoryCode: input.categoryCode,
    year: input.year,
    count,
    mean,
    min: { country: min.country, weight: min.weight },
    max: { country: max.country, weight: max.weight },
    stdDev,
  };
};

export interface CountryYearTotal {
  country: string;
  year: number;
  total: Decimal;
}

/**
 * Sum of category weights per country and year, in first-appearance order.
 */
export const totalWeightsByCountryYear = (
  rows: readonly CanonicalWeightRow[]
): CountryYearTotal[] => {
  const totals = new Map<string, CountryYearTotal>();
  for (const row of rows) {
    const key = `${row.country}|${String(row.year)}`;
    const current = totals.get(key);
    if (current === undefined) {
      totals.set(key, { country: row.country, year: row.year, total: row.weight });
    } else {
      current.total = current.total.plus(row.weight);
    }
  }
  return [...totals.values()];
};
