import type { CanonicalIndexRow } from './types.js';

export const sortByDate = (rows: readonly CanonicalIndexRow[]): CanonicalIndexRow[] =>
  [...rows].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

/**
 * Drops rows dated before startDate and orders the rest by date.
 * ISO dates compare correctly as strings.
 */
export const fromStartDate = (
  rows: readonly CanonicalIndexRow[],
  startDate: string
): CanonicalIndexRow[] => sortByDate(rows.filter((row) => row.date >= startDate));

/**
 * Percent change against the same calendar month one year earlier:
 * (v[t] / v[t-12] - 1) * 100. Months without a prior-year value, or whose
 * prior-year value is zero, produce no row.
 */
export const deriveYearOverYear = (rows: readonly CanonicalIndexRow[]): CanonicalIndexRow[] => {
  const byMonth = new Map(rows.map((row) => [row.date.slice(0, 7), row]));

  return sortByDate(rows).flatMap((row) => {
    const year = Number.parseInt(row.date.slice(0, 4), 10);
    const prior = byMonth.get(`${String(year - 1).padStart(4, '0')}${row.date.slice(4, 7)}`);
    if (prior === undefined || prior.value.isZero()) return [];

    return [
      {
        ...row,
        value: row.value.div(prior.value).minus(1).times(100),
        measure: 'yoy_percent' as const,
      },
    ];
  });
};
