import type { Decimal } from 'decimal.js';

export type IndexSource = 'FRED' | 'ONS' | 'Eurostat';

/**
 * What a row's `value` measures. Sources publish different units and the
 * pipeline keeps them as published.
 * - index_level: index points (e.g. 2015 = 100)
 * - yoy_percent: percent change against the same month a year earlier
 * - ma12_rate: 12-month moving average rate of change, in percent
 */
export type IndexMeasure = 'index_level' | 'yoy_percent' | 'ma12_rate';

/**
 * One monthly observation. `date` is the first day of the month (YYYY-MM-01).
 */
export interface CanonicalIndexRow {
  date: string;
  value: Decimal;
  country: string;
  source: IndexSource;
  measure: IndexMeasure;
}
