import type { Decimal } from 'decimal.js';

export type WeightSource = 'ONS' | 'Eurostat';

/**
 * One category weight for one country and year, in parts per thousand.
 *
 * Category codes use the ONS code space (CHZR ... CJUW) regardless of source,
 * which makes rows from different sources comparable.
 */
export interface CanonicalWeightRow {
  categoryCode: string;
  categoryDescription: string;
  year: number;
  weight: Decimal;
  source: WeightSource;
  country: string;
}

export type WeightsValidationWarning =
  | {
      type: 'CategoryCount';
      message: string;
      country: string;
      year: number;
      found: number;
      expected: number;
    }
  | { type: 'WeightSum'; message: string; country: string; year: number; total: string }
  | {
      type: 'HighWeight';
      message: string;
      country: string;
      year: number;
      categoryCode: string;
      weight: string;
    }
  | { type: 'DescriptionFormat'; message: string; description: string }
  | { type: 'UnknownCategory'; message: string; categoryCode: string };

export interface WeightsValidationReport {
  rowCount: number;
  warnings: WeightsValidationWarning[];
}

export interface WeightsValidationOptions {
  /** Every row must carry this source */
  source: WeightSource;
  /** Upper bound for years is currentYear + 1 */
  currentYear: number;
  /** When set, every row must carry this country */
  country?: string;
  /** When set, every canonical category code must be present in the batch */
  requireAllCategories?: boolean;
}
