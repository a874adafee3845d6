import type { DataAcquisitionError, InvalidInputError } from '@/common/types/errors.js';
import type { CanonicalIndexRow } from '@/modules/index-series/index.js';
import type { RateOfChangeMatrix, RatePeriod } from '@/modules/rate-of-change/index.js';
import type { CanonicalWeightRow } from '@/modules/weights/index.js';

/**
 * Everything the presentation layer needs for one request.
 * Built once per request and never mutated afterwards.
 */
export interface CompleteCpiBundle {
  readonly cpi: readonly CanonicalIndexRow[];
  readonly roc: RateOfChangeMatrix;
  readonly weights: readonly CanonicalWeightRow[];
}

/**
 * A validated, normalized bundle request.
 */
export interface CpiBundleRequest {
  /** Trimmed, de-duplicated, in caller order */
  countries: string[];
  /** YYYY-MM-DD */
  startDate: string;
  periods: RatePeriod[];
}

export type CpiBundleError = DataAcquisitionError | InvalidInputError;

export const DEFAULT_START_DATE = '1999-01-01';
