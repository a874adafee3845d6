import type { CanonicalIndexRow } from './types.js';
import type {
  DataAcquisitionError,
  DataValidationError,
  NetworkError,
} from '@/common/types/errors.js';
import type { Result } from 'neverthrow';

/**
 * Monthly series for the primary country, from startDate onwards.
 */
export interface PrimaryIndexSource {
  fetchSeries(
    startDate: string
  ): Promise<Result<CanonicalIndexRow[], NetworkError | DataValidationError>>;
}

/**
 * Monthly series for many countries. Countries that fail are skipped;
 * the call fails only when none succeed.
 */
export interface SecondaryIndexSource {
  fetchSeries(
    countries: readonly string[],
    startDate: string
  ): Promise<Result<CanonicalIndexRow[], DataAcquisitionError>>;
}
