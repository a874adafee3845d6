import type { CanonicalWeightRow } from './types.js';
import type {
  DataAcquisitionError,
  DataValidationError,
  NetworkError,
} from '@/common/types/errors.js';
import type { Result } from 'neverthrow';

/**
 * Weights for the primary country, read from the national statistics workbook.
 */
export interface PrimaryWeightsSource {
  fetchWeights(): Promise<Result<CanonicalWeightRow[], NetworkError | DataValidationError>>;
}

/**
 * Weights for any number of countries from a multi-country source.
 * Countries that fail are skipped; the call fails only when none succeed.
 */
export interface SecondaryWeightsSource {
  fetchWeights(
    countries: readonly string[]
  ): Promise<Result<CanonicalWeightRow[], DataAcquisitionError>>;
}
