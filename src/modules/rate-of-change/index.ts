/**
 * Rate of Change Module - Public API
 */

export { calculateRateOfChange, validatePeriods } from './core/calculate-rate-of-change.js';
export { DEFAULT_PERIODS } from './core/periods.js';
export type {
  RateOfChangeMatrix,
  RateOfChangeResult,
  RateOfChangeWarning,
  RatePeriod,
  RateSample,
} from './core/types.js';
