import type { RatePeriod } from './types.js';

export const DEFAULT_PERIODS: readonly RatePeriod[] = [
  { label: 'Pre-GFC', startYear: 2000, endYear: 2009 },
  { label: 'Post-GFC', startYear: 2010, endYear: 2019 },
  { label: 'Post-COVID', startYear: 2020, endYear: 2024 },
];
