/**
 * Index Series Module - Public API
 */

// =============================================================================
// Sources
// =============================================================================
export {
  createFredSeriesSource,
  parseFredPage,
  toIndexLevelRows,
  FredObservationsPageSchema,
  type FredSeriesSourceOptions,
} from './shell/sources/fred-series-source.js';
export {
  createOnsSeriesSource,
  toOnsIndexRows,
  OnsEditionSchema,
  OnsObservationsSchema,
  type OnsSeriesSourceOptions,
} from './shell/sources/ons-series-source.js';
export {
  createEurostatHicpSource,
  parseHicpCube,
  HICP_DATASET,
  type EurostatHicpSourceOptions,
} from './shell/sources/eurostat-hicp-source.js';
export type { PrimaryIndexSource, SecondaryIndexSource } from './core/ports.js';

// =============================================================================
// Series helpers
// =============================================================================
export { parseMonthToken, parseEurostatMonth, TWO_DIGIT_YEAR_PIVOT } from './core/months.js';
export { deriveYearOverYear, fromStartDate, sortByDate } from './core/series.js';

// =============================================================================
// Types
// =============================================================================
export type { CanonicalIndexRow, IndexMeasure, IndexSource } from './core/types.js';
