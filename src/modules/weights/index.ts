/**
 * Weights Module - Public API
 */

// =============================================================================
// Sources
// =============================================================================
export {
  createOnsWorkbookSource,
  type OnsWorkbookSourceOptions,
} from './shell/sources/ons-workbook-source.js';
export {
  createEurostatWeightsSource,
  WEIGHTS_DATASET,
  type EurostatWeightsSourceOptions,
} from './shell/sources/eurostat-weights-source.js';
export { loadWorksheet, toSheetCell, worksheetReader } from './shell/workbook-reader.js';
export type { PrimaryWeightsSource, SecondaryWeightsSource } from './core/ports.js';

// =============================================================================
// Parsing & Validation
// =============================================================================
export { parseWeightsSheet } from './core/parse-workbook.js';
export { parseWeightsCube, roundCubeWeight, sortWeightRows } from './core/parse-weights-cube.js';
export {
  validateWeights,
  WEIGHT_TOTAL,
  WEIGHT_SUM_TOLERANCE,
  MAX_WEIGHT,
  WEIGHT_SANITY_CEILING,
  MIN_YEAR,
} from './core/validate-weights.js';
export {
  ONS_CPI_WEIGHTS_LAYOUT,
  columnLetters,
  columnNumber,
  type SheetCell,
  type SheetReader,
  type WeightsSheetLayout,
  type YearLabelLayout,
} from './core/workbook-layout.js';

// =============================================================================
// Analytics
// =============================================================================
export {
  cleanCategoryLabel,
  compareCountryWeights,
  summarizeCategoryWeights,
  totalWeightsByCountryYear,
  type CategoryWeightSummary,
  type CompareCountryWeightsInput,
  type CountryWeightComparison,
  type CountryYearTotal,
} from './core/analytics.js';

// =============================================================================
// Types
// =============================================================================
export {
  CATEGORIES,
  CANONICAL_CATEGORY_CODES,
  CANONICAL_CATEGORY_COUNT,
  OVERALL_INDEX_CODE,
  findCategoryByCoicop,
  type CategoryDefinition,
} from './core/categories.js';
export type {
  CanonicalWeightRow,
  WeightSource,
  WeightsValidationOptions,
  WeightsValidationReport,
  WeightsValidationWarning,
} from './core/types.js';
