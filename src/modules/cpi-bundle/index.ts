/**
 * CPI Bundle Module - Public API
 */

// =============================================================================
// Use Cases
// =============================================================================
export { getCompleteCpiData } from './core/usecases/get-complete-cpi-data.js';
export {
  createCachedCpiBundleLoader,
  bundleCacheKey,
  type CachedCpiBundleLoaderOptions,
  type CpiBundleLoader,
} from './shell/cached-bundle-loader.js';

// =============================================================================
// Request & Routing
// =============================================================================
export {
  parseCpiBundleRequest,
  CpiBundleRequestSchema,
  RatePeriodSchema,
  type CpiBundleRequestInput,
} from './core/request.js';
export {
  createRoutingStrategy,
  planRoutes,
  routeFor,
  DEFAULT_ROUTING,
  type CountryRoute,
  type RoutingPlan,
  type RoutingStrategy,
} from './core/routing.js';
export type { CpiBundleDeps, CpiSources } from './core/ports.js';

// =============================================================================
// Types
// =============================================================================
export {
  DEFAULT_START_DATE,
  type CompleteCpiBundle,
  type CpiBundleError,
  type CpiBundleRequest,
} from './core/types.js';
