/**
 * Country routing: which adapters serve which country.
 *
 * The primary adapters cover a single national source; everything else goes
 * to the multi-country secondary adapters.
 */

export type CountryRoute = { kind: 'primary' } | { kind: 'secondary' };

export type RoutingStrategy = ReadonlyMap<string, CountryRoute>;

const SECONDARY: CountryRoute = { kind: 'secondary' };

export const createRoutingStrategy = (primaryCountry: string): RoutingStrategy =>
  new Map([[primaryCountry, { kind: 'primary' }]]);

export const DEFAULT_ROUTING: RoutingStrategy = createRoutingStrategy('UK');

export const routeFor = (strategy: RoutingStrategy, country: string): CountryRoute =>
  strategy.get(country) ?? SECONDARY;

export interface RoutingPlan {
  primary: string[];
  secondary: string[];
}

/**
 * Splits requested countries by route, keeping request order within each side.
 */
export const planRoutes = (countries: readonly string[], strategy: RoutingStrategy): RoutingPlan => {
  const plan: RoutingPlan = { primary: [], secondary: [] };
  for (const country of countries) {
    plan[routeFor(strategy, country).kind].push(country);
  }
  return plan;
};
