import { describe, expect, it } from 'vitest';

import {
  DEFAULT_ROUTING,
  createRoutingStrategy,
  planRoutes,
  routeFor,
} from '@/modules/cpi-bundle/index.js';

describe('routing', () => {
  it('sends the primary country to the primary sources', () => {
    expect(routeFor(DEFAULT_ROUTING, 'UK')).toEqual({ kind: 'primary' });
    expect(routeFor(DEFAULT_ROUTING, 'DE')).toEqual({ kind: 'secondary' });
  });

  it('splits countries by route in request order', () => {
    expect(planRoutes(['FR', 'UK', 'DE'], DEFAULT_ROUTING)).toEqual({
      primary: ['UK'],
      secondary: ['FR', 'DE'],
    });
  });

  it('follows a configured primary country', () => {
    const strategy = createRoutingStrategy('IE');

    expect(planRoutes(['UK', 'IE'], strategy)).toEqual({ primary: ['IE'], secondary: ['UK'] });
  });
});
