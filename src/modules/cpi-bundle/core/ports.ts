import type { RoutingStrategy } from './routing.js';
import type { PrimaryIndexSource, SecondaryIndexSource } from '@/modules/index-series/index.js';
import type { PrimaryWeightsSource, SecondaryWeightsSource } from '@/modules/weights/index.js';
import type { Logger } from 'pino';

export interface CpiSources {
  primary: {
    weights: PrimaryWeightsSource;
    index: PrimaryIndexSource;
  };
  secondary: {
    weights: SecondaryWeightsSource;
    index: SecondaryIndexSource;
  };
}

export interface CpiBundleDeps {
  sources: CpiSources;
  routing: RoutingStrategy;
  logger: Logger;
}
