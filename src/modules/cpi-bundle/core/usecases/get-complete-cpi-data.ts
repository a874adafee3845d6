/**
 * Get Complete CPI Data Use Case
 *
 * Fetches index series and weights for the requested countries from the
 * routed sources, merges them and computes period rates of change.
 *
 * Failure policy:
 * - primary sources are authoritative: any failure fails the request
 * - secondary sources degrade: a failure is logged and their rows are absent
 */

import { err, ok, type Result } from 'neverthrow';

import { createDataAcquisitionError, type AppError } from '@/common/types/errors.js';
import { calculateRateOfChange } from '@/modules/rate-of-change/index.js';

import { parseCpiBundleRequest } from '../request.js';
import { planRoutes } from '../routing.js';

import type { CpiBundleDeps } from '../ports.js';
import type { CompleteCpiBundle, CpiBundleError } from '../types.js';
import type { CanonicalIndexRow } from '@/modules/index-series/index.js';
import type { CanonicalWeightRow } from '@/modules/weights/index.js';

const compareRows = (a: CanonicalIndexRow, b: CanonicalIndexRow): number => {
  if (a.country !== b.country) return a.country < b.country ? -1 : 1;
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return 0;
};

const wrap = (pipeline: string, error: AppError): CpiBundleError =>
  createDataAcquisitionError(pipeline, `${pipeline} failed: ${error.message}`, error);

export const getCompleteCpiData = async (
  deps: CpiBundleDeps,
  input: unknown
): Promise<Result<CompleteCpiBundle, CpiBundleError>> => {
  const { sources, logger } = deps;

  // 1. Validate request
  const requestResult = parseCpiBundleRequest(input);
  if (requestResult.isErr()) return err(requestResult.error);
  const request = requestResult.value;

  // 2. Resolve routing once
  const plan = planRoutes(request.countries, deps.routing);
  logger.debug({ plan, startDate: request.startDate }, 'Resolved country routing');

  // 3. Index series
  const cpi: CanonicalIndexRow[] = [];

  if (plan.primary.length > 0) {
    const primary = await sources.primary.index.fetchSeries(request.startDate);
    if (primary.isErr()) return err(wrap('primary-index', primary.error));
    cpi.push(...primary.value);
  }

  if (plan.secondary.length > 0) {
    const secondary = await sources.secondary.index.fetchSeries(
      plan.secondary,
      request.startDate
    );
    if (secondary.isErr()) {
      logger.warn(
        { countries: plan.secondary, errorType: secondary.error.type },
        `Secondary index source unavailable: ${secondary.error.message}`
      );
    } else {
      cpi.push(...secondary.value);
    }
  }

  // 4. Weights
  const weights: CanonicalWeightRow[] = [];

  if (plan.primary.length > 0) {
    const primary = await sources.primary.weights.fetchWeights();
    if (primary.isErr()) return err(wrap('primary-weights', primary.error));
    weights.push(...primary.value);
  }

  if (plan.secondary.length > 0) {
    const secondary = await sources.secondary.weights.fetchWeights(plan.secondary);
    if (secondary.isErr()) {
      logger.warn(
        { countries: plan.secondary, errorType: secondary.error.type },
        `Secondary weights source unavailable: ${secondary.error.message}`
      );
    } else {
      weights.push(...secondary.value);
    }
  }

  // 5. Merge
  if (cpi.length === 0) {
    return err(
      createDataAcquisitionError(
        'cpi-bundle',
        `No CPI data available for ${request.countries.join(', ')}`
      )
    );
  }
  cpi.sort(compareRows);

  // 6. Rates of change
  const rocResult = calculateRateOfChange(cpi, request.periods);
  if (rocResult.isErr()) return err(rocResult.error);

  for (const { message, ...details } of rocResult.value.warnings) {
    logger.warn(details, message);
  }

  logger.info(
    {
      countries: request.countries,
      cpiRows: cpi.length,
      weightRows: weights.length,
    },
    'Assembled CPI bundle'
  );

  return ok({ cpi, roc: rocResult.value.matrix, weights });
};
