import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { isIsoDate } from '@/common/calendar.js';
import { createInvalidInputError, type InvalidInputError } from '@/common/types/errors.js';
import { DEFAULT_PERIODS, validatePeriods } from '@/modules/rate-of-change/index.js';

import { DEFAULT_START_DATE, type CpiBundleRequest } from './types.js';

export const RatePeriodSchema = Type.Object({
  label: Type.String({ minLength: 1 }),
  startYear: Type.Integer(),
  endYear: Type.Integer(),
});

export const CpiBundleRequestSchema = Type.Object({
  countries: Type.Array(Type.String(), { minItems: 1 }),
  startDate: Type.Optional(Type.String({ pattern: '^\\d{4}-\\d{2}-\\d{2}$' })),
  periods: Type.Optional(Type.Array(RatePeriodSchema, { minItems: 1 })),
});

export type CpiBundleRequestInput = Static<typeof CpiBundleRequestSchema>;

const validator = TypeCompiler.Compile(CpiBundleRequestSchema);

/**
 * Validates caller input and fills in defaults.
 */
export const parseCpiBundleRequest = (
  input: unknown
): Result<CpiBundleRequest, InvalidInputError> => {
  if (!validator.Check(input)) {
    const first = validator.Errors(input).First();
    return err(
      createInvalidInputError(
        first !== undefined ? `${first.path}: ${first.message}` : 'Invalid bundle request',
        first?.path.replace(/^\//, '').split('/')[0]
      )
    );
  }

  const countries: string[] = [];
  for (const raw of input.countries) {
    const country = raw.trim();
    if (country === '') {
      return err(createInvalidInputError('Country codes must not be empty', 'countries'));
    }
    if (!countries.includes(country)) countries.push(country);
  }

  const startDate = input.startDate ?? DEFAULT_START_DATE;
  if (!isIsoDate(startDate)) {
    return err(createInvalidInputError(`'${startDate}' is not a calendar date`, 'startDate'));
  }

  const periods = input.periods ?? DEFAULT_PERIODS.map((period) => ({ ...period }));
  const periodError = validatePeriods(periods);
  if (periodError !== undefined) return err(periodError);

  return ok({ countries, startDate, periods });
};
