import type { WeightsValidationWarning } from '../../core/types.js';
import type { Logger } from '@/infra/logger/index.js';

export const logValidationWarnings = (
  logger: Logger,
  warnings: readonly WeightsValidationWarning[]
): void => {
  for (const { message, ...details } of warnings) {
    logger.warn(details, message);
  }
};
