/**
 * Error taxonomy shared by every source pipeline.
 * Errors are plain tagged values carried through neverthrow Results.
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Transport-level failure talking to an upstream source.
 * Retryable errors are re-attempted by the retry policy.
 */
export interface NetworkError extends AppError {
  readonly type: 'NetworkError';
  readonly url: string;
  readonly status?: number | undefined;
  readonly retryable: boolean;
}

/**
 * Parsed data does not match the expected shape or breaks a domain rule.
 * Never retried: fetching the same payload again cannot fix it.
 */
export interface DataValidationError extends AppError {
  readonly type: 'DataValidationError';
  /** Which parser or validator rejected the data (e.g. 'ons-workbook') */
  readonly source: string;
  /** One entry per offending row, cell or rule */
  readonly issues: readonly string[];
}

/**
 * A whole source pipeline failed end to end.
 */
export interface DataAcquisitionError extends AppError {
  readonly type: 'DataAcquisitionError';
  readonly pipeline: string;
}

/**
 * Caller handed the core something it cannot work with.
 */
export interface InvalidInputError extends AppError {
  readonly type: 'InvalidInputError';
  readonly field?: string | undefined;
}

export type SourceError = NetworkError | DataValidationError;

export type CpiError = NetworkError | DataValidationError | DataAcquisitionError | InvalidInputError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

const RETRYABLE_STATUSES = new Set([408, 425, 429]);

/**
 * 5xx, 408, 425 and 429 are transient; any other status is not.
 */
export const isRetryableStatus = (status: number): boolean =>
  status >= 500 || RETRYABLE_STATUSES.has(status);

export const createNetworkError = (
  url: string,
  message: string,
  options: { status?: number; retryable?: boolean; cause?: unknown } = {}
): NetworkError => ({
  type: 'NetworkError',
  message,
  url,
  status: options.status,
  retryable:
    options.retryable ?? (options.status === undefined ? true : isRetryableStatus(options.status)),
  cause: options.cause,
});

export const createDataValidationError = (
  source: string,
  message: string,
  issues: readonly string[] = []
): DataValidationError => ({
  type: 'DataValidationError',
  message,
  source,
  issues,
});

export const createDataAcquisitionError = (
  pipeline: string,
  message: string,
  cause?: unknown
): DataAcquisitionError => ({
  type: 'DataAcquisitionError',
  message,
  pipeline,
  ...(cause !== undefined && { cause }),
});

export const createInvalidInputError = (message: string, field?: string): InvalidInputError => ({
  type: 'InvalidInputError',
  message,
  ...(field !== undefined && { field }),
});

/**
 * True for errors that carry `retryable: true`.
 */
export const isRetryableError = (error: AppError): boolean =>
  'retryable' in error && error.retryable === true;
