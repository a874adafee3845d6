export {
  createHttpClient,
  buildUrl,
  redactUrl,
  type HttpClient,
  type HttpClientOptions,
  type QueryParams,
} from './client.js';
export {
  createRetryPolicy,
  createNoRetryPolicy,
  linearBackoff,
  type BackoffFn,
  type RetryPolicy,
  type RetryPolicyOptions,
} from './retry.js';
