/**
 * Thin HTTP client over the global fetch.
 * Every request carries its own timeout; failures come back as NetworkError values.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createDataValidationError,
  createNetworkError,
  type DataValidationError,
  type NetworkError,
} from '@/common/types/errors.js';

export type QueryParams = Readonly<Record<string, string | number>>;

export interface HttpClient {
  /** GET a JSON document. A body that is not JSON is a DataValidationError. */
  getJson(
    url: string,
    query?: QueryParams
  ): Promise<Result<unknown, NetworkError | DataValidationError>>;

  /** GET a binary resource (e.g. a workbook). */
  getBuffer(url: string, query?: QueryParams): Promise<Result<Buffer, NetworkError>>;
}

export interface HttpClientOptions {
  /** Per-request socket timeout. Default: 30000 */
  timeoutMs?: number;
  /** Injected for tests. Default: globalThis.fetch */
  fetchFn?: typeof fetch;
  userAgent?: string;
}

/**
 * Appends query parameters to a URL, keeping any already present.
 */
export const buildUrl = (url: string, query?: QueryParams): string => {
  if (query === undefined) return url;

  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
};

const SECRET_PARAMS = new Set(['api_key', 'apikey', 'token', 'access_token']);

/**
 * Masks credential query parameters so URLs can appear in errors and logs.
 */
export const redactUrl = (url: string): string => {
  let target: URL;
  try {
    target = new URL(url);
  } catch {
    return url;
  }
  for (const key of [...target.searchParams.keys()]) {
    if (SECRET_PARAMS.has(key.toLowerCase())) target.searchParams.set(key, 'REDACTED');
  }
  return target.toString();
};

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

const isTimeout = (cause: unknown): boolean =>
  cause instanceof Error && (cause.name === 'TimeoutError' || cause.name === 'AbortError');

export const createHttpClient = (options: HttpClientOptions = {}): HttpClient => {
  const timeoutMs = options.timeoutMs ?? 30_000;
  const fetchFn = options.fetchFn ?? globalThis.fetch;
  const userAgent = options.userAgent ?? 'cpi-aggregator/1.0';

  const send = async (
    url: string,
    accept: string
  ): Promise<Result<Response, NetworkError>> => {
    const shown = redactUrl(url);
    let response: Response;
    try {
      response = await fetchFn(url, {
        method: 'GET',
        headers: { Accept: accept, 'User-Agent': userAgent },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (cause) {
      const message = isTimeout(cause)
        ? `Request to ${shown} timed out after ${String(timeoutMs)}ms`
        : `Request to ${shown} failed: ${describeCause(cause)}`;
      return err(createNetworkError(shown, message, { retryable: true, cause }));
    }

    if (!response.ok) {
      return err(
        createNetworkError(
          shown,
          `Request to ${shown} failed with status ${String(response.status)} ${response.statusText}`,
          { status: response.status }
        )
      );
    }

    return ok(response);
  };

  return {
    async getJson(url, query) {
      const target = buildUrl(url, query);
      const shown = redactUrl(target);
      const responseResult = await send(target, 'application/json');
      if (responseResult.isErr()) return err(responseResult.error);

      let body: string;
      try {
        body = await responseResult.value.text();
      } catch (cause) {
        return err(
          createNetworkError(shown, `Failed to read response body: ${describeCause(cause)}`, {
            retryable: true,
            cause,
          })
        );
      }

      try {
        // eslint-disable-next-line no-restricted-syntax -- JSON.parse is wrapped in try-catch with proper error handling
        const payload: unknown = JSON.parse(body);
        return ok(payload);
      } catch (cause) {
        return err(
          createDataValidationError('http', `Response from ${shown} is not valid JSON`, [
            describeCause(cause),
          ])
        );
      }
    },

    async getBuffer(url, query) {
      const target = buildUrl(url, query);
      const responseResult = await send(target, '*/*');
      if (responseResult.isErr()) return err(responseResult.error);

      try {
        const arrayBuffer = await responseResult.value.arrayBuffer();
        return ok(Buffer.from(arrayBuffer));
      } catch (cause) {
        return err(
          createNetworkError(
            redactUrl(target),
            `Failed to read response body: ${describeCause(cause)}`,
            { retryable: true, cause }
          )
        );
      }
    },
  };
};
