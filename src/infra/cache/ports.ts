/**
 * Cache port interfaces using Result pattern for explicit error handling.
 */

import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CacheError {
  type: 'CacheBackendError';
  message: string;
  cause?: unknown;
}

export const createCacheError = (message: string, cause?: unknown): CacheError => ({
  type: 'CacheBackendError',
  message,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

export interface CacheSetOptions {
  /** TTL in milliseconds. If undefined, uses adapter default. */
  ttlMs?: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// CachePort (Low-Level / Adapter Interface)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Low-level cache interface for implementing backends.
 */
export interface CachePort<T = unknown> {
  /**
   * @returns Ok(value) if found, Ok(undefined) if missing or expired, Err on failure
   */
  get(key: string): Promise<Result<T | undefined, CacheError>>;

  set(key: string, value: T, options?: CacheSetOptions): Promise<Result<void, CacheError>>;

  /**
   * @returns Ok(true) if deleted, Ok(false) if key didn't exist
   */
  delete(key: string): Promise<Result<boolean, CacheError>>;

  /** Delete all keys matching a prefix; returns the number removed */
  clearByPrefix(prefix: string): Promise<Result<number, CacheError>>;

  clear(): Promise<Result<void, CacheError>>;

  stats(): Promise<CacheStats>;
}

// ─────────────────────────────────────────────────────────────────────────────
// SilentCachePort (Application Interface)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Application-level cache interface with silent degradation.
 * Errors are logged and treated as misses; they never reach the caller.
 */
export interface SilentCachePort<T = unknown> {
  get(key: string): Promise<T | undefined>;
  set(key: string, value: T, options?: CacheSetOptions): Promise<void>;
  delete(key: string): Promise<boolean>;
  /** Returns count removed (0 on error) */
  clearByPrefix(prefix: string): Promise<number>;
  clear(): Promise<void>;
  stats(): Promise<CacheStats>;
}
