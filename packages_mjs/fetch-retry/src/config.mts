/**
 * Configuration utilities for fetch-retry
 */

import type { RetryPolicyConfig } from './types.mjs';

/**
 * Default retry policy configuration
 */
export const DEFAULT_RETRY_POLICY: Required<RetryPolicyConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  retryOnErrors: [
    'ECONNRESET',
    'ETIMEDOUT',
    'ENOTFOUND',
    'ECONNREFUSED',
    'EPIPE',
    'EAI_AGAIN',
    'UND_ERR_SOCKET',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_HEADERS_TIMEOUT',
    'UND_ERR_BODY_TIMEOUT',
    'UND_ERR_CLOSED',
  ],
  respectRetryAfter: true,
};

/**
 * Calculate exponential backoff delay with additive jitter
 *
 * delay = min(cap, base * 2^attempt) + random(0, base)
 *
 * The exponential part always grows by at least `base` per attempt, so
 * jitter never makes an earlier delay exceed a later one below the cap.
 *
 * @param attempt - Attempt that just failed (0-indexed)
 */
export function calculateBackoffDelay(
  attempt: number,
  config: Pick<RetryPolicyConfig, 'baseDelayMs' | 'maxDelayMs'>
): number {
  const { baseDelayMs = 1000, maxDelayMs = 30000 } = config;

  const exponentialDelay = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));
  const jitter = Math.random() * baseDelayMs;

  return Math.floor(exponentialDelay + jitter);
}

/**
 * Check whether a plain Error looks like a network or timeout failure
 */
export function isNetworkError(error: Error, config: RetryPolicyConfig = {}): boolean {
  const { retryOnErrors = DEFAULT_RETRY_POLICY.retryOnErrors } = config;

  const errorCode = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  if (errorCode && retryOnErrors.includes(errorCode)) {
    return true;
  }

  const message = error.message.toLowerCase();
  const networkPatterns = [
    'network',
    'timeout',
    'timed out',
    'econnreset',
    'econnrefused',
    'enotfound',
    'socket',
    'epipe',
    'fetch failed',
  ];

  if (networkPatterns.some((pattern) => message.includes(pattern))) {
    return true;
  }

  if (error.cause instanceof Error) {
    return isNetworkError(error.cause, config);
  }

  return false;
}

/**
 * Parse Retry-After header value
 *
 * The header carries either a number of seconds or an HTTP-date.
 *
 * @returns Wait time in milliseconds, or undefined if absent or unparseable
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (!isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
}

/**
 * Merge configuration with defaults
 */
export function mergeRetryPolicyConfig(config: RetryPolicyConfig = {}): Required<RetryPolicyConfig> {
  return {
    ...DEFAULT_RETRY_POLICY,
    ...config,
  };
}

/**
 * Sleep for a specified duration
 *
 * @param signal - Optional abort signal
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeout);
      reject(new Error('Aborted'));
    };

    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
