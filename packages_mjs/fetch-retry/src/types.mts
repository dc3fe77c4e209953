/**
 * Type definitions for fetch-retry
 */

/**
 * Retry policy configuration
 */
export interface RetryPolicyConfig {
  /** Maximum number of retries after the first attempt. Default: 3 */
  maxRetries?: number;
  /** Base delay for exponential backoff (ms); also the jitter ceiling. Default: 1000 */
  baseDelayMs?: number;
  /** Cap on the exponential part of the delay (ms). Default: 30000 */
  maxDelayMs?: number;
  /** Error codes that mark a plain Error as a transient network failure */
  retryOnErrors?: string[];
  /** Whether a rate limit with a known Retry-After may be retried in place. Default: true */
  respectRetryAfter?: boolean;
}

/**
 * What the caller knows about the call that failed
 */
export interface RetryContext {
  /** The failed call was sent with credentials */
  authenticated: boolean;
  /** Falling back to anonymous access is still allowed for this request */
  canSwitchMode: boolean;
}

/**
 * Tagged outcome of a retry decision
 */
export type RetryDecision =
  | { action: 'retry'; delayMs: number; reason: string }
  | { action: 'switch-mode'; reason: string }
  | { action: 'fail'; error: Error; reason: string };
