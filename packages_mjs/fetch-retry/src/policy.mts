/**
 * Retry policy: a pure decision over (error, attempt, context)
 */

import type { RetryContext, RetryDecision, RetryPolicyConfig } from './types.mjs';
import { calculateBackoffDelay, isNetworkError, mergeRetryPolicyConfig } from './config.mjs';
import {
  AuthenticationError,
  ExhaustedRetriesError,
  RateLimitError,
  RelayError,
  TransientNetworkError,
  ValidationError,
  toError,
} from './errors.mjs';

/**
 * Map an arbitrary thrown value onto the error taxonomy
 *
 * Relay errors pass through unchanged. Plain errors that look like network
 * failures become TransientNetworkError; everything else stays as it is and
 * is treated as terminal.
 */
export function classifyError(error: unknown, config: RetryPolicyConfig = {}): Error {
  const normalized = toError(error);

  if (normalized instanceof RelayError) {
    return normalized;
  }

  if (isNetworkError(normalized, config)) {
    return new TransientNetworkError(normalized.message, { cause: normalized });
  }

  return normalized;
}

/**
 * Retry Policy
 *
 * Decides, without doing any I/O, what the dispatcher does after a failed
 * upstream call:
 * - transient network and 5xx failures back off and retry up to the cap
 * - a rate limit (or rejected credentials) on the authenticated path asks for
 *   a switch to anonymous access
 * - validation failures are terminal
 */
export class RetryPolicy {
  private readonly config: Required<RetryPolicyConfig>;

  constructor(config: RetryPolicyConfig = {}) {
    this.config = mergeRetryPolicyConfig(config);
  }

  /**
   * Decide what to do after a failure
   *
   * @param attempt - Attempt that just failed (0 for the first call)
   */
  decide(error: unknown, attempt: number, context: RetryContext): RetryDecision {
    const classified = classifyError(error, this.config);
    const canRetry = attempt < this.config.maxRetries;

    if (classified instanceof RateLimitError) {
      if (context.authenticated && context.canSwitchMode) {
        return { action: 'switch-mode', reason: 'rate limited on authenticated access' };
      }

      const { retryAfterMs } = classified;
      if (
        this.config.respectRetryAfter &&
        retryAfterMs !== undefined &&
        retryAfterMs <= this.config.maxDelayMs &&
        canRetry
      ) {
        return { action: 'retry', delayMs: retryAfterMs, reason: 'rate limited, honouring Retry-After' };
      }

      return { action: 'fail', error: classified, reason: 'rate limited' };
    }

    if (classified instanceof AuthenticationError) {
      if (context.authenticated && context.canSwitchMode) {
        return { action: 'switch-mode', reason: 'credentials rejected' };
      }
      return { action: 'fail', error: classified, reason: 'credentials rejected' };
    }

    if (classified instanceof ValidationError) {
      return { action: 'fail', error: classified, reason: 'validation error' };
    }

    if (classified instanceof RelayError && classified.isRetryable) {
      if (!canRetry) {
        return {
          action: 'fail',
          error: new ExhaustedRetriesError(classified, attempt + 1),
          reason: 'retry attempts exhausted',
        };
      }

      return {
        action: 'retry',
        delayMs: calculateBackoffDelay(attempt, this.config),
        reason: classified.code === 'NETWORK' ? 'network error' : 'upstream server error',
      };
    }

    return { action: 'fail', error: classified, reason: 'not retryable' };
  }

  getConfig(): Required<RetryPolicyConfig> {
    return { ...this.config };
  }
}

/**
 * Create a new retry policy
 */
export function createRetryPolicy(config?: RetryPolicyConfig): RetryPolicy {
  return new RetryPolicy(config);
}
