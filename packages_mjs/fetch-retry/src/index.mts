/**
 * @qa-relay/fetch-retry
 * Error taxonomy and retry/backoff decisions for upstream API calls
 * Pure ESM module
 */

export type { RetryPolicyConfig, RetryContext, RetryDecision } from './types.mjs';

export {
  DEFAULT_RETRY_POLICY,
  calculateBackoffDelay,
  isNetworkError,
  parseRetryAfter,
  mergeRetryPolicyConfig,
  sleep,
} from './config.mjs';

export {
  RelayError,
  ValidationError,
  AuthenticationError,
  RateLimitError,
  TransientNetworkError,
  UpstreamServerError,
  ExhaustedRetriesError,
  QueueSaturatedError,
  RequestTimeoutError,
  DispatcherClosedError,
  toError,
} from './errors.mjs';
export type { RelayErrorCode, RelayErrorOptions } from './errors.mjs';

export { RetryPolicy, createRetryPolicy, classifyError } from './policy.mjs';
