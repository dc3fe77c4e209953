/**
 * @qa-relay/quota-tracker
 *
 * Upstream quota tracking and access-mode selection.
 *
 * @example
 * import { createRateLimitTracker, createAccessModeSelector, parseQuotaObservation } from '@qa-relay/quota-tracker';
 *
 * const tracker = createRateLimitTracker();
 * const selector = createAccessModeSelector(tracker, { hasCredentials: true });
 *
 * tracker.recordResponse('authenticated', parseQuotaObservation(headers, body));
 * const mode = selector.choose();
 */

export type {
  AccessMode,
  AccessModeChoice,
  AccessModeInput,
  AccessModeReason,
  AccessModeSelectorConfig,
  QuotaObservation,
  RateLimitSnapshot,
  RateLimitTrackerConfig,
  TransportMode,
} from './types.mjs';

export type { HeaderBag } from './quota.mjs';
export { nextUtcMidnight, parseQuotaObservation } from './quota.mjs';

export type { CredentialStatus } from './tracker.mjs';
export { DEFAULT_RATE_LIMIT_TRACKER_CONFIG, RateLimitTracker, createRateLimitTracker } from './tracker.mjs';

export {
  AccessModeSelector,
  DEFAULT_LOW_WATER_MARK,
  chooseAccessMode,
  createAccessModeSelector,
} from './selector.mjs';
