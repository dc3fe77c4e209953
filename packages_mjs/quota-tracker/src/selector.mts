/**
 * Access mode selection
 *
 * Authenticated calls draw on a larger quota, so auto mode prefers them
 * while the authenticated quota is above the low-water mark and falls back to
 * anonymous calls otherwise, returning once the quota window resets.
 */

import type { RateLimitTracker } from './tracker.mjs';
import type {
  AccessMode,
  AccessModeChoice,
  AccessModeInput,
  AccessModeSelectorConfig,
  TransportMode,
} from './types.mjs';

export const DEFAULT_LOW_WATER_MARK = 50;

/**
 * Pure selection rule
 */
export function chooseAccessMode(input: AccessModeInput): AccessModeChoice {
  if (!input.hasCredentials) {
    return { mode: 'unauthenticated', reason: 'no-credentials' };
  }

  if (input.configuredMode !== 'auto') {
    return { mode: input.configuredMode, reason: 'configured' };
  }

  if (input.credentialsRejected) {
    return { mode: 'unauthenticated', reason: 'credentials-rejected' };
  }

  const snapshot = input.snapshot;
  if (snapshot === null) {
    return { mode: 'authenticated', reason: 'quota-unknown' };
  }

  if (snapshot.rateLimitedUntil !== null && input.now < snapshot.rateLimitedUntil) {
    return { mode: 'unauthenticated', reason: 'rate-limited' };
  }

  if (snapshot.remainingQuota === null) {
    return { mode: 'authenticated', reason: 'quota-unknown' };
  }

  if (snapshot.remainingQuota > input.lowWaterMark) {
    return { mode: 'authenticated', reason: 'quota-available' };
  }

  if (snapshot.resetAt !== null && input.now >= snapshot.resetAt) {
    return { mode: 'authenticated', reason: 'quota-reset' };
  }

  return { mode: 'unauthenticated', reason: 'quota-low' };
}

/**
 * Access Mode Selector bound to a tracker
 *
 * @example
 * const selector = new AccessModeSelector(tracker, { hasCredentials: true, lowWaterMark: 50 });
 * const mode = selector.choose();
 */
export class AccessModeSelector {
  private readonly defaultMode: AccessMode;
  private readonly hasCredentials: boolean;
  private readonly lowWaterMark: number;

  constructor(
    private readonly tracker: RateLimitTracker,
    config: AccessModeSelectorConfig
  ) {
    this.defaultMode = config.defaultMode ?? 'auto';
    this.hasCredentials = config.hasCredentials;
    this.lowWaterMark = config.lowWaterMark ?? DEFAULT_LOW_WATER_MARK;

    if (this.lowWaterMark < 0) {
      throw new Error(`lowWaterMark must not be negative, got ${this.lowWaterMark}`);
    }
  }

  explain(configuredMode: AccessMode = this.defaultMode, now: number = Date.now()): AccessModeChoice {
    return chooseAccessMode({
      configuredMode,
      hasCredentials: this.hasCredentials,
      credentialsRejected: this.tracker.credentialStatus().rejected,
      snapshot: this.tracker.snapshot('authenticated'),
      lowWaterMark: this.lowWaterMark,
      now,
    });
  }

  choose(configuredMode: AccessMode = this.defaultMode, now: number = Date.now()): TransportMode {
    return this.explain(configuredMode, now).mode;
  }

  /**
   * Whether a rate-limited authenticated call may be retried anonymously
   */
  canFallBack(configuredMode: AccessMode = this.defaultMode): boolean {
    return configuredMode === 'auto' && this.hasCredentials;
  }

  getDefaultMode(): AccessMode {
    return this.defaultMode;
  }

  getLowWaterMark(): number {
    return this.lowWaterMark;
  }

  credentialsConfigured(): boolean {
    return this.hasCredentials;
  }
}

/**
 * Create an access mode selector
 */
export function createAccessModeSelector(
  tracker: RateLimitTracker,
  config: AccessModeSelectorConfig
): AccessModeSelector {
  return new AccessModeSelector(tracker, config);
}
