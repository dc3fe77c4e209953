/**
 * Rate Limit Tracker
 *
 * Keeps the most recent quota observation per transport mode, along with
 * rate-limit windows and whether the upstream has rejected the configured
 * credentials. All updates are synchronous.
 */

import type {
  QuotaObservation,
  RateLimitSnapshot,
  RateLimitTrackerConfig,
  TransportMode,
} from './types.mjs';

/**
 * Default tracker configuration
 */
export const DEFAULT_RATE_LIMIT_TRACKER_CONFIG: Required<RateLimitTrackerConfig> = {
  rateLimitCooldownMs: 60000,
};

export interface CredentialStatus {
  rejected: boolean;
  reason: string | null;
  rejectedAt: number | null;
}

function emptySnapshot(mode: TransportMode): RateLimitSnapshot {
  return {
    mode,
    remainingQuota: null,
    quotaMax: null,
    resetAt: null,
    backoffUntil: null,
    rateLimitedUntil: null,
    updatedAt: null,
  };
}

export class RateLimitTracker {
  private readonly config: Required<RateLimitTrackerConfig>;
  private snapshots: Record<TransportMode, RateLimitSnapshot>;
  private credentials: CredentialStatus = { rejected: false, reason: null, rejectedAt: null };

  constructor(config: RateLimitTrackerConfig = {}) {
    this.config = { ...DEFAULT_RATE_LIMIT_TRACKER_CONFIG, ...config };
    this.snapshots = {
      authenticated: emptySnapshot('authenticated'),
      unauthenticated: emptySnapshot('unauthenticated'),
    };
  }

  /**
   * Record the quota metadata of a successful response.
   * Fields the response did not carry keep their previous value.
   */
  recordResponse(mode: TransportMode, observation: QuotaObservation, now: number = Date.now()): void {
    const current = this.snapshots[mode];
    const next: RateLimitSnapshot = {
      ...current,
      remainingQuota: observation.remaining ?? current.remainingQuota,
      quotaMax: observation.max ?? current.quotaMax,
      resetAt: observation.resetAt ?? current.resetAt,
      backoffUntil: observation.backoffMs !== null ? now + observation.backoffMs : current.backoffUntil,
      rateLimitedUntil: null,
      updatedAt: now,
    };
    this.snapshots[mode] = next;

    if (mode === 'authenticated' && this.credentials.rejected) {
      this.credentials = { rejected: false, reason: null, rejectedAt: null };
    }
  }

  /**
   * Mark a mode as rate limited. The window ends after `retryAfterMs` when
   * known, else at a future quota reset, else after the configured cooldown.
   * Returns the end of the window.
   */
  recordRateLimit(mode: TransportMode, retryAfterMs?: number, now: number = Date.now()): number {
    const current = this.snapshots[mode];
    let until: number;
    if (retryAfterMs !== undefined) {
      until = now + retryAfterMs;
    } else if (current.resetAt !== null && current.resetAt > now) {
      until = current.resetAt;
    } else {
      until = now + this.config.rateLimitCooldownMs;
    }

    this.snapshots[mode] = {
      ...current,
      remainingQuota: 0,
      rateLimitedUntil: until,
      updatedAt: now,
    };
    return until;
  }

  /**
   * Record that the upstream refused the configured credentials
   */
  recordCredentialsRejected(reason: string, now: number = Date.now()): void {
    this.credentials = { rejected: true, reason, rejectedAt: now };
  }

  /**
   * Latest snapshot for a mode
   */
  snapshot(mode: TransportMode): Readonly<RateLimitSnapshot> {
    return { ...this.snapshots[mode] };
  }

  /**
   * Milliseconds left before the upstream-requested backoff for a mode ends
   */
  backoffRemaining(mode: TransportMode, now: number = Date.now()): number {
    const until = this.snapshots[mode].backoffUntil;
    return until === null ? 0 : Math.max(0, until - now);
  }

  credentialStatus(): Readonly<CredentialStatus> {
    return { ...this.credentials };
  }

  /**
   * Forget every observation
   */
  reset(): void {
    this.snapshots = {
      authenticated: emptySnapshot('authenticated'),
      unauthenticated: emptySnapshot('unauthenticated'),
    };
    this.credentials = { rejected: false, reason: null, rejectedAt: null };
  }
}

/**
 * Create a rate limit tracker
 */
export function createRateLimitTracker(config?: RateLimitTrackerConfig): RateLimitTracker {
  return new RateLimitTracker(config);
}
