/**
 * Type definitions for quota-tracker
 */

/**
 * Transport actually used for one upstream call
 */
export type TransportMode = 'authenticated' | 'unauthenticated';

/**
 * Configured access mode; 'auto' resolves per call
 */
export type AccessMode = TransportMode | 'auto';

/**
 * Latest quota state observed for one transport mode
 */
export interface RateLimitSnapshot {
  mode: TransportMode;
  /** Calls left in the current quota window; null before the first response */
  remainingQuota: number | null;
  /** Size of the quota window, when the upstream reports it */
  quotaMax: number | null;
  /** Epoch ms at which the quota window resets */
  resetAt: number | null;
  /** Epoch ms before which the upstream asked not to be called again */
  backoffUntil: number | null;
  /** Epoch ms until which this mode is considered rate limited */
  rateLimitedUntil: number | null;
  /** Epoch ms of the last update */
  updatedAt: number | null;
}

/**
 * Quota metadata read from one upstream response
 */
export interface QuotaObservation {
  remaining: number | null;
  max: number | null;
  resetAt: number | null;
  /** Requested pause before the next call (ms) */
  backoffMs: number | null;
}

/**
 * Tracker configuration
 */
export interface RateLimitTrackerConfig {
  /** How long a mode stays rate limited when the upstream gives no hint (ms). Default: 60000 */
  rateLimitCooldownMs?: number;
}

/**
 * Why a transport mode was chosen
 */
export type AccessModeReason =
  | 'configured'
  | 'no-credentials'
  | 'credentials-rejected'
  | 'rate-limited'
  | 'quota-unknown'
  | 'quota-available'
  | 'quota-reset'
  | 'quota-low';

/**
 * Everything the selector decides from
 */
export interface AccessModeInput {
  configuredMode: AccessMode;
  /** Credentials are configured */
  hasCredentials: boolean;
  /** The upstream rejected the configured credentials */
  credentialsRejected: boolean;
  /** Snapshot of the authenticated transport */
  snapshot: Readonly<RateLimitSnapshot> | null;
  lowWaterMark: number;
  now: number;
}

export interface AccessModeChoice {
  mode: TransportMode;
  reason: AccessModeReason;
}

/**
 * Selector configuration
 */
export interface AccessModeSelectorConfig {
  /** Mode used when a caller does not request one. Default: 'auto' */
  defaultMode?: AccessMode;
  /** Whether credentials (API key or access token) are configured */
  hasCredentials: boolean;
  /** Remaining authenticated quota at or below which auto mode falls back. Default: 50 */
  lowWaterMark?: number;
}
