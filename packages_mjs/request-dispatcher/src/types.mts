/**
 * Type definitions for request-dispatcher
 */

import type { Logger } from 'pino';
import type { ApiCall, UpstreamTransport } from '@qa-relay/fetch-client';
import type { RetryPolicy, RetryPolicyConfig } from '@qa-relay/fetch-retry';
import type {
  AccessMode,
  AccessModeReason,
  AccessModeSelector,
  RateLimitTracker,
  TransportMode,
} from '@qa-relay/quota-tracker';
import type { ResultCache, ResultCacheConfig, ResultCacheStats } from '@qa-relay/result-cache';

/**
 * Request priority bands, lowest first
 */
export type Priority = 'low' | 'normal' | 'high' | 'urgent';

/**
 * Numeric rank per band; higher ranks are dispatched first
 */
export const PRIORITY_RANK: Readonly<Record<Priority, number>> = {
  low: 0,
  normal: 1,
  high: 2,
  urgent: 3,
};

/**
 * Lifecycle state of a pending request
 */
export type EntryState = 'queued' | 'in-flight' | 'backing-off';

/**
 * What happens to a dispatched request once every caller has stopped waiting.
 * - complete: keep retrying so the result still lands in the cache
 * - discard: finish the current attempt, then drop it
 */
export type AbandonedPolicy = 'complete' | 'discard';

/**
 * Anything the queue can order
 */
export interface Prioritized {
  priority: Priority;
  /** Monotonic insertion number; lower is older */
  sequence: number;
}

/**
 * One caller waiting on a pending request
 */
export interface Waiter {
  id: number;
  settled: boolean;
  resolve: (payload: unknown) => void;
  reject: (error: Error) => void;
  /** Detach timers and abort listeners */
  cleanup: () => void;
}

/**
 * One logical upstream request shared by every caller with the same fingerprint
 */
export interface PendingRequest extends Prioritized {
  fingerprint: string;
  call: ApiCall;
  enqueuedAt: number;
  /** Failed attempts so far; mode switches are not counted */
  attempt: number;
  state: EntryState;
  /** Mode requested by the caller that created the entry */
  accessMode: AccessMode;
  /** Set once the request has been moved to anonymous access */
  forcedMode: TransportMode | null;
  /** Whether the request has been handed to a worker at least once */
  dispatched: boolean;
  /** Store the payload in the result cache on success */
  cacheable: boolean;
  /** Callers in arrival order; only ever appended to */
  waiters: Waiter[];
}

/**
 * Per-call options
 */
export interface EnqueueOptions {
  /** Stop waiting after this many ms; the shared request keeps going */
  timeoutMs?: number;
  /** Stop waiting when aborted */
  signal?: AbortSignal;
  /** Access mode for this call. Default: dispatcher's mode */
  accessMode?: AccessMode;
  /** Read and write the result cache. Default: true */
  cache?: boolean;
}

/**
 * Dispatcher configuration
 */
export interface DispatcherConfig {
  /** Worker count. Default: 5 */
  concurrency?: number;
  /** Queued entries accepted before new ones are refused. Default: Infinity */
  maxQueueSize?: number;
  /** Default caller wait timeout (ms); 0 waits indefinitely. Default: 0 */
  waitTimeoutMs?: number;
  /** Default access mode. Default: 'auto' */
  accessMode?: AccessMode;
  /** Remaining authenticated quota at or below which auto mode goes anonymous. Default: 50 */
  lowWaterMark?: number;
  /** Default: 'complete' */
  abandonedPolicy?: AbandonedPolicy;
  /** Used when no cache instance is supplied */
  cache?: ResultCacheConfig;
  /** Used when no retry policy instance is supplied */
  retry?: RetryPolicyConfig;
  /** Used when no tracker instance is supplied (ms). Default: 60000 */
  rateLimitCooldownMs?: number;
}

/**
 * Collaborators; everything but the transport has a default
 */
export interface DispatcherDependencies {
  transport: UpstreamTransport;
  cache?: ResultCache<unknown>;
  tracker?: RateLimitTracker;
  selector?: AccessModeSelector;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
}

export interface DispatcherTotals {
  enqueued: number;
  completed: number;
  failed: number;
  deduplicated: number;
  skipped: number;
  rejected: number;
  retries: number;
  modeSwitches: number;
}

/**
 * Point-in-time view of the dispatcher
 */
export interface DispatcherStatus {
  pendingByPriority: Record<Priority, number>;
  queued: number;
  inFlight: number;
  inFlightByPriority: Record<Priority, number>;
  backingOff: number;
  cacheHits: number;
  cacheMisses: number;
  cache: ResultCacheStats;
  currentAccessMode: TransportMode;
  accessModeReason: AccessModeReason;
  quotaRemaining: number | null;
  quotaResetAt: number | null;
  totals: DispatcherTotals;
  closed: boolean;
}

/**
 * Dispatcher event types
 */
export type DispatcherEvent =
  | { type: 'request:queued'; fingerprint: string; operation: string; priority: Priority; queueSize: number }
  | { type: 'request:cache-hit'; fingerprint: string; operation: string }
  | { type: 'request:joined'; fingerprint: string; waiters: number }
  | { type: 'request:promoted'; fingerprint: string; from: Priority; to: Priority }
  | { type: 'request:rejected'; operation: string; reason: string }
  | { type: 'request:started'; fingerprint: string; operation: string; mode: TransportMode; attempt: number }
  | { type: 'request:completed'; fingerprint: string; mode: TransportMode; durationMs: number; waiters: number }
  | { type: 'request:retry'; fingerprint: string; attempt: number; delayMs: number; reason: string }
  | { type: 'request:mode-switch'; fingerprint: string; from: TransportMode; to: TransportMode; reason: string }
  | { type: 'request:failed'; fingerprint: string; error: Error; attempts: number; reason: string }
  | { type: 'request:skipped'; fingerprint: string }
  | { type: 'quota:waiting'; mode: TransportMode; waitMs: number }
  | { type: 'dispatcher:closed'; rejected: number };

export type DispatcherEventListener = (event: DispatcherEvent) => void;
