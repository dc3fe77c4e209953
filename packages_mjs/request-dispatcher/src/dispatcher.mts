/**
 * Request dispatcher
 */

import type { Logger } from 'pino';
import { getDefaultLogger } from '@qa-relay/fetch-client';
import type { QueryParams, UpstreamTransport } from '@qa-relay/fetch-client';
import {
  AuthenticationError,
  DispatcherClosedError,
  QueueSaturatedError,
  RateLimitError,
  RequestTimeoutError,
  RetryPolicy,
  ValidationError,
  classifyError,
  sleep,
  toError,
} from '@qa-relay/fetch-retry';
import { AccessModeSelector, RateLimitTracker } from '@qa-relay/quota-tracker';
import type { AccessMode, TransportMode } from '@qa-relay/quota-tracker';
import { ResultCache } from '@qa-relay/result-cache';
import { fingerprintRequest } from './fingerprint.mjs';
import { PriorityQueue } from './queue.mjs';
import { PRIORITY_RANK } from './types.mjs';
import type {
  AbandonedPolicy,
  DispatcherConfig,
  DispatcherDependencies,
  DispatcherEvent,
  DispatcherEventListener,
  DispatcherStatus,
  DispatcherTotals,
  EnqueueOptions,
  PendingRequest,
  Priority,
  Waiter,
} from './types.mjs';

/**
 * Default dispatcher configuration
 */
export const DEFAULT_DISPATCHER_CONFIG = {
  concurrency: 5,
  maxQueueSize: Infinity,
  waitTimeoutMs: 0,
  accessMode: 'auto',
  lowWaterMark: 50,
  abandonedPolicy: 'complete',
} as const satisfies DispatcherConfig;

interface ResolvedDispatcherConfig {
  concurrency: number;
  maxQueueSize: number;
  waitTimeoutMs: number;
  accessMode: AccessMode;
  lowWaterMark: number;
  abandonedPolicy: AbandonedPolicy;
}

/**
 * Merge user config with defaults
 */
export function mergeDispatcherConfig(config: DispatcherConfig = {}): ResolvedDispatcherConfig {
  const merged: ResolvedDispatcherConfig = {
    concurrency: config.concurrency ?? DEFAULT_DISPATCHER_CONFIG.concurrency,
    maxQueueSize: config.maxQueueSize ?? DEFAULT_DISPATCHER_CONFIG.maxQueueSize,
    waitTimeoutMs: config.waitTimeoutMs ?? DEFAULT_DISPATCHER_CONFIG.waitTimeoutMs,
    accessMode: config.accessMode ?? DEFAULT_DISPATCHER_CONFIG.accessMode,
    lowWaterMark: config.lowWaterMark ?? DEFAULT_DISPATCHER_CONFIG.lowWaterMark,
    abandonedPolicy: config.abandonedPolicy ?? DEFAULT_DISPATCHER_CONFIG.abandonedPolicy,
  };

  if (!Number.isInteger(merged.concurrency) || merged.concurrency < 1) {
    throw new ValidationError(`concurrency must be a positive integer, got ${merged.concurrency}`);
  }
  if (merged.maxQueueSize < 1) {
    throw new ValidationError(`maxQueueSize must be at least 1, got ${merged.maxQueueSize}`);
  }
  if (merged.waitTimeoutMs < 0) {
    throw new ValidationError(`waitTimeoutMs must not be negative, got ${merged.waitTimeoutMs}`);
  }

  return merged;
}

function isPriority(value: string): value is Priority {
  return Object.prototype.hasOwnProperty.call(PRIORITY_RANK, value);
}

/**
 * Request Dispatcher
 *
 * Turns logical queries into a bounded stream of upstream calls:
 * - cache hits resolve without touching the queue
 * - callers asking for a request already pending share its outcome
 * - a fixed pool of workers drains the queue, urgent first, FIFO within a band
 * - every failure goes through the retry policy, which may back off, fall
 *   back to anonymous access or give up
 *
 * All bookkeeping happens synchronously between awaits, so workers never see
 * a half-updated queue, dedup table, cache or tracker.
 *
 * @example
 * const dispatcher = new RequestDispatcher({ concurrency: 5 }, { transport: createClient({ apiKey }) });
 * const payload = await dispatcher.enqueue('search/advanced', { intitle: 'event loop' }, 'normal');
 */
export class RequestDispatcher {
  private readonly config: ResolvedDispatcherConfig;
  private readonly transport: UpstreamTransport;
  private readonly cache: ResultCache<unknown>;
  private readonly ownsCache: boolean;
  private readonly tracker: RateLimitTracker;
  private readonly selector: AccessModeSelector;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;

  private readonly queue = new PriorityQueue<PendingRequest>();
  private readonly pending: Map<string, PendingRequest> = new Map();
  private readonly listeners: Set<DispatcherEventListener> = new Set();
  private readonly closeController = new AbortController();

  private sequence = 0;
  private waiterIds = 0;
  private inFlight = 0;
  private readonly inFlightByPriority: Record<Priority, number> = { low: 0, normal: 0, high: 0, urgent: 0 };
  private backingOff = 0;
  private cacheHits = 0;
  private cacheMisses = 0;
  private pumpScheduled = false;
  private closed = false;
  private readonly totals: DispatcherTotals = {
    enqueued: 0,
    completed: 0,
    failed: 0,
    deduplicated: 0,
    skipped: 0,
    rejected: 0,
    retries: 0,
    modeSwitches: 0,
  };

  constructor(config: DispatcherConfig, dependencies: DispatcherDependencies) {
    this.config = mergeDispatcherConfig(config);
    this.transport = dependencies.transport;
    this.ownsCache = dependencies.cache === undefined;
    this.cache = dependencies.cache ?? new ResultCache<unknown>(config.cache);
    this.tracker =
      dependencies.tracker ?? new RateLimitTracker({ rateLimitCooldownMs: config.rateLimitCooldownMs });
    this.selector =
      dependencies.selector ??
      new AccessModeSelector(this.tracker, {
        defaultMode: this.config.accessMode,
        hasCredentials: this.transport.hasCredentials(),
        lowWaterMark: this.config.lowWaterMark,
      });
    this.retryPolicy = dependencies.retryPolicy ?? new RetryPolicy(config.retry);
    this.logger = (dependencies.logger ?? getDefaultLogger()).child({ component: 'request-dispatcher' });
  }

  /**
   * Emit an event to all listeners
   */
  private emit(event: DispatcherEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch {
        // Ignore listener errors
      }
    }
  }

  /**
   * Submit a logical request and wait for its payload
   *
   * @param operation - API method path, e.g. `search/advanced`
   * @param params - Query parameters; order does not matter
   */
  enqueue(
    operation: string,
    params: QueryParams,
    priority: Priority = 'normal',
    options: EnqueueOptions = {}
  ): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new DispatcherClosedError());
    }
    if (!isPriority(priority)) {
      return Promise.reject(new ValidationError(`Unknown priority: ${String(priority)}`));
    }

    const fingerprint = fingerprintRequest(operation, params);
    const useCache = options.cache !== false;

    if (useCache) {
      const lookup = this.cache.lookup(fingerprint);
      if (lookup.hit) {
        this.cacheHits++;
        this.emit({ type: 'request:cache-hit', fingerprint, operation });
        return Promise.resolve(lookup.payload);
      }
      this.cacheMisses++;
    }

    const existing = this.pending.get(fingerprint);
    if (existing) {
      this.totals.deduplicated++;
      if (useCache) {
        existing.cacheable = true;
      }
      if (existing.state === 'queued' && PRIORITY_RANK[priority] > PRIORITY_RANK[existing.priority]) {
        this.promote(existing, priority);
      }
      const joined = this.addWaiter(existing, options);
      this.emit({ type: 'request:joined', fingerprint, waiters: existing.waiters.length });
      return joined;
    }

    if (this.queue.size >= this.config.maxQueueSize) {
      this.totals.rejected++;
      this.emit({ type: 'request:rejected', operation, reason: 'queue saturated' });
      return Promise.reject(new QueueSaturatedError(this.config.maxQueueSize));
    }

    const entry: PendingRequest = {
      fingerprint,
      call: { operation, params },
      priority,
      sequence: this.sequence++,
      enqueuedAt: Date.now(),
      attempt: 0,
      state: 'queued',
      accessMode: options.accessMode ?? this.config.accessMode,
      forcedMode: null,
      dispatched: false,
      cacheable: useCache,
      waiters: [],
    };

    this.pending.set(fingerprint, entry);
    this.queue.enqueue(entry);
    this.totals.enqueued++;
    const result = this.addWaiter(entry, options);

    this.emit({ type: 'request:queued', fingerprint, operation, priority, queueSize: this.queue.size });
    this.logger.debug({ fingerprint, operation, priority }, 'Request queued');

    this.schedulePump();
    return result;
  }

  /**
   * Move a queued entry to a higher band, behind what is already there
   */
  private promote(entry: PendingRequest, priority: Priority): void {
    const from = entry.priority;
    this.queue.remove(entry);
    entry.priority = priority;
    entry.sequence = this.sequence++;
    this.queue.enqueue(entry);
    this.emit({ type: 'request:promoted', fingerprint: entry.fingerprint, from, to: priority });
  }

  /**
   * Attach a caller to an entry
   */
  private addWaiter(entry: PendingRequest, options: EnqueueOptions): Promise<unknown> {
    return new Promise<unknown>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | null = null;
      const signal = options.signal;

      const onAbort = (): void => {
        this.abandon(entry, waiter, toError(signal?.reason ?? new Error('Aborted')));
      };

      const waiter: Waiter = {
        id: this.waiterIds++,
        settled: false,
        resolve,
        reject,
        cleanup: () => {
          if (timer !== null) {
            clearTimeout(timer);
            timer = null;
          }
          signal?.removeEventListener('abort', onAbort);
        },
      };

      entry.waiters.push(waiter);

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      const timeoutMs = options.timeoutMs ?? this.config.waitTimeoutMs;
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          this.abandon(entry, waiter, new RequestTimeoutError(timeoutMs));
        }, timeoutMs);
      }
    });
  }

  /**
   * A caller stops waiting; the entry itself is left alone
   */
  private abandon(entry: PendingRequest, waiter: Waiter, error: Error): void {
    if (waiter.settled) {
      return;
    }
    this.settleWaiter(waiter, { ok: false, error });
    this.logger.debug(
      { fingerprint: entry.fingerprint, state: entry.state, liveWaiters: this.liveWaiters(entry) },
      `Caller stopped waiting: ${error.message}`
    );
  }

  private settleWaiter(waiter: Waiter, outcome: { ok: true; payload: unknown } | { ok: false; error: Error }): void {
    if (waiter.settled) {
      return;
    }
    waiter.settled = true;
    waiter.cleanup();
    if (outcome.ok) {
      waiter.resolve(outcome.payload);
    } else {
      waiter.reject(outcome.error);
    }
  }

  private liveWaiters(entry: PendingRequest): number {
    return entry.waiters.filter((waiter) => !waiter.settled).length;
  }

  /**
   * Nobody is waiting and the abandoned policy does not ask to finish it
   */
  private isAbandoned(entry: PendingRequest): boolean {
    if (this.liveWaiters(entry) > 0) {
      return false;
    }
    return this.config.abandonedPolicy === 'discard' || !entry.dispatched;
  }

  private drop(entry: PendingRequest): void {
    this.pending.delete(entry.fingerprint);
    this.totals.skipped++;
    this.emit({ type: 'request:skipped', fingerprint: entry.fingerprint });
    this.logger.debug({ fingerprint: entry.fingerprint }, 'Dropped request nobody is waiting for');
  }

  private schedulePump(): void {
    if (this.pumpScheduled || this.closed) {
      return;
    }
    this.pumpScheduled = true;
    setImmediate(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  /**
   * Hand queued entries to free workers
   */
  private pump(): void {
    while (!this.closed && this.inFlight < this.config.concurrency) {
      const entry = this.queue.dequeue();
      if (!entry) {
        break;
      }

      if (this.isAbandoned(entry)) {
        this.drop(entry);
        continue;
      }

      const band = entry.priority;
      this.inFlight++;
      this.inFlightByPriority[band]++;
      entry.state = 'in-flight';
      entry.dispatched = true;

      this.runAttempt(entry)
        .catch((error: unknown) => {
          this.logger.error({ err: toError(error), fingerprint: entry.fingerprint }, 'Worker failed unexpectedly');
          this.fail(entry, toError(error), 'worker failure');
        })
        .finally(() => {
          this.inFlight--;
          this.inFlightByPriority[band]--;
          this.schedulePump();
        });
    }
  }

  /**
   * One physical call for an entry
   */
  private async runAttempt(entry: PendingRequest): Promise<void> {
    const mode = entry.forcedMode ?? this.selector.choose(entry.accessMode);
    const started = Date.now();

    try {
      const waitMs = this.tracker.backoffRemaining(mode);
      if (waitMs > 0) {
        this.emit({ type: 'quota:waiting', mode, waitMs });
        this.logger.info({ mode, waitMs }, 'Waiting for upstream backoff');
        await sleep(waitMs, this.closeController.signal);
      }

      this.emit({
        type: 'request:started',
        fingerprint: entry.fingerprint,
        operation: entry.call.operation,
        mode,
        attempt: entry.attempt,
      });

      const result = await this.transport.execute(entry.call, mode);
      if (this.closed) {
        return;
      }

      this.tracker.recordResponse(mode, result.quota);
      this.complete(entry, result.data, mode, Date.now() - started);
    } catch (error) {
      if (this.closed) {
        return;
      }
      this.handleFailure(entry, mode, error);
    }
  }

  private complete(entry: PendingRequest, payload: unknown, mode: TransportMode, durationMs: number): void {
    if (entry.cacheable) {
      this.cache.store(entry.fingerprint, payload);
    }
    this.pending.delete(entry.fingerprint);
    this.totals.completed++;

    this.emit({
      type: 'request:completed',
      fingerprint: entry.fingerprint,
      mode,
      durationMs,
      waiters: this.liveWaiters(entry),
    });
    this.logger.debug({ fingerprint: entry.fingerprint, mode, durationMs }, 'Request completed');

    for (const waiter of entry.waiters) {
      this.settleWaiter(waiter, { ok: true, payload });
    }
  }

  private fail(entry: PendingRequest, error: Error, reason: string): void {
    if (this.pending.get(entry.fingerprint) === entry) {
      this.pending.delete(entry.fingerprint);
    }
    this.totals.failed++;

    this.emit({ type: 'request:failed', fingerprint: entry.fingerprint, error, attempts: entry.attempt + 1, reason });
    this.logger.warn(
      { fingerprint: entry.fingerprint, operation: entry.call.operation, err: error, reason },
      'Request failed'
    );

    for (const waiter of entry.waiters) {
      this.settleWaiter(waiter, { ok: false, error });
    }
  }

  private handleFailure(entry: PendingRequest, mode: TransportMode, error: unknown): void {
    const classified = classifyError(error, this.retryPolicy.getConfig());

    if (classified instanceof RateLimitError) {
      const until = this.tracker.recordRateLimit(mode, classified.retryAfterMs);
      this.logger.warn({ mode, until }, 'Upstream rate limit reached');
    } else if (classified instanceof AuthenticationError && mode === 'authenticated') {
      this.tracker.recordCredentialsRejected(classified.message);
      this.logger.warn({ reason: classified.message }, 'Upstream rejected the configured credentials');
    }

    const decision = this.retryPolicy.decide(classified, entry.attempt, {
      authenticated: mode === 'authenticated',
      canSwitchMode: entry.forcedMode === null && this.selector.canFallBack(entry.accessMode),
    });

    if (decision.action !== 'fail' && this.config.abandonedPolicy === 'discard' && this.liveWaiters(entry) === 0) {
      this.drop(entry);
      return;
    }

    switch (decision.action) {
      case 'switch-mode':
        entry.forcedMode = 'unauthenticated';
        this.totals.modeSwitches++;
        this.emit({
          type: 'request:mode-switch',
          fingerprint: entry.fingerprint,
          from: mode,
          to: 'unauthenticated',
          reason: decision.reason,
        });
        this.logger.info({ fingerprint: entry.fingerprint, reason: decision.reason }, 'Falling back to anonymous access');
        this.requeue(entry, true);
        return;

      case 'retry':
        entry.attempt++;
        this.totals.retries++;
        this.emit({
          type: 'request:retry',
          fingerprint: entry.fingerprint,
          attempt: entry.attempt,
          delayMs: decision.delayMs,
          reason: decision.reason,
        });
        this.logger.info(
          { fingerprint: entry.fingerprint, attempt: entry.attempt, delayMs: decision.delayMs, reason: decision.reason },
          'Retrying request'
        );
        this.backOff(entry, decision.delayMs).catch((backoffError: unknown) => {
          if (!this.closed) {
            this.fail(entry, toError(backoffError), 'backoff interrupted');
          }
        });
        return;

      case 'fail':
        this.fail(entry, decision.error, decision.reason);
        return;
    }
  }

  /**
   * Wait out a retry delay off the worker pool, then queue again.
   * The entry stays joinable meanwhile.
   */
  private async backOff(entry: PendingRequest, delayMs: number): Promise<void> {
    entry.state = 'backing-off';
    this.backingOff++;
    try {
      await sleep(delayMs, this.closeController.signal);
    } finally {
      this.backingOff--;
    }
    this.requeue(entry);
  }

  /**
   * Put an entry back in its band. With keepPosition it goes ahead of
   * everything queued after it first arrived.
   */
  private requeue(entry: PendingRequest, keepPosition = false): void {
    if (this.closed) {
      return;
    }
    entry.state = 'queued';
    if (!keepPosition) {
      entry.sequence = this.sequence++;
    }
    entry.enqueuedAt = Date.now();
    this.queue.enqueue(entry);
    this.schedulePump();
  }

  /**
   * Point-in-time status
   */
  statusSnapshot(): DispatcherStatus {
    const choice = this.selector.explain();
    const quota = this.tracker.snapshot(choice.mode);

    return {
      pendingByPriority: this.queue.countByPriority(),
      queued: this.queue.size,
      inFlight: this.inFlight,
      inFlightByPriority: { ...this.inFlightByPriority },
      backingOff: this.backingOff,
      cacheHits: this.cacheHits,
      cacheMisses: this.cacheMisses,
      cache: this.cache.getStats(),
      currentAccessMode: choice.mode,
      accessModeReason: choice.reason,
      quotaRemaining: quota.remainingQuota,
      quotaResetAt: quota.resetAt,
      totals: { ...this.totals },
      closed: this.closed,
    };
  }

  getTracker(): RateLimitTracker {
    return this.tracker;
  }

  getSelector(): AccessModeSelector {
    return this.selector;
  }

  /**
   * Add an event listener
   *
   * @returns Function to remove the listener
   */
  on(listener: DispatcherEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Remove an event listener
   */
  off(listener: DispatcherEventListener): void {
    this.listeners.delete(listener);
  }

  /**
   * Stop dispatching and reject every outstanding caller.
   * Calls already on the wire are not cancelled; their results are ignored.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.closeController.abort();

    const error = new DispatcherClosedError();
    let rejected = 0;
    for (const entry of this.pending.values()) {
      for (const waiter of entry.waiters) {
        if (!waiter.settled) {
          rejected++;
          this.settleWaiter(waiter, { ok: false, error });
        }
      }
    }
    this.pending.clear();
    this.queue.clear();

    if (this.ownsCache) {
      this.cache.close();
    }

    this.emit({ type: 'dispatcher:closed', rejected });
    this.logger.info({ rejected }, 'Dispatcher closed');
    this.listeners.clear();
  }
}

/**
 * Create a new request dispatcher
 */
export function createRequestDispatcher(
  config: DispatcherConfig,
  dependencies: DispatcherDependencies
): RequestDispatcher {
  return new RequestDispatcher(config, dependencies);
}

