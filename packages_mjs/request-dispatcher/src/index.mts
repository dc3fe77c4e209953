/**
 * @qa-relay/request-dispatcher
 *
 * Bounded-concurrency priority dispatcher for upstream API calls with
 * fingerprint deduplication, result caching, quota-aware access-mode
 * selection and retries.
 *
 * @example
 * ```typescript
 * import { createRequestDispatcher } from '@qa-relay/request-dispatcher';
 * import { createClient } from '@qa-relay/fetch-client';
 *
 * const dispatcher = createRequestDispatcher(
 *   { concurrency: 5, maxQueueSize: 100 },
 *   { transport: createClient({ apiKey: process.env.STACKOVERFLOW_API_KEY }) }
 * );
 *
 * const payload = await dispatcher.enqueue('questions/42', { filter: 'withbody' }, 'high');
 * ```
 */

export type {
  AbandonedPolicy,
  DispatcherConfig,
  DispatcherDependencies,
  DispatcherEvent,
  DispatcherEventListener,
  DispatcherStatus,
  DispatcherTotals,
  EnqueueOptions,
  EntryState,
  PendingRequest,
  Prioritized,
  Priority,
  Waiter,
} from './types.mjs';
export { PRIORITY_RANK } from './types.mjs';

export { fingerprintRequest } from './fingerprint.mjs';
export { PriorityQueue } from './queue.mjs';
export {
  DEFAULT_DISPATCHER_CONFIG,
  RequestDispatcher,
  createRequestDispatcher,
  mergeDispatcherConfig,
} from './dispatcher.mjs';
