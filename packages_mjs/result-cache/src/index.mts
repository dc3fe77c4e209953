/**
 * @qa-relay/result-cache
 *
 * Content-addressed, time- and size-bounded store of completed upstream
 * responses, keyed by request fingerprint.
 *
 * @example
 * ```typescript
 * import { ResultCache } from '@qa-relay/result-cache';
 *
 * const cache = new ResultCache({ ttlMs: 300000, capacity: 500 });
 * cache.store('a1b2', { items: [] });
 *
 * const lookup = cache.lookup('a1b2');
 * if (lookup.hit) {
 *   console.log(lookup.payload);
 * }
 * ```
 */

export type {
  CacheEntry,
  CacheLookup,
  ResultCacheConfig,
  ResultCacheStats,
  ResultCacheEvent,
  ResultCacheEventListener,
} from './types.mjs';

export {
  ResultCache,
  createResultCache,
  mergeResultCacheConfig,
  DEFAULT_RESULT_CACHE_CONFIG,
} from './cache.mjs';
