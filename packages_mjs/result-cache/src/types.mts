/**
 * Types for result-cache package
 */

/**
 * A completed response held by the cache
 */
export interface CacheEntry<T = unknown> {
  fingerprint: string;
  payload: T;
  storedAt: number;
  /** Always storedAt + ttlMs; the entry is visible only while now < expiresAt */
  expiresAt: number;
}

/**
 * Outcome of a lookup. A hit may carry any payload, including undefined.
 */
export type CacheLookup<T = unknown> = { hit: true; payload: T } | { hit: false };

/**
 * Result cache configuration
 */
export interface ResultCacheConfig {
  /** Time-to-live for stored entries (ms). Default: 300000 (5 minutes) */
  ttlMs?: number;
  /** Maximum number of entries before LRU eviction. Default: 500 */
  capacity?: number;
  /** Period of the background purge of expired entries (ms); 0 disables it. Default: 60000 */
  cleanupIntervalMs?: number;
}

/**
 * Cache statistics
 */
export interface ResultCacheStats {
  /** Entries currently held, expired or not */
  totalEntries: number;
  /** Entries that would still be returned by a lookup */
  validEntries: number;
  capacity: number;
  ttlMs: number;
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
}

/**
 * Events emitted by the cache
 */
export type ResultCacheEvent =
  | { type: 'cache:hit'; fingerprint: string; ageMs: number }
  | { type: 'cache:miss'; fingerprint: string }
  | { type: 'cache:store'; fingerprint: string; expiresAt: number }
  | { type: 'cache:evict'; fingerprint: string }
  | { type: 'cache:expire'; fingerprint: string };

export type ResultCacheEventListener = (event: ResultCacheEvent) => void;
