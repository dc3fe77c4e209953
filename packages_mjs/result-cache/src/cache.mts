/**
 * In-memory result cache with TTL expiry and LRU eviction
 */

import type {
  CacheEntry,
  CacheLookup,
  ResultCacheConfig,
  ResultCacheEvent,
  ResultCacheEventListener,
  ResultCacheStats,
} from './types.mjs';

/**
 * Default result cache configuration
 */
export const DEFAULT_RESULT_CACHE_CONFIG: Required<ResultCacheConfig> = {
  ttlMs: 5 * 60 * 1000,
  capacity: 500,
  cleanupIntervalMs: 60000,
};

/**
 * Merge user config with defaults
 */
export function mergeResultCacheConfig(config: ResultCacheConfig = {}): Required<ResultCacheConfig> {
  const merged = { ...DEFAULT_RESULT_CACHE_CONFIG, ...config };

  if (merged.capacity < 1) {
    throw new Error(`capacity must be at least 1, got ${merged.capacity}`);
  }
  if (merged.ttlMs <= 0) {
    throw new Error(`ttlMs must be positive, got ${merged.ttlMs}`);
  }

  return merged;
}

/**
 * Result Cache
 *
 * Map iteration order doubles as recency order: the first key is the least
 * recently used one. Both `store` and a successful `lookup` move the key to
 * the end. Expired entries are dropped lazily on access and by `purgeExpired`.
 *
 * All mutations are synchronous, so concurrent workers on the event loop
 * never interleave inside one.
 *
 * @example
 * const cache = new ResultCache({ ttlMs: 60000, capacity: 100 });
 * cache.store(fingerprint, payload);
 * const lookup = cache.lookup(fingerprint);
 * if (lookup.hit) return lookup.payload;
 */
export class ResultCache<T = unknown> {
  private readonly config: Required<ResultCacheConfig>;
  private readonly entries: Map<string, CacheEntry<T>> = new Map();
  private readonly listeners: Set<ResultCacheEventListener> = new Set();
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(config: ResultCacheConfig = {}) {
    this.config = mergeResultCacheConfig(config);
    this.startCleanup();
  }

  private startCleanup(): void {
    if (this.config.cleanupIntervalMs <= 0) {
      return;
    }

    this.cleanupInterval = setInterval(() => {
      this.purgeExpired();
    }, this.config.cleanupIntervalMs);

    // Unref to not prevent process exit
    this.cleanupInterval.unref();
  }

  private emit(event: ResultCacheEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch {
        // Ignore listener errors
      }
    }
  }

  private isExpired(entry: CacheEntry<T>, now: number): boolean {
    return now >= entry.expiresAt;
  }

  /**
   * Return the payload for a fingerprint if it is present and unexpired
   */
  lookup(fingerprint: string): CacheLookup<T> {
    const entry = this.entries.get(fingerprint);
    const now = Date.now();

    if (!entry) {
      this.misses++;
      this.emit({ type: 'cache:miss', fingerprint });
      return { hit: false };
    }

    if (this.isExpired(entry, now)) {
      this.entries.delete(fingerprint);
      this.expirations++;
      this.misses++;
      this.emit({ type: 'cache:expire', fingerprint });
      this.emit({ type: 'cache:miss', fingerprint });
      return { hit: false };
    }

    // Move to end for LRU
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, entry);

    this.hits++;
    this.emit({ type: 'cache:hit', fingerprint, ageMs: now - entry.storedAt });
    return { hit: true, payload: entry.payload };
  }

  /**
   * Insert or overwrite an entry, evicting the least recently used one when over capacity
   */
  store(fingerprint: string, payload: T): CacheEntry<T> {
    const storedAt = Date.now();
    const entry: CacheEntry<T> = {
      fingerprint,
      payload,
      storedAt,
      expiresAt: storedAt + this.config.ttlMs,
    };

    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, entry);
    this.emit({ type: 'cache:store', fingerprint, expiresAt: entry.expiresAt });

    while (this.entries.size > this.config.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
      this.evictions++;
      this.emit({ type: 'cache:evict', fingerprint: oldest.value });
    }

    return entry;
  }

  /**
   * Remove every expired entry
   *
   * @returns Number of entries removed
   */
  purgeExpired(): number {
    const now = Date.now();
    let removed = 0;

    for (const [fingerprint, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(fingerprint);
        this.expirations++;
        removed++;
        this.emit({ type: 'cache:expire', fingerprint });
      }
    }

    return removed;
  }

  /**
   * Check for a live entry without touching recency or counters
   */
  has(fingerprint: string): boolean {
    const entry = this.entries.get(fingerprint);
    return entry !== undefined && !this.isExpired(entry, Date.now());
  }

  delete(fingerprint: string): boolean {
    return this.entries.delete(fingerprint);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): ResultCacheStats {
    const now = Date.now();
    let validEntries = 0;
    for (const entry of this.entries.values()) {
      if (!this.isExpired(entry, now)) {
        validEntries++;
      }
    }

    return {
      totalEntries: this.entries.size,
      validEntries,
      capacity: this.config.capacity,
      ttlMs: this.config.ttlMs,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }

  getConfig(): Required<ResultCacheConfig> {
    return { ...this.config };
  }

  /**
   * Add event listener
   *
   * @returns Function to remove the listener
   */
  on(listener: ResultCacheEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  off(listener: ResultCacheEventListener): void {
    this.listeners.delete(listener);
  }

  /**
   * Stop the purge timer and drop all entries
   */
  close(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.entries.clear();
    this.listeners.clear();
  }
}

/**
 * Create a result cache
 */
export function createResultCache<T = unknown>(config?: ResultCacheConfig): ResultCache<T> {
  return new ResultCache<T>(config);
}
