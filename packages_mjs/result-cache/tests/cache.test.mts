/**
 * Tests for ResultCache
 *
 * Coverage includes:
 * - TTL boundaries (T <= T' < T + TTL is a hit, T' >= T + TTL is a miss)
 * - LRU eviction with recency updated by store and lookup
 * - Counters, purge and event emission
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ResultCache, createResultCache, mergeResultCacheConfig } from '../src/cache.mjs';
import type { ResultCacheEvent } from '../src/types.mjs';

describe('ResultCache', () => {
  let cache: ResultCache<string>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    cache = new ResultCache<string>({ ttlMs: 300000, capacity: 3, cleanupIntervalMs: 0 });
  });

  afterEach(() => {
    cache.close();
    vi.useRealTimers();
  });

  describe('configuration', () => {
    it('should default to a 5 minute TTL and 500 entries', () => {
      const defaults = createResultCache();
      expect(defaults.getConfig().ttlMs).toBe(300000);
      expect(defaults.getConfig().capacity).toBe(500);
      defaults.close();
    });

    it('should reject a capacity below one', () => {
      expect(() => mergeResultCacheConfig({ capacity: 0 })).toThrow('capacity must be at least 1, got 0');
    });

    it('should reject a non-positive TTL', () => {
      expect(() => mergeResultCacheConfig({ ttlMs: 0 })).toThrow('ttlMs must be positive, got 0');
    });
  });

  describe('lookup and store', () => {
    it('should miss on an unknown fingerprint', () => {
      expect(cache.lookup('missing')).toEqual({ hit: false });
    });

    it('should return a stored payload', () => {
      cache.store('f1', 'payload');
      expect(cache.lookup('f1')).toEqual({ hit: true, payload: 'payload' });
    });

    it('should overwrite an existing entry', () => {
      cache.store('f1', 'first');
      cache.store('f1', 'second');

      expect(cache.lookup('f1')).toEqual({ hit: true, payload: 'second' });
      expect(cache.size).toBe(1);
    });

    it('should set expiresAt to storedAt plus TTL', () => {
      const entry = cache.store('f1', 'payload');
      expect(entry.expiresAt - entry.storedAt).toBe(300000);
    });

    it('should treat an undefined payload as a hit', () => {
      const anyCache = new ResultCache<string | undefined>({ cleanupIntervalMs: 0 });
      anyCache.store('f1', undefined);

      expect(anyCache.lookup('f1')).toEqual({ hit: true, payload: undefined });
      anyCache.close();
    });
  });

  describe('expiry', () => {
    it('should hit up to one millisecond before expiry', () => {
      cache.store('f1', 'payload');
      vi.advanceTimersByTime(299999);

      expect(cache.lookup('f1').hit).toBe(true);
    });

    it('should miss exactly at expiry and drop the entry', () => {
      cache.store('f1', 'payload');
      vi.advanceTimersByTime(300000);

      expect(cache.lookup('f1')).toEqual({ hit: false });
      expect(cache.size).toBe(0);
      expect(cache.getStats().expirations).toBe(1);
    });

    it('should still hit one second after storing', () => {
      cache.store('f1', 'payload');
      vi.advanceTimersByTime(1000);

      expect(cache.lookup('f1')).toEqual({ hit: true, payload: 'payload' });
    });

    it('should purge expired entries in bulk', () => {
      cache.store('old', 'a');
      vi.advanceTimersByTime(200000);
      cache.store('new', 'b');
      vi.advanceTimersByTime(100000);

      expect(cache.purgeExpired()).toBe(1);
      expect(cache.has('old')).toBe(false);
      expect(cache.has('new')).toBe(true);
    });

    it('should purge on the background interval', () => {
      const timed = new ResultCache<string>({ ttlMs: 1000, cleanupIntervalMs: 5000 });
      timed.store('f1', 'payload');

      vi.advanceTimersByTime(5000);

      expect(timed.size).toBe(0);
      timed.close();
    });
  });

  describe('LRU eviction', () => {
    it('should evict the least recently stored entry past capacity', () => {
      cache.store('a', '1');
      cache.store('b', '2');
      cache.store('c', '3');
      cache.store('d', '4');

      expect(cache.lookup('a')).toEqual({ hit: false });
      expect(cache.lookup('b').hit).toBe(true);
      expect(cache.lookup('d').hit).toBe(true);
      expect(cache.getStats().evictions).toBe(1);
    });

    it('should treat a hit as a use', () => {
      cache.store('a', '1');
      cache.store('b', '2');
      cache.store('c', '3');
      cache.lookup('a');
      cache.store('d', '4');

      expect(cache.has('a')).toBe(true);
      expect(cache.has('b')).toBe(false);
    });

    it('should treat a re-store as a use', () => {
      cache.store('a', '1');
      cache.store('b', '2');
      cache.store('c', '3');
      cache.store('a', '1b');
      cache.store('d', '4');

      expect(cache.has('a')).toBe(true);
      expect(cache.has('b')).toBe(false);
    });
  });

  describe('statistics', () => {
    it('should count hits and misses', () => {
      cache.store('a', '1');
      cache.lookup('a');
      cache.lookup('a');
      cache.lookup('b');

      const stats = cache.getStats();
      expect(stats.hits).toBe(2);
      expect(stats.misses).toBe(1);
    });

    it('should report total and valid entries', () => {
      cache.store('a', '1');
      vi.advanceTimersByTime(200000);
      cache.store('b', '2');
      vi.advanceTimersByTime(100000);

      const stats = cache.getStats();
      expect(stats.totalEntries).toBe(2);
      expect(stats.validEntries).toBe(1);
      expect(stats.capacity).toBe(3);
      expect(stats.ttlMs).toBe(300000);
    });

    it('should not change counters on has()', () => {
      cache.store('a', '1');
      cache.has('a');
      cache.has('b');

      expect(cache.getStats().hits).toBe(0);
      expect(cache.getStats().misses).toBe(0);
    });
  });

  describe('events', () => {
    it('should emit store, hit, miss and evict events', () => {
      const events: ResultCacheEvent['type'][] = [];
      cache.on((event) => events.push(event.type));

      cache.store('a', '1');
      cache.lookup('a');
      cache.lookup('z');
      cache.store('b', '2');
      cache.store('c', '3');
      cache.store('d', '4');

      expect(events).toEqual([
        'cache:store',
        'cache:hit',
        'cache:miss',
        'cache:store',
        'cache:store',
        'cache:store',
        'cache:evict',
      ]);
    });

    it('should isolate listener errors', () => {
      cache.on(() => {
        throw new Error('listener failure');
      });

      expect(() => cache.store('a', '1')).not.toThrow();
    });

    it('should stop notifying removed listeners', () => {
      const listener = vi.fn();
      const unsubscribe = cache.on(listener);
      unsubscribe();
      cache.store('a', '1');

      expect(listener).not.toHaveBeenCalled();
    });
  });

  it('should delete and clear entries', () => {
    cache.store('a', '1');
    cache.store('b', '2');

    expect(cache.delete('a')).toBe(true);
    expect(cache.size).toBe(1);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
