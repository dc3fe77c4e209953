/**
 * Tests for access mode selection
 *
 * Coverage includes:
 * - Pure selection rule, branch by branch
 * - Low-water mark boundary
 * - Fallback and return after the quota window resets
 * - Selector bound to a tracker
 */

import { describe, it, expect } from 'vitest';
import { AccessModeSelector, chooseAccessMode, createAccessModeSelector } from '../src/selector.mjs';
import { RateLimitTracker } from '../src/tracker.mjs';
import type { AccessModeInput, RateLimitSnapshot } from '../src/types.mjs';

const NOW = 1_700_000_000_000;

function snapshot(overrides: Partial<RateLimitSnapshot> = {}): RateLimitSnapshot {
  return {
    mode: 'authenticated',
    remainingQuota: null,
    quotaMax: null,
    resetAt: null,
    backoffUntil: null,
    rateLimitedUntil: null,
    updatedAt: null,
    ...overrides,
  };
}

function input(overrides: Partial<AccessModeInput> = {}): AccessModeInput {
  return {
    configuredMode: 'auto',
    hasCredentials: true,
    credentialsRejected: false,
    snapshot: snapshot(),
    lowWaterMark: 50,
    now: NOW,
    ...overrides,
  };
}

describe('chooseAccessMode', () => {
  it('should go anonymous without credentials, whatever is configured', () => {
    expect(chooseAccessMode(input({ hasCredentials: false, configuredMode: 'authenticated' }))).toEqual({
      mode: 'unauthenticated',
      reason: 'no-credentials',
    });
  });

  it('should honour an explicit mode', () => {
    expect(chooseAccessMode(input({ configuredMode: 'unauthenticated' }))).toEqual({
      mode: 'unauthenticated',
      reason: 'configured',
    });
    expect(
      chooseAccessMode(input({ configuredMode: 'authenticated', snapshot: snapshot({ remainingQuota: 0 }) }))
    ).toEqual({ mode: 'authenticated', reason: 'configured' });
  });

  it('should go anonymous in auto mode after credentials were rejected', () => {
    expect(chooseAccessMode(input({ credentialsRejected: true })).reason).toBe('credentials-rejected');
  });

  it('should prefer authenticated while quota is unknown', () => {
    expect(chooseAccessMode(input({ snapshot: null }))).toEqual({ mode: 'authenticated', reason: 'quota-unknown' });
    expect(chooseAccessMode(input())).toEqual({ mode: 'authenticated', reason: 'quota-unknown' });
  });

  it('should treat the low-water mark as exhausted', () => {
    const resetAt = NOW + 60000;
    expect(chooseAccessMode(input({ snapshot: snapshot({ remainingQuota: 51, resetAt }) })).mode).toBe('authenticated');
    expect(chooseAccessMode(input({ snapshot: snapshot({ remainingQuota: 50, resetAt }) }))).toEqual({
      mode: 'unauthenticated',
      reason: 'quota-low',
    });
  });

  it('should fall back while quota is low and return after the reset', () => {
    const low = snapshot({ remainingQuota: 10, resetAt: NOW + 60000 });

    expect(chooseAccessMode(input({ snapshot: low, now: NOW })).mode).toBe('unauthenticated');
    expect(chooseAccessMode(input({ snapshot: low, now: NOW + 59999 })).mode).toBe('unauthenticated');
    expect(chooseAccessMode(input({ snapshot: low, now: NOW + 60000 }))).toEqual({
      mode: 'authenticated',
      reason: 'quota-reset',
    });
  });

  it('should stay anonymous inside a rate-limit window', () => {
    const limited = snapshot({ remainingQuota: 9000, rateLimitedUntil: NOW + 1000 });

    expect(chooseAccessMode(input({ snapshot: limited }))).toEqual({ mode: 'unauthenticated', reason: 'rate-limited' });
    expect(chooseAccessMode(input({ snapshot: limited, now: NOW + 1000 })).mode).toBe('authenticated');
  });
});

describe('AccessModeSelector', () => {
  it('should read the authenticated snapshot from the tracker', () => {
    const tracker = new RateLimitTracker();
    const selector = createAccessModeSelector(tracker, { hasCredentials: true, lowWaterMark: 50 });

    expect(selector.choose(undefined, NOW)).toBe('authenticated');

    tracker.recordResponse(
      'authenticated',
      { remaining: 0, max: 10000, resetAt: NOW + 1000, backoffMs: null },
      NOW
    );
    expect(selector.choose(undefined, NOW)).toBe('unauthenticated');
    expect(selector.choose(undefined, NOW + 1000)).toBe('authenticated');
  });

  it('should fall back after the tracker records rejected credentials', () => {
    const tracker = new RateLimitTracker();
    const selector = new AccessModeSelector(tracker, { hasCredentials: true });

    tracker.recordCredentialsRejected('invalid key', NOW);
    expect(selector.explain(undefined, NOW)).toEqual({ mode: 'unauthenticated', reason: 'credentials-rejected' });
    expect(selector.choose('authenticated', NOW)).toBe('authenticated');
  });

  it('should use the configured default mode', () => {
    const selector = new AccessModeSelector(new RateLimitTracker(), {
      hasCredentials: true,
      defaultMode: 'unauthenticated',
    });
    expect(selector.choose(undefined, NOW)).toBe('unauthenticated');
    expect(selector.getDefaultMode()).toBe('unauthenticated');
  });

  it('should only allow falling back in auto mode with credentials', () => {
    const tracker = new RateLimitTracker();
    expect(new AccessModeSelector(tracker, { hasCredentials: true }).canFallBack()).toBe(true);
    expect(new AccessModeSelector(tracker, { hasCredentials: true }).canFallBack('authenticated')).toBe(false);
    expect(new AccessModeSelector(tracker, { hasCredentials: false }).canFallBack()).toBe(false);
  });

  it('should reject a negative low-water mark', () => {
    expect(() => new AccessModeSelector(new RateLimitTracker(), { hasCredentials: true, lowWaterMark: -1 })).toThrow(
      'lowWaterMark must not be negative, got -1'
    );
  });
});
