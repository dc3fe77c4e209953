/**
 * Quota metadata parsing from upstream responses
 *
 * The upstream reports quota in the JSON envelope (`quota_remaining`,
 * `quota_max`, `backoff` in seconds) and some deployments add
 * `x-ratelimit-remaining` / `x-ratelimit-reset` headers. Headers win when
 * both are present. Daily quotas reset at UTC midnight, which is used when no
 * explicit reset time is given.
 */

import type { QuotaObservation } from './types.mjs';

export type HeaderBag = Record<string, string | string[] | undefined>;

function headerValue(headers: HeaderBag, name: string): string | undefined {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) {
      return Array.isArray(value) ? value[0] : value;
    }
  }
  return undefined;
}

function toNonNegativeInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : null;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return null;
}

function envelopeField(body: unknown, field: string): unknown {
  if (typeof body !== 'object' || body === null || !(field in body)) {
    return undefined;
  }
  return Object.getOwnPropertyDescriptor(body, field)?.value;
}

/**
 * Next UTC midnight after `now`
 */
export function nextUtcMidnight(now: number): number {
  const date = new Date(now);
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate() + 1);
}

/**
 * Read quota metadata from a response's headers and JSON body
 */
export function parseQuotaObservation(headers: HeaderBag, body: unknown, now: number = Date.now()): QuotaObservation {
  const remaining =
    toNonNegativeInteger(headerValue(headers, 'x-ratelimit-remaining')) ??
    toNonNegativeInteger(envelopeField(body, 'quota_remaining'));

  const max =
    toNonNegativeInteger(headerValue(headers, 'x-ratelimit-limit')) ??
    toNonNegativeInteger(envelopeField(body, 'quota_max'));

  const resetSeconds = toNonNegativeInteger(headerValue(headers, 'x-ratelimit-reset'));
  let resetAt: number | null = resetSeconds === null ? null : resetSeconds * 1000;
  if (resetAt === null && remaining !== null) {
    resetAt = nextUtcMidnight(now);
  }

  const backoffSeconds = toNonNegativeInteger(envelopeField(body, 'backoff'));

  return {
    remaining,
    max,
    resetAt,
    backoffMs: backoffSeconds === null ? null : backoffSeconds * 1000,
  };
}
