/**
 * Request fingerprinting
 */

import { createHash } from 'node:crypto';
import { serializeQueryValue } from '@qa-relay/fetch-client';
import type { QueryParams } from '@qa-relay/fetch-client';

/**
 * SHA-256 over the operation and its parameters.
 * Parameter order does not matter; undefined parameters are ignored.
 */
export function fingerprintRequest(operation: string, params: QueryParams): string {
  const canonical = Object.entries(params)
    .map(([key, value]) => [key, serializeQueryValue(value)] as const)
    .filter((pair): pair is readonly [string, string] => pair[1] !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
    .join('&');

  const hash = createHash('sha256');
  hash.update(operation);
  hash.update('?');
  hash.update(canonical);
  return hash.digest('hex');
}
