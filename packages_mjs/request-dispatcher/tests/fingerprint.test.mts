/**
 * Tests for request fingerprinting
 *
 * Coverage includes:
 * - Parameter order independence
 * - Undefined parameters
 * - Distinct operations and values
 */

import { describe, it, expect } from 'vitest';
import { fingerprintRequest } from '../src/fingerprint.mjs';

describe('fingerprintRequest', () => {
  it('should produce a sha256 hex digest', () => {
    expect(fingerprintRequest('info', {})).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should ignore parameter order', () => {
    expect(fingerprintRequest('search/advanced', { intitle: 'closures', page: 1, order: 'desc' })).toBe(
      fingerprintRequest('search/advanced', { order: 'desc', page: 1, intitle: 'closures' })
    );
  });

  it('should ignore undefined parameters', () => {
    expect(fingerprintRequest('questions/1', { filter: 'withbody', sort: undefined })).toBe(
      fingerprintRequest('questions/1', { filter: 'withbody' })
    );
  });

  it('should treat numbers and their string form alike', () => {
    expect(fingerprintRequest('search/advanced', { page: 2 })).toBe(fingerprintRequest('search/advanced', { page: '2' }));
  });

  it('should serialize arrays the way they are sent', () => {
    expect(fingerprintRequest('search/advanced', { tagged: ['python', 'asyncio'] })).toBe(
      fingerprintRequest('search/advanced', { tagged: 'python;asyncio' })
    );
  });

  it('should distinguish operations and values', () => {
    const base = fingerprintRequest('questions/1', { filter: 'withbody' });
    expect(fingerprintRequest('questions/2', { filter: 'withbody' })).not.toBe(base);
    expect(fingerprintRequest('questions/1', { filter: 'default' })).not.toBe(base);
  });

  it('should not confuse a key boundary with a value', () => {
    expect(fingerprintRequest('search', { a: 'b&c=d' })).not.toBe(fingerprintRequest('search', { a: 'b', c: 'd' }));
  });
});
