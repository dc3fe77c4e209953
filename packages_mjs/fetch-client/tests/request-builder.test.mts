/**
 * Tests for request-builder.mts
 * Logic testing: Decision/Branch, Path coverage
 */
import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../src/config.mjs';
import {
  buildHeaders,
  buildQuery,
  buildUndiciOptions,
  buildUrl,
  maskUrl,
  serializeQueryValue,
} from '../src/core/request-builder.mjs';

const config = resolveConfig({ apiKey: 'test-key', accessToken: 'test-token', timeout: { connect: 100, read: 200 } });

describe('request-builder', () => {
  describe('serializeQueryValue', () => {
    it('should serialize scalars', () => {
      expect(serializeQueryValue('async')).toBe('async');
      expect(serializeQueryValue(10)).toBe('10');
      expect(serializeQueryValue(true)).toBe('true');
    });

    it('should join arrays with semicolons', () => {
      expect(serializeQueryValue(['python', 'asyncio'])).toBe('python;asyncio');
    });

    it('should omit undefined', () => {
      expect(serializeQueryValue(undefined)).toBeUndefined();
    });
  });

  describe('buildQuery', () => {
    const call = { operation: 'search/advanced', params: { intitle: 'event loop', page: 2, extra: undefined } };

    it('should attach credentials to authenticated calls', () => {
      expect(buildQuery(config, call, 'authenticated')).toEqual({
        intitle: 'event loop',
        page: '2',
        site: 'stackoverflow',
        key: 'test-key',
        access_token: 'test-token',
      });
    });

    it('should leave credentials off anonymous calls', () => {
      expect(buildQuery(config, call, 'unauthenticated')).toEqual({
        intitle: 'event loop',
        page: '2',
        site: 'stackoverflow',
      });
    });

    it('should keep an explicit site parameter', () => {
      const query = buildQuery(config, { operation: 'info', params: { site: 'serverfault' } }, 'unauthenticated');
      expect(query.site).toBe('serverfault');
    });
  });

  describe('buildUrl', () => {
    it('should resolve method paths beneath the API root', () => {
      expect(buildUrl(config.baseUrl, '/questions/42', { site: 'stackoverflow' })).toBe(
        'https://api.stackexchange.com/2.3/questions/42?site=stackoverflow'
      );
    });

    it('should encode parameter values', () => {
      const url = new URL(buildUrl(config.baseUrl, 'search/advanced', { tagged: 'python;asyncio' }));
      expect(url.searchParams.get('tagged')).toBe('python;asyncio');
    });
  });

  describe('maskUrl', () => {
    it('should mask credential parameters only', () => {
      expect(maskUrl('https://api.stackexchange.com/2.3/info?key=test-key-123&site=stackoverflow')).toBe(
        'https://api.stackexchange.com/2.3/info?key=test********&site=stackoverflow'
      );
    });

    it('should leave URLs without credentials unchanged', () => {
      expect(maskUrl('https://api.stackexchange.com/2.3/info?site=stackoverflow')).toBe(
        'https://api.stackexchange.com/2.3/info?site=stackoverflow'
      );
    });
  });

  describe('buildHeaders', () => {
    it('should default accept headers without overriding configured ones', () => {
      expect(buildHeaders(resolveConfig({ headers: { accept: 'text/plain' } }))).toEqual({
        accept: 'text/plain',
        'accept-encoding': 'gzip, deflate',
      });
    });
  });

  describe('buildUndiciOptions', () => {
    it('should map timeouts to undici options', () => {
      const signal = new AbortController().signal;
      const options = buildUndiciOptions(config, signal);

      expect(options.method).toBe('GET');
      expect(options.headersTimeout).toBe(100);
      expect(options.bodyTimeout).toBe(200);
      expect(options.signal).toBe(signal);
    });
  });
});
