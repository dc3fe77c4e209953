/**
 * Request builder utilities for @qa-relay/fetch-client
 */
import type { Dispatcher } from 'undici';
import type { TransportMode } from '@qa-relay/quota-tracker';
import type { ApiCall, QueryValue } from '../types.mjs';
import type { ResolvedConfig } from '../config.mjs';
import { maskValue } from '../config.mjs';

const CREDENTIAL_PARAMS = ['key', 'access_token'] as const;

/**
 * Serialize a query value; undefined means the parameter is omitted
 */
export function serializeQueryValue(value: QueryValue): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return value.join(';');
}

/**
 * Build the query string parameters for one call.
 * Credentials are only attached to authenticated calls.
 */
export function buildQuery(
  config: ResolvedConfig,
  call: ApiCall,
  mode: TransportMode
): Record<string, string> {
  const query: Record<string, string> = {};

  for (const [key, value] of Object.entries(call.params)) {
    const serialized = serializeQueryValue(value);
    if (serialized !== undefined) {
      query[key] = serialized;
    }
  }

  if (query.site === undefined) {
    query.site = config.site;
  }

  if (mode === 'authenticated') {
    if (config.apiKey !== null) {
      query.key = config.apiKey;
    }
    if (config.accessToken !== null) {
      query.access_token = config.accessToken;
    }
  }

  return query;
}

/**
 * Build full URL from base and method path
 */
export function buildUrl(
  baseUrl: URL,
  operation: string,
  query?: Record<string, string>
): string {
  const url = new URL(operation.replace(/^\/+/, ''), baseUrl);

  if (query) {
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
  }

  return url.toString();
}

/**
 * Mask credential query parameters for safe logging
 */
export function maskUrl(url: string): string {
  const parsed = new URL(url);
  for (const name of CREDENTIAL_PARAMS) {
    const value = parsed.searchParams.get(name);
    if (value !== null) {
      parsed.searchParams.set(name, maskValue(value));
    }
  }
  return parsed.toString();
}

/**
 * Build request headers
 */
export function buildHeaders(config: ResolvedConfig): Record<string, string> {
  const headers: Record<string, string> = { ...config.headers };

  if (!headers['accept']) {
    headers['accept'] = 'application/json';
  }
  if (!headers['accept-encoding']) {
    headers['accept-encoding'] = 'gzip, deflate';
  }

  return headers;
}

/**
 * Undici request options
 */
export interface UndiciRequestOptions {
  method: Dispatcher.HttpMethod;
  headers: Record<string, string>;
  signal?: AbortSignal;
  bodyTimeout: number;
  headersTimeout: number;
}

/**
 * Build undici request options
 */
export function buildUndiciOptions(config: ResolvedConfig, signal?: AbortSignal): UndiciRequestOptions {
  return {
    method: 'GET',
    headers: buildHeaders(config),
    signal,
    bodyTimeout: config.timeout.read,
    headersTimeout: config.timeout.connect,
  };
}
