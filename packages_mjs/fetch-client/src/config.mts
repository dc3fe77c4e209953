/**
 * Configuration utilities for @qa-relay/fetch-client
 */
import { ValidationError } from '@qa-relay/fetch-retry';
import type { ClientConfig, TimeoutConfig } from './types.mjs';

export const DEFAULT_BASE_URL = 'https://api.stackexchange.com/2.3';

export const DEFAULT_SITE = 'stackoverflow';

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS: Required<TimeoutConfig> = {
  connect: 5000,
  read: 30000,
};

/**
 * Normalize timeout config to milliseconds
 */
export function normalizeTimeout(timeout?: TimeoutConfig | number): Required<TimeoutConfig> {
  if (typeof timeout === 'number') {
    return {
      connect: timeout,
      read: timeout,
    };
  }

  return {
    connect: timeout?.connect ?? DEFAULT_TIMEOUTS.connect,
    read: timeout?.read ?? DEFAULT_TIMEOUTS.read,
  };
}

/**
 * Validate client configuration
 */
export function validateConfig(config: ClientConfig): void {
  const baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;

  try {
    new URL(baseUrl);
  } catch {
    throw new ValidationError(`Invalid baseUrl: ${baseUrl}`);
  }

  if (config.site !== undefined && config.site.trim() === '') {
    throw new ValidationError('site must not be empty');
  }

  const timeout = normalizeTimeout(config.timeout);
  if (timeout.connect <= 0 || timeout.read <= 0) {
    throw new ValidationError('timeouts must be positive');
  }
}

/**
 * Mask a credential for logging, keeping the first 4 characters
 */
export function maskValue(val: string): string {
  if (!val) return '<empty>';
  if (val.length <= 4) return '*'.repeat(val.length);
  return val.substring(0, 4) + '*'.repeat(val.length - 4);
}

/**
 * Resolved client configuration with defaults applied
 */
export interface ResolvedConfig {
  /** API root, always ending in '/' so method paths resolve beneath it */
  baseUrl: URL;
  site: string;
  apiKey: string | null;
  accessToken: string | null;
  timeout: Required<TimeoutConfig>;
  headers: Record<string, string>;
}

/**
 * Resolve client configuration with defaults
 */
export function resolveConfig(config: ClientConfig): ResolvedConfig {
  validateConfig(config);

  const baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;

  return {
    baseUrl: new URL(baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`),
    site: config.site ?? DEFAULT_SITE,
    apiKey: config.apiKey ? config.apiKey : null,
    accessToken: config.accessToken ? config.accessToken : null,
    timeout: normalizeTimeout(config.timeout),
    headers: { ...config.headers },
  };
}

export type { ClientConfig, TimeoutConfig };
