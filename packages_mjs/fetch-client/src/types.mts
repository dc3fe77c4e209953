/**
 * Type definitions for @qa-relay/fetch-client
 */
import type { Dispatcher } from 'undici';
import type { Logger } from 'pino';
import type { QuotaObservation, TransportMode } from '@qa-relay/quota-tracker';

/**
 * Query parameter value. Arrays are joined with ';' the way the upstream
 * expects multi-valued parameters such as `tagged`.
 */
export type QueryValue = string | number | boolean | readonly string[] | undefined;

export type QueryParams = Readonly<Record<string, QueryValue>>;

/**
 * One logical upstream call: an API method path plus its parameters
 */
export interface ApiCall {
  /** Method path relative to the API root, e.g. `search/advanced` */
  operation: string;
  params: QueryParams;
}

/**
 * Timeout configuration
 */
export interface TimeoutConfig {
  /** Time to receive response headers (ms) */
  connect?: number;
  /** Idle time while reading the body (ms) */
  read?: number;
}

/**
 * Client configuration
 */
export interface ClientConfig {
  /** API root. Default: https://api.stackexchange.com/2.3 */
  baseUrl?: string;
  /** Site parameter added to every call. Default: stackoverflow */
  site?: string;
  /** Application key, sent as `key` on authenticated calls */
  apiKey?: string;
  /** User access token, sent as `access_token` on authenticated calls */
  accessToken?: string;
  timeout?: TimeoutConfig | number;
  /** Extra headers for every call */
  headers?: Record<string, string>;
  /** undici dispatcher (connection pool, proxy agent or MockAgent) */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

/**
 * A successful upstream response
 */
export interface FetchResult {
  status: number;
  headers: Record<string, string>;
  /** Parsed JSON body */
  data: unknown;
  /** Quota metadata carried by the response */
  quota: QuotaObservation;
  durationMs: number;
}

/**
 * What the dispatcher needs from a transport
 */
export interface UpstreamTransport {
  execute(call: ApiCall, mode: TransportMode, signal?: AbortSignal): Promise<FetchResult>;
  /** Whether an API key is configured */
  hasCredentials(): boolean;
  close(): Promise<void>;
}

/**
 * Diagnostics event types
 */
export interface DiagnosticsEvent {
  name: 'request:start' | 'request:end' | 'request:error';
  timestamp: number;
  duration?: number;
  mode: TransportMode;
  /** Request URL with credentials masked */
  url: string;
  status?: number;
  error?: Error;
}
