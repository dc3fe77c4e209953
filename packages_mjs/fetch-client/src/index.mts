/**
 * @qa-relay/fetch-client
 * undici transport for the Stack Exchange API
 * Pure ESM module
 */

export type {
  ApiCall,
  ClientConfig,
  DiagnosticsEvent,
  FetchResult,
  QueryParams,
  QueryValue,
  TimeoutConfig,
  UpstreamTransport,
} from './types.mjs';

export {
  DEFAULT_BASE_URL,
  DEFAULT_SITE,
  DEFAULT_TIMEOUTS,
  maskValue,
  normalizeTimeout,
  resolveConfig,
  validateConfig,
} from './config.mjs';
export type { ResolvedConfig } from './config.mjs';

export { BaseClient } from './core/base-client.mjs';
export {
  buildHeaders,
  buildQuery,
  buildUndiciOptions,
  buildUrl,
  maskUrl,
  serializeQueryValue,
} from './core/request-builder.mjs';
export {
  decodeBody,
  flattenHeaders,
  mapUpstreamError,
  parseBody,
  readErrorEnvelope,
} from './core/response.mjs';
export type { ErrorEnvelope } from './core/response.mjs';

export { createClient } from './factory.mjs';
export { createLogger, getDefaultLogger } from './logger.mjs';
export type { LoggerConfig } from './logger.mjs';

export {
  CHANNELS,
  emitRequestEnd,
  emitRequestError,
  emitRequestStart,
  onAllEvents,
  onRequestEnd,
  onRequestError,
  onRequestStart,
} from './diagnostics.mjs';
