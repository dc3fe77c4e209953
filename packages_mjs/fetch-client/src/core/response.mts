/**
 * Response decoding and upstream error mapping
 */
import { brotliDecompressSync, gunzipSync, inflateSync } from 'node:zlib';
import {
  AuthenticationError,
  RateLimitError,
  UpstreamServerError,
  ValidationError,
  parseRetryAfter,
} from '@qa-relay/fetch-retry';
import type { RelayErrorOptions } from '@qa-relay/fetch-retry';

const THROTTLE_ERROR_ID = 502;
const SERVER_ERROR_IDS = new Set([500, 503]);
const CREDENTIAL_ERROR_IDS = new Set([401, 402, 403, 405, 406]);

const RATE_LIMIT_PATTERN = /throttl|quota|too many requests/i;
const CREDENTIAL_PATTERN = /(^|\W)(key|access_token)(\W|$)/i;

/**
 * Flatten undici response headers to single string values
 */
export function flattenHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      flat[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      flat[key.toLowerCase()] = value.join(', ');
    }
  }
  return flat;
}

/**
 * Decode a response body according to its content-encoding
 */
export function decodeBody(buffer: Buffer, contentEncoding?: string): string {
  const encoding = contentEncoding?.trim().toLowerCase();

  switch (encoding) {
    case 'gzip':
    case 'x-gzip':
      return gunzipSync(buffer).toString('utf8');
    case 'deflate':
      return inflateSync(buffer).toString('utf8');
    case 'br':
      return brotliDecompressSync(buffer).toString('utf8');
    default:
      return buffer.toString('utf8');
  }
}

/**
 * Parse a body as JSON, falling back to the raw text
 */
export function parseBody(text: string): unknown {
  if (text.trim() === '') {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

/**
 * Upstream error envelope (`error_id`, `error_name`, `error_message`)
 */
export interface ErrorEnvelope {
  errorId: number | null;
  errorName: string | null;
  errorMessage: string | null;
}

function readField(body: object, field: string): unknown {
  return Object.getOwnPropertyDescriptor(body, field)?.value;
}

export function readErrorEnvelope(body: unknown): ErrorEnvelope | null {
  if (typeof body !== 'object' || body === null) {
    return null;
  }

  const errorId = readField(body, 'error_id');
  const errorName = readField(body, 'error_name');
  const errorMessage = readField(body, 'error_message');

  if (errorId === undefined && errorName === undefined && errorMessage === undefined) {
    return null;
  }

  return {
    errorId: typeof errorId === 'number' ? errorId : null,
    errorName: typeof errorName === 'string' ? errorName : null,
    errorMessage: typeof errorMessage === 'string' ? errorMessage : null,
  };
}

/**
 * Map a response to the error taxonomy. Returns null for a successful response.
 *
 * The upstream reports some failures with a 200 status and an error
 * envelope, so the envelope is checked regardless of status.
 */
export function mapUpstreamError(
  status: number,
  body: unknown,
  headers: Record<string, string>,
  now: number = Date.now()
): Error | null {
  const envelope = readErrorEnvelope(body);
  const isHttpError = status >= 400;

  if (!isHttpError && envelope === null) {
    return null;
  }

  const message = envelope?.errorMessage ?? envelope?.errorName ?? `HTTP ${status}`;
  const options: RelayErrorOptions = {
    statusCode: status,
    upstreamErrorId: envelope?.errorId ?? undefined,
    upstreamErrorName: envelope?.errorName ?? undefined,
  };

  if (status === 429 || envelope?.errorId === THROTTLE_ERROR_ID || RATE_LIMIT_PATTERN.test(message)) {
    return new RateLimitError(`Rate limited by upstream: ${message}`, {
      ...options,
      retryAfterMs: parseRetryAfter(headers['retry-after'], now),
    });
  }

  if (status >= 500 || (envelope?.errorId != null && SERVER_ERROR_IDS.has(envelope.errorId))) {
    return new UpstreamServerError(`Upstream server error (${status}): ${message}`, options);
  }

  if (
    (envelope?.errorId != null && CREDENTIAL_ERROR_IDS.has(envelope.errorId)) ||
    status === 401 ||
    status === 403 ||
    CREDENTIAL_PATTERN.test(message)
  ) {
    return new AuthenticationError(`Credentials rejected by upstream: ${message}`, options);
  }

  return new ValidationError(`Upstream rejected request (${status}): ${message}`, options);
}
