/**
 * Error taxonomy for calls to the upstream Q&A API
 *
 * Every error that reaches a caller's promise is one of these classes (or a
 * plain Error the transport could not classify). `isRetryable` is the flag
 * the retry policy reads first.
 */

export type RelayErrorCode =
  | 'VALIDATION'
  | 'AUTHENTICATION'
  | 'RATE_LIMITED'
  | 'NETWORK'
  | 'UPSTREAM_SERVER'
  | 'RETRIES_EXHAUSTED'
  | 'QUEUE_SATURATED'
  | 'WAIT_TIMEOUT'
  | 'DISPATCHER_CLOSED';

/**
 * Context shared by all relay errors
 */
export interface RelayErrorOptions {
  cause?: unknown;
  /** HTTP status of the upstream response, when there was one */
  statusCode?: number;
  /** `error_id` from the upstream error envelope */
  upstreamErrorId?: number;
  /** `error_name` from the upstream error envelope */
  upstreamErrorName?: string;
}

export class RelayError extends Error {
  readonly code: RelayErrorCode;
  readonly isRetryable: boolean;
  readonly statusCode?: number;
  readonly upstreamErrorId?: number;
  readonly upstreamErrorName?: string;

  constructor(
    code: RelayErrorCode,
    message: string,
    isRetryable: boolean,
    options: RelayErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RelayError';
    this.code = code;
    this.isRetryable = isRetryable;
    this.statusCode = options.statusCode;
    this.upstreamErrorId = options.upstreamErrorId;
    this.upstreamErrorName = options.upstreamErrorName;
  }
}

/**
 * Bad parameters, or any 4xx other than a rate limit. Never retried.
 */
export class ValidationError extends RelayError {
  constructor(message: string, options: RelayErrorOptions = {}, code: RelayErrorCode = 'VALIDATION') {
    super(code, message, false, options);
    this.name = 'ValidationError';
  }
}

/**
 * The upstream rejected the configured credentials
 */
export class AuthenticationError extends ValidationError {
  constructor(message: string, options: RelayErrorOptions = {}) {
    super(message, options, 'AUTHENTICATION');
    this.name = 'AuthenticationError';
  }
}

export class RateLimitError extends RelayError {
  /** Wait the upstream asked for, from Retry-After or the envelope's `backoff` */
  readonly retryAfterMs?: number;

  constructor(message: string, options: RelayErrorOptions & { retryAfterMs?: number } = {}) {
    super('RATE_LIMITED', message, false, options);
    this.name = 'RateLimitError';
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class TransientNetworkError extends RelayError {
  constructor(message: string, options: RelayErrorOptions = {}) {
    super('NETWORK', message, true, options);
    this.name = 'TransientNetworkError';
  }
}

export class UpstreamServerError extends RelayError {
  constructor(message: string, options: RelayErrorOptions = {}) {
    super('UPSTREAM_SERVER', message, true, options);
    this.name = 'UpstreamServerError';
  }
}

export class ExhaustedRetriesError extends RelayError {
  /** Physical calls made before giving up */
  readonly attempts: number;
  readonly lastError: Error;

  constructor(lastError: Error, attempts: number) {
    super(
      'RETRIES_EXHAUSTED',
      `Gave up after ${attempts} attempts: ${lastError.message}`,
      false,
      { cause: lastError, statusCode: lastError instanceof RelayError ? lastError.statusCode : undefined }
    );
    this.name = 'ExhaustedRetriesError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class QueueSaturatedError extends RelayError {
  readonly maxQueueSize: number;

  constructor(maxQueueSize: number) {
    super('QUEUE_SATURATED', `Request queue is full (${maxQueueSize} pending)`, false);
    this.name = 'QueueSaturatedError';
    this.maxQueueSize = maxQueueSize;
  }
}

/**
 * A caller stopped waiting. The shared request itself keeps going.
 */
export class RequestTimeoutError extends RelayError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('WAIT_TIMEOUT', `Timed out after ${timeoutMs}ms waiting for the upstream response`, false);
    this.name = 'RequestTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class DispatcherClosedError extends RelayError {
  constructor(message = 'Dispatcher has been closed') {
    super('DISPATCHER_CLOSED', message, false);
    this.name = 'DispatcherClosedError';
  }
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}
