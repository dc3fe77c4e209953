/**
 * Base HTTP client using undici
 */
import { request } from 'undici';
import type { Dispatcher } from 'undici';
import type { Logger } from 'pino';
import { TransientNetworkError, toError } from '@qa-relay/fetch-retry';
import { parseQuotaObservation } from '@qa-relay/quota-tracker';
import type { TransportMode } from '@qa-relay/quota-tracker';
import type { ApiCall, ClientConfig, FetchResult, UpstreamTransport } from '../types.mjs';
import { resolveConfig, type ResolvedConfig } from '../config.mjs';
import { buildQuery, buildUndiciOptions, buildUrl, maskUrl } from './request-builder.mjs';
import { decodeBody, flattenHeaders, mapUpstreamError, parseBody } from './response.mjs';
import { emitRequestEnd, emitRequestError, emitRequestStart } from '../diagnostics.mjs';
import { getDefaultLogger } from '../logger.mjs';

interface RawResponse {
  status: number;
  headers: Record<string, string>;
  data: unknown;
}

/**
 * Base HTTP client implementation
 *
 * One `execute` is one physical GET. Failures are thrown as members of the
 * relay error taxonomy; retrying is left to the caller.
 */
export class BaseClient implements UpstreamTransport {
  protected config: ResolvedConfig;
  protected dispatcher?: Dispatcher;
  protected logger: Logger;
  private closed = false;

  constructor(clientConfig: ClientConfig = {}) {
    this.config = resolveConfig(clientConfig);
    this.dispatcher = clientConfig.dispatcher;
    this.logger = (clientConfig.logger ?? getDefaultLogger()).child({ component: 'fetch-client' });
  }

  hasCredentials(): boolean {
    return this.config.apiKey !== null;
  }

  /**
   * Perform one upstream call in the given access mode
   */
  async execute(call: ApiCall, mode: TransportMode, signal?: AbortSignal): Promise<FetchResult> {
    if (this.closed) {
      throw new Error('Client has been closed');
    }

    const url = buildUrl(this.config.baseUrl, call.operation, buildQuery(this.config, call, mode));
    const safeUrl = maskUrl(url);
    const started = Date.now();

    this.logger.debug({ type: 'request', mode, url: safeUrl }, `Request: GET ${safeUrl}`);
    emitRequestStart(mode, safeUrl);

    const raw = await this.send(url, signal).catch((error: unknown) => {
      const failure = signal?.aborted
        ? toError(error)
        : new TransientNetworkError(`Request to ${call.operation} failed: ${toError(error).message}`, {
            cause: error,
          });
      emitRequestError(mode, safeUrl, failure, Date.now() - started);
      this.logger.warn({ type: 'request', mode, url: safeUrl, err: failure }, `Request failed: GET ${safeUrl}`);
      throw failure;
    });

    const durationMs = Date.now() - started;
    const failure = mapUpstreamError(raw.status, raw.data, raw.headers);

    if (failure) {
      emitRequestError(mode, safeUrl, failure, durationMs, raw.status);
      this.logger.warn(
        { type: 'response', mode, status: raw.status, durationMs, err: failure },
        `Response: ${raw.status} ${failure.name}`
      );
      throw failure;
    }

    const quota = parseQuotaObservation(raw.headers, raw.data);

    emitRequestEnd(mode, safeUrl, raw.status, durationMs);
    this.logger.debug(
      { type: 'response', mode, status: raw.status, durationMs, quotaRemaining: quota.remaining },
      `Response: ${raw.status}`
    );

    return {
      ...raw,
      quota,
      durationMs,
    };
  }

  /**
   * Send the request and read the whole body
   */
  private async send(url: string, signal?: AbortSignal): Promise<RawResponse> {
    const response = await request(url, {
      ...buildUndiciOptions(this.config, signal),
      dispatcher: this.dispatcher,
    });
    const headers = flattenHeaders(response.headers);
    const buffer = Buffer.from(await response.body.arrayBuffer());

    return {
      status: response.statusCode,
      headers,
      data: parseBody(decodeBody(buffer, headers['content-encoding'])),
    };
  }

  /**
   * Close the client
   */
  async close(): Promise<void> {
    this.closed = true;
    // Dispatcher cleanup is handled by whoever created it
  }
}
