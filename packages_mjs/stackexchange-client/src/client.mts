/**
 * Stack Exchange query handlers
 *
 * Each handler validates its input, turns it into one or more logical
 * requests and narrows the payloads the dispatcher hands back.
 */

import type { Logger } from 'pino';
import { createClient, createLogger } from '@qa-relay/fetch-client';
import type { UpstreamTransport } from '@qa-relay/fetch-client';
import { ValidationError, toError } from '@qa-relay/fetch-retry';
import { RequestDispatcher } from '@qa-relay/request-dispatcher';
import type { DispatcherConfig, Priority } from '@qa-relay/request-dispatcher';
import { parseRelayConfig } from './config.mjs';
import type { RelayConfig, RelayConfigInput } from './config.mjs';
import {
  QuestionIdSchema,
  QuestionOptionsSchema,
  SearchOptionsSchema,
  TagSearchOptionsSchema,
  buildAnswerParams,
  buildQuestionParams,
  buildSearchParams,
  buildTagSearchParams,
  validateInput,
} from './params.mjs';
import type { QuestionOptions, SearchOptions, TagSearchOptions } from './params.mjs';
import { AnswerListSchema, InfoSchema, QuestionListSchema, parsePayload } from './schemas.mjs';
import type { QuestionList } from './schemas.mjs';
import type {
  AuthenticationStatus,
  QuestionDetail,
  RelayStatus,
  SearchResult,
  StackExchangeClientDependencies,
} from './types.mjs';

interface AuthenticationState {
  tested: boolean;
  valid: boolean | null;
  error: string | null;
  lastValidationTime: number | null;
}

/**
 * Dispatcher settings taken from the relay configuration
 */
export function toDispatcherConfig(config: RelayConfig): DispatcherConfig {
  return {
    concurrency: config.maxConcurrentRequests,
    maxQueueSize: config.maxQueueSize,
    accessMode: config.accessMode,
    lowWaterMark: config.lowWaterMark,
    cache: { ttlMs: config.cacheTtlMs, capacity: config.cacheMaxSize },
    retry: {
      maxRetries: config.maxRetries,
      baseDelayMs: config.retryDelayMs,
      maxDelayMs: config.maxRetryDelayMs,
    },
  };
}

/**
 * Stack Exchange Client
 *
 * @example
 * const client = createStackExchangeClient(loadConfig());
 * const results = await client.searchQuestions({ query: 'event loop' });
 * const detail = await client.getQuestion(results.items[0].question_id, { maxAnswers: 5 });
 * await client.close();
 */
export class StackExchangeClient {
  private readonly config: RelayConfig;
  private readonly logger: Logger;
  private readonly transport: UpstreamTransport | null;
  private readonly dispatcher: RequestDispatcher;
  private readonly ownsTransport: boolean;
  private readonly ownsDispatcher: boolean;
  private readonly unsubscribe: () => void;
  private auth: AuthenticationState = { tested: false, valid: null, error: null, lastValidationTime: null };
  private closed = false;

  constructor(config: RelayConfigInput = {}, dependencies: StackExchangeClientDependencies = {}) {
    this.config = parseRelayConfig(config);
    this.logger =
      dependencies.logger ?? createLogger({ level: this.config.logLevel, pretty: this.config.logPretty });

    if (dependencies.dispatcher) {
      this.transport = dependencies.transport ?? null;
      this.dispatcher = dependencies.dispatcher;
      this.ownsTransport = false;
      this.ownsDispatcher = false;
    } else {
      const transport =
        dependencies.transport ??
        createClient({
          baseUrl: this.config.baseUrl,
          site: this.config.site,
          apiKey: this.config.apiKey,
          accessToken: this.config.accessToken,
          timeout: { read: this.config.requestTimeoutMs },
          dispatcher: dependencies.httpDispatcher,
          logger: this.logger,
        });
      this.transport = transport;
      this.ownsTransport = dependencies.transport === undefined;
      this.dispatcher = new RequestDispatcher(toDispatcherConfig(this.config), {
        transport,
        logger: this.logger,
      });
      this.ownsDispatcher = true;
    }

    this.unsubscribe = this.dispatcher.on((event) => {
      if (event.type === 'request:completed' && event.mode === 'authenticated') {
        this.markAuthentication(true, null);
      }
    });
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ValidationError('Client has been closed');
    }
  }

  private markAuthentication(valid: boolean, error: string | null): void {
    this.auth = { tested: true, valid, error, lastValidationTime: Date.now() };
  }

  /**
   * Search question titles by keyword
   */
  async searchQuestions(options: SearchOptions, priority: Priority = 'normal'): Promise<SearchResult> {
    this.assertOpen();
    const resolved = validateInput(SearchOptionsSchema, options, 'search options');

    const payload = await this.dispatcher.enqueue(
      'search/advanced',
      buildSearchParams(resolved, this.config.site),
      priority
    );
    return this.toSearchResult(parsePayload(QuestionListSchema, payload, 'search/advanced'), resolved);
  }

  /**
   * Search questions carrying every one of the given tags
   */
  async searchByTags(options: TagSearchOptions, priority: Priority = 'normal'): Promise<SearchResult> {
    this.assertOpen();
    const resolved = validateInput(TagSearchOptionsSchema, options, 'tag search options');

    const payload = await this.dispatcher.enqueue(
      'search/advanced',
      buildTagSearchParams(resolved, this.config.site),
      priority
    );
    return this.toSearchResult(parsePayload(QuestionListSchema, payload, 'search/advanced'), resolved);
  }

  private toSearchResult(list: QuestionList, page: { page: number; pageSize: number }): SearchResult {
    return {
      items: list.items,
      page: page.page,
      pageSize: page.pageSize,
      hasMore: list.has_more,
      total: list.total ?? null,
      quotaRemaining: list.quota_remaining ?? null,
    };
  }

  /**
   * Fetch a question with its body and, unless disabled, its answers
   * sorted by votes
   */
  async getQuestion(id: number, options: QuestionOptions = {}, priority: Priority = 'high'): Promise<QuestionDetail> {
    this.assertOpen();
    const questionId = validateInput(QuestionIdSchema, id, 'question id');
    const resolved = validateInput(QuestionOptionsSchema, options, 'question options');

    const operation = `questions/${questionId}`;
    const questions = parsePayload(
      QuestionListSchema,
      await this.dispatcher.enqueue(operation, buildQuestionParams(this.config.site), priority),
      operation
    );

    const question = questions.items[0];
    if (question === undefined) {
      throw new ValidationError(`Question ${questionId} not found`, { statusCode: 404 });
    }

    if (!resolved.includeAnswers) {
      return { question, answers: [], totalAnswers: question.answer_count };
    }

    const answersOperation = `${operation}/answers`;
    const answers = parsePayload(
      AnswerListSchema,
      await this.dispatcher.enqueue(answersOperation, buildAnswerParams(this.config.site), priority),
      answersOperation
    );

    return {
      question,
      answers: resolved.maxAnswers === undefined ? answers.items : answers.items.slice(0, resolved.maxAnswers),
      totalAnswers: answers.items.length,
    };
  }

  /**
   * Check the configured key with an authenticated `info` call.
   * Failures resolve to false; the outcome is kept for getAuthenticationStatus.
   */
  async validateApiKey(): Promise<boolean> {
    this.assertOpen();
    if (!this.dispatcher.getSelector().credentialsConfigured()) {
      this.markAuthentication(false, 'No API key configured');
      return false;
    }

    try {
      const payload = await this.dispatcher.enqueue('info', { site: this.config.site }, 'urgent', {
        accessMode: 'authenticated',
        cache: false,
      });
      parsePayload(InfoSchema, payload, 'info');
      this.markAuthentication(true, null);
      this.logger.info('API key validated');
      return true;
    } catch (error) {
      const err = toError(error);
      this.markAuthentication(false, err.message);
      this.logger.warn({ err }, 'API key validation failed');
      return false;
    }
  }

  getAuthenticationStatus(): AuthenticationStatus {
    const tracker = this.dispatcher.getTracker();
    const selector = this.dispatcher.getSelector();
    const credentials = tracker.credentialStatus();
    const quota = tracker.snapshot('authenticated');
    const auth: AuthenticationState = credentials.rejected
      ? {
          tested: true,
          valid: false,
          error: credentials.reason,
          lastValidationTime: credentials.rejectedAt ?? this.auth.lastValidationTime,
        }
      : this.auth;

    return {
      apiKeyConfigured: selector.credentialsConfigured(),
      isAuthenticated: auth.valid === true,
      apiKeyValid: auth.valid,
      authenticationTested: auth.tested,
      authenticationError: auth.error,
      lastValidationTime: auth.lastValidationTime,
      dailyQuota: quota.quotaMax,
      dailyQuotaRemaining: quota.remainingQuota,
      accessMode: selector.choose(),
    };
  }

  getStatus(): RelayStatus {
    return {
      dispatcher: this.dispatcher.statusSnapshot(),
      authentication: this.getAuthenticationStatus(),
    };
  }

  getDispatcher(): RequestDispatcher {
    return this.dispatcher;
  }

  getConfig(): Readonly<RelayConfig> {
    return this.config;
  }

  /**
   * Reject everything outstanding and release what this client created
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.unsubscribe();

    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
    if (this.ownsTransport && this.transport) {
      await this.transport.close();
    }
  }
}

/**
 * Create a client from a configuration object
 */
export function createStackExchangeClient(
  config: RelayConfigInput = {},
  dependencies: StackExchangeClientDependencies = {}
): StackExchangeClient {
  return new StackExchangeClient(config, dependencies);
}
