/**
 * Type definitions for stackexchange-client
 */

import type { Logger } from 'pino';
import type { Dispatcher } from 'undici';
import type { UpstreamTransport } from '@qa-relay/fetch-client';
import type { TransportMode } from '@qa-relay/quota-tracker';
import type { DispatcherStatus, RequestDispatcher } from '@qa-relay/request-dispatcher';
import type { Answer, Question } from './schemas.mjs';

export interface SearchResult {
  items: Question[];
  page: number;
  pageSize: number;
  hasMore: boolean;
  /** Only present when the filter asks for it */
  total: number | null;
  quotaRemaining: number | null;
}

export interface QuestionDetail {
  question: Question;
  /** Highest voted first, truncated to `maxAnswers` */
  answers: Answer[];
  /** Answers returned by the API before truncation */
  totalAnswers: number;
}

export interface AuthenticationStatus {
  apiKeyConfigured: boolean;
  /** Last authenticated call succeeded */
  isAuthenticated: boolean;
  /** null until the key has been exercised */
  apiKeyValid: boolean | null;
  authenticationTested: boolean;
  authenticationError: string | null;
  lastValidationTime: number | null;
  dailyQuota: number | null;
  dailyQuotaRemaining: number | null;
  /** Mode the next automatic request would use */
  accessMode: TransportMode;
}

export interface RelayStatus {
  dispatcher: DispatcherStatus;
  authentication: AuthenticationStatus;
}

/**
 * Collaborators; anything left out is built from the configuration
 */
export interface StackExchangeClientDependencies {
  transport?: UpstreamTransport;
  /** A dispatcher built around `transport` */
  dispatcher?: RequestDispatcher;
  /** undici dispatcher for the default transport (connection pool, proxy or MockAgent) */
  httpDispatcher?: Dispatcher;
  logger?: Logger;
}
