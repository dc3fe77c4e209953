/**
 * @qa-relay/stackexchange-client
 *
 * Query handlers for the Stack Exchange API, wired to the request
 * dispatcher, with environment-driven configuration.
 *
 * @example
 * ```typescript
 * import { createStackExchangeClient, loadConfig } from '@qa-relay/stackexchange-client';
 *
 * const client = createStackExchangeClient(loadConfig());
 * const { items } = await client.searchByTags({ tags: ['node.js', 'promise'] });
 * console.error(client.getStatus().dispatcher.currentAccessMode);
 * await client.close();
 * ```
 */

export type {
  AuthenticationStatus,
  QuestionDetail,
  RelayStatus,
  SearchResult,
  StackExchangeClientDependencies,
} from './types.mjs';

export {
  ENV_VARS,
  LOG_LEVELS,
  RelayConfigSchema,
  loadConfig,
  loadConfigFromEnv,
  parseRelayConfig,
} from './config.mjs';
export type { Environment, LoadConfigOptions, RelayConfig, RelayConfigInput } from './config.mjs';

export {
  MAX_PAGE_SIZE,
  SEARCH_SORTS,
  QuestionIdSchema,
  QuestionOptionsSchema,
  SearchOptionsSchema,
  TagSearchOptionsSchema,
  validateInput,
} from './params.mjs';
export type { QuestionOptions, SearchOptions, SearchSort, TagSearchOptions } from './params.mjs';

export {
  AnswerListSchema,
  AnswerSchema,
  InfoSchema,
  OwnerSchema,
  QuestionListSchema,
  QuestionSchema,
  formatZodIssues,
  parsePayload,
} from './schemas.mjs';
export type { Answer, AnswerList, Owner, Question, QuestionList } from './schemas.mjs';

export { StackExchangeClient, createStackExchangeClient, toDispatcherConfig } from './client.mjs';
