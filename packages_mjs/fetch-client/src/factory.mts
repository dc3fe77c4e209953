/**
 * Client factory for @qa-relay/fetch-client
 */
import type { ClientConfig, UpstreamTransport } from './types.mjs';
import { BaseClient } from './core/base-client.mjs';

/**
 * Create an upstream transport with the given configuration
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   apiKey: process.env.STACKOVERFLOW_API_KEY,
 *   timeout: 30000,
 * });
 *
 * const result = await client.execute(
 *   { operation: 'search/advanced', params: { intitle: 'event loop' } },
 *   'authenticated'
 * );
 * ```
 */
export function createClient(config: ClientConfig = {}): UpstreamTransport {
  return new BaseClient(config);
}
