/**
 * A client wired to a MockTransport.
 */

import { createClient } from '../client/client.js';
import type { RiakClient } from '../client/client.js';
import type { RiakConfig } from '../config.js';
import type { Logger } from '../observability/types.js';
import { MockTransport } from './mock-transport.js';

/**
 * Create a client whose transport answers from a script instead of the network.
 * The transport reads the client's live configuration, so setter changes
 * show up in recorded headers.
 *
 * @example
 * ```typescript
 * const { client, transport } = createMockClient({ clientId: 'test-client' });
 * transport.reply(200, 'OK');
 * await client.isAlive(); // true
 * ```
 */
export function createMockClient(
  config: Partial<RiakConfig> = {},
  logger?: Logger
): { client: RiakClient; transport: MockTransport } {
  const transport = new MockTransport({ getConfig: () => client.getConfig() });
  const client = createClient(config, { transport, logger });
  return { client, transport };
}
