/**
 * Riak HTTP Client
 *
 * Client for a Riak node's HTTP interface: bucket listing, liveness checks
 * and Map/Reduce jobs.
 *
 * @example
 * ```typescript
 * import { createClient } from 'riak-http-client';
 *
 * const client = createClient({ host: '127.0.0.1', port: 8098 });
 * const [counts] = await client
 *   .addBucket('orders')
 *   .map('Riak.mapValuesJson')
 *   .reduce(['riak_kv_mapreduce', 'reduce_sum'])
 *   .run();
 * ```
 *
 * @module riak-http-client
 */

// Client
export * from './client/index.js';

// Configuration
export {
  DEFAULT_HOST,
  DEFAULT_INDEX_PREFIX,
  DEFAULT_MAPRED_PREFIX,
  DEFAULT_PORT,
  DEFAULT_PREFIX,
  DEFAULT_QUORUM,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
  RiakConfig,
  RiakConfigBuilder,
  RiakConfigSchema,
  createConfigFromEnv,
  createDefaultConfig,
  generateClientId,
  validateConfig,
  validateQuorum,
} from './config.js';
export type { BasicAuthConfig, Scheme, TlsConfig } from './config.js';

// Errors
export {
  ConfigurationError,
  InvalidStateError,
  ProtocolError,
  RiakError,
  TransportError,
  isInvalidStateError,
  isProtocolError,
  isRiakError,
  isTransportError,
} from './errors.js';
export type { ErrorCategory, TransportFailureReason } from './errors.js';

// Map/Reduce
export * from './mapreduce/index.js';

// Transport
export * from './transport/index.js';

// Observability
export * from './observability/index.js';

// Simulation
export * from './simulation/index.js';
