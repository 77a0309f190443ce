/**
 * Riak HTTP Client
 *
 * Holds the connection configuration and is the entry point for bucket
 * proxies, bucket listing, liveness checks and Map/Reduce jobs.
 *
 * @module client
 */

import { z } from 'zod';
import { RiakConfigBuilder, createConfigFromEnv, validateConfig, validateQuorum } from '../config.js';
import type { RiakConfig } from '../config.js';
import { ConfigurationError, ProtocolError, TransportError } from '../errors.js';
import { MapReduceJob } from '../mapreduce/job.js';
import type { JobContext } from '../mapreduce/job.js';
import { parseJsonBody } from '../mapreduce/results.js';
import type {
  IndexQuery,
  LinkPhaseParams,
  MapPhaseParams,
  ReducePhaseParams,
  SearchPhaseParams,
} from '../mapreduce/types.js';
import { NoopLogger, createLogContext, createLogger, parseLogLevel } from '../observability/logger.js';
import type { Logger } from '../observability/types.js';
import { HttpTransport } from '../transport/http.js';
import type { ConfigSource, Transport } from '../transport/types.js';
import { Bucket } from './bucket.js';

/**
 * Builds a transport that reads its configuration from the client.
 */
export type TransportFactory = (source: ConfigSource) => Transport;

/**
 * Client construction options.
 */
export interface RiakClientOptions {
  /** Transport instance or factory (default: HttpTransport) */
  transport?: Transport | TransportFactory;
  /** Logger (default: no-op) */
  logger?: Logger;
}

const bucketListSchema = z.object({
  buckets: z.array(z.string()),
});

/**
 * Riak HTTP client.
 *
 * @example
 * ```typescript
 * const client = createClient({ host: 'riak.internal', port: 8098 });
 *
 * if (await client.isAlive()) {
 *   const buckets = await client.buckets();
 * }
 * ```
 */
export class RiakClient implements ConfigSource, JobContext {
  private readonly config: RiakConfig;
  private readonly transport: Transport;
  private readonly logger: Logger;

  /**
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  constructor(config: RiakConfig, options: RiakClientOptions = {}) {
    validateConfig(config);
    this.config = {
      ...config,
      tls: config.tls ? Object.freeze({ ...config.tls }) : undefined,
      auth: config.auth ? Object.freeze({ ...config.auth }) : undefined,
    };
    this.logger = options.logger ?? new NoopLogger();

    const transport = options.transport;
    if (transport === undefined) {
      this.transport = new HttpTransport(this, { logger: this.logger });
    } else if (typeof transport === 'function') {
      this.transport = transport(this);
    } else {
      this.transport = transport;
    }
  }

  /**
   * The live configuration. Nested TLS and auth settings are frozen copies.
   */
  getConfig(): Readonly<RiakConfig> {
    return this.config;
  }

  getTransport(): Transport {
    return this.transport;
  }

  getLogger(): Logger {
    return this.logger;
  }

  // ==========================================================================
  // Buckets
  // ==========================================================================

  /**
   * Get a proxy for a bucket. Never fails and never contacts the server.
   */
  bucket(name: string): Bucket {
    return new Bucket(this, name);
  }

  /**
   * List every bucket on the node.
   *
   * This is an expensive operation on the server side.
   *
   * @throws {TransportError} If the node is unreachable or answers with a status other than 200.
   * @throws {ProtocolError} If the body is not a bucket list.
   */
  async buckets(): Promise<Bucket[]> {
    const url = this.transport.buildRestPath(undefined, undefined, { buckets: 'true' });
    const response = await this.transport.httpRequest('GET', url);

    if (response.status !== 200) {
      throw TransportError.fromStatus(response.status, response.body, 'Bucket listing');
    }

    const parsed = bucketListSchema.safeParse(parseJsonBody(response.body, 'Bucket listing'));
    if (!parsed.success) {
      throw new ProtocolError('Bucket listing response has no "buckets" string array', {
        body: response.body.slice(0, 512),
      });
    }

    return parsed.data.buckets.map((name) => this.bucket(name));
  }

  /**
   * Check whether the node answers its ping endpoint.
   *
   * Never throws: any failure is logged and reported as false.
   */
  async isAlive(): Promise<boolean> {
    const url = this.transport.buildPingPath();
    try {
      const response = await this.transport.httpRequest('GET', url);
      return response.status === 200 && response.body === 'OK';
    } catch (error) {
      this.logger.warn(
        'Ping failed',
        createLogContext({
          operation: 'ping',
          url,
          error: error instanceof Error ? error : new Error(String(error)),
        })
      );
      return false;
    }
  }

  // ==========================================================================
  // Map/Reduce
  // ==========================================================================

  /**
   * Start an empty Map/Reduce job bound to this client.
   */
  mapReduce(): MapReduceJob {
    return new MapReduceJob(this);
  }

  /**
   * Start a job whose first phase is a map.
   */
  addMapPhase(params: MapPhaseParams): MapReduceJob {
    const { fn, ...options } = params;
    return this.mapReduce().map(fn, options);
  }

  /**
   * Start a job whose first phase is a reduce.
   */
  addReducePhase(params: ReducePhaseParams): MapReduceJob {
    const { fn, ...options } = params;
    return this.mapReduce().reduce(fn, options);
  }

  /**
   * Start a job whose first phase is a link walk.
   */
  addLinkPhase(params: LinkPhaseParams = {}): MapReduceJob {
    return this.mapReduce().link(params);
  }

  /**
   * Start a job over the results of a search query.
   */
  addSearchPhase(params: SearchPhaseParams): MapReduceJob {
    return this.mapReduce().setSearchQuery(params.bucket, params.query);
  }

  /**
   * Start a job over every key in a bucket.
   */
  addBucket(bucket: string): MapReduceJob {
    return this.mapReduce().addBucket(bucket);
  }

  /**
   * Start a job over one bucket/key pair.
   */
  addKey(bucket: string, key: string, keyData?: unknown): MapReduceJob {
    return this.mapReduce().addKey(bucket, key, keyData);
  }

  /**
   * Start a job over a secondary-index query.
   */
  addIndex(query: IndexQuery): MapReduceJob {
    return this.mapReduce().setIndexQuery(query);
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  getR(): number {
    return this.config.r;
  }

  /**
   * @throws {ConfigurationError} If the value is not a positive integer.
   */
  setR(r: number): this {
    this.config.r = validateQuorum('R', r);
    return this;
  }

  getW(): number {
    return this.config.w;
  }

  /**
   * @throws {ConfigurationError} If the value is not a positive integer.
   */
  setW(w: number): this {
    this.config.w = validateQuorum('W', w);
    return this;
  }

  getDW(): number {
    return this.config.dw;
  }

  /**
   * @throws {ConfigurationError} If the value is not a positive integer.
   */
  setDW(dw: number): this {
    this.config.dw = validateQuorum('DW', dw);
    return this;
  }

  getClientId(): string {
    return this.config.clientId;
  }

  /**
   * Change the X-Riak-ClientId sent with subsequent requests.
   * @throws {ConfigurationError} If the ID is empty.
   */
  setClientId(clientId: string): this {
    if (clientId.length === 0) {
      throw new ConfigurationError('Client ID cannot be empty');
    }
    this.config.clientId = clientId;
    return this;
  }

  /**
   * Release the transport's pooled connections.
   */
  async close(): Promise<void> {
    await this.transport.close();
  }
}

/**
 * Create a client from defaults overridden by a partial configuration.
 *
 * @throws {ConfigurationError} If the resulting configuration is invalid.
 */
export function createClient(config: Partial<RiakConfig> = {}, options?: RiakClientOptions): RiakClient {
  return new RiakClient(new RiakConfigBuilder().merge(config).build(), options);
}

/**
 * Create a client from RIAK_* environment variables, logging to the console
 * at the level named by RIAK_LOG_LEVEL.
 *
 * @throws {ConfigurationError} If a variable holds an invalid value.
 */
export function createClientFromEnv(env: NodeJS.ProcessEnv = process.env): RiakClient {
  const config = createConfigFromEnv(env).build();
  return new RiakClient(config, { logger: createLogger({ level: parseLogLevel(env.RIAK_LOG_LEVEL) }) });
}
