/**
 * Configuration types for the Riak client.
 * @module config
 */

import { randomInt } from 'node:crypto';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

/** Default Riak host. */
export const DEFAULT_HOST = '127.0.0.1';

/** Default Riak HTTP port. */
export const DEFAULT_PORT = 8098;

/** Default REST interface prefix. */
export const DEFAULT_PREFIX = 'riak';

/** Default Map/Reduce prefix. */
export const DEFAULT_MAPRED_PREFIX = 'mapred';

/** Default secondary-index prefix. */
export const DEFAULT_INDEX_PREFIX = 'buckets';

/** Default quorum value for R, W and DW. */
export const DEFAULT_QUORUM = 2;

/** Default request timeout in milliseconds (30 seconds). */
export const DEFAULT_TIMEOUT = 30000;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'riak-http-client/0.1.0';

/**
 * URL scheme used to reach the node.
 */
export type Scheme = 'http' | 'https';

/**
 * TLS client credentials. Paths are read when the first HTTPS request is made.
 */
export interface TlsConfig {
  /** Path to the PEM client certificate. */
  certPath?: string;
  /** Path to the PEM private key. */
  keyPath?: string;
  /** Passphrase for the private key. */
  passphrase?: string;
  /** Path to a PEM CA bundle used to verify the node. */
  caPath?: string;
}

/**
 * HTTP basic-auth credentials.
 */
export interface BasicAuthConfig {
  username: string;
  password: string;
}

/**
 * Riak client configuration.
 */
export interface RiakConfig {
  /** Hostname or IP address. */
  host: string;
  /** HTTP port. */
  port: number;
  /** REST interface prefix (e.g. "riak"). */
  prefix: string;
  /** Map/Reduce prefix (e.g. "mapred"). */
  mapReducePrefix: string;
  /** Secondary-index prefix (e.g. "buckets"). */
  indexPrefix: string;
  /** URL scheme. */
  scheme: Scheme;
  /** Client ID sent as X-Riak-ClientId. */
  clientId: string;
  /** Default read quorum. */
  r: number;
  /** Default write quorum. */
  w: number;
  /** Default durable-write quorum. */
  dw: number;
  /** Request timeout in milliseconds. */
  timeout: number;
  /** User-Agent header. */
  userAgent: string;
  /** TLS client credentials. */
  tls?: TlsConfig;
  /** Basic-auth credentials. */
  auth?: BasicAuthConfig;
}

const quorumSchema = z.number().int().positive();

/**
 * Zod schema for a complete configuration.
 */
export const RiakConfigSchema = z.object({
  host: z.string().min(1, 'Host cannot be empty'),
  port: z.number().int().min(1).max(65535),
  prefix: z.string().min(1, 'Prefix cannot be empty'),
  mapReducePrefix: z.string().min(1, 'Map/Reduce prefix cannot be empty'),
  indexPrefix: z.string().min(1, 'Index prefix cannot be empty'),
  scheme: z.enum(['http', 'https']),
  clientId: z.string().min(1, 'Client ID cannot be empty'),
  r: quorumSchema,
  w: quorumSchema,
  dw: quorumSchema,
  timeout: z.number().int().positive(),
  userAgent: z.string().min(1, 'User-Agent cannot be empty'),
  tls: z
    .object({
      certPath: z.string().min(1).optional(),
      keyPath: z.string().min(1).optional(),
      passphrase: z.string().optional(),
      caPath: z.string().min(1).optional(),
    })
    .optional(),
  auth: z
    .object({
      username: z.string().min(1),
      password: z.string(),
    })
    .optional(),
});

/**
 * Generates a random client ID.
 */
export function generateClientId(): string {
  return `node_${randomInt(0, 2 ** 31).toString(36)}`;
}

/**
 * Creates a default Riak configuration with a fresh client ID.
 */
export function createDefaultConfig(): RiakConfig {
  return {
    host: DEFAULT_HOST,
    port: DEFAULT_PORT,
    prefix: DEFAULT_PREFIX,
    mapReducePrefix: DEFAULT_MAPRED_PREFIX,
    indexPrefix: DEFAULT_INDEX_PREFIX,
    scheme: 'http',
    clientId: generateClientId(),
    r: DEFAULT_QUORUM,
    w: DEFAULT_QUORUM,
    dw: DEFAULT_QUORUM,
    timeout: DEFAULT_TIMEOUT,
    userAgent: DEFAULT_USER_AGENT,
  };
}

/**
 * Validates a Riak configuration.
 * @param config - The configuration to validate.
 * @throws {ConfigurationError} If the configuration is invalid.
 */
export function validateConfig(config: RiakConfig): void {
  const result = RiakConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid Riak configuration: ${issues.join('; ')}`, { issues });
  }

  if (config.tls && config.scheme !== 'https') {
    throw new ConfigurationError('TLS credentials require the https scheme');
  }
}

/**
 * Validates a single quorum value (R, W or DW).
 * @throws {ConfigurationError} If the value is not a positive integer.
 */
export function validateQuorum(name: string, value: number): number {
  if (!quorumSchema.safeParse(value).success) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`, { [name]: value });
  }
  return value;
}

/**
 * Builder for RiakConfig.
 */
export class RiakConfigBuilder {
  private config: RiakConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  /**
   * Sets the host.
   * @returns The builder instance for chaining.
   */
  host(host: string): this {
    this.config.host = host;
    return this;
  }

  /**
   * Sets the port.
   * @returns The builder instance for chaining.
   */
  port(port: number): this {
    this.config.port = port;
    return this;
  }

  /**
   * Sets the REST interface prefix. Leading and trailing slashes are dropped.
   * @returns The builder instance for chaining.
   */
  prefix(prefix: string): this {
    this.config.prefix = trimSlashes(prefix);
    return this;
  }

  /**
   * Sets the Map/Reduce prefix.
   * @returns The builder instance for chaining.
   */
  mapReducePrefix(prefix: string): this {
    this.config.mapReducePrefix = trimSlashes(prefix);
    return this;
  }

  /**
   * Sets the secondary-index prefix.
   * @returns The builder instance for chaining.
   */
  indexPrefix(prefix: string): this {
    this.config.indexPrefix = trimSlashes(prefix);
    return this;
  }

  /**
   * Sets the URL scheme.
   * @returns The builder instance for chaining.
   */
  scheme(scheme: Scheme): this {
    this.config.scheme = scheme;
    return this;
  }

  /**
   * Sets the client ID.
   * @returns The builder instance for chaining.
   */
  clientId(clientId: string): this {
    this.config.clientId = clientId;
    return this;
  }

  /**
   * Sets the default R, W and DW values in one call.
   * @returns The builder instance for chaining.
   */
  quorum(quorum: { r?: number; w?: number; dw?: number }): this {
    this.config.r = quorum.r ?? this.config.r;
    this.config.w = quorum.w ?? this.config.w;
    this.config.dw = quorum.dw ?? this.config.dw;
    return this;
  }

  /**
   * Sets the request timeout.
   * @param timeout - The timeout in milliseconds.
   * @returns The builder instance for chaining.
   */
  timeout(timeout: number): this {
    this.config.timeout = timeout;
    return this;
  }

  /**
   * Sets TLS client credentials and switches the scheme to https.
   * @returns The builder instance for chaining.
   */
  tls(tls: TlsConfig): this {
    this.config.tls = { ...tls };
    this.config.scheme = 'https';
    return this;
  }

  /**
   * Sets basic-auth credentials.
   * @returns The builder instance for chaining.
   */
  basicAuth(username: string, password: string): this {
    this.config.auth = { username, password };
    return this;
  }

  /**
   * Sets the User-Agent header.
   * @returns The builder instance for chaining.
   */
  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  /**
   * Applies a partial configuration on top of the current values.
   * @returns The builder instance for chaining.
   */
  merge(partial: Partial<RiakConfig>): this {
    const defined = Object.fromEntries(
      Object.entries(partial).filter(([, value]) => value !== undefined)
    );
    this.config = Object.assign({ ...this.config }, defined);
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  build(): RiakConfig {
    validateConfig(this.config);
    return {
      ...this.config,
      tls: this.config.tls ? { ...this.config.tls } : undefined,
      auth: this.config.auth ? { ...this.config.auth } : undefined,
    };
  }
}

/**
 * Creates a Riak configuration builder from environment variables.
 *
 * Environment variables:
 * - RIAK_HOST, RIAK_PORT, RIAK_SCHEME
 * - RIAK_PREFIX, RIAK_MAPRED_PREFIX, RIAK_INDEX_PREFIX
 * - RIAK_CLIENT_ID
 * - RIAK_R, RIAK_W, RIAK_DW
 * - RIAK_TIMEOUT_MS
 * - RIAK_USERNAME, RIAK_PASSWORD
 * - RIAK_TLS_CERT, RIAK_TLS_KEY, RIAK_TLS_PASSPHRASE, RIAK_TLS_CA
 *
 * Numeric variables that do not parse are reported when the builder is built.
 *
 * @param env - Environment to read (defaults to process.env).
 */
export function createConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RiakConfigBuilder {
  const builder = new RiakConfigBuilder();

  if (env.RIAK_HOST) builder.host(env.RIAK_HOST);
  if (env.RIAK_PORT) builder.port(parseNumber(env.RIAK_PORT));
  if (env.RIAK_PREFIX) builder.prefix(env.RIAK_PREFIX);
  if (env.RIAK_MAPRED_PREFIX) builder.mapReducePrefix(env.RIAK_MAPRED_PREFIX);
  if (env.RIAK_INDEX_PREFIX) builder.indexPrefix(env.RIAK_INDEX_PREFIX);
  if (env.RIAK_CLIENT_ID) builder.clientId(env.RIAK_CLIENT_ID);
  if (env.RIAK_TIMEOUT_MS) builder.timeout(parseNumber(env.RIAK_TIMEOUT_MS));
  if (env.RIAK_USER_AGENT) builder.userAgent(env.RIAK_USER_AGENT);

  builder.quorum({
    r: env.RIAK_R ? parseNumber(env.RIAK_R) : undefined,
    w: env.RIAK_W ? parseNumber(env.RIAK_W) : undefined,
    dw: env.RIAK_DW ? parseNumber(env.RIAK_DW) : undefined,
  });

  if (env.RIAK_USERNAME) {
    builder.basicAuth(env.RIAK_USERNAME, env.RIAK_PASSWORD ?? '');
  }

  if (env.RIAK_TLS_CERT || env.RIAK_TLS_KEY || env.RIAK_TLS_CA) {
    builder.tls({
      certPath: env.RIAK_TLS_CERT,
      keyPath: env.RIAK_TLS_KEY,
      passphrase: env.RIAK_TLS_PASSPHRASE,
      caPath: env.RIAK_TLS_CA,
    });
  }

  // An explicit scheme wins over the https implied by TLS settings.
  if (env.RIAK_SCHEME) {
    const scheme = env.RIAK_SCHEME.toLowerCase();
    if (scheme !== 'http' && scheme !== 'https') {
      throw new ConfigurationError(`RIAK_SCHEME must be http or https, got ${env.RIAK_SCHEME}`);
    }
    builder.scheme(scheme);
  }

  return builder;
}

function parseNumber(value: string): number {
  return Number(value.trim());
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

/**
 * Namespace for RiakConfig-related utilities.
 */
export namespace RiakConfig {
  /**
   * Creates a new configuration builder.
   */
  export function builder(): RiakConfigBuilder {
    return new RiakConfigBuilder();
  }

  /**
   * Creates a default configuration.
   */
  export function defaultConfig(): RiakConfig {
    return createDefaultConfig();
  }

  /**
   * Creates a configuration builder from environment variables.
   */
  export function fromEnv(env?: NodeJS.ProcessEnv): RiakConfigBuilder {
    return createConfigFromEnv(env);
  }
}
