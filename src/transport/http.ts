/**
 * HTTP Transport Implementation
 *
 * Path building shared by all transports, and the undici-based transport
 * that talks to a live node.
 * @module transport/http
 */

import { readFileSync } from 'node:fs';
import { Agent, fetch } from 'undici';
import type { RiakConfig, TlsConfig } from '../config.js';
import { TransportError } from '../errors.js';
import { NoopLogger } from '../observability/logger.js';
import type { Logger } from '../observability/types.js';
import type {
  ConfigSource,
  HttpMethod,
  QueryParams,
  RawResponse,
  RequestOptions,
  Transport,
} from './types.js';
import { buildRootUrl, indexPath, restPath } from './types.js';

// ============================================================================
// Base Transport
// ============================================================================

/**
 * Abstract base class for transports.
 *
 * Provides URL construction from the live configuration; subclasses
 * implement the exchange itself.
 */
export abstract class BaseTransport implements Transport {
  protected readonly source: ConfigSource;

  constructor(source: ConfigSource) {
    this.source = source;
  }

  protected get config(): Readonly<RiakConfig> {
    return this.source.getConfig();
  }

  buildRestPath(bucket?: string, key?: string, params?: QueryParams): string {
    return restPath(this.config, bucket, key, params);
  }

  buildMapReducePath(): string {
    return `${buildRootUrl(this.config)}/${this.config.mapReducePrefix}`;
  }

  buildPingPath(): string {
    return `${buildRootUrl(this.config)}/ping`;
  }

  buildIndexPath(bucket: string, index: string, start: string | number, end?: string | number): string {
    return indexPath(this.config, bucket, index, start, end);
  }

  /**
   * Headers sent with every request. Later entries override earlier ones.
   */
  protected buildHeaders(
    customHeaders: Record<string, string> | undefined,
    hasBody: boolean
  ): Record<string, string> {
    const config = this.config;
    const headers: Record<string, string> = {
      'User-Agent': config.userAgent,
      'X-Riak-ClientId': config.clientId,
    };

    if (config.auth) {
      const encoded = Buffer.from(`${config.auth.username}:${config.auth.password}`).toString('base64');
      headers['Authorization'] = `Basic ${encoded}`;
    }

    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }

    return { ...headers, ...customHeaders };
  }

  abstract httpRequest(
    method: HttpMethod,
    url: string,
    body?: string,
    headers?: Record<string, string>,
    options?: RequestOptions
  ): Promise<RawResponse>;

  abstract close(): Promise<void>;
}

// ============================================================================
// Undici Transport
// ============================================================================

/**
 * Transport options.
 */
export interface HttpTransportOptions {
  /** Logger for request tracing (default: no-op) */
  logger?: Logger;
}

const TLS_ERROR_CODE = /^(ERR_TLS|ERR_SSL|CERT_|UNABLE_TO_|DEPTH_ZERO|SELF_SIGNED|ERR_OSSL)/;

/**
 * Transport that performs real HTTP exchanges with undici.
 *
 * - AbortController for timeout handling
 * - TLS client certificates through an undici Agent
 * - Basic auth and X-Riak-ClientId on every request
 * - No status interpretation and no retries
 */
export class HttpTransport extends BaseTransport {
  private readonly logger: Logger;
  private dispatcher: Agent | undefined;

  constructor(source: ConfigSource, options: HttpTransportOptions = {}) {
    super(source);
    this.logger = options.logger ?? new NoopLogger();
  }

  async httpRequest(
    method: HttpMethod,
    url: string,
    body?: string,
    headers?: Record<string, string>,
    options?: RequestOptions
  ): Promise<RawResponse> {
    const timeout = options?.timeout ?? this.config.timeout;
    const requestHeaders = this.buildHeaders(headers, body !== undefined);
    const dispatcher = url.startsWith('https:') ? this.getDispatcher() : undefined;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const startedAt = Date.now();

    try {
      const response = await fetch(url, {
        method,
        headers: requestHeaders,
        body,
        signal: controller.signal,
        dispatcher,
      });

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key.toLowerCase()] = value;
      });
      const text = method === 'HEAD' ? '' : await response.text();

      this.logger.debug('HTTP exchange', {
        method,
        url,
        status: response.status,
        durationMs: Date.now() - startedAt,
      });

      return { status: response.status, headers: responseHeaders, body: text };
    } catch (error) {
      throw this.mapError(error, method, url, timeout);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async close(): Promise<void> {
    if (this.dispatcher) {
      const dispatcher = this.dispatcher;
      this.dispatcher = undefined;
      await dispatcher.close();
    }
  }

  /**
   * Lazily create the agent carrying TLS client credentials.
   */
  private getDispatcher(): Agent | undefined {
    const tls = this.config.tls;
    if (!tls) {
      return undefined;
    }
    if (!this.dispatcher) {
      this.dispatcher = new Agent({ connect: loadTlsOptions(tls) });
    }
    return this.dispatcher;
  }

  private mapError(error: unknown, method: HttpMethod, url: string, timeout: number): TransportError {
    if (error instanceof TransportError) {
      return error;
    }

    if (error instanceof Error && error.name === 'AbortError') {
      this.logger.warn('HTTP request timed out', { method, url, timeoutMs: timeout });
      return TransportError.timeout(url, timeout);
    }

    const cause = error instanceof Error ? error : new Error(String(error));
    const code = errorCode(cause);
    const reason = code !== undefined && TLS_ERROR_CODE.test(code) ? 'tls' : 'connection';

    this.logger.warn('HTTP request failed', { method, url, reason, code });
    return new TransportError(`${method} ${url} failed: ${describe(cause)}`, {
      reason,
      details: { url, method, code },
      cause,
    });
  }
}

/**
 * Read the PEM files named by the TLS configuration.
 *
 * @throws {TransportError} If a file cannot be read.
 */
export function loadTlsOptions(tls: TlsConfig): {
  cert?: Buffer;
  key?: Buffer;
  ca?: Buffer;
  passphrase?: string;
} {
  const read = (path: string | undefined): Buffer | undefined => {
    if (path === undefined) return undefined;
    try {
      return readFileSync(path);
    } catch (error) {
      throw new TransportError(`Unable to read TLS file ${path}`, {
        reason: 'tls',
        details: { path },
        cause: error instanceof Error ? error : undefined,
      });
    }
  };

  return {
    cert: read(tls.certPath),
    key: read(tls.keyPath),
    ca: read(tls.caPath),
    passphrase: tls.passphrase,
  };
}

/**
 * undici reports the system error code on the cause of its "fetch failed" TypeError.
 */
function errorCode(error: Error): string | undefined {
  const candidates: unknown[] = [error.cause, error];
  for (const candidate of candidates) {
    if (
      typeof candidate === 'object' &&
      candidate !== null &&
      'code' in candidate &&
      typeof candidate.code === 'string'
    ) {
      return candidate.code;
    }
  }
  return undefined;
}

function describe(error: Error): string {
  return error.cause instanceof Error ? `${error.message} (${error.cause.message})` : error.message;
}

/**
 * Create a new HttpTransport instance.
 */
export function createHttpTransport(source: ConfigSource, options?: HttpTransportOptions): HttpTransport {
  return new HttpTransport(source, options);
}
