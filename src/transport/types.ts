/**
 * Transport Layer Types and Interfaces
 *
 * Defines the raw HTTP exchange used by the client and Map/Reduce jobs.
 * @module transport/types
 */

import type { RiakConfig } from '../config.js';

// ============================================================================
// HTTP Request/Response Types
// ============================================================================

/**
 * HTTP methods supported by the transport layer.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'HEAD';

/**
 * Query parameters appended to a REST path.
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Raw response from the node. The status code is not interpreted.
 */
export interface RawResponse {
  /** HTTP status code */
  status: number;
  /** Response headers, lower-cased names */
  headers: Record<string, string>;
  /** Response body text */
  body: string;
}

/**
 * Per-request options.
 */
export interface RequestOptions {
  /** Request timeout in milliseconds (overrides the configured default) */
  timeout?: number;
}

/**
 * Supplies the current configuration. The client implements this so that
 * setter changes (such as a new client ID) reach the transport.
 */
export interface ConfigSource {
  getConfig(): Readonly<RiakConfig>;
}

// ============================================================================
// Transport Interface
// ============================================================================

/**
 * Transport interface for talking to a Riak node's REST endpoint.
 */
export interface Transport {
  /**
   * Build a REST path for a bucket and/or key.
   *
   * @example
   * buildRestPath('users', 'alice') // "http://127.0.0.1:8098/riak/users/alice"
   */
  buildRestPath(bucket?: string, key?: string, params?: QueryParams): string;

  /**
   * Build the Map/Reduce endpoint URL.
   */
  buildMapReducePath(): string;

  /**
   * Build the liveness endpoint URL.
   */
  buildPingPath(): string;

  /**
   * Build a secondary-index query URL.
   */
  buildIndexPath(bucket: string, index: string, start: string | number, end?: string | number): string;

  /**
   * Perform one HTTP exchange.
   *
   * @throws {TransportError} On connection failure, timeout or TLS failure.
   */
  httpRequest(
    method: HttpMethod,
    url: string,
    body?: string,
    headers?: Record<string, string>,
    options?: RequestOptions
  ): Promise<RawResponse>;

  /**
   * Release pooled connections.
   */
  close(): Promise<void>;
}

// ============================================================================
// URL Building
// ============================================================================

/**
 * Build the scheme://host:port root for a configuration.
 */
export function buildRootUrl(config: Readonly<RiakConfig>): string {
  return `${config.scheme}://${config.host}:${config.port}`;
}

/**
 * Append encoded query parameters to a URL. Undefined values are skipped.
 */
export function appendQuery(url: string, params?: QueryParams): string {
  if (!params) {
    return url;
  }

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      searchParams.append(key, String(value));
    }
  }

  const queryString = searchParams.toString();
  return queryString ? `${url}?${queryString}` : url;
}

/**
 * REST path construction shared by every transport.
 */
export function restPath(
  config: Readonly<RiakConfig>,
  bucket?: string,
  key?: string,
  params?: QueryParams
): string {
  let path = `${buildRootUrl(config)}/${config.prefix}`;
  if (bucket !== undefined) {
    path += `/${encodeURIComponent(bucket)}`;
    if (key !== undefined) {
      path += `/${encodeURIComponent(key)}`;
    }
  }
  return appendQuery(path, params);
}

/**
 * Secondary-index path construction shared by every transport.
 */
export function indexPath(
  config: Readonly<RiakConfig>,
  bucket: string,
  index: string,
  start: string | number,
  end?: string | number
): string {
  let path =
    `${buildRootUrl(config)}/${config.indexPrefix}/${encodeURIComponent(bucket)}` +
    `/index/${encodeURIComponent(index)}/${encodeURIComponent(String(start))}`;
  if (end !== undefined) {
    path += `/${encodeURIComponent(String(end))}`;
  }
  return path;
}
