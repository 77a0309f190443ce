/**
 * Transport module exports.
 * @module transport
 */

export type {
  ConfigSource,
  HttpMethod,
  QueryParams,
  RawResponse,
  RequestOptions,
  Transport,
} from './types.js';
export { appendQuery, buildRootUrl, indexPath, restPath } from './types.js';
export {
  BaseTransport,
  HttpTransport,
  createHttpTransport,
  loadTlsOptions,
} from './http.js';
export type { HttpTransportOptions } from './http.js';
