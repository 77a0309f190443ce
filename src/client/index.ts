/**
 * Client module exports.
 * @module client
 */

export { RiakClient, createClient, createClientFromEnv } from './client.js';
export type { RiakClientOptions, TransportFactory } from './client.js';
export { Bucket } from './bucket.js';
