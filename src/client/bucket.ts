/**
 * Bucket proxy.
 * @module client/bucket
 */

import { validateQuorum } from '../config.js';
import { MapReduceJob } from '../mapreduce/job.js';
import type { RiakClient } from './client.js';

/**
 * A named bucket on the node the client talks to.
 *
 * Buckets are created on demand and never checked against the server.
 * Quorum values set here override the client's defaults for this bucket
 * only; a value passed to a getter wins over both.
 */
export class Bucket {
  readonly name: string;
  readonly client: RiakClient;

  private r: number | undefined;
  private w: number | undefined;
  private dw: number | undefined;

  constructor(client: RiakClient, name: string) {
    this.client = client;
    this.name = name;
  }

  getName(): string {
    return this.name;
  }

  getClient(): RiakClient {
    return this.client;
  }

  // ==========================================================================
  // Quorum
  // ==========================================================================

  /**
   * Resolve the read quorum: the given value, else the bucket's, else the client's.
   * @throws {ConfigurationError} If the given value is not a positive integer.
   */
  getR(r?: number): number {
    return r !== undefined ? validateQuorum('R', r) : this.r ?? this.client.getR();
  }

  /**
   * Resolve the write quorum: the given value, else the bucket's, else the client's.
   * @throws {ConfigurationError} If the given value is not a positive integer.
   */
  getW(w?: number): number {
    return w !== undefined ? validateQuorum('W', w) : this.w ?? this.client.getW();
  }

  /**
   * Resolve the durable-write quorum: the given value, else the bucket's, else the client's.
   * @throws {ConfigurationError} If the given value is not a positive integer.
   */
  getDW(dw?: number): number {
    return dw !== undefined ? validateQuorum('DW', dw) : this.dw ?? this.client.getDW();
  }

  /**
   * @throws {ConfigurationError} If the value is not a positive integer.
   */
  setR(r: number): this {
    this.r = validateQuorum('R', r);
    return this;
  }

  /**
   * @throws {ConfigurationError} If the value is not a positive integer.
   */
  setW(w: number): this {
    this.w = validateQuorum('W', w);
    return this;
  }

  /**
   * @throws {ConfigurationError} If the value is not a positive integer.
   */
  setDW(dw: number): this {
    this.dw = validateQuorum('DW', dw);
    return this;
  }

  // ==========================================================================
  // Map/Reduce
  // ==========================================================================

  /**
   * A job over every key in this bucket.
   */
  mapReduce(): MapReduceJob {
    return new MapReduceJob(this.client).addBucket(this.name);
  }

  /**
   * A job over the objects of this bucket matching a search query.
   */
  search(query: string): MapReduceJob {
    return new MapReduceJob(this.client).setSearchQuery(this.name, query);
  }

  /**
   * A job over the objects of this bucket matching a secondary-index query.
   * Without `end` the index must equal `start`.
   */
  indexQuery(index: string, start: string | number, end?: string | number): MapReduceJob {
    const job = new MapReduceJob(this.client);
    return end === undefined
      ? job.setIndexQuery({ bucket: this.name, index, key: start })
      : job.setIndexQuery({ bucket: this.name, index, start, end });
  }
}
