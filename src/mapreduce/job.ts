/**
 * Map/Reduce job builder.
 *
 * A job accumulates an ordered list of phases and one input specification,
 * then submits them as a single POST to the node's Map/Reduce endpoint.
 *
 * @module mapreduce/job
 */

import { ConfigurationError, InvalidStateError, TransportError } from '../errors.js';
import type { Logger } from '../observability/types.js';
import type { Transport } from '../transport/types.js';
import { serializePhases } from './phases.js';
import { parseMapReduceResponse } from './results.js';
import type {
  FunctionPhaseOptions,
  IndexQuery,
  JobInput,
  JobState,
  KeyFilter,
  KeyInput,
  LinkPhaseOptions,
  MapReducePhase,
  MapReduceRequest,
  PhaseFunctionLike,
  PhaseResult,
  SerializedInputs,
} from './types.js';

/**
 * Extra time the transport waits beyond the job's own server-side timeout,
 * so the node's timeout answer arrives before the client gives up.
 */
export const MAPRED_TIMEOUT_GRACE = 1000;

/**
 * What a job needs from its client.
 */
export interface JobContext {
  getTransport(): Transport;
  getLogger(): Logger;
}

/**
 * Map/Reduce job builder.
 *
 * @example
 * ```typescript
 * const results = await client
 *   .addBucket('orders')
 *   .map('Riak.mapValuesJson')
 *   .reduce(['riak_kv_mapreduce', 'reduce_sum'])
 *   .run();
 * ```
 */
export class MapReduceJob {
  private readonly context: JobContext;
  private readonly phases: MapReducePhase[] = [];
  private input: JobInput | undefined;
  private keyFilters: KeyFilter[] = [];
  private finalized = false;

  constructor(context: JobContext) {
    this.context = context;
  }

  /**
   * empty until a phase is added, accumulating afterwards, finalized once run.
   */
  get state(): JobState {
    if (this.finalized) return 'finalized';
    return this.phases.length > 0 ? 'accumulating' : 'empty';
  }

  getPhases(): readonly MapReducePhase[] {
    return this.phases;
  }

  getInput(): JobInput | undefined {
    return this.input;
  }

  getKeyFilters(): readonly KeyFilter[] {
    return this.keyFilters;
  }

  // ==========================================================================
  // Phases
  // ==========================================================================

  /**
   * Append a phase.
   * @throws {InvalidStateError} If the job has been run.
   */
  addPhase(phase: MapReducePhase): this {
    this.assertMutable('add a phase');
    this.phases.push({ ...phase });
    return this;
  }

  map(fn: PhaseFunctionLike, options: FunctionPhaseOptions = {}): this {
    return this.addPhase({ kind: 'map', fn, ...options });
  }

  reduce(fn: PhaseFunctionLike, options: FunctionPhaseOptions = {}): this {
    return this.addPhase({ kind: 'reduce', fn, ...options });
  }

  link(options: LinkPhaseOptions = {}): this {
    return this.addPhase({ kind: 'link', ...options });
  }

  // ==========================================================================
  // Inputs
  // ==========================================================================

  /**
   * Use every key of a bucket as input. Replaces an earlier bucket input.
   */
  addBucket(bucket: string): this {
    this.assertMutable('add a bucket input');
    this.setInput({ kind: 'bucket', bucket });
    return this;
  }

  /**
   * Add one bucket/key pair, with optional key data, to the input list.
   */
  addKey(bucket: string, key: string, keyData?: unknown): this {
    return this.addKeys([{ bucket, key, keyData }]);
  }

  /**
   * Add several bucket/key pairs to the input list.
   */
  addKeys(keys: KeyInput[]): this {
    this.assertMutable('add key inputs');
    const existing = this.input?.kind === 'keys' ? this.input.keys : [];
    this.setInput({ kind: 'keys', keys: [...existing, ...keys.map((key) => ({ ...key }))] });
    return this;
  }

  /**
   * Use the objects matching a search query as input.
   */
  setSearchQuery(bucket: string, query: string): this {
    this.assertMutable('set a search query');
    this.setInput({ kind: 'search', bucket, query });
    return this;
  }

  /**
   * Use the objects matching a secondary-index query as input.
   */
  setIndexQuery(query: IndexQuery): this {
    this.assertMutable('set an index query');
    this.setInput({ kind: 'index', query: { ...query } });
    return this;
  }

  // ==========================================================================
  // Key filters
  // ==========================================================================

  /**
   * Append key filters. Only valid with a bucket input.
   */
  keyFilter(...filters: KeyFilter[]): this {
    this.assertKeyFiltersAllowed();
    this.keyFilters = [...this.keyFilters, ...filters];
    return this;
  }

  /**
   * Combine the existing filters and the given ones with "and".
   */
  keyFilterAnd(...filters: KeyFilter[]): this {
    return this.keyFilterOperator('and', filters);
  }

  /**
   * Combine the existing filters and the given ones with "or".
   */
  keyFilterOr(...filters: KeyFilter[]): this {
    return this.keyFilterOperator('or', filters);
  }

  private keyFilterOperator(operator: 'and' | 'or', filters: KeyFilter[]): this {
    this.assertKeyFiltersAllowed();
    this.keyFilters =
      this.keyFilters.length > 0 ? [[operator, this.keyFilters, filters]] : [...filters];
    return this;
  }

  // ==========================================================================
  // Serialization & execution
  // ==========================================================================

  /**
   * Build the request document.
   *
   * @throws {InvalidStateError} If the job has no phases or no input.
   */
  toRequest(timeout?: number): MapReduceRequest {
    if (this.phases.length === 0) {
      throw new InvalidStateError('Map/Reduce job has no phases');
    }
    if (!this.input) {
      throw new InvalidStateError('Map/Reduce job has no inputs');
    }

    const request: MapReduceRequest = {
      inputs: this.serializeInputs(this.input),
      query: serializePhases(this.phases),
    };
    if (timeout !== undefined) {
      request.timeout = timeout;
    }
    return request;
  }

  /**
   * Submit the job and parse one result per kept phase.
   *
   * @param timeout - Server-side job timeout in milliseconds.
   * @throws {InvalidStateError} If the job has no phases or no input.
   * @throws {ConfigurationError} If the timeout is invalid or the job is not JSON-encodable.
   * @throws {TransportError} On network failure or a non-2xx status.
   * @throws {ProtocolError} If the response is not the expected JSON.
   */
  async run(timeout?: number): Promise<PhaseResult[]> {
    if (timeout !== undefined && !(Number.isInteger(timeout) && timeout > 0)) {
      throw new ConfigurationError(`Map/Reduce timeout must be a positive integer, got ${timeout}`);
    }

    const body = this.serializeRequest(this.toRequest(timeout));
    this.finalized = true;

    const transport = this.context.getTransport();
    const logger = this.context.getLogger();
    const url = transport.buildMapReducePath();

    logger.debug('Submitting Map/Reduce job', {
      url,
      phases: this.phases.length,
      input: this.input?.kind,
    });

    const response = await transport.httpRequest('POST', url, body, undefined, {
      timeout: timeout !== undefined ? timeout + MAPRED_TIMEOUT_GRACE : undefined,
    });

    if (response.status < 200 || response.status >= 300) {
      throw TransportError.fromStatus(response.status, response.body, 'Map/Reduce');
    }

    return parseMapReduceResponse(response.body, this.phases);
  }

  /**
   * @throws {ConfigurationError} If a phase argument or key data cannot be encoded as JSON.
   */
  private serializeRequest(request: MapReduceRequest): string {
    try {
      return JSON.stringify(request);
    } catch (error) {
      throw new ConfigurationError('Map/Reduce job cannot be encoded as JSON', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private serializeInputs(input: JobInput): SerializedInputs {
    switch (input.kind) {
      case 'bucket':
        return this.keyFilters.length > 0
          ? { bucket: input.bucket, key_filters: this.keyFilters }
          : input.bucket;
      case 'keys':
        return input.keys.map(({ bucket, key, keyData }): [string, string] | [string, string, unknown] =>
          keyData === undefined ? [bucket, key] : [bucket, key, keyData]
        );
      case 'search':
        return {
          module: 'riak_search',
          function: 'mapred_search',
          arg: [input.bucket, input.query],
        };
      case 'index': {
        const { query } = input;
        return 'key' in query
          ? { bucket: query.bucket, index: query.index, key: query.key }
          : { bucket: query.bucket, index: query.index, start: query.start, end: query.end };
      }
    }
  }

  /**
   * Inputs of different kinds cannot be mixed on one job.
   */
  private setInput(next: JobInput): void {
    if (this.input && this.input.kind !== next.kind) {
      throw new InvalidStateError(
        `Cannot add ${next.kind} input: job already has ${this.input.kind} input`,
        { current: this.input.kind, requested: next.kind }
      );
    }
    this.input = next;
  }

  private assertKeyFiltersAllowed(): void {
    this.assertMutable('add key filters');
    if (this.input?.kind !== 'bucket') {
      throw new InvalidStateError('Key filters can only be used with a bucket input');
    }
  }

  private assertMutable(action: string): void {
    if (this.finalized) {
      throw new InvalidStateError(`Cannot ${action}: Map/Reduce job has already been run`);
    }
  }
}
