/**
 * Mock transport for exercising the client without a Riak node.
 *
 * Builds URLs exactly like HttpTransport, records every request and answers
 * from a queue of scripted responses.
 */

import type { RiakConfig } from '../config.js';
import { createDefaultConfig } from '../config.js';
import { TransportError } from '../errors.js';
import { BaseTransport } from '../transport/http.js';
import type { ConfigSource, HttpMethod, RawResponse, RequestOptions } from '../transport/types.js';

/**
 * A request seen by the mock transport.
 */
export interface RecordedRequest {
  method: HttpMethod;
  url: string;
  body?: string;
  headers: Record<string, string>;
  timeout?: number;
}

/**
 * A scripted answer: a response, or an error to throw.
 */
export type ScriptedReply = RawResponse | { error: Error };

/**
 * Scripted transport used in tests.
 */
export class MockTransport extends BaseTransport {
  public readonly requests: RecordedRequest[] = [];
  private readonly replies: ScriptedReply[] = [];
  private closed = false;

  constructor(source?: ConfigSource) {
    super(source ?? staticConfig(createDefaultConfig()));
  }

  /**
   * Queue a response with the given status and body.
   */
  reply(status: number, body: string, headers: Record<string, string> = {}): this {
    this.replies.push({ status, body, headers });
    return this;
  }

  /**
   * Queue a JSON response.
   */
  replyJson(status: number, value: unknown): this {
    return this.reply(status, JSON.stringify(value), { 'content-type': 'application/json' });
  }

  /**
   * Queue an error.
   */
  fail(error: Error): this {
    this.replies.push({ error });
    return this;
  }

  /**
   * Queue a connection failure.
   */
  failConnection(message = 'connect ECONNREFUSED'): this {
    return this.fail(new TransportError(message, { reason: 'connection' }));
  }

  async httpRequest(
    method: HttpMethod,
    url: string,
    body?: string,
    headers?: Record<string, string>,
    options?: RequestOptions
  ): Promise<RawResponse> {
    this.requests.push({
      method,
      url,
      body,
      headers: this.buildHeaders(headers, body !== undefined),
      timeout: options?.timeout,
    });

    const next = this.replies.shift();
    if (!next) {
      throw new TransportError(`No scripted reply for ${method} ${url}`, { reason: 'connection' });
    }
    if ('error' in next) {
      throw next.error;
    }
    return next;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * Whether close() has been called.
   */
  isClosed(): boolean {
    return this.closed;
  }

  /**
   * The most recent request, if any.
   */
  lastRequest(): RecordedRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  /**
   * Number of scripted replies not yet consumed.
   */
  pendingReplies(): number {
    return this.replies.length;
  }
}

/**
 * Wrap a fixed configuration as a ConfigSource.
 */
export function staticConfig(config: RiakConfig): ConfigSource {
  return { getConfig: () => config };
}
