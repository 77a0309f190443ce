/**
 * Error types for the Riak client.
 * @module errors
 */

/**
 * Error category for classifying Riak client errors.
 */
export type ErrorCategory = 'configuration' | 'transport' | 'protocol' | 'invalid_state';

/**
 * Why a transport exchange failed.
 */
export type TransportFailureReason = 'connection' | 'timeout' | 'tls' | 'status' | 'malformed_response';

/**
 * Base error class for all Riak client errors.
 */
export abstract class RiakError extends Error {
  /** The category of error for classification and handling. */
  public readonly category: ErrorCategory;
  /** HTTP status code associated with the error, if applicable. */
  public readonly statusCode?: number;
  /** Additional error details. */
  public readonly details?: Record<string, unknown>;

  constructor(options: {
    category: ErrorCategory;
    message: string;
    statusCode?: number;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'RiakError';
    this.category = options.category;
    this.statusCode = options.statusCode;
    this.details = options.details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }

  /**
   * Returns a human-readable string representation of the error.
   */
  toString(): string {
    let result = `${this.name}: ${this.message}`;
    if (this.statusCode !== undefined) {
      result += ` (HTTP ${this.statusCode})`;
    }
    if (this.cause instanceof Error) {
      result += `\nCaused by: ${this.cause.message}`;
    }
    return result;
  }
}

/**
 * Thrown when the client is misconfigured or a setter receives an invalid value.
 */
export class ConfigurationError extends RiakError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ category: 'configuration', message, details });
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when an HTTP exchange with the Riak node fails: the connection
 * could not be made, timed out, failed the TLS handshake, or the node
 * answered with a status the operation cannot accept.
 */
export class TransportError extends RiakError {
  public readonly reason: TransportFailureReason;

  constructor(
    message: string,
    options: {
      reason: TransportFailureReason;
      statusCode?: number;
      details?: Record<string, unknown>;
      cause?: Error;
    },
    category: ErrorCategory = 'transport'
  ) {
    super({
      category,
      message,
      statusCode: options.statusCode,
      details: options.details,
      cause: options.cause,
    });
    this.name = 'TransportError';
    this.reason = options.reason;
  }

  /**
   * Creates an error for a response whose status the caller does not accept.
   */
  static fromStatus(status: number, body: string, operation: string): TransportError {
    return new TransportError(`${operation} failed with HTTP ${status}`, {
      reason: 'status',
      statusCode: status,
      details: { body: body.slice(0, 512) },
    });
  }

  /**
   * Creates a timeout error.
   */
  static timeout(url: string, timeoutMs: number): TransportError {
    return new TransportError(`Request to ${url} timed out after ${timeoutMs}ms`, {
      reason: 'timeout',
      details: { url, timeoutMs },
    });
  }
}

/**
 * Thrown when the node answers with a body that is not JSON or does not
 * have the expected shape.
 */
export class ProtocolError extends TransportError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, { reason: 'malformed_response', details, cause }, 'protocol');
    this.name = 'ProtocolError';
  }
}

/**
 * Thrown when a Map/Reduce job is used in a way its current state forbids.
 */
export class InvalidStateError extends RiakError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ category: 'invalid_state', message, details });
    this.name = 'InvalidStateError';
  }
}

/**
 * Type guard to check if an error is a RiakError.
 */
export function isRiakError(error: unknown): error is RiakError {
  return error instanceof RiakError;
}

/**
 * Type guard for TransportError (including ProtocolError).
 */
export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

/**
 * Type guard for ProtocolError.
 */
export function isProtocolError(error: unknown): error is ProtocolError {
  return error instanceof ProtocolError;
}

/**
 * Type guard for InvalidStateError.
 */
export function isInvalidStateError(error: unknown): error is InvalidStateError {
  return error instanceof InvalidStateError;
}
