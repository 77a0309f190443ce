/**
 * Logger implementations for the Riak client.
 *
 * Provides NoopLogger and ConsoleLogger with structured logging and auto-redaction.
 */

import { LogLevel } from './types.js';
import type { LogEntry, Logger } from './types.js';

// ============================================================================
// NoopLogger Implementation
// ============================================================================

/**
 * No-op logger implementation
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  info(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  warn(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  error(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  setLevel(_level: LogLevel): void {
    // No-op
  }
}

// ============================================================================
// ConsoleLogger Implementation
// ============================================================================

/**
 * Console logger options
 */
export interface ConsoleLoggerOptions {
  /** Logger name/component */
  name?: string;
  /** Log level */
  level?: LogLevel;
  /** Use JSON output instead of formatted text */
  json?: boolean;
  /** Custom sensitive field names to redact */
  sensitiveFields?: string[];
}

/**
 * Console logger implementation with structured logging and auto-redaction
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel = LogLevel.Info;
  private readonly name: string;
  private readonly json: boolean;
  private readonly sensitiveFields: Set<string>;

  constructor(options?: ConsoleLoggerOptions) {
    this.name = options?.name ?? 'riak';
    this.json = options?.json ?? false;

    if (options?.level !== undefined) {
      this.level = options.level;
    }

    const defaultSensitive = [
      'authorization',
      'password',
      'passphrase',
      'secret',
      'token',
      'userpwd',
    ];

    this.sensitiveFields = new Set([
      ...defaultSensitive,
      ...(options?.sensitiveFields ?? []),
    ]);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const safeContext = context ? this.redactSensitive(context) : undefined;
    const logFn = this.getLogFunction(level);

    if (this.json) {
      const logEntry: LogEntry & { component: string } = {
        level,
        message,
        timestamp: Date.now(),
        context: safeContext,
        component: this.name,
      };
      logFn(JSON.stringify(logEntry));
      return;
    }

    const timestamp = new Date().toISOString();
    const levelStr = LogLevel[level].toUpperCase();
    const line = `${timestamp} ${levelStr} [${this.name}] ${message}`;

    if (safeContext && Object.keys(safeContext).length > 0) {
      logFn(line, safeContext);
    } else {
      logFn(line);
    }
  }

  private getLogFunction(level: LogLevel): (...args: unknown[]) => void {
    switch (level) {
      case LogLevel.Error:
        return console.error;
      case LogLevel.Warn:
        return console.warn;
      case LogLevel.Debug:
        return console.debug;
      default:
        return console.log;
    }
  }

  /**
   * Replace values of sensitive keys, recursing into nested objects and arrays.
   */
  redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      if (this.isSensitiveKey(key)) {
        result[key] = '[REDACTED]';
      } else if (Array.isArray(value)) {
        result[key] = value.map((item) => (isRecord(item) ? this.redactSensitive(item) : item));
      } else if (isRecord(value)) {
        result[key] = this.redactSensitive(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  private isSensitiveKey(key: string): boolean {
    const lowerKey = key.toLowerCase();
    for (const sensitive of this.sensitiveFields) {
      if (lowerKey.includes(sensitive.toLowerCase())) {
        return true;
      }
    }
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse a level name such as "debug" or "WARN"; unknown names fall back to Info.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value ?? '').toLowerCase()) {
    case 'debug':
      return LogLevel.Debug;
    case 'warn':
    case 'warning':
      return LogLevel.Warn;
    case 'error':
      return LogLevel.Error;
    default:
      return LogLevel.Info;
  }
}

/**
 * Create a logger based on configuration
 */
export function createLogger(options?: {
  enabled?: boolean;
  type?: 'console' | 'noop';
  level?: LogLevel;
  json?: boolean;
  name?: string;
}): Logger {
  if (options?.enabled === false || options?.type === 'noop') {
    return new NoopLogger();
  }

  return new ConsoleLogger({
    name: options?.name ?? 'riak',
    level: options?.level ?? parseLogLevel(process.env.RIAK_LOG_LEVEL),
    json: options?.json ?? false,
  });
}

/**
 * Create a structured log context for Riak operations
 */
export function createLogContext(params: {
  operation?: string;
  bucket?: string;
  durationMs?: number;
  status?: number;
  error?: Error;
  [key: string]: unknown;
}): Record<string, unknown> {
  const context: Record<string, unknown> = {
    component: 'riak',
  };

  for (const [key, value] of Object.entries(params)) {
    if (key === 'error' || value === undefined) continue;
    context[key] = value;
  }

  if (params.error) {
    context.error = {
      name: params.error.name,
      message: params.error.message,
    };
  }

  return context;
}
