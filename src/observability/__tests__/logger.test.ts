/**
 * Tests for the observability loggers
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TransportError } from '../../errors.js';
import {
  ConsoleLogger,
  LogLevel,
  NoopLogger,
  createLogContext,
  createLogger,
  parseLogLevel,
} from '../index.js';

describe('Observability', () => {
  describe('ConsoleLogger', () => {
    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-01-02T03:04:05.000Z'));
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should write formatted text lines', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const logger = new ConsoleLogger();

      logger.info('Client created');

      expect(log).toHaveBeenCalledWith('2024-01-02T03:04:05.000Z INFO [riak] Client created');
    });

    it('should pass redacted context as a second argument', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const logger = new ConsoleLogger({ name: 'riak-test' });

      logger.warn('Ping failed', { url: 'http://127.0.0.1:8098/ping', password: 'test-secret' });

      expect(warn).toHaveBeenCalledWith('2024-01-02T03:04:05.000Z WARN [riak-test] Ping failed', {
        url: 'http://127.0.0.1:8098/ping',
        password: '[REDACTED]',
      });
    });

    it('should skip messages below the level', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      const logger = new ConsoleLogger({ level: LogLevel.Warn });

      logger.debug('hidden');
      logger.info('hidden');

      expect(debug).not.toHaveBeenCalled();
      expect(log).not.toHaveBeenCalled();
    });

    it('should honour setLevel', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      const logger = new ConsoleLogger();

      logger.debug('hidden');
      logger.setLevel(LogLevel.Debug);
      logger.debug('HTTP exchange');

      expect(debug).toHaveBeenCalledTimes(1);
      expect(debug).toHaveBeenCalledWith('2024-01-02T03:04:05.000Z DEBUG [riak] HTTP exchange');
    });

    it('should write JSON entries', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const logger = new ConsoleLogger({ json: true });

      logger.error('Map/Reduce failed', { status: 500, Authorization: 'Basic abc' });

      expect(error).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(error.mock.calls[0]?.[0]))).toEqual({
        level: LogLevel.Error,
        message: 'Map/Reduce failed',
        timestamp: new Date('2024-01-02T03:04:05.000Z').getTime(),
        context: { status: 500, Authorization: '[REDACTED]' },
        component: 'riak',
      });
    });
  });

  describe('redactSensitive', () => {
    it('should redact nested keys and array entries', () => {
      const logger = new ConsoleLogger({ sensitiveFields: ['clientId'] });

      expect(
        logger.redactSensitive({
          auth: { Password: 'test-secret', username: 'test-user' },
          files: [{ tlsPassphrase: 'test-secret' }, 'ca.pem'],
          clientId: 'node_abc',
        })
      ).toEqual({
        auth: { Password: '[REDACTED]', username: 'test-user' },
        files: [{ tlsPassphrase: '[REDACTED]' }, 'ca.pem'],
        clientId: '[REDACTED]',
      });
    });
  });

  describe('parseLogLevel', () => {
    it('should map level names', () => {
      expect(parseLogLevel('DEBUG')).toBe(LogLevel.Debug);
      expect(parseLogLevel('warning')).toBe(LogLevel.Warn);
      expect(parseLogLevel('error')).toBe(LogLevel.Error);
      expect(parseLogLevel('verbose')).toBe(LogLevel.Info);
      expect(parseLogLevel(undefined)).toBe(LogLevel.Info);
    });
  });

  describe('createLogger', () => {
    it('should return a no-op logger when disabled', () => {
      expect(createLogger({ enabled: false })).toBeInstanceOf(NoopLogger);
      expect(createLogger({ type: 'noop' })).toBeInstanceOf(NoopLogger);
    });

    it('should return a console logger by default', () => {
      expect(createLogger({ level: LogLevel.Error })).toBeInstanceOf(ConsoleLogger);
    });
  });

  describe('createLogContext', () => {
    it('should drop undefined values and summarize errors', () => {
      const context = createLogContext({
        operation: 'ping',
        bucket: undefined,
        status: 503,
        error: new TransportError('connect ECONNREFUSED', { reason: 'connection' }),
      });

      expect(context).toEqual({
        component: 'riak',
        operation: 'ping',
        status: 503,
        error: { name: 'TransportError', message: 'connect ECONNREFUSED' },
      });
    });
  });
});
