export { LogLevel } from './types.js';
export type { LogEntry, Logger } from './types.js';
export {
  NoopLogger,
  ConsoleLogger,
  createLogger,
  createLogContext,
  parseLogLevel,
} from './logger.js';
export type { ConsoleLoggerOptions } from './logger.js';
