export type { LogLevel, Logger, LogRecord } from './logger.js';
export {
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  sanitizeContext,
  createConsoleLogger,
  createNoopLogger,
} from './logger.js';

export type { HttpStatsSnapshot, HttpStatsSink } from './http-stats.js';
export { HttpStats } from './http-stats.js';
