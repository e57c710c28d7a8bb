/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger, createSilentLogger)
 * - Console sink (createConsoleSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, describeError } from './helpers';
export { createConsoleSink } from './console';
export { createLogger, createSilentLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  FilterContext
} from './types';
