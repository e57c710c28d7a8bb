/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces
 * - Filter context
 */

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Log level (matches CONFIG.LOG_LEVELS values)
 */
export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | CRITICAL

/**
 * Log level constants structure
 * Passed to pure functions instead of importing CONFIG
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Main logger interface
 * Provides leveled logging methods and runtime configuration
 */
export interface Logger {
  /** Log at specified level */
  log(level: LogLevel, msg: string): void;
  /** Log DEBUG level message */
  debug(msg: string): void;
  /** Log INFO level message */
  info(msg: string): void;
  /** Log WARNING level message */
  warning(msg: string): void;
  /** Log CRITICAL level message */
  critical(msg: string): void;
  /** Update log level at runtime */
  setLevel(newLevel: LogLevel): void;
  /** Get current log level */
  getLevel(): LogLevel;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Current log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL) */
  level: LogLevel;
}

/**
 * Sink with its minimum log level
 * Logger filters messages before sending to each sink
 */
export interface SinkWithLevel {
  sink: LogSink;
  minLevel: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  sinks: SinkWithLevel[];
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 * Level filtering happens in logger before write() is called; the level is
 * passed along so sinks can route warnings separately.
 */
export interface LogSink {
  write(formattedMessage: string, level: LogLevel): void;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Prefix each line with an ISO-8601 timestamp */
  timestamps: boolean;
  /** Messages at or above this level go to console.warn */
  warnLevel: LogLevel;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
}

// ═══════════════════════════════════════════════════════════════
// FILTER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Context for log filtering decisions
 */
export interface FilterContext {
  currentLevel: LogLevel;
  sinkLevel: LogLevel;
}
