/**
 * Logging helper functions
 */

import type { LogLevel, LogLevels, FilterContext } from './types';

/**
 * Format log message with level tag
 *
 * Adds a prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "[INFO]     "
 * - WARNING: "[WARNING]  "
 * - CRITICAL: "[CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = '[DEBUG]    ';
  if (level === logLevels.INFO) tag = '[INFO]     ';
  if (level === logLevels.WARNING) tag = '[WARNING]  ';
  if (level === logLevels.CRITICAL) tag = '[CRITICAL] ';

  return tag + msg;
}

/**
 * Check if a message should reach a sink
 *
 * A message must meet both the logger's current threshold and the
 * sink's own minimum level.
 *
 * @param level - Level of the message
 * @param context - Logger and sink thresholds
 * @returns True if the sink should receive the message
 */
export function shouldLog(level: LogLevel, context: FilterContext): boolean {
  if (level < context.currentLevel) {
    return false;
  }
  return level >= context.sinkLevel;
}

/**
 * Render an unknown thrown value for a log line
 * @param err - Caught value
 * @returns "Name: message" for errors, String(err) otherwise
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.name + ': ' + err.message;
  }
  return String(err);
}
