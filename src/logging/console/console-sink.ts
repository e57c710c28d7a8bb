/**
 * Console output sink
 *
 * Writes formatted log lines through an injectable console API:
 * - WARNING and above are routed to console.warn (stderr)
 * - Optional ISO-8601 timestamp prefix
 */

import type { ConsoleAPI, ConsoleSinkConfig, LogLevel, LogSink } from '../types';

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration
 * @param clock - Returns the current time in milliseconds
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { timestamps: true, warnLevel: 2 });
 * consoleSink.write('[INFO]     Hello world', 1);
 * ```
 */
export function createConsoleSink(
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig,
  clock: () => number = Date.now
): LogSink {
  function write(formattedMessage: string, level: LogLevel): void {
    const line = config.timestamps
      ? new Date(clock()).toISOString() + ' ' + formattedMessage
      : formattedMessage;

    if (level >= config.warnLevel) {
      consoleApi.warn(line);
    } else {
      consoleApi.log(line);
    }
  }

  return {
    write: write
  };
}
