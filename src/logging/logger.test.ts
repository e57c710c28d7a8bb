/**
 * Unit tests for logger coordinator
 */

import { createLogger, createSilentLogger } from './logger';
import type { LogLevels, LogSink } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

describe('createLogger', () => {
  let sink: LogSink & { write: ReturnType<typeof vi.fn> };

  beforeEach(() => {
    sink = { write: vi.fn() };
  });

  describe('log level methods', () => {
    test('should log debug messages when level is DEBUG', () => {
      const logger = createLogger({ level: LOG_LEVELS.DEBUG }, { sinks: [{ sink, minLevel: LOG_LEVELS.DEBUG }] }, LOG_LEVELS);

      logger.debug('test debug');

      expect(sink.write).toHaveBeenCalledWith('[DEBUG]    test debug', 0);
    });

    test('should tag each level', () => {
      const logger = createLogger({ level: LOG_LEVELS.DEBUG }, { sinks: [{ sink, minLevel: LOG_LEVELS.DEBUG }] }, LOG_LEVELS);

      logger.info('i');
      logger.warning('w');
      logger.critical('c');

      expect(sink.write).toHaveBeenNthCalledWith(1, '[INFO]     i', 1);
      expect(sink.write).toHaveBeenNthCalledWith(2, '[WARNING]  w', 2);
      expect(sink.write).toHaveBeenNthCalledWith(3, '[CRITICAL] c', 3);
    });

    test('should log via generic log method', () => {
      const logger = createLogger({ level: LOG_LEVELS.INFO }, { sinks: [{ sink, minLevel: LOG_LEVELS.INFO }] }, LOG_LEVELS);

      logger.log(LOG_LEVELS.WARNING, 'generic log');

      expect(sink.write).toHaveBeenCalledWith('[WARNING]  generic log', 2);
    });
  });

  describe('level filtering', () => {
    test('should not log debug when level is INFO', () => {
      const logger = createLogger({ level: LOG_LEVELS.INFO }, { sinks: [{ sink, minLevel: LOG_LEVELS.DEBUG }] }, LOG_LEVELS);

      logger.debug('hidden');

      expect(sink.write).not.toHaveBeenCalled();
    });

    test('should respect the sink minimum level', () => {
      const quiet: LogSink & { write: ReturnType<typeof vi.fn> } = { write: vi.fn() };
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG },
        { sinks: [{ sink, minLevel: LOG_LEVELS.DEBUG }, { sink: quiet, minLevel: LOG_LEVELS.WARNING }] },
        LOG_LEVELS
      );

      logger.info('only first');
      logger.warning('both');

      expect(sink.write).toHaveBeenCalledTimes(2);
      expect(quiet.write).toHaveBeenCalledTimes(1);
      expect(quiet.write).toHaveBeenCalledWith('[WARNING]  both', 2);
    });

    test('should apply runtime level changes', () => {
      const logger = createLogger({ level: LOG_LEVELS.DEBUG }, { sinks: [{ sink, minLevel: LOG_LEVELS.DEBUG }] }, LOG_LEVELS);

      logger.setLevel(LOG_LEVELS.CRITICAL);
      logger.warning('dropped');

      expect(logger.getLevel()).toBe(3);
      expect(sink.write).not.toHaveBeenCalled();
    });
  });

  describe('sink failures', () => {
    test('should keep writing to remaining sinks when one throws', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const broken: LogSink = { write: () => { throw new Error('disk full'); } };
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG },
        { sinks: [{ sink: broken, minLevel: LOG_LEVELS.DEBUG }, { sink, minLevel: LOG_LEVELS.DEBUG }] },
        LOG_LEVELS
      );

      logger.info('still delivered');

      expect(sink.write).toHaveBeenCalledWith('[INFO]     still delivered', 1);
      expect(warnSpy).toHaveBeenCalledWith('Logger sink error: Error: disk full');
    });
  });

  describe('createSilentLogger', () => {
    test('should accept every call without output', () => {
      const logger = createSilentLogger(LOG_LEVELS);

      expect(() => logger.critical('nothing')).not.toThrow();
      expect(logger.getLevel()).toBe(3);
    });
  });
});
