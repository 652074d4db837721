import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { Logger, LogLevel } from './logger.js';

describe('Logger', () => {
  let logger: Logger;
  let consoleSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    Logger.resetInstance();
    logger = Logger.getInstance();
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  describe('getInstance', () => {
    it('should return singleton instance', () => {
      const instance1 = Logger.getInstance();
      const instance2 = Logger.getInstance();

      expect(instance1).toBe(instance2);
    });

    it('should start from defaults after reset', () => {
      logger.setLogLevel(LogLevel.ERROR);
      Logger.resetInstance();

      expect(Logger.getInstance().getLogLevel()).toBe(LogLevel.INFO);
    });
  });

  describe('setLogLevel', () => {
    it('should filter messages below the level', () => {
      logger.setLogLevel(LogLevel.ERROR);

      logger.debug('Debug message');
      logger.info('Info message');
      logger.warn('Warn message');
      logger.error('Error message');

      expect(consoleSpy).toHaveBeenCalledTimes(1);
      expect(consoleSpy).toHaveBeenCalledWith(
        expect.stringContaining('ERROR: Error message')
      );
    });

    it('should respect log level hierarchy', () => {
      logger.setLogLevel(LogLevel.WARN);

      logger.debug('Debug message');
      logger.info('Info message');
      logger.warn('Warn message');
      logger.error('Error message');

      expect(consoleSpy).toHaveBeenCalledTimes(2);
      expect(logger.isLevelEnabled(LogLevel.INFO)).toBe(false);
      expect(logger.isLevelEnabled(LogLevel.WARN)).toBe(true);
    });
  });

  describe('context', () => {
    it('should append context as JSON', () => {
      logger.setLogLevel(LogLevel.DEBUG);
      logger.debug('Transition', { from: 'IDLE', to: 'TX' });

      expect(consoleSpy).toHaveBeenCalledWith(
        expect.stringContaining('DEBUG: Transition {"from":"IDLE","to":"TX"}')
      );
    });
  });

  describe('log buffer', () => {
    it('should keep entries until cleared', () => {
      logger.info('first');
      logger.warn('second', { band: 1 });

      const logs = logger.getLogs();
      expect(logs).toHaveLength(2);
      expect(logs[1].message).toBe('second');
      expect(logs[1].context).toEqual({ band: 1 });

      logger.clearLogs();
      expect(logger.getLogs()).toHaveLength(0);
    });

    it('should return a copy of the buffer', () => {
      logger.info('entry');
      const logs = logger.getLogs();
      logs.pop();

      expect(logger.getLogs()).toHaveLength(1);
    });

    it('should filter entries by level', () => {
      logger.info('info');
      logger.error('error one');
      logger.error('error two');

      expect(
        logger.getLogsByLevel(LogLevel.ERROR).map(entry => entry.message)
      ).toEqual(['error one', 'error two']);
    });

    it('should drop the oldest entries beyond the buffer size', () => {
      logger.setMaxEntries(2);
      logger.info('a');
      logger.info('b');
      logger.info('c');

      expect(logger.getLogs().map(entry => entry.message)).toEqual(['b', 'c']);
    });

    it('should reject an invalid buffer size', () => {
      expect(() => logger.setMaxEntries(0)).toThrow('Invalid log buffer size: 0');
    });
  });
});
