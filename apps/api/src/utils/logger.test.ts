import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { formatMessage, logger } from './logger';

describe('logger', () => {
  const originalLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  describe('formatMessage', () => {
    it('prefixes the timestamp and padded level', () => {
      expect(formatMessage('warn', 'hello')).toBe('\x1b[33m[2026-01-02T03:04:05.000Z] [WARN ]\x1b[0m hello ');
    });

    it('keeps error name and message in the args', () => {
      const line = formatMessage('error', 'failed:', new Error('boom'), { playerId: 'p1' });

      expect(line).toBe(
        '\x1b[31m[2026-01-02T03:04:05.000Z] [ERROR]\x1b[0m failed: [{"name":"Error","message":"boom"},{"playerId":"p1"}]'
      );
    });
  });

  describe('LOG_LEVEL', () => {
    it('drops messages below the configured level', () => {
      process.env.LOG_LEVEL = 'warn';
      const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      logger.info('quiet');
      logger.warn('loud');

      expect(info).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('falls back to info for an unknown level', () => {
      process.env.LOG_LEVEL = 'verbose';
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

      logger.debug('hidden');
      logger.info('shown');

      expect(debug).not.toHaveBeenCalled();
      expect(info).toHaveBeenCalledTimes(1);
    });
  });
});
