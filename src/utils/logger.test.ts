import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { Logger, LogLevel, parseLogLevel } from './logger.js';

describe('Logger', () => {
  let logger: Logger;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logger = new Logger({ useColors: false });
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  it('should log info messages', () => {
    logger.info('info message');
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('ℹ️ info message'));
  });

  it('should log error messages to stderr', () => {
    logger.error('error message');
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('❌ error message'));
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it('should filter messages based on level', () => {
    logger.setLevel(LogLevel.WARNING);

    logger.debug('debug');
    logger.info('info');
    logger.success('success');
    logger.warning('warning');
    logger.error('error');

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('⚠️ warning'));
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('❌ error'));
  });

  it('should use colors when enabled', () => {
    logger = new Logger({ useColors: true });
    logger.info('message');
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('\x1b[34mmessage\x1b[0m'));
  });

  it('should not emit escape codes when colors are disabled', () => {
    logger.info('message');
    const lastCall = consoleLogSpy.mock.lastCall?.[0];
    expect(lastCall).not.toContain('\x1b[');
  });

  it('should prefix messages with a MM-DD HH:mm:ss timestamp', () => {
    logger.success('done');
    expect(consoleLogSpy.mock.lastCall?.[0]).toMatch(/^\d{2}-\d{2} \d{2}:\d{2}:\d{2} ✅ done$/);
  });
});

describe('parseLogLevel', () => {
  it('should map config values onto log levels', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('info')).toBe(LogLevel.INFO);
    expect(parseLogLevel('warning')).toBe(LogLevel.WARNING);
    expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
  });
});
