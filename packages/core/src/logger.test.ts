import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, LogLevel, parseLogLevel } from './logger';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes to stderr with level prefixes', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger(LogLevel.DEBUG);

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(spy.mock.calls.map(call => call[0])).toEqual(['debug: d', 'i', 'warning: w', 'error: e']);
  });

  it('drops messages below its level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger(LogLevel.WARN);

    logger.info('hidden');
    logger.warn('shown');
    logger.setLevel(LogLevel.SILENT);
    logger.error('hidden too');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(logger.getLevel()).toBe(LogLevel.SILENT);
  });
});

describe('parseLogLevel', () => {
  it('accepts level names case-insensitively', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(' silent ')).toBe(LogLevel.SILENT);
    expect(parseLogLevel('loud')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
