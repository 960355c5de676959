import { describe, it, expect } from 'vitest';
import { Logger, LogLevel, parseLogLevel } from './logger.js';

function capture(level: LogLevel): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new Logger({ level, write: line => lines.push(line) }), lines };
}

describe('Logger', () => {
  it('should drop messages below the configured level', () => {
    const { logger, lines } = capture(LogLevel.WARN);

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('also shown', { code: 2 });

    expect(lines).toEqual([
      '[hooktask] [WARN] shown',
      '[hooktask] [ERROR] also shown {"code":2}'
    ]);
  });

  it('should log nothing when silent', () => {
    const { logger, lines } = capture(LogLevel.SILENT);
    logger.error('boom');
    expect(lines).toEqual([]);
  });

  it('should change level at runtime', () => {
    const { logger, lines } = capture(LogLevel.WARN);
    logger.setLevel(LogLevel.DEBUG);
    logger.debug('now shown');
    expect(logger.getLevel()).toBe(LogLevel.DEBUG);
    expect(lines).toEqual(['[hooktask] [DEBUG] now shown']);
  });

  it('should parse level names', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(' WARN ')).toBe(LogLevel.WARN);
    expect(parseLogLevel('silent')).toBe(LogLevel.SILENT);
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
