import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  configureLogger,
  createLogger,
  formatLogLine,
  getLogLevel,
  isLogLevel,
} from './logger.js';

describe('logger', () => {
  afterEach(() => {
    configureLogger({ level: 'info' });
    vi.restoreAllMocks();
  });

  it('formats a line with timestamp, padded level and extra args', () => {
    const line = formatLogLine('warn', 'hello', ['x', { a: 1 }], new Date('2026-01-02T03:04:05.000Z'));

    expect(line).toBe('[2026-01-02T03:04:05.000Z] WARN  hello x {"a":1}');
  });

  it('recognises log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });

  it('writes prefixed messages at or above the configured level to stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    configureLogger({ level: 'warn' });
    const logger = createLogger('test');

    logger.info('hidden');
    logger.error('shown');

    expect(getLogLevel()).toBe('warn');
    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0]?.[0])).toMatch(/ ERROR \[test\] shown\n$/);
  });
});
