import { describe, expect, it } from 'vitest';
import { createLogger, isEnvironment, isLogLevel, type LoggerConfig } from '../src/index.js';
import { createMockLogger } from '../src/mock.js';

function capture(config: LoggerConfig = {}) {
  const lines: string[] = [];
  const logger = createLogger({ ...config, sink: (line) => lines.push(line) });
  const entries = () => lines.map((line) => JSON.parse(line) as Record<string, unknown>);
  return { logger, lines, entries };
}

describe('logger', () => {
  describe('log levels', () => {
    it('production skips debug and info', () => {
      const { logger, lines } = capture();

      logger.debug('debug_event');
      logger.info('info_event');

      expect(lines).toHaveLength(0);
    });

    it('production keeps warnings and errors', () => {
      const { logger, entries } = capture({ environment: 'production' });

      logger.warn('warn_event');
      logger.error('error_event');
      logger.fatal('fatal_event');

      expect(entries().map((e) => e.level)).toEqual(['warn', 'error', 'fatal']);
    });

    it('development skips debug only', () => {
      const { logger, entries } = capture({ environment: 'development' });

      logger.debug('debug_event');
      logger.info('info_event');

      expect(entries().map((e) => e.event_type)).toEqual(['info_event']);
    });

    it('test logs everything', () => {
      const { logger, lines } = capture({ environment: 'test' });

      logger.debug('debug_event');

      expect(lines).toHaveLength(1);
    });

    it('minLevel overrides the environment', () => {
      const { logger, entries } = capture({ environment: 'production', minLevel: 'debug' });

      logger.debug('debug_event', { foo: 'bar' });

      expect(entries()[0]).toMatchObject({
        level: 'debug',
        event_type: 'debug_event',
        metadata: { foo: 'bar' },
      });
    });
  });

  describe('entries', () => {
    it('writes one JSON object per line with an ISO timestamp', () => {
      const { logger, entries } = capture({ environment: 'test' });

      logger.info('compiled', { instructions: 3 });

      const [entry] = entries();
      expect(Object.keys(entry).sort()).toEqual(['event_type', 'level', 'metadata', 'timestamp']);
      expect(new Date(String(entry.timestamp)).toISOString()).toBe(entry.timestamp);
    });

    it('flattens errors without stack traces in production', () => {
      const { logger, entries } = capture({ environment: 'production' });

      logger.error('failed', { error: new TypeError('bad input') });

      expect(entries()[0].metadata).toEqual({ error: { name: 'TypeError', message: 'bad input' } });
    });

    it('includes stack traces outside production', () => {
      const { logger, entries } = capture({ environment: 'development' });

      logger.error('failed', { error: new Error('boom') });

      const metadata = entries()[0].metadata as { error: { stack?: string } };
      expect(metadata.error.stack).toContain('boom');
    });
  });

  describe('child loggers', () => {
    it('merge parent metadata', () => {
      const { logger, entries } = capture({ environment: 'test' });

      logger.child({ command: 'exprcc' }).child({ stage: 'lexer' }).info('event', { extra: 1 });

      expect(entries()[0].metadata).toEqual({ command: 'exprcc', stage: 'lexer', extra: 1 });
    });

    it('inherit level and sink', () => {
      const { logger, lines } = capture({ environment: 'production' });

      const child = logger.child({ command: 'exprcc' });
      child.info('skipped');
      child.warn('kept');

      expect(lines).toHaveLength(1);
    });
  });

  describe('guards', () => {
    it('recognises log levels', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('verbose')).toBe(false);
    });

    it('recognises environments without inherited keys', () => {
      expect(isEnvironment('test')).toBe(true);
      expect(isEnvironment('staging')).toBe(false);
      expect(isEnvironment('toString')).toBe(false);
    });
  });
});

describe('createMockLogger', () => {
  it('records calls', () => {
    const logger = createMockLogger();

    logger.info('event', { a: 1 });

    expect(logger.info).toHaveBeenCalledWith('event', { a: 1 });
  });

  it('returns mock children', () => {
    const logger = createMockLogger();

    const child = logger.child({ a: 1 });
    child.warn('event');

    expect(logger.child).toHaveBeenCalledWith({ a: 1 });
    expect(child.warn).toHaveBeenCalledWith('event');
  });
});
