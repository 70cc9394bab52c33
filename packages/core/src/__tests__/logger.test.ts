import { afterEach, describe, expect, it, vi } from 'vitest';
import { SourceInvalidError } from '../errors/observe-error.js';
import {
  type LogEntry,
  ObserveLogger,
  createLogger,
  isDebugMode,
  setDebugMode,
} from '../observability/logger.js';

describe('ObserveLogger', () => {
  afterEach(() => {
    setDebugMode(false);
  });

  describe('creation', () => {
    it('should create via factory', () => {
      expect(createLogger({ module: 'test' })).toBeInstanceOf(ObserveLogger);
    });

    it('should prefix child modules', () => {
      const child = createLogger({ module: 'parent' }).child('child');
      expect(child.module).toBe('parent:child');
    });
  });

  describe('log levels', () => {
    it('should call handler for info and above at default level', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
      logger.debug('debug msg');
      logger.info('info msg');
      logger.warn('warn msg');
      logger.error('error msg');
      expect(entries.map((e) => e.level)).toEqual(['info', 'warn', 'error']);
    });

    it('should include debug when level is debug', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'debug', handler: (e) => entries.push(e) });
      logger.debug('debug msg');
      expect(entries).toHaveLength(1);
      expect(logger.isEnabled('debug')).toBe(true);
    });

    it('should only emit errors at error level', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'error', handler: (e) => entries.push(e) });
      logger.info('info');
      logger.warn('warn');
      logger.error('error');
      expect(entries).toHaveLength(1);
    });
  });

  describe('debug mode', () => {
    it('should enable global debug mode', () => {
      setDebugMode(true);
      expect(isDebugMode()).toBe(true);
    });

    it('should override level when debug mode is on', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'error', handler: (e) => entries.push(e) });
      setDebugMode(true);
      logger.debug('should appear');
      expect(entries).toHaveLength(1);
    });
  });

  describe('error logging', () => {
    it('should include error details and the error code', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
      logger.error('failed', new SourceInvalidError('fake', 'nope'), { extra: 'data' });

      expect(entries).toHaveLength(1);
      expect(entries[0]?.code).toBe('OBSERVE_S100');
      expect(entries[0]?.context?.['extra']).toBe('data');
      expect(entries[0]?.context?.['error']).toMatchObject({
        message: 'Source cannot be observed by "fake": nope',
      });
    });

    it('should omit the code for plain errors', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
      logger.error('failed', new Error('plain'));
      expect(entries[0]?.code).toBeUndefined();
    });
  });

  describe('JSON output', () => {
    it('should output JSON when configured', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const logger = createLogger({ module: 'test', json: true });
      logger.info('json test');
      expect(spy).toHaveBeenCalledTimes(1);
      const output = String(spy.mock.calls[0]?.[0]);
      const parsed: unknown = JSON.parse(output);
      expect(parsed).toMatchObject({ message: 'json test', module: 'test', level: 'info' });
      spy.mockRestore();
    });

    it('should stay silent without a handler or JSON output', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      createLogger({ module: 'test' }).info('quiet');
      expect(spy).not.toHaveBeenCalled();
      spy.mockRestore();
    });
  });
});
