/**
 * Tests for loggers and redaction.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ConsoleLogger,
  InMemoryLogger,
  LogLevel,
  NoopLogger,
  parseLogLevel,
  redactSensitive,
} from '../observability/index.js';

describe('parseLogLevel', () => {
  it('should read level names in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.Debug);
    expect(parseLogLevel(' warning ')).toBe(LogLevel.Warn);
    expect(parseLogLevel('error')).toBe(LogLevel.Error);
    expect(parseLogLevel('verbose')).toBeUndefined();
  });
});

describe('redactSensitive', () => {
  it('should redact sensitive keys at any depth', () => {
    expect(
      redactSensitive({ url: 'http://api.test', Authorization: 'Basic abc', nested: { password: 'test-secret' } })
    ).toEqual({ url: 'http://api.test', Authorization: '[REDACTED]', nested: { password: '[REDACTED]' } });
  });
});

describe('ConsoleLogger', () => {
  it('should drop request traffic at the default level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = new ConsoleLogger();

    logger.debug('Sending request', { method: 'GET' });

    expect(debug).not.toHaveBeenCalled();
  });

  it('should write debug lines when enabled', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: LogLevel.Debug });

    logger.debug('Sending request');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(String(debug.mock.calls[0]?.[0])).toMatch(/^\[.+\] DEBUG Sending request$/);
  });

  it('should prefix the component and redact the context', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ConsoleLogger().child({ component: 'HttpClient' });

    logger.warn('Request failed', { url: 'http://api.test', token: 'test-secret' });

    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0]?.[0])).toMatch(
      /^\[.+\] WARN HttpClient: Request failed \{"url":"http:\/\/api\.test","token":"\[REDACTED\]"\}$/
    );
  });
});

describe('InMemoryLogger', () => {
  it('should share entries with its children', () => {
    const logger = new InMemoryLogger();
    logger.child({ component: 'HttpClient' }).error('from child');
    logger.warn('from parent');

    expect(logger.entries.map((entry) => entry.message)).toEqual(['from child', 'from parent']);
    expect(logger.entries[0]?.context).toEqual({ component: 'HttpClient' });
    expect(logger.messages(LogLevel.Error)).toEqual(['from child']);
  });

  it('should clear entries for every child', () => {
    const logger = new InMemoryLogger();
    const child = logger.child({});
    child.warn('before');

    logger.clear();
    child.warn('after');

    expect(logger.messages(LogLevel.Warn)).toEqual(['after']);
  });
});

describe('NoopLogger', () => {
  it('should return itself as a child', () => {
    const logger = new NoopLogger();

    expect(logger.child()).toBe(logger);
  });
});
