import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  createConsoleLogger,
  withScope,
  isLevelEnabled,
  setLogger,
  getLogger,
  type Logger,
} from '../src/index.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('isLevelEnabled', () => {
  it('should pass messages at or above the threshold', () => {
    expect(isLevelEnabled('info', 'debug')).toBe(false);
    expect(isLevelEnabled('info', 'info')).toBe(true);
    expect(isLevelEnabled('info', 'error')).toBe(true);
    expect(isLevelEnabled('silent', 'error')).toBe(false);
  });
});

describe('createConsoleLogger', () => {
  it('should drop messages below its level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = createConsoleLogger({ level: 'warn' });
    logger.info('hidden');
    logger.warn('shown');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[inkpost] shown');
  });

  it('should pass context through when there is any', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createConsoleLogger({ scope: 'blog' });
    logger.error('failed', { userId: 3 });
    logger.error('empty context', {});

    expect(error.mock.calls).toEqual([['[blog] failed', { userId: 3 }], ['[blog] empty context']]);
  });

  it('should emit nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createConsoleLogger({ level: 'silent' }).error('never');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('withScope', () => {
  it('should prefix every message', () => {
    const base = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;

    const scoped = withScope(base, 'Database');
    scoped.info("Adding tag 'news'");
    scoped.debug('checking', { table: 'users' });

    expect(base.info).toHaveBeenCalledWith("Database: Adding tag 'news'", undefined);
    expect(base.debug).toHaveBeenCalledWith('Database: checking', { table: 'users' });
  });
});

describe('global logger', () => {
  it('should be replaceable', () => {
    const original = getLogger();
    const custom = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;

    setLogger(custom);
    try {
      getLogger().warn('through custom');
      expect(custom.warn).toHaveBeenCalledWith('through custom');
    } finally {
      setLogger(original);
    }
  });
});
