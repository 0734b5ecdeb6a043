import { afterEach, describe, it, expect, vi } from 'vitest';
import { ConsoleLogger, NoopLogger, createLogger, isLogLevel, logError } from './logging.js';
import type { Logger } from './logging.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print level, message and context', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new ConsoleLogger('info').info('Upload completed', { key: 'a.txt', status: 200 });

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0][0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] Upload completed \{"key":"a.txt","status":200\}$/
    );
  });

  it('should drop messages below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const logger = new ConsoleLogger('warn');
    logger.debug('hidden');
    logger.error('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe('createLogger', () => {
  it('should return a no-op logger without a level', () => {
    expect(createLogger()).toBeInstanceOf(NoopLogger);
    expect(createLogger('debug')).toBeInstanceOf(ConsoleLogger);
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('trace')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

describe('logError', () => {
  it('should log the error shape with context', () => {
    const error = vi.fn();
    const logger: Logger = { error, warn: vi.fn(), info: vi.fn(), debug: vi.fn(), trace: vi.fn() };

    logError(logger, 'Upload', new RangeError('bad length'), { key: 'a.txt' });

    expect(error).toHaveBeenCalledWith('Upload failed', {
      key: 'a.txt',
      errorName: 'RangeError',
      errorMessage: 'bad length',
    });
  });
});
