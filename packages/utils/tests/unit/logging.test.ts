import { describe, it, expect, afterEach, vi } from 'vitest';
import { Logger, getLogLevel, resolveLogLevel, setLogLevel } from '../../src/logger.js';
import { LogHelpers, createPackageLogger } from '../../src/logging/index.js';

describe('createPackageLogger', () => {
  it('returns one logger per package name', () => {
    const first = createPackageLogger('@modelvault/test-a');
    const again = createPackageLogger('@modelvault/test-a');
    const other = createPackageLogger('@modelvault/test-b');

    expect(again).toBe(first);
    expect(other).not.toBe(first);
  });
});

describe('log levels', () => {
  afterEach(() => {
    setLogLevel(resolveLogLevel());
  });

  it('starts from LOG_LEVEL when winston knows it', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'warn' })).toBe('warn');
  });

  it('falls back to the default for levels winston does not know', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'trace' })).toBe('debug');
    expect(resolveLogLevel({ LOG_LEVEL: 'trace', NODE_ENV: 'production' })).toBe('info');
  });

  it('switches the active level', () => {
    setLogLevel('warn');

    expect(getLogLevel()).toBe('warn');
  });
});

describe('LogHelpers.apiResponse', () => {
  it('logs failures at warn and successes at debug', () => {
    const target = new Logger('@modelvault/test');
    const warn = vi.spyOn(target, 'warn').mockImplementation(() => undefined);
    const debug = vi.spyOn(target, 'debug').mockImplementation(() => undefined);

    LogHelpers.apiResponse(target, 'GET', '/models/9', 404, 3);
    LogHelpers.apiResponse(target, 'GET', '/models', 200, 1);

    expect(warn).toHaveBeenCalledWith('API Response', { method: 'GET', url: '/models/9', statusCode: 404, duration: 3 });
    expect(debug).toHaveBeenCalledWith('API Response', { method: 'GET', url: '/models', statusCode: 200, duration: 1 });
  });
});
