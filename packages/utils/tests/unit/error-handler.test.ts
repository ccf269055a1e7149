import { describe, it, expect, vi, beforeEach } from 'vitest';
import { handleError } from '../../src/error-handler.js';
import { ConfigurationError, ValidationError } from '../../src/errors.js';
import { logger } from '../../src/logger.js';

vi.mock('../../src/logger.js', () => ({
  logger: {
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('handleError', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('logs operational errors as warnings and keeps their status', () => {
    const error = new ValidationError('name must not be empty', { field: 'name' });

    const result = handleError(error, { url: '/models' });

    expect(result).toEqual({
      handled: true,
      message: 'name must not be empty',
      code: 'VALIDATION_ERROR',
      statusCode: 422,
    });
    expect(logger.warn).toHaveBeenCalledWith(
      'Operational error occurred',
      expect.objectContaining({
        field: 'name',
        url: '/models',
        error: expect.objectContaining({ code: 'VALIDATION_ERROR', statusCode: 422 }),
      })
    );
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('logs non-operational application errors as errors', () => {
    const error = new ConfigurationError('DATABASE_URL is required', 'DATABASE_URL');

    const result = handleError(error);

    expect(result.code).toBe('CONFIGURATION_ERROR');
    expect(result.statusCode).toBe(500);
    expect(logger.error).toHaveBeenCalledWith(
      'Application error occurred',
      error,
      expect.objectContaining({ configKey: 'DATABASE_URL' })
    );
  });

  it('turns unknown errors into INTERNAL_ERROR', () => {
    const result = handleError(new TypeError('undefined is not a function'), { phase: 'startup' });

    expect(result).toEqual({
      handled: true,
      message: 'undefined is not a function',
      code: 'INTERNAL_ERROR',
      statusCode: 500,
    });
    expect(logger.error).toHaveBeenCalledWith('Unknown error occurred', expect.any(TypeError), { phase: 'startup' });
  });

  it('wraps thrown values that are not errors', () => {
    expect(handleError('boom').message).toBe('boom');
  });
});
