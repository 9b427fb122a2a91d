import { describe, it, expect, vi } from 'vitest';
import { AppError, ErrorType, classifyError, formatError, isFatal, retryWithBackoff } from '../utils/errors';

function httpError(status: number, message = 'request failed') {
  return Object.assign(new Error(message), {
    response: { status, data: { error: { message: `google says ${status}` } }, headers: { 'retry-after': '30' } },
  });
}

describe('classifyError', () => {
  it('should map HTTP statuses to error types', () => {
    expect(classifyError(httpError(429)).type).toBe(ErrorType.RATE_LIMIT);
    expect(classifyError(httpError(401)).type).toBe(ErrorType.AUTHENTICATION_ERROR);
    expect(classifyError(httpError(403)).type).toBe(ErrorType.AUTHENTICATION_ERROR);
    expect(classifyError(httpError(404)).type).toBe(ErrorType.NOT_FOUND);
    expect(classifyError(httpError(400)).type).toBe(ErrorType.VALIDATION_ERROR);
    expect(classifyError(httpError(503)).type).toBe(ErrorType.SERVER_ERROR);
  });

  it('should use the message from the API response body', () => {
    const error = classifyError(httpError(503));
    expect(error.message).toBe('Server error (503): google says 503');
    expect(error.retryable).toBe(true);
    expect(error.httpStatus).toBe(503);
  });

  it('should keep Retry-After on rate limit errors', () => {
    expect(classifyError(httpError(429), { messageId: 'msg-1' }).context).toEqual({
      messageId: 'msg-1',
      retryAfter: '30',
    });
  });

  it('should treat connection resets as retryable network errors', () => {
    const error = classifyError(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }));
    expect(error.type).toBe(ErrorType.NETWORK_ERROR);
    expect(error.retryable).toBe(true);
  });

  it('should treat rejected credentials as authentication errors', () => {
    const error = classifyError(new Error('invalid_grant'));
    expect(error.type).toBe(ErrorType.AUTHENTICATION_ERROR);
    expect(isFatal(error)).toBe(true);
  });

  it('should return AppErrors unchanged', () => {
    const original = new AppError({ type: ErrorType.PARSING_ERROR, message: 'bad', retryable: false });
    expect(classifyError(original)).toBe(original);
    expect(isFatal(original)).toBe(false);
  });

  it('should fall back to an unknown error', () => {
    const error = classifyError('boom');
    expect(error.type).toBe(ErrorType.UNKNOWN_ERROR);
    expect(error.message).toBe('boom');
  });
});

describe('retryWithBackoff', () => {
  it('should retry transient failures', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    await expect(retryWithBackoff(fn, { initialDelay: 0, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(expect.any(AppError), 1);
  });

  it('should not retry permanent failures', async () => {
    const fn = vi.fn().mockRejectedValue(httpError(400));

    await expect(retryWithBackoff(fn, { initialDelay: 0 })).rejects.toMatchObject({
      type: ErrorType.VALIDATION_ERROR,
    });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should give up after the last retry', async () => {
    const fn = vi.fn().mockRejectedValue(httpError(500));

    await expect(retryWithBackoff(fn, { maxRetries: 2, initialDelay: 0 })).rejects.toMatchObject({
      type: ErrorType.SERVER_ERROR,
    });
    expect(fn).toHaveBeenCalledTimes(3);
  });
});

describe('formatError', () => {
  it('should include type, context and status', () => {
    const error = new AppError({
      type: ErrorType.NOT_FOUND,
      message: 'Resource not found: sheet',
      retryable: false,
      context: { sheet: 'Raw' },
      httpStatus: 404,
    });
    expect(formatError(error)).toBe('[NOT_FOUND] Resource not found: sheet | Context: {"sheet":"Raw"} | HTTP 404');
  });

  it('should format plain errors by message', () => {
    expect(formatError(new Error('plain'))).toBe('plain');
  });
});
