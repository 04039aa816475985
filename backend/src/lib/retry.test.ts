import { describe, test, expect, vi } from 'vitest';
import { isTransientError, getErrorStatusCode, withRetry, createRetryWrapper } from './retry';

describe('isTransientError', () => {
  test('returns false for null/undefined', () => {
    expect(isTransientError(null)).toBe(false);
    expect(isTransientError(undefined)).toBe(false);
  });

  test('returns false for non-object', () => {
    expect(isTransientError('error')).toBe(false);
    expect(isTransientError(42)).toBe(false);
  });

  test('returns true for 5xx status codes', () => {
    expect(isTransientError({ statusCode: 500 })).toBe(true);
    expect(isTransientError({ statusCode: 502 })).toBe(true);
    expect(isTransientError({ statusCode: 503 })).toBe(true);
    expect(isTransientError({ statusCode: 504 })).toBe(true);
  });

  test('returns true for 429 rate limiting', () => {
    expect(isTransientError({ statusCode: 429 })).toBe(true);
    expect(isTransientError({ response: { statusCode: 429 } })).toBe(true);
  });

  test('returns false for 4xx client errors', () => {
    expect(isTransientError({ statusCode: 400 })).toBe(false);
    expect(isTransientError({ statusCode: 404 })).toBe(false);
    expect(isTransientError({ statusCode: 403 })).toBe(false);
  });

  test('returns true for network error codes', () => {
    expect(isTransientError({ code: 'ECONNRESET' })).toBe(true);
    expect(isTransientError({ code: 'ETIMEDOUT' })).toBe(true);
    expect(isTransientError({ code: 'ECONNREFUSED' })).toBe(true);
    expect(isTransientError({ code: 'ENOTFOUND' })).toBe(true);
    expect(isTransientError({ code: 'EAI_AGAIN' })).toBe(true);
  });

  test('returns true for network error messages', () => {
    expect(isTransientError({ message: 'socket hang up' })).toBe(true);
    expect(isTransientError({ message: 'network error occurred' })).toBe(true);
    expect(isTransientError({ message: 'connection ECONNRESET' })).toBe(true);
    expect(isTransientError({ message: 'request ETIMEDOUT' })).toBe(true);
  });

  test('returns false for regular errors', () => {
    expect(isTransientError({ message: 'invalid resource' })).toBe(false);
    expect(isTransientError(new Error('some error'))).toBe(false);
  });

  test('handles nested response statusCode', () => {
    expect(isTransientError({ response: { statusCode: 500 } })).toBe(true);
    expect(isTransientError({ response: { statusCode: 404 } })).toBe(false);
  });

  test('returns true for fetch timeouts and failures', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    expect(isTransientError(abort)).toBe(true);
    expect(isTransientError(new TypeError('fetch failed'))).toBe(true);
  });

  test('inspects the error cause', () => {
    const error = new Error('request failed', { cause: { code: 'ECONNREFUSED' } });
    expect(isTransientError(error)).toBe(true);
    expect(isTransientError(new Error('request failed', { cause: { code: 'EACCES' } }))).toBe(false);
  });
});

describe('getErrorStatusCode', () => {
  test('reads status from the supported error shapes', () => {
    expect(getErrorStatusCode({ statusCode: 503 })).toBe(503);
    expect(getErrorStatusCode({ status: 429 })).toBe(429);
    expect(getErrorStatusCode({ response: { statusCode: 404 } })).toBe(404);
    expect(getErrorStatusCode({ response: { status: 500 } })).toBe(500);
  });

  test('returns undefined when no status is present', () => {
    expect(getErrorStatusCode(new Error('boom'))).toBeUndefined();
    expect(getErrorStatusCode('boom')).toBeUndefined();
    expect(getErrorStatusCode({ statusCode: '500' })).toBeUndefined();
  });
});

describe('withRetry', () => {
  test('returns result on success', async () => {
    const fn = vi.fn(() => Promise.resolve('success'));
    const result = await withRetry(fn, { maxRetries: 3 });
    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('retries on retryable error', async () => {
    let attempts = 0;
    const fn = vi.fn(async () => {
      attempts++;
      if (attempts < 3) {
        throw { statusCode: 503 };
      }
      return 'success';
    });

    const result = await withRetry(fn, {
      maxRetries: 3,
      initialDelayMs: 1,
      maxDelayMs: 10,
    });

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  test('throws immediately on non-retryable error', async () => {
    const fn = vi.fn(async () => {
      throw { statusCode: 404, message: 'Not found' };
    });

    await expect(
      withRetry(fn, { maxRetries: 3, initialDelayMs: 1 })
    ).rejects.toEqual({ statusCode: 404, message: 'Not found' });

    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('throws after max retries exceeded', async () => {
    const fn = vi.fn(async () => {
      throw { statusCode: 503 };
    });

    await expect(
      withRetry(fn, { maxRetries: 2, initialDelayMs: 1, maxDelayMs: 5 })
    ).rejects.toEqual({ statusCode: 503 });

    expect(fn).toHaveBeenCalledTimes(3); // initial + 2 retries
  });

  test('uses custom isRetryable function', async () => {
    let attempts = 0;
    const fn = vi.fn(async () => {
      attempts++;
      if (attempts < 2) {
        throw new Error('custom error');
      }
      return 'success';
    });

    const result = await withRetry(fn, {
      maxRetries: 3,
      initialDelayMs: 1,
      isRetryable: (err) => err instanceof Error && err.message === 'custom error',
    });

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  test('uses default options', async () => {
    const fn = vi.fn(() => Promise.resolve('success'));
    const result = await withRetry(fn);
    expect(result).toBe('success');
  });
});

describe('createRetryWrapper', () => {
  test('creates wrapper with preset options', async () => {
    const wrapper = createRetryWrapper({
      maxRetries: 2,
      initialDelayMs: 1,
      isRetryable: () => true,
    });

    let attempts = 0;
    const fn = async () => {
      attempts++;
      if (attempts < 2) {
        throw new Error('retry me');
      }
      return 'wrapped success';
    };

    const result = await wrapper(fn);
    expect(result).toBe('wrapped success');
    expect(attempts).toBe(2);
  });

  test('allows overriding preset options', async () => {
    const wrapper = createRetryWrapper({ maxRetries: 5 });

    const fn = vi.fn(async () => {
      throw { statusCode: 503 };
    });

    await expect(
      wrapper(fn, { maxRetries: 1, initialDelayMs: 1 })
    ).rejects.toBeDefined();

    expect(fn).toHaveBeenCalledTimes(2); // override to 1 retry = 2 attempts
  });
});
