/**
 * Tests for the retry policy.
 */

import { describe, it, expect, vi } from 'vitest';
import { RetryPolicy, DEFAULT_RETRY_CONFIG } from '../resilience';
import { ApiError, AuthenticationError, RateLimitError } from '../errors';
import { NoopLogger } from '../observability';

const fast = { initialDelayMs: 0, jitterFactor: 0 };

describe('RetryPolicy', () => {
  it('should succeed on first attempt', async () => {
    const policy = new RetryPolicy(fast);
    const fn = vi.fn().mockResolvedValue('success');

    expect(await policy.execute(fn)).toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry server errors', async () => {
    const policy = new RetryPolicy({ ...fast, maxRetries: 2 });
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new ApiError('busy', { statusCode: 503 }))
      .mockRejectedValueOnce(new RateLimitError('slow', { statusCode: 429 }))
      .mockResolvedValue('success');

    expect(await policy.execute(fn)).toBe('success');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should stop after the budget is spent', async () => {
    const policy = new RetryPolicy({ ...fast, maxRetries: 2 });
    const fn = vi.fn().mockRejectedValue(new ApiError('busy', { statusCode: 500 }));

    await expect(policy.execute(fn)).rejects.toThrow('busy');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should not retry client errors', async () => {
    const policy = new RetryPolicy(fast);
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new ApiError('bad request', { statusCode: 400 }))
      .mockRejectedValueOnce(new AuthenticationError('bad key', { statusCode: 401 }));

    await expect(policy.execute(fn)).rejects.toThrow('bad request');
    await expect(policy.execute(fn)).rejects.toThrow('bad key');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should log each retry at warn level', async () => {
    const logger = new NoopLogger();
    const warn = vi.spyOn(logger, 'warn');
    const policy = new RetryPolicy({ ...fast, maxRetries: 1 }, logger);
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new ApiError('busy', { statusCode: 502 }))
      .mockResolvedValue('ok');

    await policy.execute(fn);

    expect(warn).toHaveBeenCalledWith('Retrying request', {
      attempt: 1,
      maxRetries: 1,
      delayMs: 0,
      reason: 'busy',
    });
  });

  describe('getDelay', () => {
    it('should back off exponentially up to the cap', () => {
      const policy = new RetryPolicy({ initialDelayMs: 100, multiplier: 2, maxDelayMs: 350, jitterFactor: 0 });
      const error = new ApiError('busy', { statusCode: 500 });

      expect(policy.getDelay(error, 0)).toBe(100);
      expect(policy.getDelay(error, 1)).toBe(200);
      expect(policy.getDelay(error, 2)).toBe(350);
    });

    it('should honour retry-after', () => {
      const policy = new RetryPolicy();

      expect(policy.getDelay(new RateLimitError('slow', { retryAfter: 3 }), 0)).toBe(3000);
    });

    it('should keep jitter within bounds', () => {
      const policy = new RetryPolicy({ initialDelayMs: 1000, jitterFactor: 0.5 });

      for (let i = 0; i < 20; i++) {
        const delay = policy.getDelay(new Error('x'), 0);
        expect(delay).toBeGreaterThanOrEqual(500);
        expect(delay).toBeLessThanOrEqual(1500);
      }
    });
  });

  it('should override config with withConfig', () => {
    const policy = new RetryPolicy({ jitterFactor: 0 }).withConfig({ initialDelayMs: 10 });

    expect(policy.getDelay(new Error('x'), 0)).toBe(10);
    expect(DEFAULT_RETRY_CONFIG.initialDelayMs).toBe(500);
  });
});
