import { describe, it, expect, vi } from 'vitest';
import {
  parseRetryAfter,
  rateLimitWaitSeconds,
  waitForRateLimit,
  waitOutRateLimits,
  withRateLimitRetry,
  type Sleeper,
} from '../../src/services/rate-limit.js';
import { HttpError, OperationCancelledError, RateLimitedError } from '../../src/services/errors.js';

const instantSleep: Sleeper = async () => true;

describe('rate limit helpers', () => {
  describe('parseRetryAfter', () => {
    it('should parse numeric seconds including fractions', () => {
      expect(parseRetryAfter(new Headers({ 'Retry-After': '3' }))).toBe(3);
      expect(parseRetryAfter(new Headers({ 'Retry-After': ' 0.5 ' }))).toBe(0.5);
    });

    it('should default to one second', () => {
      expect(parseRetryAfter(new Headers())).toBe(1);
      expect(parseRetryAfter(new Headers({ 'Retry-After': 'later' }))).toBe(1);
      expect(parseRetryAfter(undefined)).toBe(1);
    });
  });

  it('should wait at least one whole second', () => {
    expect(rateLimitWaitSeconds(new RateLimitedError(0.2))).toBe(1);
    expect(rateLimitWaitSeconds(new RateLimitedError(2.6))).toBe(3);
  });

  describe('waitForRateLimit', () => {
    it('should tick once per second', async () => {
      const ticks: number[] = [];
      const sleep = vi.fn(instantSleep);

      const finished = await waitForRateLimit(new RateLimitedError(3), { sleep, onTick: (s) => ticks.push(s) });

      expect(finished).toBe(true);
      expect(ticks).toEqual([3, 2, 1]);
      expect(sleep).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledWith(1000, undefined);
    });

    it('should stop when the sleep is interrupted', async () => {
      const ticks: number[] = [];
      const sleep: Sleeper = async () => ticks.length < 2;

      const finished = await waitForRateLimit(new RateLimitedError(5), { sleep, onTick: (s) => ticks.push(s) });

      expect(finished).toBe(false);
      expect(ticks).toEqual([5, 4]);
    });

    it('should return false immediately for an aborted signal with the default sleep', async () => {
      const controller = new AbortController();
      controller.abort();

      expect(await waitForRateLimit(new RateLimitedError(30), { signal: controller.signal })).toBe(false);
    });
  });

  describe('withRateLimitRetry', () => {
    it('should retry until the call succeeds', async () => {
      const fn = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new RateLimitedError(2))
        .mockRejectedValueOnce(new RateLimitedError(1))
        .mockResolvedValueOnce('done');
      const attempts: number[] = [];

      const result = await withRateLimitRetry(fn, {
        sleep: instantSleep,
        onRateLimited: (_error, attempt) => attempts.push(attempt),
      });

      expect(result).toEqual({ completed: true, value: 'done', waitedSeconds: 3 });
      expect(attempts).toEqual([1, 2]);
    });

    it('should report an incomplete result when cancelled', async () => {
      const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new RateLimitedError(2));

      const result = await withRateLimitRetry(fn, { sleep: async () => false });

      expect(result).toEqual({ completed: false, waitedSeconds: 2 });
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should propagate other errors', async () => {
      const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new HttpError(500, {}));

      await expect(withRateLimitRetry(fn, { sleep: instantSleep })).rejects.toBeInstanceOf(HttpError);
    });
  });

  describe('waitOutRateLimits', () => {
    it('should return the value once the rate limit clears', async () => {
      const fn = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new RateLimitedError(1))
        .mockResolvedValue('ok');

      await expect(waitOutRateLimits(fn, { sleep: instantSleep })).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should throw a cancellation when the wait is aborted', async () => {
      const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new RateLimitedError(1));
      const controller = new AbortController();
      controller.abort();

      await expect(
        waitOutRateLimits(fn, { signal: controller.signal, sleep: async (_ms, signal) => !signal?.aborted })
      ).rejects.toBeInstanceOf(OperationCancelledError);
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });
});
