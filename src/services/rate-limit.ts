/**
 * Rate Limit Service
 * 速率限制處理 - Retry-After 解析與呼叫端擁有的等待/重試
 *
 * The executor never sleeps; callers decide how to wait by using these helpers.
 */

import { isRateLimited, OperationCancelledError, type RateLimitedError } from './errors.js';
import { recordRateLimitWait } from '../lib/metrics.js';

export const DEFAULT_RETRY_AFTER_SECONDS = 1.0;

/** Sleeps are split so cancellation is observed at least once per second */
export const SLEEP_SLICE_MS = 1000;

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Sleep that reports whether it ran to completion (false when aborted).
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export interface HeaderSource {
  get(name: string): string | null;
}

/**
 * 解析 Retry-After（秒，可為小數）
 * 缺少或無法解析時回傳 1.0
 */
export function parseRetryAfter(headers: HeaderSource | null | undefined): number {
  const raw = headers?.get('retry-after');
  if (raw === null || raw === undefined) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }
  const trimmed = raw.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }
  const value = Number.parseFloat(trimmed);
  return Number.isFinite(value) ? value : DEFAULT_RETRY_AFTER_SECONDS;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * 可中斷的等待：每個切片邊界檢查一次取消訊號
 */
export const interruptibleSleep: Sleeper = async (ms, signal) => {
  let remaining = ms;
  while (remaining > 0) {
    if (signal?.aborted) {
      return false;
    }
    const slice = Math.min(SLEEP_SLICE_MS, remaining);
    await delay(slice);
    remaining -= slice;
  }
  return !signal?.aborted;
};

export interface RateLimitWaitOptions {
  signal?: AbortSignal;
  sleep?: Sleeper;
  /** Called once per second with the seconds still to wait */
  onTick?: (remainingSeconds: number) => void;
}

/**
 * Whole seconds a caller waits for a rate-limit signal (at least one).
 */
export function rateLimitWaitSeconds(error: RateLimitedError): number {
  return Math.max(1, Math.round(error.retryAfterSeconds));
}

/**
 * 依 Retry-After 等待，每秒回報剩餘秒數
 * @returns false if cancelled before the wait finished
 */
export async function waitForRateLimit(
  error: RateLimitedError,
  options: RateLimitWaitOptions = {}
): Promise<boolean> {
  const sleep = options.sleep ?? interruptibleSleep;
  const waitSeconds = rateLimitWaitSeconds(error);

  for (let remaining = waitSeconds; remaining > 0; remaining--) {
    options.onTick?.(remaining);
    const completed = await sleep(1000, options.signal);
    recordRateLimitWait(1);
    if (!completed) {
      return false;
    }
  }
  return true;
}

export interface RateLimitRetryOptions extends RateLimitWaitOptions {
  /** Callback called each time a rate limit is hit */
  onRateLimited?: (error: RateLimitedError, attempt: number) => void;
}

export type RateLimitRetryResult<T> =
  | { completed: true; value: T; waitedSeconds: number }
  | { completed: false; waitedSeconds: number };

/**
 * Run `fn`, waiting out every rate limit and retrying until it succeeds,
 * throws another error, or the signal aborts. There is no attempt cap.
 */
export async function withRateLimitRetry<T>(
  fn: () => Promise<T>,
  options: RateLimitRetryOptions = {}
): Promise<RateLimitRetryResult<T>> {
  let waitedSeconds = 0;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      const value = await fn();
      return { completed: true, value, waitedSeconds };
    } catch (error) {
      if (!isRateLimited(error)) {
        throw error;
      }

      options.onRateLimited?.(error, attempt);

      const finished = await waitForRateLimit(error, options);
      waitedSeconds += rateLimitWaitSeconds(error);
      if (!finished) {
        return { completed: false, waitedSeconds };
      }
    }
  }
}

/**
 * 等待所有速率限制後回傳結果
 * @throws OperationCancelledError 等待中被取消
 */
export async function waitOutRateLimits<T>(fn: () => Promise<T>, options: RateLimitRetryOptions = {}): Promise<T> {
  const outcome = await withRateLimitRetry(fn, options);
  if (!outcome.completed) {
    throw new OperationCancelledError();
  }
  return outcome.value;
}
