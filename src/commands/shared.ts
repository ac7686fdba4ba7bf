/**
 * Command helpers
 * 指令共用 - 輸出格式、可取消操作
 */

import type { Command } from 'commander';
import { waitOutRateLimits } from '../services/rate-limit.js';
import { isOutputFormat, renderJson, type OutputFormat } from '../shell/render.js';
import type { AppContext } from '../shell/context.js';

/**
 * 子指令的 -f/--format 優先，其次為全域設定
 */
export function resolveFormat(ctx: AppContext, cmd: Command): OutputFormat {
  const { format } = cmd.optsWithGlobals();
  return isOutputFormat(format) ? format : ctx.format;
}

/**
 * 在可被 Ctrl+C 取消的操作中執行
 */
export async function withOperation<T>(ctx: AppContext, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const signal = ctx.beginOperation();
  try {
    return await fn(signal);
  } finally {
    ctx.endOperation();
  }
}

/**
 * 可取消的單一請求；速率限制時倒數等待後重試
 * @throws OperationCancelledError 等待中被取消
 */
export function withRateLimitWait<T>(ctx: AppContext, fn: () => Promise<T>): Promise<T> {
  return withOperation(ctx, () =>
    waitOutRateLimits(fn, {
      ...ctx.waitOptions(),
      onRateLimited: (error) => ctx.reportRateLimit(error),
    })
  );
}

export function printJson(ctx: AppContext, data: unknown): void {
  ctx.output.log(renderJson(data));
}
