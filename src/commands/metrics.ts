/**
 * Metrics Command
 * 指標檢視指令 - 本次工作階段累積的 Prometheus 指標
 */

import { Command } from 'commander';
import { printJson, resolveFormat } from './shared.js';
import { getMetricsJson, getMetricsSnapshot } from '../lib/metrics.js';
import type { AppContext } from '../shell/context.js';

/**
 * asio metrics
 * table 格式輸出 Prometheus 文字格式；json 格式輸出指標物件
 */
export function createMetricsCommand(ctx: AppContext): Command {
  return new Command('metrics')
    .description('Show Prometheus metrics collected in this session')
    .action(async (_options: unknown, cmd: Command) => {
      if (resolveFormat(ctx, cmd) === 'json') {
        printJson(ctx, await getMetricsJson());
        return;
      }
      ctx.output.log(await getMetricsSnapshot());
    });
}
