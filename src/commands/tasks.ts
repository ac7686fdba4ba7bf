/**
 * Task Commands
 * 任務摘要、執行結果與完成監控
 */

import { Command, InvalidArgumentError } from 'commander';
import { printJson, resolveFormat, withOperation, withRateLimitWait } from './shared.js';
import { TaskTimeoutError } from '../services/errors.js';
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_TASK_TIMEOUT_MS } from '../services/task-monitor.js';
import { formatDuration } from '../lib/time-utils.js';
import { renderRecord, type OutputFormat } from '../shell/render.js';
import type { AppContext } from '../shell/context.js';
import type { TaskOutcome } from '../types/task.js';

export interface WatchTaskOptions {
  format: OutputFormat;
  submittedAt?: Date;
  timeoutSeconds?: number;
  intervalSeconds?: number;
}

function parseSeconds(value: string): number {
  const seconds = Number.parseFloat(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Must be a positive number of seconds.');
  }
  return seconds;
}

/**
 * 監控任務直到完成並輸出結果
 * @throws TaskTimeoutError 超過等待期限
 */
export async function watchTask(ctx: AppContext, taskId: string, options: WatchTaskOptions): Promise<TaskOutcome> {
  const table = options.format === 'table';
  const timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TASK_TIMEOUT_MS / 1000;
  const intervalSeconds = options.intervalSeconds ?? DEFAULT_POLL_INTERVAL_MS / 1000;

  if (table) {
    ctx.output.log('Waiting for task completion...');
  }

  const outcome = await withOperation(ctx, (signal) =>
    ctx.getServices().monitor.watch(taskId, {
      submittedAt: options.submittedAt,
      signal,
      timeoutMs: timeoutSeconds * 1000,
      intervalMs: intervalSeconds * 1000,
      onStatusChange: (change) => {
        if (table) {
          ctx.output.log(`Instance ${change.instanceId}: ${change.status || '(unknown)'}`);
        }
      },
      onRateLimit: (error) => ctx.reportRateLimit(error),
      onTick: (remaining) => ctx.output.log(`${remaining} seconds remaining...`),
    })
  );

  if (outcome.state === 'timed_out') {
    if (table) {
      ctx.output.log("Use 'summary'/'results' commands to check the task manually.");
    }
    throw new TaskTimeoutError(taskId, timeoutSeconds);
  }

  if (!table) {
    printJson(ctx, outcome);
    return outcome;
  }

  if (outcome.state === 'cancelled') {
    ctx.output.log("Stopped waiting for task completion. You can check later with 'summary' or 'results'.");
    return outcome;
  }

  ctx.output.log('Task reached a terminal status.');
  for (const instance of outcome.instances) {
    if (instance.error !== undefined) {
      ctx.output.error(`Failed to fetch results for instance ${instance.instanceId}: ${instance.error}`);
    } else if (instance.results !== undefined) {
      ctx.debugPrint(`task_results:${instance.instanceId}`, instance.results);
      if (instance.output !== undefined) {
        ctx.output.log(`Instance ${instance.instanceId} output:`);
        ctx.output.log(instance.output);
      }
      ctx.output.log(renderRecord(instance.results, `Task Results for ${instance.instanceId}`));
    }

    if (instance.elapsedSeconds !== undefined) {
      const suffix = instance.measuredFrom === 'submission' ? ' from submission' : '';
      ctx.output.log(`Instance ${instance.instanceId} completed in ${formatDuration(instance.elapsedSeconds)}${suffix}.`);
    }
  }
  if (outcome.totalElapsedSeconds !== undefined) {
    ctx.output.log(`Task completed in ${formatDuration(outcome.totalElapsedSeconds)} from submission.`);
  }
  return outcome;
}

/**
 * asio summary <task>
 */
export function createSummaryCommand(ctx: AppContext): Command {
  return new Command('summary')
    .description('Show execution summary for a task')
    .argument('<task>', 'task id')
    .action(async (taskId: string, _options: unknown, cmd: Command) => {
      const format = resolveFormat(ctx, cmd);
      const { api } = ctx.getServices();
      const summary = await withRateLimitWait(ctx, () => api.getTaskInstancesSummary(taskId));
      ctx.debugPrint(`summary:${taskId}`, summary);
      if (format === 'json') {
        printJson(ctx, summary);
        return;
      }
      ctx.output.log(renderRecord(summary, `Task Summary for ${taskId}`));
    });
}

/**
 * asio results <task> <instance>
 */
export function createResultsCommand(ctx: AppContext): Command {
  return new Command('results')
    .description('Show detailed results for a task instance')
    .argument('<task>', 'task id')
    .argument('<instance>', 'task instance id')
    .action(async (taskId: string, instanceId: string, _options: unknown, cmd: Command) => {
      const format = resolveFormat(ctx, cmd);
      const { api } = ctx.getServices();
      const results = await withRateLimitWait(ctx, () => api.getTaskInstanceResults(taskId, instanceId));
      ctx.debugPrint(`results:${taskId}:${instanceId}`, results);
      if (format === 'json') {
        printJson(ctx, results);
        return;
      }
      ctx.output.log(renderRecord(results, `Task Results for ${instanceId}`));
    });
}

/**
 * asio watch <task>
 */
export function createWatchCommand(ctx: AppContext): Command {
  return new Command('watch')
    .description('Poll a task until every instance finishes, then show results')
    .argument('<task>', 'task id')
    .option('--timeout <seconds>', 'give up after this many seconds', parseSeconds, DEFAULT_TASK_TIMEOUT_MS / 1000)
    .option('--interval <seconds>', 'seconds between summary polls', parseSeconds, DEFAULT_POLL_INTERVAL_MS / 1000)
    .action(async (taskId: string, options: { timeout: number; interval: number }, cmd: Command) => {
      await watchTask(ctx, taskId, {
        format: resolveFormat(ctx, cmd),
        timeoutSeconds: options.timeout,
        intervalSeconds: options.interval,
      });
    });
}
