/**
 * Task Completion Monitor
 * 任務完成監控 - 輪詢執行摘要、判斷完成、取得結果並計算耗時
 */

import { RateLimitedError, formatError } from './errors.js';
import { interruptibleSleep, waitForRateLimit, withRateLimitRetry, type Sleeper } from './rate-limit.js';
import { loggers } from '../lib/logger.js';
import { recordTaskOutcome, recordTaskPoll } from '../lib/metrics.js';
import {
  FIELD_NAMES,
  coerceCount,
  entriesForInstance,
  extractInstanceOutput,
  extractSummaryInstances,
  pickString,
  pickTimestamp,
} from '../lib/payload-fields.js';
import { elapsedSeconds } from '../lib/time-utils.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';
import type {
  InstanceReport,
  StatusChange,
  StatusClass,
  TaskInstanceState,
  TaskOutcome,
  TaskOutcomeState,
} from '../types/task.js';

export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_TASK_TIMEOUT_MS = 600_000;

export const TERMINAL_STATUSES: ReadonlySet<string> = new Set([
  'success',
  'succeeded',
  'failed',
  'completed',
  'cancelled',
  'canceled',
  'error',
  'partial_success',
  'timeout',
]);

export const PENDING_STATUSES: ReadonlySet<string> = new Set([
  'running',
  'waiting',
  'queued',
  'pending',
  'in_progress',
  'scheduled',
]);

/**
 * 摘要與結果的資料來源（AutomationApiClient）
 */
export interface TaskDataSource {
  getTaskInstancesSummary(taskId: string): Promise<JsonValue>;
  getTaskInstanceResults(taskId: string, instanceId: string): Promise<JsonValue>;
}

export interface TaskMonitorOptions {
  intervalMs?: number;
  timeoutMs?: number;
  /** 時鐘（測試用） */
  now?: () => number;
  sleep?: Sleeper;
}

export interface WatchOptions {
  /** Overrides the monitor's poll interval for this watch */
  intervalMs?: number;
  /** Overrides the monitor's timeout for this watch */
  timeoutMs?: number;
  /** When the task was scheduled, if known */
  submittedAt?: Date;
  signal?: AbortSignal;
  onStatusChange?: (change: StatusChange) => void;
  onRateLimit?: (error: RateLimitedError, phase: 'summary' | 'results') => void;
  /** Seconds left while waiting out a rate limit */
  onTick?: (remainingSeconds: number) => void;
}

/**
 * 狀態分類（不分大小寫）
 */
export function classifyStatus(status: string): StatusClass {
  const normalized = status.trim().toLowerCase();
  if (TERMINAL_STATUSES.has(normalized)) {
    return 'terminal';
  }
  if (PENDING_STATUSES.has(normalized)) {
    return 'pending';
  }
  return 'unknown';
}

/**
 * 以 running/waiting/scheduled 計數判斷完成（摘要沒有可用的執行個體清單時）
 */
export function summaryIsComplete(summary: JsonValue): boolean {
  if (!isJsonObject(summary)) {
    return false;
  }
  const counts = new Map<string, JsonValue>();
  for (const [key, value] of Object.entries(summary)) {
    const lower = key.toLowerCase();
    if (lower.endsWith('count')) {
      counts.set(lower, value);
    }
  }
  const read = (...keys: string[]): number => {
    for (const key of keys) {
      const count = coerceCount(counts.get(key));
      if (count !== 0) {
        return count;
      }
    }
    return 0;
  };
  return (
    read('runningcount', 'running_count') === 0 &&
    read('waitingcount', 'waiting_count') === 0 &&
    read('scheduledcount', 'scheduled_count') === 0
  );
}

/**
 * 執行個體 id → 狀態（沒有 id 的略過）
 */
export function readInstanceStatuses(instances: readonly JsonObject[]): Map<string, string> {
  const statuses = new Map<string, string>();
  for (const instance of instances) {
    const instanceId = pickString(instance, FIELD_NAMES.instanceId);
    if (instanceId) {
      statuses.set(instanceId, pickString(instance, FIELD_NAMES.status));
    }
  }
  return statuses;
}

type CompletionPath = 'instances' | 'counts';

export class TaskCompletionMonitor {
  private api: TaskDataSource;
  private intervalMs: number;
  private timeoutMs: number;
  private now: () => number;
  private sleep: Sleeper;

  constructor(api: TaskDataSource, options: TaskMonitorOptions = {}) {
    this.api = api;
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TASK_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? interruptibleSleep;
  }

  /**
   * 輪詢直到完成、逾時或取消
   * 取消與逾時都以結果回報，不丟出例外
   * @throws 摘要請求的非 429 錯誤
   */
  async watch(taskId: string, options: WatchOptions = {}): Promise<TaskOutcome> {
    const { signal } = options;
    const intervalMs = options.intervalMs ?? this.intervalMs;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const loopStart = this.now();
    const states = new Map<string, TaskInstanceState>();
    let polls = 0;

    const finish = (state: TaskOutcomeState, extra: Partial<TaskOutcome> = {}): TaskOutcome => {
      recordTaskOutcome(state);
      loggers.task.info('Task watch finished', { taskId, state, polls });
      return { state, taskId, polls, instances: [], ...extra };
    };

    for (;;) {
      if (signal?.aborted) {
        return finish('cancelled');
      }
      if (this.now() - loopStart >= timeoutMs) {
        return finish('timed_out');
      }

      let summary: JsonValue;
      try {
        summary = await this.api.getTaskInstancesSummary(taskId);
      } catch (error) {
        if (!(error instanceof RateLimitedError)) {
          throw error;
        }
        options.onRateLimit?.(error, 'summary');
        const waited = await waitForRateLimit(error, { signal, sleep: this.sleep, onTick: options.onTick });
        if (!waited) {
          return finish('cancelled');
        }
        continue;
      }

      polls++;
      recordTaskPoll();

      const instances = extractSummaryInstances(summary) ?? [];
      const completedVia = this.evaluate(summary, instances, states, options.onStatusChange);

      if (completedVia) {
        const { reports, cancelled } = await this.collectResults(taskId, instances, states, options);
        if (cancelled) {
          return finish('cancelled', { completedVia, instances: reports });
        }
        const fromSubmission = reports
          .filter((report) => report.measuredFrom === 'submission')
          .map((report) => report.elapsedSeconds ?? 0);
        return finish('done', {
          completedVia,
          instances: reports,
          totalElapsedSeconds: fromSubmission.length > 0 ? Math.max(...fromSubmission) : undefined,
        });
      }

      // 間隔固定，不因執行個體數量而加速
      const slept = await this.sleep(intervalMs, signal);
      if (!slept) {
        return finish('cancelled');
      }
    }
  }

  /**
   * 套用一次摘要：更新狀態、回報變化，回傳完成路徑（尚未完成則 undefined）
   */
  private evaluate(
    summary: JsonValue,
    instances: readonly JsonObject[],
    states: Map<string, TaskInstanceState>,
    onStatusChange?: (change: StatusChange) => void
  ): CompletionPath | undefined {
    if (instances.length > 0) {
      const statuses = readInstanceStatuses(instances);

      for (const instance of instances) {
        const instanceId = pickString(instance, FIELD_NAMES.instanceId);
        const status = statuses.get(instanceId);
        if (!instanceId || status === undefined) {
          continue;
        }
        const state = states.get(instanceId) ?? { instanceId, status: '' };
        const previous = states.has(instanceId) ? state.status : undefined;
        if (previous === undefined || previous !== status) {
          onStatusChange?.({ instanceId, status, previous });
          loggers.task.debug('Instance status changed', { instanceId, status, previous });
        }
        state.status = status;
        // 已取得的時間不再覆寫
        state.startedAt ??= pickTimestamp(instance, FIELD_NAMES.summaryStart);
        states.set(instanceId, state);
      }

      const values = [...statuses.values()];
      if (values.length > 0 && values.every((status) => !status || classifyStatus(status) === 'terminal')) {
        return 'instances';
      }
      if (values.some((status) => status && classifyStatus(status) === 'pending')) {
        return undefined;
      }
    }

    return summaryIsComplete(summary) ? 'counts' : undefined;
  }

  private async collectResults(
    taskId: string,
    instances: readonly JsonObject[],
    states: Map<string, TaskInstanceState>,
    options: WatchOptions
  ): Promise<{ reports: InstanceReport[]; cancelled: boolean }> {
    const reports: InstanceReport[] = [];

    for (const instance of instances) {
      const instanceId = pickString(instance, FIELD_NAMES.instanceId);
      if (!instanceId) {
        continue;
      }
      const state = states.get(instanceId) ?? { instanceId, status: pickString(instance, FIELD_NAMES.status) };

      let results: JsonValue | undefined;
      let error: string | undefined;
      try {
        // 完成後的盡力步驟：速率限制無限重試，不受逾時限制，可被取消
        const outcome = await withRateLimitRetry(() => this.api.getTaskInstanceResults(taskId, instanceId), {
          signal: options.signal,
          sleep: this.sleep,
          onTick: options.onTick,
          onRateLimited: (rateLimited) => options.onRateLimit?.(rateLimited, 'results'),
        });
        if (!outcome.completed) {
          return { reports, cancelled: true };
        }
        results = outcome.value;
      } catch (caught) {
        error = formatError(caught);
        loggers.task.info('Failed to fetch instance results', { taskId, instanceId, error });
      }

      const entries = entriesForInstance(results, instanceId);
      state.startedAt ??=
        pickTimestamp(instance, FIELD_NAMES.summaryStart) ?? firstTimestamp(entries, FIELD_NAMES.resultStart);
      state.completedAt ??=
        pickTimestamp(instance, FIELD_NAMES.summaryCompletion) ??
        firstTimestamp(entries, FIELD_NAMES.resultCompletion) ??
        new Date(this.now());
      states.set(instanceId, state);

      reports.push(this.buildReport(state, state.completedAt, options.submittedAt, results, error));
    }

    return { reports, cancelled: false };
  }

  private buildReport(
    state: TaskInstanceState,
    completedAt: Date,
    submittedAt: Date | undefined,
    results: JsonValue | undefined,
    error: string | undefined
  ): InstanceReport {
    const report: InstanceReport = {
      instanceId: state.instanceId,
      status: state.status,
      startedAt: state.startedAt,
      completedAt,
    };

    if (submittedAt) {
      report.elapsedSeconds = elapsedSeconds(submittedAt, completedAt);
      report.measuredFrom = 'submission';
    } else if (state.startedAt) {
      report.elapsedSeconds = elapsedSeconds(state.startedAt, completedAt);
      report.measuredFrom = 'start';
    }

    if (results !== undefined) {
      report.results = results;
      report.output = extractInstanceOutput(results);
    }
    if (error !== undefined) {
      report.error = error;
    }
    return report;
  }
}

function firstTimestamp(entries: readonly JsonObject[], keys: readonly string[]): Date | undefined {
  for (const entry of entries) {
    const found = pickTimestamp(entry, keys);
    if (found) {
      return found;
    }
  }
  return undefined;
}
