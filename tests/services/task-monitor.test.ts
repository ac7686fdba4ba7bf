import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  classifyStatus,
  readInstanceStatuses,
  summaryIsComplete,
  TaskCompletionMonitor,
  type TaskDataSource,
} from '../../src/services/task-monitor.js';
import { HttpError, RateLimitedError } from '../../src/services/errors.js';
import type { Sleeper } from '../../src/services/rate-limit.js';
import type { JsonValue } from '../../src/types/json.js';
import type { StatusChange } from '../../src/types/task.js';

type Reply = JsonValue | Error;

/**
 * 依序回傳摘要（最後一個重複使用）與固定的執行結果
 */
class FakeTaskApi implements TaskDataSource {
  summaryCalls = 0;
  resultCalls: string[] = [];

  constructor(
    private summaries: Reply[],
    private results: Record<string, Reply[]> = {}
  ) {}

  async getTaskInstancesSummary(): Promise<JsonValue> {
    this.summaryCalls++;
    const next = this.summaries.length > 1 ? this.summaries.shift() : this.summaries[0];
    if (next instanceof Error) {
      throw next;
    }
    return next ?? {};
  }

  async getTaskInstanceResults(_taskId: string, instanceId: string): Promise<JsonValue> {
    this.resultCalls.push(instanceId);
    const queue = this.results[instanceId] ?? [{}];
    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (next instanceof Error) {
      throw next;
    }
    return next ?? {};
  }
}

describe('TaskCompletionMonitor', () => {
  let clock: number;
  let sleeps: number[];
  const sleep: Sleeper = async (ms, signal) => {
    if (signal?.aborted) {
      return false;
    }
    sleeps.push(ms);
    clock += ms;
    return true;
  };

  beforeEach(() => {
    clock = Date.parse('2024-03-01T10:00:00Z');
    sleeps = [];
  });

  function createMonitor(api: TaskDataSource, timeoutMs = 600_000): TaskCompletionMonitor {
    return new TaskCompletionMonitor(api, { intervalMs: 1000, timeoutMs, now: () => clock, sleep });
  }

  it('should poll until every instance reaches a terminal status', async () => {
    const api = new FakeTaskApi(
      [
        { Results: [{ taskInstanceId: 'i1', Status: 'Running', ExecutedOn: '2024-03-01T10:00:00Z' }] },
        {
          Results: [
            {
              taskInstanceId: 'i1',
              Status: 'Success',
              ExecutedOn: '2024-03-01T10:00:00Z',
              CompletedOn: '2024-03-01T10:00:05Z',
            },
          ],
        },
      ],
      { i1: [{ Result: [{ taskInstanceId: 'i1', output: 'hello' }] }] }
    );
    const changes: StatusChange[] = [];

    const outcome = await createMonitor(api).watch('t1', {
      submittedAt: new Date('2024-03-01T09:59:58Z'),
      onStatusChange: (change) => changes.push(change),
    });

    expect(outcome).toMatchObject({ state: 'done', taskId: 't1', polls: 2, completedVia: 'instances' });
    expect(outcome.instances).toHaveLength(1);
    expect(outcome.instances[0]).toMatchObject({
      instanceId: 'i1',
      status: 'Success',
      elapsedSeconds: 7,
      measuredFrom: 'submission',
      output: 'hello',
    });
    expect(outcome.instances[0].startedAt?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
    expect(outcome.instances[0].completedAt.toISOString()).toBe('2024-03-01T10:00:05.000Z');
    expect(outcome.totalElapsedSeconds).toBe(7);
    expect(changes).toEqual([
      { instanceId: 'i1', status: 'Running', previous: undefined },
      { instanceId: 'i1', status: 'Success', previous: 'Running' },
    ]);
    expect(sleeps).toEqual([1000]);
  });

  it('should measure from start when the submission time is unknown', async () => {
    const api = new FakeTaskApi([
      {
        Results: [
          {
            Id: 'i1',
            OverallStatus: 'Failed',
            ExecutedOn: '2024-03-01T10:00:00Z',
            CompletedOn: '2024-03-01T10:02:05Z',
          },
        ],
      },
    ]);

    const outcome = await createMonitor(api).watch('t1');

    expect(outcome.instances[0]).toMatchObject({ status: 'Failed', elapsedSeconds: 125, measuredFrom: 'start' });
    expect(outcome.totalElapsedSeconds).toBeUndefined();
  });

  it('should fall back to result entry timestamps', async () => {
    const api = new FakeTaskApi([{ Results: [{ taskInstanceId: 'i1', Status: 'completed' }] }], {
      i1: [
        [
          {
            taskInstanceId: 'i1',
            executionTime: '2024-03-01T09:00:00Z',
            completedOn: '2024-03-01T09:00:30Z',
            resultDetails: 'ok',
          },
        ],
      ],
    });

    const outcome = await createMonitor(api).watch('t1');

    expect(outcome.instances[0]).toMatchObject({ elapsedSeconds: 30, measuredFrom: 'start', output: 'ok' });
  });

  it('should keep polling while any instance is pending', async () => {
    const api = new FakeTaskApi([
      {
        Results: [
          { taskInstanceId: 'i1', Status: 'Success' },
          { taskInstanceId: 'i2', Status: 'Queued' },
        ],
      },
      {
        Results: [
          { taskInstanceId: 'i1', Status: 'Success' },
          { taskInstanceId: 'i2', Status: 'Failed' },
        ],
      },
    ]);

    const outcome = await createMonitor(api).watch('t1');

    expect(outcome.polls).toBe(2);
    expect(outcome.instances.map((instance) => instance.status)).toEqual(['Success', 'Failed']);
    expect(api.resultCalls).toEqual(['i1', 'i2']);
  });

  it('should use summary counts when there is no instance list', async () => {
    const api = new FakeTaskApi([{ runningCount: 1, successCount: 0 }, { RunningCount: '0', successCount: 1 }]);

    const outcome = await createMonitor(api).watch('t1');

    expect(outcome).toMatchObject({ state: 'done', polls: 2, completedVia: 'counts', instances: [] });
  });

  it('should time out when the deadline passes', async () => {
    const api = new FakeTaskApi([{ Results: [{ taskInstanceId: 'i1', Status: 'Running' }] }]);

    const outcome = await createMonitor(api, 2000).watch('t1');

    expect(outcome).toMatchObject({ state: 'timed_out', polls: 2, instances: [] });
    expect(api.resultCalls).toEqual([]);
  });

  it('should let a watch override the interval and timeout', async () => {
    const api = new FakeTaskApi([{ Results: [{ taskInstanceId: 'i1', Status: 'Running' }] }]);

    const outcome = await createMonitor(api).watch('t1', { intervalMs: 500, timeoutMs: 1500 });

    expect(outcome).toMatchObject({ state: 'timed_out', polls: 3 });
    expect(sleeps).toEqual([500, 500, 500]);
  });

  it('should stop when cancelled', async () => {
    const controller = new AbortController();
    const api = new FakeTaskApi([{ Results: [{ taskInstanceId: 'i1', Status: 'Running' }] }]);

    const outcome = await createMonitor(api).watch('t1', {
      signal: controller.signal,
      onStatusChange: () => controller.abort(),
    });

    expect(outcome).toMatchObject({ state: 'cancelled', polls: 1 });
  });

  it('should wait out rate-limited summaries', async () => {
    const api = new FakeTaskApi([new RateLimitedError(2), { Results: [{ taskInstanceId: 'i1', Status: 'Success' }] }]);
    const onRateLimit = vi.fn();
    const ticks: number[] = [];

    const outcome = await createMonitor(api).watch('t1', { onRateLimit, onTick: (s) => ticks.push(s) });

    expect(outcome).toMatchObject({ state: 'done', polls: 1 });
    expect(onRateLimit).toHaveBeenCalledWith(expect.any(RateLimitedError), 'summary');
    expect(ticks).toEqual([2, 1]);
    expect(api.summaryCalls).toBe(2);
  });

  it('should propagate other summary errors', async () => {
    const api = new FakeTaskApi([new HttpError(404, { message: 'Task not found' })]);

    await expect(createMonitor(api).watch('t1')).rejects.toBeInstanceOf(HttpError);
  });

  it('should record result errors per instance', async () => {
    const api = new FakeTaskApi([{ Results: [{ taskInstanceId: 'i1', Status: 'Success' }] }], {
      i1: [new HttpError(500, { message: 'boom' })],
    });

    const outcome = await createMonitor(api).watch('t1');

    expect(outcome.state).toBe('done');
    expect(outcome.instances[0].error).toBe('HTTP 500: {"message":"boom"}');
    expect(outcome.instances[0].results).toBeUndefined();
    expect(outcome.instances[0].completedAt.getTime()).toBe(clock);
  });

  it('should retry rate-limited result fetches', async () => {
    const api = new FakeTaskApi([{ Results: [{ taskInstanceId: 'i1', Status: 'Success' }] }], {
      i1: [new RateLimitedError(1), { output: 'late' }],
    });
    const onRateLimit = vi.fn();

    const outcome = await createMonitor(api).watch('t1', { onRateLimit });

    expect(outcome.instances[0].output).toBe('late');
    expect(onRateLimit).toHaveBeenCalledWith(expect.any(RateLimitedError), 'results');
  });

  it('should stop fetching results when cancelled during a rate-limit wait', async () => {
    const controller = new AbortController();
    const limited = Array.from({ length: 5 }, () => new RateLimitedError(1));
    const api = new FakeTaskApi(
      [
        {
          Results: [
            { taskInstanceId: 'i1', Status: 'Success' },
            { taskInstanceId: 'i2', Status: 'Success' },
          ],
        },
      ],
      { i1: [...limited, { output: 'never' }] }
    );

    const outcome = await createMonitor(api).watch('t1', {
      signal: controller.signal,
      onRateLimit: () => controller.abort(),
    });

    expect(outcome).toMatchObject({ state: 'cancelled', completedVia: 'instances', polls: 1, instances: [] });
    expect(api.resultCalls).toEqual(['i1']);
  });

  it('should report a change only for the instance whose status moved', async () => {
    const api = new FakeTaskApi([
      {
        Results: [
          { taskInstanceId: 'i1', Status: 'Running' },
          { taskInstanceId: 'i2', Status: 'Success' },
        ],
      },
      {
        Results: [
          { taskInstanceId: 'i1', Status: 'Succeeded' },
          { taskInstanceId: 'i2', Status: 'Success' },
        ],
      },
    ]);
    const changes: StatusChange[] = [];

    const outcome = await createMonitor(api).watch('t1', { onStatusChange: (change) => changes.push(change) });

    expect(outcome.polls).toBe(2);
    expect(changes).toEqual([
      { instanceId: 'i1', status: 'Running', previous: undefined },
      { instanceId: 'i2', status: 'Success', previous: undefined },
      { instanceId: 'i1', status: 'Succeeded', previous: 'Running' },
    ]);
  });

  it('should finish on summary counts when a status is unrecognized', async () => {
    const api = new FakeTaskApi([{ Results: [{ taskInstanceId: 'i1', Status: 'Weird' }] }]);

    const outcome = await createMonitor(api).watch('t1');

    expect(outcome).toMatchObject({ state: 'done', polls: 1, completedVia: 'counts' });
    expect(outcome.instances.map((instance) => instance.status)).toEqual(['Weird']);
  });

  it('should keep the first start time seen for an instance', async () => {
    const api = new FakeTaskApi([
      { Results: [{ taskInstanceId: 'i1', Status: 'Running', ExecutedOn: '2024-03-01T10:00:00Z' }] },
      { Results: [{ taskInstanceId: 'i1', Status: 'Running' }] },
      {
        Results: [
          {
            taskInstanceId: 'i1',
            Status: 'Success',
            ExecutedOn: '2024-03-01T10:00:03Z',
            CompletedOn: '2024-03-01T10:00:05Z',
          },
        ],
      },
    ]);

    const outcome = await createMonitor(api).watch('t1');

    expect(outcome.polls).toBe(3);
    expect(outcome.instances[0].startedAt?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
    expect(outcome.instances[0]).toMatchObject({ elapsedSeconds: 5, measuredFrom: 'start' });
  });

  describe('status helpers', () => {
    it('should classify statuses case-insensitively', () => {
      expect(classifyStatus('SUCCESS')).toBe('terminal');
      expect(classifyStatus(' partial_success ')).toBe('terminal');
      expect(classifyStatus('In_Progress')).toBe('pending');
      expect(classifyStatus('Paused')).toBe('unknown');
    });

    it('should treat missing counts as complete', () => {
      expect(summaryIsComplete({})).toBe(true);
      expect(summaryIsComplete({ waiting_count: 2 })).toBe(false);
      expect(summaryIsComplete({ ScheduledCount: 'x' })).toBe(true);
      expect(summaryIsComplete([])).toBe(false);
    });

    it('should map instance ids to statuses', () => {
      const statuses = readInstanceStatuses([{ Id: 'a', status: 'Running' }, { status: 'Orphan' }, { id: 'b' }]);
      expect([...statuses.entries()]).toEqual([
        ['a', 'Running'],
        ['b', ''],
      ]);
    });
  });
});
