/**
 * Task monitoring types
 * 任務監控型別
 */

import type { JsonValue } from './json.js';

export type StatusClass = 'terminal' | 'pending' | 'unknown';

/**
 * 單一執行個體的追蹤狀態（只在一次監控中存在）
 */
export interface TaskInstanceState {
  instanceId: string;
  status: string;
  startedAt?: Date;
  completedAt?: Date;
}

export interface StatusChange {
  instanceId: string;
  status: string;
  previous?: string;
}

export interface InstanceReport {
  instanceId: string;
  status: string;
  startedAt?: Date;
  completedAt: Date;
  /** Elapsed seconds, measured from submission when known, otherwise from start */
  elapsedSeconds?: number;
  measuredFrom?: 'submission' | 'start';
  results?: JsonValue;
  output?: string;
  error?: string;
}

export type TaskOutcomeState = 'done' | 'timed_out' | 'cancelled';

export interface TaskOutcome {
  state: TaskOutcomeState;
  taskId: string;
  polls: number;
  /** How DONE was decided */
  completedVia?: 'instances' | 'counts';
  instances: InstanceReport[];
  /** Longest elapsed time across instances, measured from submission */
  totalElapsedSeconds?: number;
}
