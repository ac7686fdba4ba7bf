/**
 * Payload field lookup
 * 遠端回應欄位名稱不一致（大小寫、拼法），每個概念以固定順序嘗試候選欄位
 */

import { parseTimestamp } from './time-utils.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';

export const FIELD_NAMES = {
  /** Instance list inside a task summary */
  instanceList: ['Results', 'results', 'TaskInstances', 'taskInstances'],
  instanceId: ['taskInstanceId', 'TaskInstanceId', 'Id', 'id'],
  status: ['OverallStatus', 'overallStatus', 'Status', 'status'],
  /** Start time on a summary instance */
  summaryStart: ['ExecutedOn', 'executedOn', 'executionTime', 'StartTime', 'startTime'],
  /** Completion time on a summary instance */
  summaryCompletion: ['CompletedOn', 'completedOn', 'completionTime', 'CompletionTime', 'ModifiedOn', 'modifiedOn'],
  /** Entry list inside an instance results payload */
  resultEntries: ['Result', 'Results', 'items', 'data'],
  resultEntryId: ['taskInstanceId', 'instanceId'],
  resultStart: ['executionTime', 'executedOn', 'startTime', 'startedAt'],
  resultCompletion: ['completedOn', 'completionTime', 'createdOn', 'completedAt', 'finishedAt'],
  entryOutput: ['output', 'resultDetails', 'result', 'stdout', 'details', 'logs'],
  payloadOutput: ['output', 'resultDetails', 'result', 'stdout'],
  /** Task id in a schedule response */
  taskId: ['taskID', 'taskId'],
  /** Submission time in a schedule response */
  submittedAt: ['createdOn', 'CreatedOn'],
} as const satisfies Record<string, readonly string[]>;

function isPresent(value: JsonValue | undefined): value is JsonValue {
  if (value === undefined || value === null || value === false) {
    return false;
  }
  if (typeof value === 'string') {
    return value.trim().length > 0;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (isJsonObject(value)) {
    return Object.keys(value).length > 0;
  }
  return true;
}

/**
 * 依序回傳第一個存在且非空的值
 */
export function pickValue(record: JsonObject, keys: readonly string[]): JsonValue | undefined {
  for (const key of keys) {
    const value = record[key];
    if (isPresent(value)) {
      return value;
    }
  }
  return undefined;
}

export function stringifyValue(value: JsonValue | undefined): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * 第一個非空欄位的字串值（已去除空白），沒有則為空字串
 */
export function pickString(record: JsonObject, keys: readonly string[]): string {
  return stringifyValue(pickValue(record, keys)).trim();
}

/**
 * 第一個可解析為時間的欄位
 */
export function pickTimestamp(record: JsonObject, keys: readonly string[]): Date | undefined {
  for (const key of keys) {
    const parsed = parseTimestamp(record[key]);
    if (parsed) {
      return parsed;
    }
  }
  return undefined;
}

function objectsOnly(items: JsonValue[]): JsonObject[] {
  return items.filter(isJsonObject);
}

/**
 * 任務摘要中的執行個體清單；找不到清單時回傳 undefined
 */
export function extractSummaryInstances(summary: JsonValue): JsonObject[] | undefined {
  if (!isJsonObject(summary)) {
    return undefined;
  }
  for (const key of FIELD_NAMES.instanceList) {
    const value = summary[key];
    if (Array.isArray(value)) {
      return objectsOnly(value);
    }
  }
  return undefined;
}

export function extractResultEntries(results: JsonValue | undefined): JsonObject[] {
  if (Array.isArray(results)) {
    return objectsOnly(results);
  }
  if (isJsonObject(results)) {
    for (const key of FIELD_NAMES.resultEntries) {
      const value = results[key];
      if (Array.isArray(value)) {
        return objectsOnly(value);
      }
    }
  }
  return [];
}

/**
 * Result entries that belong to the instance (entries without an id are kept).
 */
export function entriesForInstance(results: JsonValue | undefined, instanceId: string): JsonObject[] {
  return extractResultEntries(results).filter((entry) => {
    const entryId = pickString(entry, FIELD_NAMES.resultEntryId);
    return !instanceId || !entryId || entryId === instanceId;
  });
}

/**
 * 取出執行個體的輸出文字
 */
export function extractInstanceOutput(results: JsonValue | undefined): string | undefined {
  for (const entry of extractResultEntries(results)) {
    const value = pickValue(entry, FIELD_NAMES.entryOutput);
    if (value !== undefined) {
      return stringifyValue(value);
    }
  }
  if (isJsonObject(results)) {
    const value = pickValue(results, FIELD_NAMES.payloadOutput);
    if (value !== undefined) {
      return stringifyValue(value);
    }
  }
  return undefined;
}

/**
 * Coerce a count field to an integer; anything unreadable counts as zero.
 */
export function coerceCount(value: JsonValue | undefined): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return 0;
}
