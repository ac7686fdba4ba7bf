/**
 * Render helpers
 * 輸出格式化 - cli-table3 表格、鍵值列表與除錯輸出
 */

import Table from 'cli-table3';
import { isJsonObject, type JsonValue } from '../types/json.js';
import type { DebugRecorder } from '../types/debug.js';

export type OutputFormat = 'table' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json'];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * 輸出目的地（預設為 console，測試時可替換）
 */
export interface Output {
  log(message: string): void;
  error(message: string): void;
}

export const consoleOutput: Output = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

/**
 * 表格儲存格文字：物件與陣列以 JSON 表示
 */
export function stringifyCell(value: JsonValue | undefined): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

export function renderTable(head: string[], rows: string[][], title?: string): string {
  const table = new Table({
    head,
    style: { head: ['cyan'] },
    wordWrap: true,
  });
  for (const row of rows) {
    table.push(row);
  }
  return title ? `${title}\n${table.toString()}` : table.toString();
}

/**
 * 以 Key/Value（物件）或 Index/Value（陣列）表格呈現任意 JSON
 */
export function renderRecord(data: JsonValue, title: string): string {
  if (isJsonObject(data)) {
    return renderTable(
      ['Key', 'Value'],
      Object.entries(data).map(([key, value]) => [key, stringifyCell(value)]),
      title
    );
  }
  if (Array.isArray(data)) {
    return renderTable(
      ['Index', 'Value'],
      data.map((value, index) => [String(index), stringifyCell(value)]),
      title
    );
  }
  return `${title}: ${stringifyCell(data)}`;
}

export function renderJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * 將除錯事件輸出為「標籤 事件」加上縮排 JSON
 */
export function createDebugPrinter(output: Output, label: string): DebugRecorder {
  return {
    record(event, payload) {
      output.error(`${label} ${event}`);
      if (payload !== undefined && payload !== null) {
        output.error(renderJson(payload));
      }
    },
  };
}
