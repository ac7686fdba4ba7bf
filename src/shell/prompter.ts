/**
 * Prompter
 * 互動選單 - readline 輸入與編號/別名選擇
 */

import type { Interface } from 'node:readline/promises';
import { renderTable, type Output } from './render.js';
import type { JsonObject } from '../types/json.js';
import type { Prompter } from '../types/prompt.js';

export class ReadlinePrompter implements Prompter {
  private open: () => Interface;
  private output: Output;
  private signal: () => AbortSignal | undefined;

  /**
   * @param open 取得 readline 介面（可延遲建立）
   * @param signal 目前操作的取消訊號；中斷時等待中的提問會被放棄
   */
  constructor(open: () => Interface, output: Output, signal: () => AbortSignal | undefined = () => undefined) {
    this.open = open;
    this.output = output;
    this.signal = signal;
  }

  ask(question: string): Promise<string> {
    const rl = this.open();
    const signal = this.signal();
    return signal ? rl.question(question, { signal }) : rl.question(question);
  }

  print(message: string): void {
    this.output.log(message);
  }
}

/**
 * 別名（不分大小寫）→ 符合的項目
 */
export function buildAliasMap<T>(
  items: readonly T[],
  label: (item: T) => string,
  aliases: (item: T) => string[] = () => []
): Map<string, T[]> {
  const map = new Map<string, T[]>();
  for (const item of items) {
    for (const alias of [label(item), ...aliases(item)]) {
      const key = alias.trim().toLowerCase();
      if (!key) {
        continue;
      }
      const matches = map.get(key) ?? [];
      if (!matches.includes(item)) {
        matches.push(item);
      }
      map.set(key, matches);
    }
  }
  return map;
}

export interface ChooseOptions<T> {
  label: (item: T) => string;
  aliases?: (item: T) => string[];
}

/**
 * 顯示編號清單並讀取選擇（序號或別名）；空白輸入視為取消
 */
export async function chooseItem<T extends JsonObject>(
  prompter: Prompter,
  title: string,
  items: readonly T[],
  options: ChooseOptions<T>
): Promise<T | undefined> {
  prompter.print(
    renderTable(
      ['#', 'Description'],
      items.map((item, index) => [String(index + 1), options.label(item)]),
      title
    )
  );

  const selection = (await prompter.ask(`${title} (enter number or blank to cancel): `)).trim();
  if (!selection) {
    return undefined;
  }

  if (/^[+-]?\d+$/.test(selection)) {
    const index = Number.parseInt(selection, 10);
    if (index >= 1 && index <= items.length) {
      return items[index - 1];
    }
    prompter.print('Selection out of range.');
    return undefined;
  }

  const matches = buildAliasMap(items, options.label, options.aliases).get(selection.toLowerCase());
  if (!matches || matches.length === 0) {
    prompter.print('Invalid selection.');
    return undefined;
  }
  if (matches.length > 1) {
    prompter.print('Selection matched multiple entries. Please choose by number to disambiguate.');
    return undefined;
  }
  return matches[0];
}
