/**
 * Prompt types
 * 互動輸入介面（readline 實作或測試替身）
 */

export interface Prompter {
  /** 讀取一行輸入（不含換行） */
  ask(question: string): Promise<string>;
  /** 輸出一行訊息 */
  print(message: string): void;
}
