/**
 * Debug recorder
 * 除錯事件接收者 - 只會收到已遮罩的內容
 */
export interface DebugRecorder {
  record(event: string, payload?: unknown): void;
}
