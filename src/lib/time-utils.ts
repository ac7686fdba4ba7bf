/**
 * Time Utils Module
 * 時間工具模組 - 解析遠端時間戳記與格式化經過時間
 */

const ISO_PATTERN = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?(?:Z|[+-]\d{2}:?\d{2})?$/i;
const OFFSET_PATTERN = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * 解析 ISO 8601 時間戳記
 * 沒有時區的時間視為 UTC；無法解析時回傳 undefined
 */
export function parseTimestamp(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value;
  }
  if (typeof value !== 'string') {
    return undefined;
  }

  let text = value.trim();
  if (!text || !ISO_PATTERN.test(text)) {
    return undefined;
  }

  text = text
    .replace(/^(\d{4}-\d{2}-\d{2}) /, '$1T')
    // 毫秒以下的位數 Date.parse 不一定接受
    .replace(/(\.\d{3})\d+/, '$1')
    .replace(/([+-]\d{2})(\d{2})$/, '$1:$2')
    .replace(/z$/, 'Z');

  if (text.includes('T') && !OFFSET_PATTERN.test(text)) {
    text += 'Z';
  }

  const ms = Date.parse(text);
  return Number.isNaN(ms) ? undefined : new Date(ms);
}

/**
 * 兩個時間點之間的秒數（不為負）
 */
export function elapsedSeconds(from: Date, to: Date): number {
  return Math.max(0, (to.getTime() - from.getTime()) / 1000);
}

/**
 * 格式化經過時間，例如 125 → "2m 5s"、3725 → "1h 2m 5s"
 */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.round(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  const parts: string[] = [];
  if (hours) {
    parts.push(`${hours}h`);
  }
  if (minutes || hours) {
    parts.push(`${minutes}m`);
  }
  parts.push(`${secs}s`);
  return parts.join(' ');
}
