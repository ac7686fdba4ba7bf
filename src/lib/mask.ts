/**
 * Secret masking
 * 機密遮罩 - 除錯輸出與稽核前一律遮罩
 */

import { isJsonObject, type JsonValue } from '../types/json.js';

const SECRET_VISIBLE = 2;
const TOKEN_VISIBLE = 4;

/** Keys whose string values are bearer-style tokens */
export const TOKEN_FIELD_NAMES: ReadonlySet<string> = new Set(['access_token', 'refresh_token', 'token']);

/** Keys whose string values are client secrets */
export const SECRET_FIELD_NAMES: ReadonlySet<string> = new Set(['client_secret']);

function maskKeepingEnds(value: string, visible: number): string {
  if (!value) {
    return value;
  }
  if (value.length <= visible * 2) {
    return '*'.repeat(value.length);
  }
  return `${value.slice(0, visible)}${'*'.repeat(value.length - visible * 2)}${value.slice(-visible)}`;
}

/**
 * 遮罩 client secret：保留前後各 2 字元
 */
export function maskSecret(secret: string): string {
  return maskKeepingEnds(secret, SECRET_VISIBLE);
}

/**
 * 遮罩 bearer token：保留前後各 4 字元
 */
export function maskToken(token: string): string {
  return maskKeepingEnds(token, TOKEN_VISIBLE);
}

/**
 * Mask the token segment of an `Authorization: Bearer <token>` value.
 * Other schemes pass through untouched.
 */
export function maskAuthorization(value: string): string {
  if (!value) {
    return value;
  }
  if (value.toLowerCase().startsWith('bearer ')) {
    return `Bearer ${maskToken(value.slice('bearer '.length))}`;
  }
  return value;
}

export function maskHeaders(headers: Record<string, string>): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    masked[key] = key.toLowerCase() === 'authorization' ? maskAuthorization(value) : value;
  }
  return masked;
}

/**
 * 遞迴遮罩 token 欄位（object / array / scalar）
 */
export function maskTokenFields(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map((item) => maskTokenFields(item));
  }
  if (isJsonObject(value)) {
    const masked: Record<string, JsonValue> = {};
    for (const [key, item] of Object.entries(value)) {
      if (TOKEN_FIELD_NAMES.has(key) && typeof item === 'string') {
        masked[key] = maskToken(item);
      } else if (SECRET_FIELD_NAMES.has(key) && typeof item === 'string') {
        masked[key] = maskSecret(item);
      } else {
        masked[key] = maskTokenFields(item);
      }
    }
    return masked;
  }
  return value;
}

/**
 * Mask a token request body: `client_secret` plus any token fields.
 */
export function maskCredentials<T extends Record<string, string | undefined>>(body: T): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const [key, value] of Object.entries(body)) {
    if (value === undefined) {
      continue;
    }
    if (SECRET_FIELD_NAMES.has(key)) {
      masked[key] = maskSecret(value);
    } else if (TOKEN_FIELD_NAMES.has(key)) {
      masked[key] = maskToken(value);
    } else {
      masked[key] = value;
    }
  }
  return masked;
}
