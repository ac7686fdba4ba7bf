/**
 * Error taxonomy
 * 錯誤分類 - 設定、認證、速率限制、HTTP、逾時、回應格式
 */

export interface AppErrorOptions {
  status?: number;
  body?: unknown;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly code: string;

  constructor(code: string, message: string, options: { cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'AppError';
    this.code = code;
  }
}

/**
 * 必要設定缺漏（在任何網路請求之前回報）
 */
export class ConfigError extends AppError {
  public readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super('CONFIG_MISSING', message);
    this.name = 'ConfigError';
    this.missing = missing;
  }
}

/**
 * Token 交換失敗（非速率限制）
 */
export class AuthError extends AppError {
  public readonly status?: number;
  /** Masked response body */
  public readonly body?: unknown;

  constructor(message: string, options: AppErrorOptions = {}, code = 'AUTH_FAILED') {
    super(code, message, options);
    this.name = 'AuthError';
    this.status = options.status;
    this.body = options.body;
  }
}

/**
 * 回應缺少必要欄位，例如 token 回應沒有 access_token
 */
export class MalformedResponseError extends AuthError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, options, 'MALFORMED_RESPONSE');
    this.name = 'MalformedResponseError';
  }
}

/**
 * HTTP 429 - 呼叫端可等待後重試
 */
export class RateLimitedError extends AppError {
  public readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number) {
    super('RATE_LIMITED', `Rate limited, retry after ${retryAfterSeconds}s`);
    this.name = 'RateLimitedError';
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * 非 2xx、非 429 回應
 */
export class HttpError extends AppError {
  public readonly status: number;
  /** Masked response body */
  public readonly body: unknown;
  public readonly url?: string;

  constructor(status: number, body: unknown, url?: string) {
    super('HTTP_ERROR', `HTTP ${status}${url ? ` for ${url}` : ''}`);
    this.name = 'HttpError';
    this.status = status;
    this.body = body;
    this.url = url;
  }
}

/**
 * 任務輪詢超過期限
 */
export class TaskTimeoutError extends AppError {
  public readonly taskId: string;
  public readonly timeoutSeconds: number;

  constructor(taskId: string, timeoutSeconds: number) {
    super('TASK_TIMEOUT', `Timed out after ${timeoutSeconds}s waiting for task ${taskId}`);
    this.name = 'TaskTimeoutError';
    this.taskId = taskId;
    this.timeoutSeconds = timeoutSeconds;
  }
}

/**
 * 操作者在等待速率限制時取消
 */
export class OperationCancelledError extends AppError {
  constructor(message = 'Operation cancelled') {
    super('CANCELLED', message);
    this.name = 'OperationCancelledError';
  }
}

export function isRateLimited(error: unknown): error is RateLimitedError {
  return error instanceof RateLimitedError;
}

function renderBody(body: unknown): string {
  if (body === undefined || body === null || body === '') {
    return '';
  }
  return typeof body === 'string' ? body : JSON.stringify(body);
}

/**
 * 轉換為操作者可讀的錯誤訊息
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigError) {
    return error.message;
  }
  if (error instanceof HttpError || error instanceof AuthError) {
    const body = renderBody(error.body);
    const status = error instanceof AuthError && error.status !== undefined ? ` (HTTP ${error.status})` : '';
    return `${error.message}${status}${body ? `: ${body}` : ''}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
