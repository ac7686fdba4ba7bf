/**
 * Rate-Limited Executor
 * 單一 HTTP 請求執行：token 保護、429 偵測、遮罩除錯快照
 */

import { ofetch, type FetchResponse } from 'ofetch';
import { HttpError, RateLimitedError } from './errors.js';
import { parseRetryAfter } from './rate-limit.js';
import { headersToRecord } from './auth.js';
import { loggers } from '../lib/logger.js';
import { maskHeaders, maskTokenFields } from '../lib/mask.js';
import { recordApiRequest, recordRateLimited } from '../lib/metrics.js';
import { toJsonValue, type JsonValue } from '../types/json.js';
import type { AuthToken } from '../types/auth.js';
import type { HttpMethod, RequestOptions } from '../types/api.js';
import type { DebugRecorder } from '../types/debug.js';

const REQUEST_TIMEOUT_MS = 30_000;

/**
 * Anything that can hand out a currently valid token.
 */
export interface TokenSource {
  getValidToken(): Promise<AuthToken>;
}

export interface ExecutorOptions {
  /** 接收已遮罩的 HTTP 請求/回應快照 */
  httpRecorder?: DebugRecorder;
  timeoutMs?: number;
}

export class RateLimitedExecutor {
  private baseUrl: string;
  private tokens: TokenSource;
  private httpRecorder?: DebugRecorder;
  private timeoutMs: number;

  constructor(baseUrl: string, tokens: TokenSource, options: ExecutorOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.tokens = tokens;
    this.httpRecorder = options.httpRecorder;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  setHttpRecorder(recorder?: DebugRecorder): void {
    this.httpRecorder = recorder;
  }

  buildUrl(path: string): string {
    return `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
  }

  /**
   * 發送帶認證的 API 請求
   * @throws RateLimitedError HTTP 429（不在內部重試）
   * @throws HttpError 其他非 2xx 回應
   */
  async execute(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<JsonValue> {
    // 先取得 token（必要時同步更新）
    const token = await this.tokens.getValidToken();

    const url = this.buildUrl(path);
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token.accessToken}`,
      Accept: 'application/json',
    };

    const requestId = loggers.api.pushRequestId();
    const startTime = Date.now();

    try {
      this.httpRecorder?.record('REQUEST', {
        method,
        url,
        headers: maskHeaders(headers),
        query: options.query ?? null,
        body: options.body === undefined ? null : maskTokenFields(options.body),
      });

      const response: FetchResponse<unknown> = await ofetch.raw<unknown>(url, {
        method,
        headers,
        query: options.query,
        body: options.body,
        ignoreResponseError: true,
        retry: 0,
        timeout: this.timeoutMs,
      });

      // 空回應視為 {}
      const data = toJsonValue(response._data);
      const duration = Date.now() - startTime;

      this.httpRecorder?.record('RESPONSE', {
        status: response.status,
        url: response.url || url,
        headers: maskHeaders(headersToRecord(response.headers)),
        body: maskTokenFields(data),
      });

      recordApiRequest(method, response.status, duration);

      if (response.status === 429) {
        const retryAfterSeconds = parseRetryAfter(response.headers);
        recordRateLimited('api');
        loggers.api.info('API rate limited', { requestId, method, url, retryAfterSeconds });
        throw new RateLimitedError(retryAfterSeconds);
      }

      if (!response.ok) {
        loggers.api.warn('API request failed', { requestId, method, url, duration, statusCode: response.status });
        throw new HttpError(response.status, maskTokenFields(data), url);
      }

      loggers.api.debug('API request completed', { requestId, method, url, duration, statusCode: response.status });

      return data;
    } finally {
      loggers.api.popRequestId();
    }
  }
}
