/**
 * Auth Service
 * OAuth2 認證服務 - client credentials 交換、到期追蹤與透明更新
 */

import { ofetch, type FetchResponse } from 'ofetch';
import { AuthError, MalformedResponseError, RateLimitedError } from './errors.js';
import { parseRetryAfter } from './rate-limit.js';
import { parseScopes } from './config.js';
import { loggers } from '../lib/logger.js';
import { maskCredentials, maskHeaders, maskTokenFields } from '../lib/mask.js';
import {
  recordAuthCacheHit,
  recordAuthCacheMiss,
  recordAuthTokenRequest,
  recordRateLimited,
} from '../lib/metrics.js';
import { isJsonObject, toJsonValue, type JsonObject } from '../types/json.js';
import type { AuthToken, TokenExchange, TokenRequestBody, TokenResponse } from '../types/auth.js';
import type { AppConfig } from '../types/config.js';
import type { DebugRecorder } from '../types/debug.js';

// Token 提前 30 秒過期，避免與進行中的請求競爭
export const TOKEN_EXPIRY_BUFFER_SECONDS = 30;

// 伺服器未提供 expires_in 時的預設值
export const DEFAULT_EXPIRES_IN_SECONDS = 3600;

const REQUEST_TIMEOUT_MS = 30_000;

export type TokenManagerConfig = Pick<AppConfig, 'clientId' | 'clientSecret' | 'scope' | 'tokenEndpoint'>;

export interface TokenManagerOptions {
  /** 接收已遮罩的登入流程訊息 */
  loginRecorder?: DebugRecorder;
  /** 接收已遮罩的 HTTP 請求/回應快照 */
  httpRecorder?: DebugRecorder;
  /** 時鐘（測試用） */
  now?: () => number;
}

export function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

function coerceExpiresIn(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return DEFAULT_EXPIRES_IN_SECONDS;
}

function toTokenResponse(data: JsonObject, accessToken: string): TokenResponse {
  return {
    access_token: accessToken,
    expires_in: coerceExpiresIn(data.expires_in),
    token_type: typeof data.token_type === 'string' ? data.token_type : undefined,
    scope: typeof data.scope === 'string' ? data.scope : undefined,
  };
}

export class TokenManager {
  private config: TokenManagerConfig;
  private cachedToken: AuthToken | null = null;
  private loginRecorder?: DebugRecorder;
  private httpRecorder?: DebugRecorder;
  private now: () => number;

  // 單一飛行請求：同時間只發出一個 token 交換
  private inFlightTokenPromise: Promise<AuthToken> | null = null;

  constructor(config: TokenManagerConfig, options: TokenManagerOptions = {}) {
    this.config = config;
    this.loginRecorder = options.loginRecorder;
    this.httpRecorder = options.httpRecorder;
    this.now = options.now ?? Date.now;
  }

  /**
   * 取得有效的 Access Token
   * - 快取有效：直接返回
   * - 已過期或不存在：同步更新後再返回
   */
  async getValidToken(): Promise<AuthToken> {
    if (this.cachedToken && this.isTokenValid()) {
      recordAuthCacheHit();
      return this.cachedToken;
    }

    if (this.inFlightTokenPromise) {
      return this.inFlightTokenPromise;
    }

    recordAuthCacheMiss();
    this.inFlightTokenPromise = this.renew();

    try {
      return await this.inFlightTokenPromise;
    } finally {
      this.inFlightTokenPromise = null;
    }
  }

  private async renew(): Promise<AuthToken> {
    const { token: response } = await this.exchange(parseScopes(this.config.scope));
    const lifetimeSeconds = Math.max(
      0,
      (response.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS) - TOKEN_EXPIRY_BUFFER_SECONDS
    );

    // 整個替換，不就地修改
    const token: AuthToken = {
      accessToken: response.access_token,
      expiresAt: this.now() + lifetimeSeconds * 1000,
    };
    this.cachedToken = token;

    loggers.auth.info('Access token renewed', { expiresInSeconds: lifetimeSeconds });

    return token;
  }

  /**
   * 檢查快取的 token 是否有效
   */
  isTokenValid(): boolean {
    if (!this.cachedToken) {
      return false;
    }
    return this.now() < this.cachedToken.expiresAt;
  }

  setLoginRecorder(recorder?: DebugRecorder): void {
    this.loginRecorder = recorder;
  }

  setHttpRecorder(recorder?: DebugRecorder): void {
    this.httpRecorder = recorder;
  }

  /**
   * 執行一次不經快取的 client credentials 交換
   * 範圍探測也使用此路徑
   * @throws RateLimitedError HTTP 429（不影響現有快取）
   * @throws AuthError 其他錯誤狀態或連線失敗
   * @throws MalformedResponseError 回應缺少 access_token
   */
  async exchange(scopes: readonly string[]): Promise<TokenExchange> {
    const scope = scopes
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
      .join(' ');

    const body: TokenRequestBody = {
      grant_type: 'client_credentials',
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
    };
    if (scope) {
      body.scope = scope;
    }

    const endpoint = this.config.tokenEndpoint;
    const maskedBody = maskCredentials(body);
    this.loginRecorder?.record(`POST ${endpoint}`, maskedBody);
    this.httpRecorder?.record('REQUEST', {
      method: 'POST',
      url: endpoint,
      headers: { 'Content-Type': 'application/json' },
      query: null,
      body: maskedBody,
    });

    let response: FetchResponse<unknown>;
    try {
      response = await ofetch.raw<unknown>(endpoint, {
        method: 'POST',
        body,
        ignoreResponseError: true,
        retry: 0,
        timeout: REQUEST_TIMEOUT_MS,
      });
    } catch (error) {
      recordAuthTokenRequest('failed');
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthError(`Token request failed: ${message}`, { cause: error });
    }

    const data = toJsonValue(response._data);
    const maskedData = maskTokenFields(data);

    this.loginRecorder?.record('Token endpoint response status', response.status);
    this.httpRecorder?.record('RESPONSE', {
      status: response.status,
      url: response.url || endpoint,
      headers: maskHeaders(headersToRecord(response.headers)),
      body: maskedData,
    });

    if (response.status === 429) {
      recordRateLimited('token');
      recordAuthTokenRequest('rate_limited');
      throw new RateLimitedError(parseRetryAfter(response.headers));
    }

    if (!response.ok) {
      recordAuthTokenRequest('failed');
      loggers.auth.warn('Token request rejected', { statusCode: response.status, url: endpoint });
      throw new AuthError(`Token request failed with HTTP ${response.status}`, {
        status: response.status,
        body: maskedData,
      });
    }

    this.loginRecorder?.record('Token endpoint response body', maskedData);

    const accessToken = isJsonObject(data) ? data.access_token : undefined;
    if (!isJsonObject(data) || typeof accessToken !== 'string' || accessToken.length === 0) {
      recordAuthTokenRequest('failed');
      throw new MalformedResponseError('Token response is missing access_token', {
        status: response.status,
        body: maskedData,
      });
    }

    recordAuthTokenRequest('success');
    return { token: toTokenResponse(data, accessToken), body: data };
  }
}
