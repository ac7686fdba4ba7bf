import type { JsonObject } from './json.js';

/**
 * OAuth2 Token Response
 */
export interface TokenResponse {
  access_token: string;
  expires_in?: number;
  token_type?: string;
  scope?: string;
}

/**
 * 一次交換的結果：正規化後的 token 與伺服器回傳的原始內容
 */
export interface TokenExchange {
  token: TokenResponse;
  body: JsonObject;
}

/**
 * Live access token with expiry
 */
export interface AuthToken {
  readonly accessToken: string;
  readonly expiresAt: number; // Unix timestamp (ms)
}

/**
 * 單次 token 交換的請求內容
 */
export type TokenRequestBody = {
  grant_type: 'client_credentials';
  client_id: string;
  client_secret: string;
  scope?: string;
};
