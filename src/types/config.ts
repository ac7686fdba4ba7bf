import type { LogLevel } from '../lib/logger.js';

/**
 * 設定檔結構（~/.config/asio-shell/config.json）
 */
export interface StoredConfig {
  /** Platform base URL */
  baseUrl?: string;
  /** OAuth client id */
  clientId?: string;
  /** OAuth client secret */
  clientSecret?: string;
  /** Space-separated scope list */
  scope?: string;
  /** 日誌最小級別 */
  logLevel?: LogLevel;
}

/**
 * 已驗證的執行期設定
 */
export interface AppConfig {
  readonly baseUrl: string;
  readonly clientId: string;
  readonly clientSecret: string;
  readonly scope: string;
  readonly tokenEndpoint: string;
  readonly logLevel: LogLevel;
}
