/**
 * Config Service
 * 設定管理服務 - .env、環境變數與設定檔
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import dotenv from 'dotenv';
import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from '../lib/logger.js';
import { isJsonObject } from '../types/json.js';
import type { AppConfig, StoredConfig } from '../types/config.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'asio-shell');
const DEFAULT_CONFIG_FILE = 'config.json';

export const ENV_BASE_URL = 'ASIO_BASE_URL';
export const ENV_CLIENT_ID = 'ASIO_CLIENT_ID';
export const ENV_CLIENT_SECRET = 'ASIO_CLIENT_SECRET';
export const ENV_SCOPE = 'ASIO_SCOPE';
export const ENV_LOG_LEVEL = 'ASIO_LOG_LEVEL';

export const DEFAULT_SCOPES: readonly string[] = [
  'platform.companies.read',
  'platform.devices.read',
  'platform.custom_fields_values.read',
  'platform.sites.write',
  'platform.tickets.update',
  'platform.sites.read',
  'platform.policies.read',
  'platform.dataMapping.read',
  'platform.tickets.create',
  'platform.asset.read',
  'platform.deviceGroups.read',
  'platform.automation.read',
  'platform.automation.create',
  'platform.policies.create',
  'platform.custom_fields_definitions.write',
  'platform.tickets.read',
  'platform.agent.delete',
  'platform.policies.delete',
  'platform.policies.update',
  'platform.custom_fields_values.write',
  'platform.custom_fields_definitions.read',
  'platform.patching.read',
  'platform.agent-token.read',
  'platform.agent.read',
];

export const DEFAULT_SCOPE_STRING = DEFAULT_SCOPES.join(' ');

export interface ConfigServiceOptions {
  /** 設定檔路徑 */
  configPath?: string;
  /** .env 路徑（預設為工作目錄下的 .env） */
  dotenvPath?: string;
  /** 環境變數來源（測試用） */
  env?: NodeJS.ProcessEnv;
}

/**
 * Split a scope string into tokens. Surrounding quotes are tolerated.
 */
export function parseScopes(scope: string): string[] {
  return scope
    .trim()
    .replace(/^["']|["']$/g, '')
    .split(/\s+/)
    .filter((item) => item.length > 0);
}

function toStoredConfig(value: unknown): StoredConfig {
  if (!isJsonObject(value)) {
    return {};
  }
  const text = (key: string): string | undefined => {
    const item = value[key];
    return typeof item === 'string' ? item : undefined;
  };
  const logLevel = text('logLevel');
  return {
    baseUrl: text('baseUrl'),
    clientId: text('clientId'),
    clientSecret: text('clientSecret'),
    scope: text('scope'),
    logLevel: isLogLevel(logLevel) ? logLevel : undefined,
  };
}

export class ConfigService {
  private configPath: string;
  private stored: StoredConfig;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigServiceOptions = {}) {
    this.configPath = options.configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.env = options.env ?? process.env;

    const dotenvPath = options.dotenvPath ?? path.resolve('.env');
    if (fs.existsSync(dotenvPath)) {
      const parsed = dotenv.parse(fs.readFileSync(dotenvPath));
      for (const [name, value] of Object.entries(parsed)) {
        // 已存在的環境變數優先
        if (this.env[name] === undefined) {
          this.env[name] = value;
        }
      }
    }

    this.stored = this.load();
  }

  /**
   * 載入設定檔
   */
  private load(): StoredConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }
    const content = fs.readFileSync(this.configPath, 'utf-8');
    try {
      return toStoredConfig(JSON.parse(content));
    } catch (error) {
      throw new ConfigError(
        `Invalid JSON in ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 環境變數優先，其次設定檔
   */
  private read(envName: string, key: keyof StoredConfig): string | undefined {
    const envValue = this.env[envName];
    if (envValue && envValue.trim().length > 0) {
      return envValue.trim();
    }
    const storedValue = this.stored[key];
    return typeof storedValue === 'string' && storedValue.trim().length > 0 ? storedValue.trim() : undefined;
  }

  getBaseUrl(): string | undefined {
    return this.read(ENV_BASE_URL, 'baseUrl')?.replace(/\/+$/, '');
  }

  getClientId(): string | undefined {
    return this.read(ENV_CLIENT_ID, 'clientId');
  }

  getClientSecret(): string | undefined {
    return this.read(ENV_CLIENT_SECRET, 'clientSecret');
  }

  getScope(): string {
    return this.read(ENV_SCOPE, 'scope') ?? DEFAULT_SCOPE_STRING;
  }

  getLogLevel(): LogLevel {
    const value = this.read(ENV_LOG_LEVEL, 'logLevel')?.toLowerCase();
    return isLogLevel(value) ? value : 'warn';
  }

  hasCredentials(): boolean {
    return Boolean(this.getBaseUrl() && this.getClientId() && this.getClientSecret());
  }

  /**
   * 取得完整設定
   * @throws ConfigError 缺少必要設定時（列出所有缺少的變數）
   */
  getAppConfig(): AppConfig {
    const baseUrl = this.getBaseUrl();
    const clientId = this.getClientId();
    const clientSecret = this.getClientSecret();

    const missing = [
      [ENV_BASE_URL, baseUrl],
      [ENV_CLIENT_ID, clientId],
      [ENV_CLIENT_SECRET, clientSecret],
    ]
      .filter(([, value]) => !value)
      .map(([name]) => String(name));

    if (!baseUrl || !clientId || !clientSecret) {
      throw new ConfigError(
        `Missing required configuration environment variables: ${missing.join(', ')}`,
        missing
      );
    }

    return {
      baseUrl,
      clientId,
      clientSecret,
      scope: this.getScope(),
      tokenEndpoint: `${baseUrl}/v1/token`,
      logLevel: this.getLogLevel(),
    };
  }
}
