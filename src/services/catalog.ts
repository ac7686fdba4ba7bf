/**
 * Catalog Service
 * 查詢快取 - 公司、端點、腳本與任務定義（僅存在於本次工作階段的記憶體）
 */

import { formatError, type RateLimitedError } from './errors.js';
import { waitOutRateLimits, withRateLimitRetry, type RateLimitWaitOptions } from './rate-limit.js';
import type { AutomationApiClient } from './api.js';
import { loggers } from '../lib/logger.js';
import { pickString } from '../lib/payload-fields.js';
import type { Company, Endpoint, Script, TaskDefinition } from '../types/api.js';

export type CatalogApi = Pick<
  AutomationApiClient,
  'listCompanies' | 'listCompanyEndpoints' | 'getEndpointDetail' | 'listScripts' | 'listTaskDefinitions'
>;

export interface CatalogOptions {
  /** 速率限制時的等待設定（取消訊號、倒數回報），每次等待前取得 */
  waitOptions?: () => RateLimitWaitOptions;
  onRateLimit?: (error: RateLimitedError) => void;
  /** 非速率限制的查詢失敗（略過該筆，不中斷清單） */
  onLookupError?: (message: string) => void;
}

export interface LoadOptions {
  forceRefresh?: boolean;
}

/**
 * 選單與解析用的別名
 */
export function companyAliases(company: Company): string[] {
  return [pickString(company, ['id']), pickString(company, ['name']), pickString(company, ['friendlyName'])].filter(
    Boolean
  );
}

export function endpointAliases(endpoint: Endpoint): string[] {
  return [
    pickString(endpoint, ['endpointId']),
    pickString(endpoint, ['friendlyName']),
    pickString(endpoint, ['name']),
  ].filter(Boolean);
}

export function scriptAliases(script: Script): string[] {
  return [pickString(script, ['id']), pickString(script, ['name'])].filter(Boolean);
}

export class CatalogService {
  private api: CatalogApi;
  private options: CatalogOptions;

  private companies: Company[] | null = null;
  private companiesById = new Map<string, Company>();
  private companyIdsByName = new Map<string, string>();
  private endpointsByCompany = new Map<string, Endpoint[]>();
  private endpointDetails = new Map<string, Endpoint>();
  private scripts: Script[] | null = null;
  private taskDefinitions: TaskDefinition[] | null = null;

  constructor(api: CatalogApi, options: CatalogOptions = {}) {
    this.api = api;
    this.options = options;
  }

  /**
   * 清單請求：等待速率限制後重試
   * @throws OperationCancelledError 等待中被取消
   */
  private retry<T>(fn: () => Promise<T>): Promise<T> {
    return waitOutRateLimits(fn, {
      ...this.options.waitOptions?.(),
      onRateLimited: (error) => this.options.onRateLimit?.(error),
    });
  }

  /**
   * 清除所有快取
   */
  clear(): void {
    this.companies = null;
    this.companiesById.clear();
    this.companyIdsByName.clear();
    this.endpointsByCompany.clear();
    this.endpointDetails.clear();
    this.scripts = null;
    this.taskDefinitions = null;
  }

  async loadCompanies(options: LoadOptions = {}): Promise<Company[]> {
    if (this.companies && !options.forceRefresh) {
      return this.companies;
    }

    const companies = await loggers.catalog.trackAsync('Load companies', () =>
      this.retry(() => this.api.listCompanies())
    );
    this.companiesById.clear();
    this.companyIdsByName.clear();
    for (const company of companies) {
      const id = pickString(company, ['id']);
      this.companiesById.set(id, company);
      for (const key of ['name', 'friendlyName']) {
        const name = pickString(company, [key]);
        if (name) {
          this.companyIdsByName.set(name.toLowerCase(), id);
        }
      }
    }
    this.companies = companies;
    return companies;
  }

  /**
   * 以 id、名稱（不分大小寫）或上次列表的序號（從 1 開始）解析公司
   */
  async resolveCompany(identifier: string): Promise<Company | undefined> {
    const key = identifier.trim();
    if (!key) {
      return undefined;
    }
    const companies = await this.loadCompanies();

    const byId = this.companiesById.get(key);
    if (byId) {
      return byId;
    }
    const namedId = this.companyIdsByName.get(key.toLowerCase());
    if (namedId !== undefined) {
      return this.companiesById.get(namedId);
    }
    if (/^\d+$/.test(key)) {
      const index = Number.parseInt(key, 10);
      if (index >= 1 && index <= companies.length) {
        return companies[index - 1];
      }
    }
    return undefined;
  }

  /**
   * 公司的端點；缺少顯示名稱者以端點明細補上
   */
  async loadEndpoints(companyId: string, options: LoadOptions = {}): Promise<Endpoint[]> {
    const cached = this.endpointsByCompany.get(companyId);
    if (cached && !options.forceRefresh) {
      return cached;
    }

    const endpoints = await loggers.catalog.trackAsync(
      'Load endpoints',
      () => this.retry(() => this.api.listCompanyEndpoints(companyId)),
      { companyId }
    );

    const filled: Endpoint[] = [];
    for (const endpoint of endpoints) {
      const endpointId = pickString(endpoint, ['endpointId']);
      if (!endpointId || pickString(endpoint, ['friendlyName'])) {
        filled.push(endpoint);
        continue;
      }
      const detail = await this.getEndpointDetail(endpointId);
      const friendly = detail ? pickString(detail, ['friendlyName', 'name']) : '';
      filled.push(friendly ? { ...endpoint, friendlyName: friendly } : endpoint);
    }

    this.endpointsByCompany.set(companyId, filled);
    return filled;
  }

  /**
   * 端點明細（速率限制時等待後重試；其他錯誤回報後回傳 undefined）
   */
  async getEndpointDetail(endpointId: string): Promise<Endpoint | undefined> {
    const cached = this.endpointDetails.get(endpointId);
    if (cached) {
      return cached;
    }

    try {
      const outcome = await withRateLimitRetry(() => this.api.getEndpointDetail(endpointId), {
        ...this.options.waitOptions?.(),
        onRateLimited: (error) => this.options.onRateLimit?.(error),
      });
      if (!outcome.completed) {
        return undefined;
      }
      this.endpointDetails.set(endpointId, outcome.value);
      return outcome.value;
    } catch (error) {
      const message = `Failed to fetch details for endpoint ${endpointId}: ${formatError(error)}`;
      loggers.catalog.info('Endpoint detail lookup failed', { endpointId, error: formatError(error) });
      this.options.onLookupError?.(message);
      return undefined;
    }
  }

  async loadScripts(options: LoadOptions = {}): Promise<Script[]> {
    if (this.scripts && !options.forceRefresh) {
      return this.scripts;
    }
    this.scripts = await loggers.catalog.trackAsync('Load scripts', () => this.retry(() => this.api.listScripts()));
    return this.scripts;
  }

  /**
   * 任務定義（載入失敗時回報並視為空清單）
   */
  async loadTaskDefinitions(): Promise<TaskDefinition[]> {
    if (this.taskDefinitions) {
      return this.taskDefinitions;
    }

    let definitions: TaskDefinition[] = [];
    try {
      const outcome = await withRateLimitRetry(() => this.api.listTaskDefinitions(), {
        ...this.options.waitOptions?.(),
        onRateLimited: (error) => this.options.onRateLimit?.(error),
      });
      if (!outcome.completed) {
        return [];
      }
      definitions = outcome.value;
    } catch (error) {
      loggers.catalog.info('Task definitions lookup failed', { error: formatError(error) });
      this.options.onLookupError?.(`Failed to load task definitions: ${formatError(error)}`);
    }
    this.taskDefinitions = definitions;
    return definitions;
  }

  /**
   * 依範本 id、定義 id、名稱的順序找出腳本的任務定義
   */
  async findTaskDefinitionForScript(script: Script): Promise<TaskDefinition | undefined> {
    const scriptId = pickString(script, ['id']);
    const scriptName = pickString(script, ['name']);
    const definitions = await this.loadTaskDefinitions();

    return (
      definitions.find((definition) => {
        const templateId = pickString(definition, ['templateID', 'templateId']);
        return templateId !== '' && templateId === scriptId;
      }) ??
      definitions.find((definition) => {
        const definitionId = pickString(definition, ['id']);
        return definitionId !== '' && definitionId === scriptId;
      }) ??
      definitions.find((definition) => scriptName !== '' && pickString(definition, ['name']) === scriptName)
    );
  }
}
