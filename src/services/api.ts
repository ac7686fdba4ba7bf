/**
 * Automation Platform API Client
 * 自動化平台 API 客戶端 - 公司、端點、腳本與任務
 */

import { isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';
import type {
  Company,
  Endpoint,
  HttpMethod,
  RequestOptions,
  ScheduleScriptInput,
  ScheduleTaskRequest,
  Script,
  Site,
  TaskDefinition,
  TaskSchedule,
} from '../types/api.js';

const API_BASE = '/api/platform/v1';

export const DEFAULT_TASK_NAME = 'Automation Task';

export const DEFAULT_SCHEDULE: TaskSchedule = {
  regularity: 'Immediate',
  category: 'STZ',
  scheduleType: 'TIME',
};

/**
 * 單一請求執行者（RateLimitedExecutor 或測試替身）
 */
export interface RequestExecutor {
  execute(method: HttpMethod, path: string, options?: RequestOptions): Promise<JsonValue>;
}

/**
 * 清單回應可能是陣列，或包在複數名稱的欄位中
 */
export function unwrapList(data: JsonValue, key: string): JsonObject[] {
  const list = isJsonObject(data) && Array.isArray(data[key]) ? data[key] : data;
  return Array.isArray(list) ? list.filter(isJsonObject) : [];
}

function asObject(data: JsonValue): JsonObject {
  return isJsonObject(data) ? data : { value: data };
}

export class AutomationApiClient {
  private executor: RequestExecutor;

  constructor(executor: RequestExecutor) {
    this.executor = executor;
  }

  async listCompanies(): Promise<Company[]> {
    const data = await this.executor.execute('GET', `${API_BASE}/company/companies`);
    return unwrapList(data, 'companies');
  }

  async listCompanySites(companyId: string): Promise<Site[]> {
    const data = await this.executor.execute(
      'GET',
      `${API_BASE}/company/companies/${encodeURIComponent(companyId)}/sites`
    );
    return unwrapList(data, 'sites');
  }

  async listCompanyEndpoints(companyId: string): Promise<Endpoint[]> {
    const data = await this.executor.execute(
      'GET',
      `${API_BASE}/device/clients/${encodeURIComponent(companyId)}/endpoints`
    );
    return unwrapList(data, 'endpoints');
  }

  async getEndpointDetail(endpointId: string): Promise<Endpoint> {
    const data = await this.executor.execute(
      'GET',
      `${API_BASE}/device/endpoints/${encodeURIComponent(endpointId)}`
    );
    return asObject(data);
  }

  async listScripts(): Promise<Script[]> {
    const data = await this.executor.execute('GET', `${API_BASE}/automation/scripts`);
    return unwrapList(data, 'scripts');
  }

  /**
   * 任務定義（含參數 JSON Schema 與範例參數）
   */
  async listTaskDefinitions(): Promise<TaskDefinition[]> {
    const data = await this.executor.execute('GET', `${API_BASE}/automation/tasks`);
    return unwrapList(data, 'tasks');
  }

  /**
   * 排程腳本在一個或多個端點上執行
   */
  async scheduleScript(input: ScheduleScriptInput): Promise<JsonObject> {
    const payload: ScheduleTaskRequest = {
      name: input.name || DEFAULT_TASK_NAME,
      templateType: input.templateType,
      templateID: input.templateId,
      targets: [...input.endpointIds],
      targetType: 'MANAGED_ENDPOINT',
      resourcesType: input.resourcesType ?? 'Both',
      schedule: input.schedule ?? DEFAULT_SCHEDULE,
    };
    if (input.userParameters !== undefined && input.userParameters !== null) {
      payload.userParameters = input.userParameters;
    }

    const data = await this.executor.execute('POST', `${API_BASE}/automation/endpoints/schedule-tasks`, {
      body: payload,
    });
    return asObject(data);
  }

  async getTaskInstancesSummary(taskId: string): Promise<JsonValue> {
    return this.executor.execute(
      'GET',
      `${API_BASE}/automation/tasks/${encodeURIComponent(taskId)}/instances/summary`
    );
  }

  async getTaskInstanceResults(taskId: string, instanceId: string): Promise<JsonValue> {
    return this.executor.execute(
      'GET',
      `${API_BASE}/automation/tasks/${encodeURIComponent(taskId)}/instances/${encodeURIComponent(instanceId)}/results`
    );
  }
}
