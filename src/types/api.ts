/**
 * Platform API types
 * 自動化平台 API 型別 - 回應內容視為不透明 JSON
 */

import type { JsonObject, JsonValue } from './json.js';

export type Company = JsonObject;
export type Site = JsonObject;
export type Endpoint = JsonObject;
export type Script = JsonObject;
export type TaskDefinition = JsonObject;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean>;

export interface RequestOptions {
  query?: QueryParams;
  body?: JsonObject | JsonValue[];
}

/**
 * 排程設定
 */
export interface TaskSchedule extends JsonObject {
  regularity: string;
  category: string;
  scheduleType: string;
}

export interface ScheduleScriptInput {
  templateId: string;
  templateType: string;
  endpointIds: string[];
  name?: string;
  resourcesType?: string;
  schedule?: TaskSchedule;
  userParameters?: JsonValue;
}

/**
 * schedule-tasks 請求主體
 */
export interface ScheduleTaskRequest extends JsonObject {
  name: string;
  templateType: string;
  templateID: string;
  targets: string[];
  targetType: 'MANAGED_ENDPOINT';
  resourcesType: string;
  schedule: TaskSchedule;
}
