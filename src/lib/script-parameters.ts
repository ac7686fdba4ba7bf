/**
 * Script Parameters
 * 腳本參數 - 依任務定義的 JSON Schema 詢問並轉換參數值
 */

import { AppError } from '../services/errors.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';
import type { TaskDefinition } from '../types/api.js';
import type { Prompter } from '../types/prompt.js';

const TRUE_WORDS = new Set(['true', 't', 'yes', 'y', '1']);
const FALSE_WORDS = new Set(['false', 'f', 'no', 'n', '0']);

const INTEGER_PATTERN = /^[+-]?\d+$/;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export class ParameterValueError extends AppError {
  constructor(message: string) {
    super('INVALID_PARAMETER', message);
    this.name = 'ParameterValueError';
  }
}

/**
 * 寬鬆解析 JSON：物件/陣列原樣返回，字串嘗試解析，失敗則 undefined
 */
export function parseJsonLoose(value: JsonValue | undefined): JsonValue | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'object') {
    return value;
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const text = value.trim();
  if (!text) {
    return undefined;
  }
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

function display(value: JsonValue): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

/**
 * 依 schema 屬性轉換輸入值
 * @throws ParameterValueError 值不符合型別或列舉
 */
export function convertParameterValue(raw: string, property: JsonObject): JsonValue {
  const type = typeof property.type === 'string' && property.type ? property.type : 'string';
  const options = Array.isArray(property.enum) ? property.enum : undefined;

  if (options && options.length > 0) {
    for (const option of options) {
      if (raw === option || (typeof option === 'number' && raw === String(option))) {
        return option;
      }
    }
    const lowered = raw.trim().toLowerCase();
    for (const option of options) {
      if (typeof option === 'string' && option.toLowerCase() === lowered) {
        return option;
      }
    }
    throw new ParameterValueError(`Value must be one of: ${options.map(display).join(', ')}`);
  }

  const trimmed = raw.trim();
  switch (type) {
    case 'boolean': {
      const word = trimmed.toLowerCase();
      if (TRUE_WORDS.has(word)) {
        return true;
      }
      if (FALSE_WORDS.has(word)) {
        return false;
      }
      throw new ParameterValueError('Enter true/false');
    }
    case 'integer':
      if (!INTEGER_PATTERN.test(trimmed)) {
        throw new ParameterValueError('Enter an integer');
      }
      return Number.parseInt(trimmed, 10);
    case 'number':
      if (!NUMBER_PATTERN.test(trimmed)) {
        throw new ParameterValueError('Enter a numeric value');
      }
      return Number.parseFloat(trimmed);
    case 'array': {
      const parsed = parseJsonLoose(raw);
      if (Array.isArray(parsed)) {
        return parsed;
      }
      throw new ParameterValueError('Enter a JSON array');
    }
    case 'object': {
      const parsed = parseJsonLoose(raw);
      if (isJsonObject(parsed)) {
        return parsed;
      }
      throw new ParameterValueError('Enter a JSON object');
    }
    default:
      return raw;
  }
}

export interface ParameterSource {
  schema?: JsonObject;
  sample?: JsonValue;
}

/**
 * 從任務定義取出參數 schema 與範例值（兩者都可能是 JSON 字串）
 */
export function readParameterSource(definition: TaskDefinition | undefined): ParameterSource {
  if (!definition) {
    return {};
  }
  const schema = parseJsonLoose(definition.JSONSchema ?? definition.jsonSchema);
  return {
    schema: isJsonObject(schema) ? schema : undefined,
    sample: parseJsonLoose(definition.userParameters),
  };
}

/**
 * 以 schema 屬性逐一詢問；空白輸入採用範例或預設值
 */
export async function promptParametersFromSchema(
  schema: JsonObject,
  sample: JsonValue | undefined,
  prompter: Prompter
): Promise<JsonValue | undefined> {
  const properties = schema.properties;
  if (!isJsonObject(properties)) {
    return promptParametersManually(sample, prompter);
  }
  const required = new Set(Array.isArray(schema.required) ? schema.required.filter((item) => typeof item === 'string') : []);
  const sampleValues = isJsonObject(sample) ? sample : {};
  const params: JsonObject = {};

  for (const [name, property] of Object.entries(properties)) {
    if (!isJsonObject(property)) {
      continue;
    }
    const fallback = sampleValues[name] ?? property.default;
    const question = describeParameter(name, property, fallback);

    for (;;) {
      const raw = await prompter.ask(question);
      let value: JsonValue | undefined;
      if (!raw.trim()) {
        value = fallback === null ? undefined : fallback;
      } else {
        try {
          value = convertParameterValue(raw, property);
        } catch (error) {
          if (!(error instanceof ParameterValueError)) {
            throw error;
          }
          prompter.print(error.message);
          continue;
        }
      }

      if (value === undefined || value === null) {
        if (required.has(name)) {
          prompter.print(`${name} is required.`);
          continue;
        }
      } else {
        params[name] = value;
      }
      break;
    }
  }

  const extra = await prompter.ask('Additional parameters as JSON (leave blank to continue): ');
  if (extra.trim()) {
    const parsed = parseJsonLoose(extra);
    if (isJsonObject(parsed)) {
      Object.assign(params, parsed);
    } else {
      prompter.print('Ignored additional parameters (invalid JSON).');
    }
  }

  return Object.keys(params).length > 0 ? params : undefined;
}

function describeParameter(name: string, property: JsonObject, fallback: JsonValue | undefined): string {
  const parts = [name];
  if (typeof property.description === 'string' && property.description) {
    parts.push(`- ${property.description}`);
  }
  let typeSegment = typeof property.type === 'string' && property.type ? property.type : 'string';
  if (Array.isArray(property.enum) && property.enum.length > 0) {
    typeSegment += `, options: ${property.enum.map(display).join(', ')}`;
  }
  parts.push(`[${typeSegment}]`);
  if (fallback !== undefined && fallback !== null) {
    parts.push(`(default: ${display(fallback)})`);
  }
  return `${parts.join(' ')}: `;
}

async function askYesNo(prompter: Prompter, message: string, defaultValue = false): Promise<boolean> {
  const suffix = defaultValue ? ' [Y/n] ' : ' [y/N] ';
  for (;;) {
    const answer = (await prompter.ask(message + suffix)).trim().toLowerCase();
    if (!answer) {
      return defaultValue;
    }
    if (answer === 'y' || answer === 'yes') {
      return true;
    }
    if (answer === 'n' || answer === 'no') {
      return false;
    }
    prompter.print('Please enter y or n.');
  }
}

function parseOrRaw(raw: string): JsonValue {
  return parseJsonLoose(raw) ?? raw;
}

/**
 * 沒有 schema 時依範例值詢問，或讓操作者自行輸入鍵值
 */
export async function promptParametersManually(
  sample: JsonValue | undefined,
  prompter: Prompter
): Promise<JsonValue | undefined> {
  const params: JsonObject = {};
  const sampleObject = isJsonObject(sample) && Object.keys(sample).length > 0 ? sample : undefined;

  if (sampleObject) {
    prompter.print('Provide values for the following parameters (press Enter to keep defaults).');
    for (const [key, fallback] of Object.entries(sampleObject)) {
      const suffix = fallback === null ? '' : ` (default: ${display(fallback)})`;
      const raw = await prompter.ask(`${key}${suffix}: `);
      if (!raw.trim()) {
        if (fallback !== null) {
          params[key] = fallback;
        }
        continue;
      }
      params[key] = parseOrRaw(raw);
    }
  } else if (Array.isArray(sample) && sample.length > 0) {
    prompter.print(`Sample parameter list:\n${JSON.stringify(sample, null, 2)}`);
    if (await askYesNo(prompter, 'Use the sample list as-is?')) {
      return sample;
    }
    prompter.print('Enter each list item (blank line to finish).');
    const items: JsonValue[] = [];
    for (;;) {
      const raw = await prompter.ask(`Item ${items.length + 1}: `);
      if (!raw.trim()) {
        break;
      }
      items.push(parseOrRaw(raw));
    }
    return items.length > 0 ? items : undefined;
  } else {
    prompter.print('This script requires parameters. Enter key/value pairs (blank name to finish).');
  }

  while (await askYesNo(prompter, 'Add another parameter?')) {
    const name = (await prompter.ask('Parameter name: ')).trim();
    if (!name) {
      break;
    }
    params[name] = parseOrRaw(await prompter.ask(`${name} value: `));
  }

  if (Object.keys(params).length === 0 && sampleObject) {
    return sampleObject;
  }
  return Object.keys(params).length > 0 ? params : undefined;
}

/**
 * 需要參數的腳本：有 schema 屬性時逐項詢問，否則手動輸入
 */
export async function collectScriptParameters(
  hasParameters: boolean,
  definition: TaskDefinition | undefined,
  prompter: Prompter
): Promise<JsonValue | undefined> {
  if (!hasParameters) {
    return undefined;
  }
  const { schema, sample } = readParameterSource(definition);
  if (schema && isJsonObject(schema.properties) && Object.keys(schema.properties).length > 0) {
    return promptParametersFromSchema(schema, sample, prompter);
  }
  return promptParametersManually(sample, prompter);
}
