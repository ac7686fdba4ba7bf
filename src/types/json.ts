/**
 * JSON value types
 * 遠端 API 回傳的不透明 JSON 結構
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function convert(value: unknown): JsonValue {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => convert(item));
  }
  if (typeof value === 'object') {
    const result: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      if (item !== undefined) {
        result[key] = convert(item);
      }
    }
    return result;
  }
  return String(value);
}

/**
 * Normalise a parsed response body into a JSON value.
 * Empty bodies become an empty object.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === undefined || value === null || value === '') {
    return {};
  }
  return convert(value);
}
