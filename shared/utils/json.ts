import { JsonObject, JsonValue } from '../types/index';

/**
 * Type guard for plain JSON objects (not arrays, not null)
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return isJsonValue(value) && value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Type guard for anything JSON.parse could have produced
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) {
      return false;
    }
    return Object.values(value).every(isJsonValue);
  }
  return false;
}
