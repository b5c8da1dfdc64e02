// Conversion of untyped API payloads into inventory records
import type { InventoryRecord, JsonObject, JsonValue } from './types.js';

/**
 * Check whether a value is a plain JSON object (not an array or null).
 */
export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert an arbitrary value into a JsonValue.
 * Returns undefined for values JSON cannot carry (undefined, functions, symbols),
 * which drops them from the enclosing object.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return value.toString();
    case 'undefined':
    case 'function':
    case 'symbol':
      return undefined;
  }

  if (value === null) {
    return null;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(item => toJsonValue(item) ?? null);
  }
  if (typeof value !== 'object') {
    return undefined;
  }

  const out: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    const converted = toJsonValue(entry);
    if (converted !== undefined) {
      // Plain assignment would treat a `__proto__` field as the prototype
      Object.defineProperty(out, key, { value: converted, enumerable: true, writable: true, configurable: true });
    }
  }
  return out;
}

/**
 * Convert one listed item into a record. Items that are not objects
 * are wrapped under a `value` field so they still get a row.
 */
export function toRecord(item: unknown): InventoryRecord {
  const value = toJsonValue(item) ?? null;
  return isJsonObject(value) ? value : { value };
}

/**
 * Convert a list payload into records. Anything that is not an array
 * (a missing field in a response, for example) yields no records.
 */
export function toRecords(items: unknown): InventoryRecord[] {
  if (!Array.isArray(items)) {
    return [];
  }
  return items.map(toRecord);
}
