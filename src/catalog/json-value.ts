/**
 * Conversion of declared default values to JSON values.
 *
 * @packageDocumentation
 */

import type { JsonValue } from '../batch/types.js';

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Converts a value to a JSON value.
 *
 * Dates become ISO-8601 strings. Values with no JSON form (functions,
 * bigints, non-finite numbers, class instances) yield `undefined`, as does
 * any array or object containing one.
 *
 * @param value - The value to convert.
 * @returns The JSON value, or undefined.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value.toISOString();
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      if (converted === undefined) {
        return undefined;
      }
      items.push(converted);
    }
    return items;
  }
  if (typeof value === 'object' && value !== null && isPlainObject(value)) {
    const entries: Array<[string, JsonValue]> = [];
    for (const [key, item] of Object.entries(value)) {
      const converted = toJsonValue(item);
      if (converted === undefined) {
        return undefined;
      }
      entries.push([key, converted]);
    }
    return Object.fromEntries(entries);
  }
  return undefined;
}
