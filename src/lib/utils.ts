import type { JsonObject, JsonValue, ValueNode } from '../types/index.js';

/**
 * Whether a value is a plain object (not an array, not null, not a class instance).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Tag a JSON value as mapping, sequence or scalar.
 */
export function classifyValue(value: JsonValue): ValueNode {
  if (Array.isArray(value)) {
    return { kind: 'sequence', value };
  }
  if (value !== null && typeof value === 'object') {
    return { kind: 'mapping', value };
  }
  return { kind: 'scalar', value };
}

/**
 * Define `key` as an own enumerable property. Plain assignment would treat
 * `__proto__` as a prototype change instead of an entry.
 */
export function setEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Parse a depth given as text. Negative values mean "no limit".
 */
export function parseDepth(value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new RangeError(`Depth must be an integer, got '${value}'`);
  }
  return Number.parseInt(trimmed, 10);
}
