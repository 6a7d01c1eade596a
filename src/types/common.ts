/**
 * Common type definitions for valtree.
 *
 * These types describe the data under test. The engine only ever reads
 * values; it never mutates or retains them past a single validation pass.
 */

/**
 * Any value handed to the engine.
 */
export type Value = unknown;

/**
 * JSON-compatible value, as produced by the format bridge.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * JSON-Schema value types understood by the `type` rule.
 */
export type ValueType =
  | 'null'
  | 'boolean'
  | 'integer'
  | 'number'
  | 'string'
  | 'array'
  | 'object';

/**
 * Observed type of a runtime value.
 * `map` is a `Map` instance, `other` covers functions, symbols, class
 * instances and anything else without a JSON counterpart.
 */
export type ObservedType =
  | ValueType
  | 'map'
  | 'undefined'
  | 'other';

/**
 * Plain object with string keys.
 */
export type PlainRecord = Record<string, unknown>;

/**
 * Check whether a value is a plain object (record or mapping).
 */
export function isPlainRecord(value: unknown): value is PlainRecord {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Observed type of a value. Integers report `integer`; all other
 * numbers (including NaN and the infinities) report `number`.
 */
export function valueTypeOf(value: unknown): ObservedType {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'number';
  }
  if (Array.isArray(value)) return 'array';
  if (value instanceof Map) return 'map';
  if (isPlainRecord(value)) return 'object';
  return 'other';
}

/**
 * Whether an observed type satisfies an expected JSON-Schema type.
 * An integer is also a number.
 */
export function typeMatches(observed: ObservedType, expected: ValueType): boolean {
  if (observed === expected) return true;
  if (expected === 'number' && observed === 'integer') return true;
  if (expected === 'object' && observed === 'map') return true;
  return false;
}

/**
 * Entries of a mapping value (plain object or Map) in insertion order.
 * Map keys are converted to strings.
 */
export function mappingEntries(value: PlainRecord | Map<unknown, unknown>): Array<[string, unknown]> {
  if (value instanceof Map) {
    return Array.from(value.entries(), ([key, entry]): [string, unknown] => [String(key), entry]);
  }
  return Object.entries(value);
}
