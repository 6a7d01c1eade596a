/**
 * Normalization of parsed values into JSON values.
 */

import { ConversionError, type SourceFormat } from '../errors/errors.js';
import { toJsonPointer } from '../errors/ValidationErrors.js';
import type { PathSegment } from '../errors/types.js';
import { isPlainRecord, type JsonValue } from '../types/common.js';

/**
 * Convert a parsed value to a JsonValue. Dates (TOML date-times) become
 * ISO strings and safe bigints become numbers; anything else without a
 * JSON form is a ConversionError.
 */
export function toJsonValue(
  value: unknown,
  format: SourceFormat,
  path: PathSegment[] = []
): JsonValue {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'bigint') {
    if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
      throw new ConversionError(`integer ${value} at "${toJsonPointer(path)}" is out of range`, format);
    }
    return Number(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => toJsonValue(item, format, [...path, index]));
  }
  if (isPlainRecord(value)) {
    // fromEntries defines own keys, so a "__proto__" key stays data.
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]): [string, JsonValue] => [
        key,
        toJsonValue(entry, format, [...path, key]),
      ])
    );
  }
  throw new ConversionError(`value at "${toJsonPointer(path)}" has no JSON form`, format);
}
