/**
 * SerializedInput — Parse JSON, YAML and TOML sources into JSON values.
 */

import { parse as parseYaml } from 'yaml';
import { parse as parseToml } from 'smol-toml';
import { ConversionError, ValidationFailedError } from '../errors/errors.js';
import type { JsonValue } from '../types/common.js';
import type { Schema } from '../walker/types.js';
import { SchemaValidator, validateValue } from '../walker/StructuralWalker.js';
import { toJsonValue } from './json.js';

export type SerializedFormat = 'json' | 'yaml' | 'toml';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decode(source: string | Uint8Array, format: SerializedFormat): string {
  if (typeof source === 'string') {
    return source;
  }
  try {
    return utf8.decode(source);
  } catch (err) {
    throw new ConversionError('source is not valid UTF-8', format, { cause: err });
  }
}

function parseText(text: string, format: SerializedFormat): unknown {
  switch (format) {
    case 'json':
      return JSON.parse(text);
    case 'yaml':
      return parseYaml(text);
    case 'toml':
      return parseToml(text);
    default: {
      const unknownFormat: never = format;
      throw new Error(`Unknown format: ${String(unknownFormat)}`);
    }
  }
}

/**
 * Parse a serialized document into a JSON value. TOML date-times become
 * ISO 8601 strings.
 *
 * @throws ConversionError when the source is malformed
 */
export function fromSerialized(source: string | Uint8Array, format: SerializedFormat): JsonValue {
  const text = decode(source, format);
  let parsed: unknown;
  try {
    parsed = parseText(text, format);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConversionError(message, format, { cause: err });
  }
  return toJsonValue(parsed, format);
}

/**
 * Parse a serialized document and validate it.
 *
 * @returns the parsed value, when it is valid
 * @throws ConversionError when the source is malformed
 * @throws ValidationFailedError when the value violates the schema
 */
export function parseAndValidate(
  source: string | Uint8Array,
  format: SerializedFormat,
  schema: Schema | SchemaValidator
): JsonValue {
  const value = fromSerialized(source, format);
  const errors = schema instanceof SchemaValidator
    ? schema.validate(value)
    : validateValue(schema, value);
  if (!errors.isEmpty()) {
    throw new ValidationFailedError(errors);
  }
  return value;
}
