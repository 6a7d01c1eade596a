/**
 * SchemaBuilder — Functions that build schema nodes.
 *
 * @example
 * ```ts
 * const user = record({
 *   name: string(maxLength(32)),
 *   age: optional(integer(minimum(0))),
 *   tags: sequence(string(), uniqueItems()),
 * });
 * ```
 */

import { type } from '../constraints/rules.js';
import type { Rule } from '../constraints/types.js';
import type {
  AllOfSchema,
  AnyOfSchema,
  MapSchema,
  NotSchema,
  OneOfSchema,
  OptionalSchema,
  RecordSchema,
  Schema,
  SequenceSchema,
  ValueSchema,
} from './types.js';

/**
 * Options for `record`.
 */
export interface RecordOptions {
  /** Rules on the record as a whole (e.g. property counts) */
  rules?: readonly Rule[];
  /** Accept undeclared keys (default: true) */
  additionalFields?: boolean;
}

export function value(...rules: Rule[]): ValueSchema {
  return { node: 'value', rules };
}

export function number(...rules: Rule[]): ValueSchema {
  return value(type('number'), ...rules);
}

export function integer(...rules: Rule[]): ValueSchema {
  return value(type('integer'), ...rules);
}

export function string(...rules: Rule[]): ValueSchema {
  return value(type('string'), ...rules);
}

export function boolean(...rules: Rule[]): ValueSchema {
  return value(type('boolean'), ...rules);
}

export function nullValue(): ValueSchema {
  return value(type('null'));
}

/**
 * A record with the given fields, in the order the object lists them.
 */
export function record(
  fields: Readonly<Record<string, Schema>>,
  options: RecordOptions = {}
): RecordSchema {
  return {
    node: 'record',
    fields: Object.entries(fields).map(([name, schema]) => ({ name, schema })),
    rules: options.rules ?? [],
    additionalFields: options.additionalFields ?? true,
  };
}

export function sequence(items?: Schema, ...rules: Rule[]): SequenceSchema {
  return items === undefined ? { node: 'sequence', rules } : { node: 'sequence', items, rules };
}

export function map(values?: Schema, ...rules: Rule[]): MapSchema {
  return values === undefined ? { node: 'map', rules } : { node: 'map', values, rules };
}

export function optional(inner: Schema): OptionalSchema {
  return { node: 'optional', inner };
}

export function allOf(...branches: Schema[]): AllOfSchema {
  return { node: 'allOf', branches };
}

export function anyOf(...branches: Schema[]): AnyOfSchema {
  return { node: 'anyOf', branches };
}

export function oneOf(...branches: Schema[]): OneOfSchema {
  return { node: 'oneOf', branches };
}

export function not(inner: Schema): NotSchema {
  return { node: 'not', inner };
}
