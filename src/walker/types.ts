/**
 * Schema node types.
 *
 * A schema describes where rules apply inside a value: on the value
 * itself, on record fields, on sequence items, on mapping values, or
 * through composition of alternative schemas. Nodes are plain immutable
 * objects discriminated by `node`; build them with the SchemaBuilder
 * functions.
 */

import type { Rule } from '../constraints/types.js';

/**
 * Rules applied to the value as a whole.
 */
export interface ValueSchema {
  readonly node: 'value';
  readonly rules: readonly Rule[];
}

/**
 * One declared record field. Fields are required unless their schema is
 * an `optional` node.
 */
export interface FieldSchema {
  readonly name: string;
  readonly schema: Schema;
}

export interface RecordSchema {
  readonly node: 'record';
  /** Declared fields, in declaration order */
  readonly fields: readonly FieldSchema[];
  readonly rules: readonly Rule[];
  /** Whether keys without a declared field are accepted */
  readonly additionalFields: boolean;
}

export interface SequenceSchema {
  readonly node: 'sequence';
  /** Schema applied to every item (none: items are unchecked) */
  readonly items?: Schema;
  readonly rules: readonly Rule[];
}

/**
 * A plain object or Map used as a dictionary: every value follows the
 * same schema.
 */
export interface MapSchema {
  readonly node: 'map';
  readonly values?: Schema;
  readonly rules: readonly Rule[];
}

/**
 * Accepts `undefined` (an absent field); anything else goes to `inner`.
 */
export interface OptionalSchema {
  readonly node: 'optional';
  readonly inner: Schema;
}

export interface AllOfSchema {
  readonly node: 'allOf';
  readonly branches: readonly Schema[];
}

export interface AnyOfSchema {
  readonly node: 'anyOf';
  readonly branches: readonly Schema[];
}

export interface OneOfSchema {
  readonly node: 'oneOf';
  readonly branches: readonly Schema[];
}

export interface NotSchema {
  readonly node: 'not';
  readonly inner: Schema;
}

/**
 * Union of all schema nodes.
 */
export type Schema =
  | ValueSchema
  | RecordSchema
  | SequenceSchema
  | MapSchema
  | OptionalSchema
  | AllOfSchema
  | AnyOfSchema
  | OneOfSchema
  | NotSchema;

export type SchemaNodeKind = Schema['node'];
