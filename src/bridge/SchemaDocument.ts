/**
 * SchemaDocument — Conversion between schema nodes and JSON Schema 2020-12.
 *
 * Documents are an interchange form only. Conversion keeps pass/fail
 * behavior on JSON data, not the exact shape: several rules of one kind
 * on a node become an `allOf`, and a document's mixed keywords become an
 * `allOf` of a structural node and its combinators.
 *
 * Known gaps:
 * - custom rules and pattern flags have no document form and are dropped
 *   with a warning
 * - object and array keywords in a document turn the node into a record
 *   or sequence, which also rejects values of other types
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { ConversionError } from '../errors/errors.js';
import type { ContainsRule, Rule } from '../constraints/types.js';
import type { JsonValue, ValueType } from '../types/common.js';
import type { FieldSchema, Schema } from '../walker/types.js';
import { logger as defaultLogger } from '../logging/logger.js';
import { toJsonValue } from './json.js';

export const JSON_SCHEMA_DIALECT = 'https://json-schema.org/draft/2020-12/schema';

/**
 * The JSON Schema subset this bridge reads and writes.
 */
export type SchemaDocument = {
  $schema?: string;
  $id?: string;
  $comment?: string;
  title?: string;
  description?: string;
  type?: ValueType | ValueType[];
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
  exclusiveMaximum?: number;
  multipleOf?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  enum?: JsonValue[];
  const?: JsonValue;
  items?: SchemaDocumentNode;
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;
  contains?: SchemaDocumentNode;
  minContains?: number;
  maxContains?: number;
  properties?: Record<string, SchemaDocumentNode>;
  required?: string[];
  additionalProperties?: SchemaDocumentNode;
  minProperties?: number;
  maxProperties?: number;
  allOf?: SchemaDocumentNode[];
  anyOf?: SchemaDocumentNode[];
  oneOf?: SchemaDocumentNode[];
  not?: SchemaDocumentNode;
};

/**
 * A document or a boolean schema (`true` accepts everything, `false`
 * nothing).
 */
export type SchemaDocumentNode = SchemaDocument | boolean;

// ============================================================================
// Schema -> document
// ============================================================================

/**
 * Options for toSchemaDocument.
 */
export interface ToSchemaDocumentOptions {
  /** `$id` of the generated document */
  id?: string;
  /** Logger for dropped rules */
  logger?: Logger;
}

type Fragment = SchemaDocument;

function ruleFragment(rule: Rule, logger: Logger): Fragment | undefined {
  switch (rule.kind) {
    case 'range': {
      const fragment: Fragment = {};
      if (rule.minimum !== undefined) fragment.minimum = rule.minimum;
      if (rule.maximum !== undefined) fragment.maximum = rule.maximum;
      if (rule.exclusiveMinimum !== undefined) fragment.exclusiveMinimum = rule.exclusiveMinimum;
      if (rule.exclusiveMaximum !== undefined) fragment.exclusiveMaximum = rule.exclusiveMaximum;
      return fragment;
    }
    case 'multipleOf':
      return { multipleOf: rule.multipleOf };
    case 'length': {
      const fragment: Fragment = {};
      if (rule.minLength !== undefined) fragment.minLength = rule.minLength;
      if (rule.maxLength !== undefined) fragment.maxLength = rule.maxLength;
      return fragment;
    }
    case 'pattern':
      if (rule.flags !== undefined && rule.flags.replace('u', '') !== '') {
        logger.warn({ pattern: rule.pattern, flags: rule.flags }, 'Pattern flags have no schema document form, rule dropped');
        return undefined;
      }
      return { pattern: rule.pattern };
    case 'enumerate':
      return { enum: rule.values.map((value) => toJsonValue(value, 'schema')) };
    case 'items': {
      const fragment: Fragment = {};
      if (rule.minItems !== undefined) fragment.minItems = rule.minItems;
      if (rule.maxItems !== undefined) fragment.maxItems = rule.maxItems;
      return fragment;
    }
    case 'uniqueItems':
      return { uniqueItems: true };
    case 'contains': {
      const fragment: Fragment = { contains: nodeDocument(rule.schema, logger) };
      if (rule.minContains !== undefined) fragment.minContains = rule.minContains;
      if (rule.maxContains !== undefined) fragment.maxContains = rule.maxContains;
      return fragment;
    }
    case 'properties': {
      const fragment: Fragment = {};
      if (rule.minProperties !== undefined) fragment.minProperties = rule.minProperties;
      if (rule.maxProperties !== undefined) fragment.maxProperties = rule.maxProperties;
      return fragment;
    }
    case 'type': {
      const [only, ...rest] = rule.types;
      return only !== undefined && rest.length === 0 ? { type: only } : { type: [...rule.types] };
    }
    case 'custom':
      logger.warn({ rule: rule.name }, 'Custom rule has no schema document form, rule dropped');
      return undefined;
    default: {
      const unknownRule: never = rule;
      throw new ConversionError(`unknown rule ${JSON.stringify(unknownRule)}`, 'schema');
    }
  }
}

/**
 * Fold fragments into one document. A fragment whose keywords are
 * already taken goes into `allOf`.
 */
function combine(base: Fragment, fragments: Fragment[]): Fragment {
  const result: Fragment = { ...base };
  const overflow: SchemaDocumentNode[] = [];

  for (const fragment of fragments) {
    if (Object.keys(fragment).some((key) => Object.prototype.hasOwnProperty.call(result, key))) {
      overflow.push(fragment);
    } else {
      Object.assign(result, fragment);
    }
  }

  if (overflow.length > 0) {
    result.allOf = [...(result.allOf ?? []), ...overflow];
  }
  return result;
}

function rulesDocument(base: Fragment, rules: readonly Rule[], logger: Logger): Fragment {
  const fragments: Fragment[] = [];
  for (const rule of rules) {
    const fragment = ruleFragment(rule, logger);
    if (fragment !== undefined) fragments.push(fragment);
  }
  return combine(base, fragments);
}

function nodeDocument(schema: Schema, logger: Logger): Fragment {
  switch (schema.node) {
    case 'value':
      return rulesDocument({}, schema.rules, logger);

    case 'record': {
      const properties: Record<string, SchemaDocumentNode> = {};
      const required: string[] = [];
      for (const field of schema.fields) {
        if (field.schema.node === 'optional') {
          properties[field.name] = nodeDocument(field.schema.inner, logger);
        } else {
          properties[field.name] = nodeDocument(field.schema, logger);
          required.push(field.name);
        }
      }
      const base: Fragment = { type: 'object', properties };
      if (required.length > 0) base.required = required;
      if (!schema.additionalFields) base.additionalProperties = false;
      return rulesDocument(base, schema.rules, logger);
    }

    case 'sequence': {
      const base: Fragment = { type: 'array' };
      if (schema.items !== undefined) base.items = nodeDocument(schema.items, logger);
      return rulesDocument(base, schema.rules, logger);
    }

    case 'map': {
      const base: Fragment = { type: 'object' };
      if (schema.values !== undefined) base.additionalProperties = nodeDocument(schema.values, logger);
      return rulesDocument(base, schema.rules, logger);
    }

    case 'optional':
      return nodeDocument(schema.inner, logger);

    case 'allOf':
      return { allOf: schema.branches.map((branch) => nodeDocument(branch, logger)) };

    case 'anyOf':
      return { anyOf: schema.branches.map((branch) => nodeDocument(branch, logger)) };

    case 'oneOf':
      return { oneOf: schema.branches.map((branch) => nodeDocument(branch, logger)) };

    case 'not':
      return { not: nodeDocument(schema.inner, logger) };

    default: {
      const unknownNode: never = schema;
      throw new ConversionError(`unknown schema node ${JSON.stringify(unknownNode)}`, 'schema');
    }
  }
}

/**
 * Translate a schema into a JSON Schema 2020-12 document.
 *
 * @throws ConversionError when an enumerated value has no JSON form
 */
export function toSchemaDocument(
  schema: Schema,
  options: ToSchemaDocumentOptions = {}
): SchemaDocument {
  const body = nodeDocument(schema, options.logger ?? defaultLogger);
  return {
    $schema: JSON_SCHEMA_DIALECT,
    ...(options.id !== undefined ? { $id: options.id } : {}),
    ...body,
  };
}

// ============================================================================
// Document -> schema
// ============================================================================

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
);

const valueTypeSchema = z.enum(['null', 'boolean', 'integer', 'number', 'string', 'array', 'object']);
const countSchema = z.number().int().nonnegative();

const documentNodeSchema: z.ZodType<SchemaDocumentNode> = z.lazy(() =>
  z.union([z.boolean(), documentSchema])
);

const documentSchema: z.ZodType<SchemaDocument> = z.lazy(() =>
  z
    .object({
      $schema: z.string().optional(),
      $id: z.string().optional(),
      $comment: z.string().optional(),
      title: z.string().optional(),
      description: z.string().optional(),
      type: z.union([valueTypeSchema, z.array(valueTypeSchema).nonempty()]).optional(),
      minimum: z.number().optional(),
      maximum: z.number().optional(),
      exclusiveMinimum: z.number().optional(),
      exclusiveMaximum: z.number().optional(),
      multipleOf: z.number().positive().optional(),
      minLength: countSchema.optional(),
      maxLength: countSchema.optional(),
      pattern: z.string().optional(),
      enum: z.array(jsonValueSchema).nonempty().optional(),
      const: jsonValueSchema.optional(),
      items: documentNodeSchema.optional(),
      minItems: countSchema.optional(),
      maxItems: countSchema.optional(),
      uniqueItems: z.boolean().optional(),
      contains: documentNodeSchema.optional(),
      minContains: countSchema.optional(),
      maxContains: countSchema.optional(),
      properties: z.record(z.string(), documentNodeSchema).optional(),
      required: z.array(z.string()).optional(),
      additionalProperties: documentNodeSchema.optional(),
      minProperties: countSchema.optional(),
      maxProperties: countSchema.optional(),
      allOf: z.array(documentNodeSchema).nonempty().optional(),
      anyOf: z.array(documentNodeSchema).nonempty().optional(),
      oneOf: z.array(documentNodeSchema).nonempty().optional(),
      not: documentNodeSchema.optional(),
    })
    .strict()
);

const ANY: Schema = { node: 'value', rules: [] };
const NOTHING: Schema = { node: 'not', inner: ANY };

function documentRules(document: SchemaDocument, omitType: boolean): Rule[] {
  const rules: Rule[] = [];

  if (document.type !== undefined && !omitType) {
    rules.push({ kind: 'type', types: Array.isArray(document.type) ? document.type : [document.type] });
  }
  if (
    document.minimum !== undefined ||
    document.maximum !== undefined ||
    document.exclusiveMinimum !== undefined ||
    document.exclusiveMaximum !== undefined
  ) {
    rules.push({
      kind: 'range',
      ...(document.minimum !== undefined ? { minimum: document.minimum } : {}),
      ...(document.maximum !== undefined ? { maximum: document.maximum } : {}),
      ...(document.exclusiveMinimum !== undefined ? { exclusiveMinimum: document.exclusiveMinimum } : {}),
      ...(document.exclusiveMaximum !== undefined ? { exclusiveMaximum: document.exclusiveMaximum } : {}),
    });
  }
  if (document.multipleOf !== undefined) {
    rules.push({ kind: 'multipleOf', multipleOf: document.multipleOf });
  }
  if (document.minLength !== undefined || document.maxLength !== undefined) {
    rules.push({
      kind: 'length',
      ...(document.minLength !== undefined ? { minLength: document.minLength } : {}),
      ...(document.maxLength !== undefined ? { maxLength: document.maxLength } : {}),
    });
  }
  if (document.pattern !== undefined) {
    rules.push({ kind: 'pattern', pattern: document.pattern });
  }
  if (document.enum !== undefined) {
    rules.push({ kind: 'enumerate', values: document.enum });
  }
  if (document.const !== undefined) {
    rules.push({ kind: 'enumerate', values: [document.const] });
  }
  if (document.minItems !== undefined || document.maxItems !== undefined) {
    rules.push({
      kind: 'items',
      ...(document.minItems !== undefined ? { minItems: document.minItems } : {}),
      ...(document.maxItems !== undefined ? { maxItems: document.maxItems } : {}),
    });
  }
  if (document.uniqueItems === true) {
    rules.push({ kind: 'uniqueItems' });
  }
  if (document.contains !== undefined) {
    const rule: ContainsRule = {
      kind: 'contains',
      schema: nodeSchema(document.contains, ['contains']),
      ...(document.minContains !== undefined ? { minContains: document.minContains } : {}),
      ...(document.maxContains !== undefined ? { maxContains: document.maxContains } : {}),
    };
    rules.push(rule);
  }
  if (document.minProperties !== undefined || document.maxProperties !== undefined) {
    rules.push({
      kind: 'properties',
      ...(document.minProperties !== undefined ? { minProperties: document.minProperties } : {}),
      ...(document.maxProperties !== undefined ? { maxProperties: document.maxProperties } : {}),
    });
  }

  return rules;
}

function requireContainerType(
  document: SchemaDocument,
  expected: 'object' | 'array',
  path: string[]
): void {
  if (document.type !== undefined && document.type !== expected) {
    throw new ConversionError(
      `${expected} keywords at "${path.join('.')}" need type "${expected}", got ${JSON.stringify(document.type)}`,
      'schema'
    );
  }
}

function structuralSchema(document: SchemaDocument, path: string[]): Schema {
  const hasObjectKeywords =
    document.properties !== undefined ||
    document.required !== undefined ||
    document.additionalProperties !== undefined;
  const hasArrayKeywords = document.items !== undefined;

  if (hasObjectKeywords && hasArrayKeywords) {
    throw new ConversionError(`"${path.join('.')}" mixes object and array keywords`, 'schema');
  }

  if (hasArrayKeywords) {
    requireContainerType(document, 'array', path);
    const rules = documentRules(document, true);
    return document.items === undefined
      ? { node: 'sequence', rules }
      : { node: 'sequence', items: nodeSchema(document.items, [...path, 'items']), rules };
  }

  if (hasObjectKeywords) {
    requireContainerType(document, 'object', path);
    const rules = documentRules(document, true);
    const additional = document.additionalProperties;
    const isMap = document.properties === undefined && document.required === undefined && additional !== false;

    if (isMap) {
      return additional === undefined || additional === true
        ? { node: 'map', rules }
        : { node: 'map', values: nodeSchema(additional, [...path, 'additionalProperties']), rules };
    }
    if (additional !== undefined && typeof additional !== 'boolean') {
      throw new ConversionError(
        `"${path.join('.')}" combines properties with an additionalProperties schema`,
        'schema'
      );
    }

    const required = new Set(document.required ?? []);
    const fields: FieldSchema[] = [];
    for (const [name, property] of Object.entries(document.properties ?? {})) {
      const fieldSchema = nodeSchema(property, [...path, 'properties', name]);
      fields.push({
        name,
        schema: required.has(name) ? fieldSchema : { node: 'optional', inner: fieldSchema },
      });
      required.delete(name);
    }
    for (const name of required) {
      fields.push({ name, schema: ANY });
    }

    return { node: 'record', fields, rules, additionalFields: additional !== false };
  }

  return { node: 'value', rules: documentRules(document, false) };
}

function nodeSchema(node: SchemaDocumentNode, path: string[]): Schema {
  if (node === true) return ANY;
  if (node === false) return NOTHING;

  const parts: Schema[] = [structuralSchema(node, path)];
  if (node.allOf !== undefined) {
    parts.push({ node: 'allOf', branches: node.allOf.map((branch, i) => nodeSchema(branch, [...path, 'allOf', String(i)])) });
  }
  if (node.anyOf !== undefined) {
    parts.push({ node: 'anyOf', branches: node.anyOf.map((branch, i) => nodeSchema(branch, [...path, 'anyOf', String(i)])) });
  }
  if (node.oneOf !== undefined) {
    parts.push({ node: 'oneOf', branches: node.oneOf.map((branch, i) => nodeSchema(branch, [...path, 'oneOf', String(i)])) });
  }
  if (node.not !== undefined) {
    parts.push({ node: 'not', inner: nodeSchema(node.not, [...path, 'not']) });
  }

  const [first, ...rest] = parts;
  if (first === undefined) return ANY;
  if (rest.length === 0) return first;

  // A bare combinator document has an empty structural part.
  const structural = first.node === 'value' && first.rules.length === 0 ? rest : parts;
  const [only, ...others] = structural;
  return only !== undefined && others.length === 0 ? only : { node: 'allOf', branches: structural };
}

/**
 * Translate a JSON Schema document into schema nodes.
 *
 * @throws ConversionError when the document uses keywords or shapes
 *   outside the supported subset
 */
export function fromSchemaDocument(document: unknown): Schema {
  const result = documentNodeSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
    throw new ConversionError(`${issue?.message ?? 'unsupported document'}${where}`, 'schema', {
      cause: result.error,
    });
  }
  return nodeSchema(result.data, []);
}
