import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { JSON_SCHEMA_DIALECT, fromSchemaDocument, toSchemaDocument } from './SchemaDocument.js';
import { ConversionError } from '../errors/errors.js';
import { validateValue } from '../walker/StructuralWalker.js';
import {
  anyOf,
  integer,
  map,
  not,
  nullValue,
  number,
  oneOf,
  optional,
  record,
  sequence,
  string,
  value,
} from '../walker/SchemaBuilder.js';
import {
  contains,
  custom,
  enumerate,
  maxLength,
  minimum,
  multipleOf,
  range,
  uniqueItems,
} from '../constraints/rules.js';
import type { Schema } from '../walker/types.js';

const silent = pino({ level: 'silent' });

describe('toSchemaDocument', () => {
  it('writes records with required and closed fields', () => {
    const schema = record(
      { id: integer(minimum(1)), note: optional(string(maxLength(10))) },
      { additionalFields: false }
    );

    expect(toSchemaDocument(schema, { id: 'urn:test:item' })).toEqual({
      $schema: JSON_SCHEMA_DIALECT,
      $id: 'urn:test:item',
      type: 'object',
      properties: {
        id: { type: 'integer', minimum: 1 },
        note: { type: 'string', maxLength: 10 },
      },
      required: ['id'],
      additionalProperties: false,
    });
  });

  it('writes sequences and maps', () => {
    expect(toSchemaDocument(sequence(string(), uniqueItems()))).toEqual({
      $schema: JSON_SCHEMA_DIALECT,
      type: 'array',
      items: { type: 'string' },
      uniqueItems: true,
    });
    expect(toSchemaDocument(map(integer()))).toEqual({
      $schema: JSON_SCHEMA_DIALECT,
      type: 'object',
      additionalProperties: { type: 'integer' },
    });
  });

  it('moves a repeated keyword into allOf', () => {
    expect(toSchemaDocument(value(maxLength(5), maxLength(3)))).toEqual({
      $schema: JSON_SCHEMA_DIALECT,
      maxLength: 5,
      allOf: [{ maxLength: 3 }],
    });
  });

  it('drops custom rules with a warning', () => {
    const lines: string[] = [];
    const log = pino({ level: 'warn' }, { write: (line: string) => { lines.push(line); } });
    const schema = string(custom('even', () => null));

    expect(toSchemaDocument(schema, { logger: log })).toEqual({
      $schema: JSON_SCHEMA_DIALECT,
      type: 'string',
    });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('"rule":"even"');
  });

  it('rejects enumerated values without a JSON form', () => {
    expect(() => toSchemaDocument(value(enumerate(new Map())), { logger: silent })).toThrow(ConversionError);
  });
});

describe('fromSchemaDocument', () => {
  it('reads an object document as a record', () => {
    const schema = fromSchemaDocument({
      type: 'object',
      properties: { a: { type: 'string' } },
      required: ['a', 'b'],
      additionalProperties: false,
    });

    expect(schema).toEqual({
      node: 'record',
      fields: [
        { name: 'a', schema: { node: 'value', rules: [{ kind: 'type', types: ['string'] }] } },
        { name: 'b', schema: { node: 'value', rules: [] } },
      ],
      rules: [],
      additionalFields: false,
    });
    expect(validateValue(schema, { a: 1, c: 2 }).toFlat()).toEqual([
      { path: '/a', message: 'the value must be of type `string`, got `integer`.' },
      { path: '/b', message: 'the property `b` is required.' },
      { path: '/c', message: 'the property `c` is not allowed.' },
    ]);
  });

  it('reads additionalProperties alone as a map', () => {
    expect(fromSchemaDocument({ type: 'object', additionalProperties: { type: 'integer' } })).toEqual({
      node: 'map',
      values: { node: 'value', rules: [{ kind: 'type', types: ['integer'] }] },
      rules: [],
    });
  });

  it('reads a bare combinator as that combinator', () => {
    expect(fromSchemaDocument({ anyOf: [{ type: 'string' }, { type: 'integer' }] })).toEqual({
      node: 'anyOf',
      branches: [
        { node: 'value', rules: [{ kind: 'type', types: ['string'] }] },
        { node: 'value', rules: [{ kind: 'type', types: ['integer'] }] },
      ],
    });
  });

  it('reads const as a one-value enumeration', () => {
    expect(fromSchemaDocument({ const: 'on' })).toEqual({
      node: 'value',
      rules: [{ kind: 'enumerate', values: ['on'] }],
    });
  });

  it('reads boolean documents', () => {
    expect(fromSchemaDocument(true)).toEqual({ node: 'value', rules: [] });
    expect(validateValue(fromSchemaDocument(false), 1).violations).toEqual([{ kind: 'not' }]);
  });

  it('keeps pass and fail through a round trip', () => {
    const declared = record({ tags: sequence(string(maxLength(2))) }, { additionalFields: false });
    const restored = fromSchemaDocument(toSchemaDocument(declared, { logger: silent }));

    for (const sample of [{ tags: ['ab'] }, { tags: ['abc'] }, { tags: [], x: 1 }, {}]) {
      expect(validateValue(restored, sample).isEmpty()).toBe(validateValue(declared, sample).isEmpty());
    }
  });

  it('keeps pass and fail through a round trip for every node kind', () => {
    const cases: Array<[Schema, unknown[]]> = [
      [oneOf(integer(), string(maxLength(2))), [1, 'ab', 'abc', true, 2.5]],
      [anyOf(string(), nullValue()), ['x', null, 1]],
      [not(string()), ['a', 1]],
      [map(integer(range({ minimum: 0, maximum: 10 }))), [{ a: 1 }, { a: 11 }, { a: 'x' }, [], 'x']],
      [value(enumerate('a', 1, null)), ['a', 1, null, 'b']],
      [sequence(undefined, contains(integer(), { minContains: 2 })), [[1, 2], [1, 'a'], 'x']],
      [number(range({ exclusiveMinimum: 0, maximum: 1 }), multipleOf(0.25)), [0, 0.5, 0.3, 1, 1.25]],
    ];

    for (const [schema, samples] of cases) {
      const restored = fromSchemaDocument(toSchemaDocument(schema, { logger: silent }));
      for (const sample of samples) {
        expect(validateValue(restored, sample).isEmpty()).toBe(validateValue(schema, sample).isEmpty());
      }
    }
  });

  it('rejects unsupported keywords', () => {
    try {
      fromSchemaDocument({ type: 'string', format: 'email' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConversionError);
      if (err instanceof ConversionError) {
        expect(err.format).toBe('schema');
      }
    }
  });

  it('rejects container keywords on another type', () => {
    expect(() => fromSchemaDocument({ type: 'string', items: { type: 'string' } }))
      .toThrow('array keywords at "" need type "array", got "string"');
  });

  it('rejects mixed object and array keywords', () => {
    expect(() => fromSchemaDocument({ items: true, properties: {} })).toThrow(ConversionError);
  });
});
