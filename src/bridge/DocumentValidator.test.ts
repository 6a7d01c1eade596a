import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { DocumentValidator, createDocumentValidator } from './DocumentValidator.js';
import { toSchemaDocument } from './SchemaDocument.js';
import { ConversionError } from '../errors/errors.js';
import { validateValue } from '../walker/StructuralWalker.js';
import { integer, optional, record, sequence, string } from '../walker/SchemaBuilder.js';
import { maxLength, pattern, range, uniqueItems } from '../constraints/rules.js';

const person = record(
  {
    name: string(),
    age: integer(range({ minimum: 0, maximum: 150 })),
    email: optional(string(pattern('@'))),
    tags: sequence(string(maxLength(3)), uniqueItems()),
  },
  { additionalFields: false }
);

const byPath = (a: { path: string }, b: { path: string }): number => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0);

describe('DocumentValidator', () => {
  it('accepts valid data', () => {
    const validator = createDocumentValidator();
    expect(validator.validateSchema({ name: 'Ada', age: 36, tags: ['a'] }, person)).toEqual({
      valid: true,
      errors: [],
    });
  });

  it('reports the same paths and messages as the walker', () => {
    const validator = new DocumentValidator();
    const data = { age: 200, tags: ['abcd', 'a', 'a'], x: 1 };

    const result = validator.validate(data, toSchemaDocument(person, { logger: pino({ level: 'silent' }) }));

    expect(result.valid).toBe(false);
    const reported = result.errors.map(({ path, message }) => ({ path, message })).sort(byPath);
    expect(reported).toEqual(validateValue(person, data).toFlat().sort(byPath));
    expect(reported).toHaveLength(5);
  });

  it('keeps the failing keyword', () => {
    const validator = new DocumentValidator();
    const result = validator.validate({ a: 1 }, { type: 'object', maxProperties: 0 });

    expect(result.errors).toEqual([
      { path: '', message: 'the size of the properties must be `<= 0`.', keyword: 'maxProperties' },
    ]);
  });

  it('compiles each document once', () => {
    const validator = new DocumentValidator();
    const document = { type: 'string' as const };

    expect(validator.compile(document)).toBe(validator.compile(document));
  });

  it('reuses the generated document of a schema', () => {
    const validator = new DocumentValidator();
    const compile = vi.spyOn(validator, 'compile');

    validator.validateSchema({ name: 'Ada', age: 36, tags: [] }, person);
    validator.validateSchema({ age: -1, tags: [] }, person);

    expect(compile).toHaveBeenCalledTimes(2);
    expect(compile.mock.calls[1]?.[0]).toBe(compile.mock.calls[0]?.[0]);
    expect(compile.mock.results[1]?.value).toBe(compile.mock.results[0]?.value);
  });

  it('rejects a document Ajv cannot compile', () => {
    const validator = new DocumentValidator();
    expect(() => validator.compile({ pattern: '(' })).toThrow(ConversionError);
  });
});
