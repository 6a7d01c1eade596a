import { describe, it, expect } from 'vitest';
import { fromSerialized, parseAndValidate } from './SerializedInput.js';
import { toJsonValue } from './json.js';
import { ConversionError, ValidationFailedError } from '../errors/errors.js';
import { integer, record, sequence, string } from '../walker/SchemaBuilder.js';
import { SchemaValidator, validateValue } from '../walker/StructuralWalker.js';
import { pino } from 'pino';

const settings = record({ name: string(), ports: sequence(integer()) });

describe('fromSerialized', () => {
  it('parses JSON', () => {
    expect(fromSerialized('{"a":[1,2],"b":null}', 'json')).toEqual({ a: [1, 2], b: null });
  });

  it('keeps a "__proto__" key as data', () => {
    const parsed = fromSerialized('{"__proto__":{"x":1},"name":"a"}', 'json');
    const closed = record({ name: string() }, { additionalFields: false });

    expect(typeof parsed === 'object' && parsed !== null ? Object.keys(parsed) : []).toEqual(['__proto__', 'name']);
    expect(Object.getPrototypeOf(parsed)).toBe(Object.prototype);
    expect(validateValue(closed, parsed).toFlat()).toEqual([
      { path: '/__proto__', message: 'the property `__proto__` is not allowed.' },
    ]);
  });

  it('parses YAML', () => {
    expect(fromSerialized('a: 1\nb: [x, y]\n', 'yaml')).toEqual({ a: 1, b: ['x', 'y'] });
  });

  it('parses TOML and turns date-times into ISO strings', () => {
    expect(fromSerialized('when = 1979-05-27T07:32:00Z\ncount = 3\n', 'toml')).toEqual({
      when: '1979-05-27T07:32:00.000Z',
      count: 3,
    });
  });

  it('decodes UTF-8 bytes', () => {
    expect(fromSerialized(new TextEncoder().encode('{"a":1}'), 'json')).toEqual({ a: 1 });
  });

  it('rejects bytes that are not UTF-8', () => {
    expect(() => fromSerialized(new Uint8Array([0xff, 0xfe]), 'json'))
      .toThrow('Cannot convert json source: source is not valid UTF-8');
  });

  it('wraps parser errors', () => {
    try {
      fromSerialized('{"a":', 'json');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConversionError);
      if (err instanceof ConversionError) {
        expect(err.format).toBe('json');
        expect(err.cause).toBeInstanceOf(SyntaxError);
      }
    }
    expect(() => fromSerialized('a = ', 'toml')).toThrow(ConversionError);
  });
});

describe('toJsonValue', () => {
  it('turns safe bigints into numbers', () => {
    expect(toJsonValue({ n: BigInt(42) }, 'toml')).toEqual({ n: 42 });
  });

  it('names the path of a value without a JSON form', () => {
    expect(() => toJsonValue({ a: [new Map()] }, 'yaml'))
      .toThrow('Cannot convert yaml source: value at "/a/0" has no JSON form');
    expect(() => toJsonValue(BigInt(Number.MAX_SAFE_INTEGER) + BigInt(1), 'toml'))
      .toThrow(ConversionError);
  });
});

describe('parseAndValidate', () => {
  it('returns a valid value', () => {
    expect(parseAndValidate('name: api\nports: [80, 443]\n', 'yaml', settings)).toEqual({
      name: 'api',
      ports: [80, 443],
    });
  });

  it('throws the error tree for an invalid value', () => {
    const validator = new SchemaValidator(settings, { logger: pino({ level: 'silent' }) });
    try {
      parseAndValidate('name = "api"\nports = [80, "x"]\n', 'toml', validator);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationFailedError);
      if (err instanceof ValidationFailedError) {
        expect(err.errors.toFlat()).toEqual([
          { path: '/ports/1', message: 'the value must be of type `integer`, got `string`.' },
        ]);
      }
    }
  });
});
