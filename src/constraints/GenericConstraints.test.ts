/**
 * Tests for enumerate, type and custom evaluators, and rule dispatch.
 */

import { describe, it, expect } from 'vitest';
import { checkCustom, checkEnumerate, checkType } from './GenericConstraints.js';
import { evaluateRule } from './ConstraintEvaluator.js';
import { deepEqual } from './equality.js';
import { contains, custom, enumerate, maximum, type } from './rules.js';
import { integer } from '../walker/SchemaBuilder.js';
import { ConfigurationError } from '../errors/errors.js';

describe('checkEnumerate', () => {
  it('keeps the declared order of allowed values', () => {
    expect(checkEnumerate('c', enumerate('b', 'a'))).toEqual({
      kind: 'enumerate',
      values: ['b', 'a'],
      actual: 'c',
    });
  });

  it('compares by value', () => {
    expect(checkEnumerate({ x: [1, 2] }, enumerate({ x: [1, 2] }))).toBeNull();
    expect(checkEnumerate(1, enumerate('1'))?.kind).toBe('enumerate');
  });

  it('rejects an empty enumeration', () => {
    expect(() => checkEnumerate('a', enumerate())).toThrow(ConfigurationError);
  });
});

describe('checkType', () => {
  it('accepts integers as numbers', () => {
    expect(checkType(3, type('number'))).toBeNull();
    expect(checkType(3, type('integer'))).toBeNull();
  });

  it('reports the observed type', () => {
    expect(checkType(3.5, type('integer'))).toEqual({
      kind: 'type',
      expected: ['integer'],
      actual: 'number',
    });
    expect(checkType(undefined, type('string', 'null'))).toEqual({
      kind: 'type',
      expected: ['string', 'null'],
      actual: 'undefined',
    });
  });

  it('accepts Maps as objects', () => {
    expect(checkType(new Map(), type('object'))).toBeNull();
    expect(checkType([], type('object'))?.kind).toBe('type');
  });
});

describe('checkCustom', () => {
  const even = custom('even', (value) =>
    typeof value === 'number' && value % 2 !== 0 ? 'must be even' : null
  );

  it('wraps a message', () => {
    expect(checkCustom(3, even)).toEqual({ kind: 'custom', name: 'even', message: 'must be even' });
    expect(checkCustom(4, even)).toBeNull();
  });

  it('keeps a message id and parameters', () => {
    const rule = custom('positive', (value) =>
      typeof value === 'number' && value <= 0
        ? { message: 'must be positive', messageId: 'positive', params: { actual: value } }
        : undefined
    );

    expect(checkCustom(-2, rule)).toEqual({
      kind: 'custom',
      name: 'positive',
      message: 'must be positive',
      messageId: 'positive',
      params: { actual: -2 },
    });
  });
});

describe('evaluateRule', () => {
  it('dispatches by rule kind', () => {
    expect(evaluateRule(150, maximum(100))).toEqual({
      kind: 'range',
      limit: 'maximum',
      maximum: 100,
      actual: 150,
    });
  });

  it('needs a matcher for contains', () => {
    expect(() => evaluateRule([1], contains(integer()))).toThrow(ConfigurationError);
    expect(evaluateRule([1], contains(integer()), { matches: () => true })).toBeNull();
  });
});

describe('deepEqual', () => {
  it('ignores key order', () => {
    expect(deepEqual({ a: 1, b: { c: [1] } }, { b: { c: [1] }, a: 1 })).toBe(true);
  });

  it('distinguishes arrays from objects', () => {
    expect(deepEqual([1], { 0: 1 })).toBe(false);
  });

  it('compares Maps by entries', () => {
    expect(deepEqual(new Map([['a', 1]]), new Map([['a', 1]]))).toBe(true);
    expect(deepEqual(new Map([['a', 1]]), new Map([['a', 2]]))).toBe(false);
  });
});
