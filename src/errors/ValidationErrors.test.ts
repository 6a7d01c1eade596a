/**
 * Tests for the ValidationErrors tree.
 */

import { describe, it, expect } from 'vitest';
import { ValidationErrors, escapePointerSegment, toJsonPointer } from './ValidationErrors.js';
import type { Violation } from './types.js';

const tooLarge: Violation = {
  kind: 'range',
  limit: 'maximum',
  minimum: 0,
  maximum: 100,
  actual: 150,
};
const tooLong: Violation = { kind: 'length', limit: 'maxLength', maxLength: 3, actual: 5 };
const tooManyProps: Violation = {
  kind: 'properties',
  limit: 'maxProperties',
  maxProperties: 1,
  actual: 2,
};

function sampleTree(): ValidationErrors {
  return ValidationErrors.of(tooManyProps)
    .mergeAt('age', ValidationErrors.of(tooLarge))
    .mergeAt('tags', new ValidationErrors().mergeAt(1, ValidationErrors.of(tooLong)));
}

describe('ValidationErrors', () => {
  describe('structure', () => {
    it('starts empty', () => {
      const errors = new ValidationErrors();
      expect(errors.isEmpty()).toBe(true);
      expect(errors.count()).toBe(0);
    });

    it('ignores empty children', () => {
      const errors = new ValidationErrors()
        .mergeAt('name', new ValidationErrors())
        .mergeAt(0, new ValidationErrors());

      expect(errors.isEmpty()).toBe(true);
      expect(errors.properties.size).toBe(0);
      expect(errors.items.size).toBe(0);
    });

    it('reports items in index order', () => {
      const errors = new ValidationErrors()
        .mergeAt(2, ValidationErrors.of(tooLong))
        .mergeAt(0, ValidationErrors.of(tooLong));

      expect([...errors.items.keys()]).toEqual([0, 2]);
    });

    it('keeps property insertion order', () => {
      const errors = new ValidationErrors()
        .mergeAt('b', ValidationErrors.of(tooLong))
        .mergeAt('a', ValidationErrors.of(tooLong));

      expect([...errors.properties.keys()]).toEqual(['b', 'a']);
    });

    it('counts violations at every depth', () => {
      expect(sampleTree().count()).toBe(3);
    });

    it('looks up subtrees by path', () => {
      const errors = sampleTree();

      expect(errors.at(['tags', 1])?.violations).toEqual([tooLong]);
      expect(errors.at(['age'])?.violations).toEqual([tooLarge]);
      expect(errors.at(['missing'])).toBeUndefined();
      expect(errors.at([])).toBe(errors);
    });

    it('does not share structure with merged children', () => {
      const child = ValidationErrors.of(tooLarge);
      const parent = new ValidationErrors().mergeAt('age', child);
      child.push(tooLong);

      expect(parent.at(['age'])?.violations).toEqual([tooLarge]);
    });
  });

  describe('merge', () => {
    it('unions violations at the same path', () => {
      const left = new ValidationErrors().mergeAt('a', ValidationErrors.of(tooLarge));
      const right = new ValidationErrors().mergeAt('a', ValidationErrors.of(tooLong));

      left.merge(right);

      expect(left.at(['a'])?.violations).toEqual([tooLarge, tooLong]);
    });

    it('is commutative', () => {
      const a = new ValidationErrors().mergeAt('a', ValidationErrors.of(tooLarge));
      const b = new ValidationErrors().mergeAt('b', ValidationErrors.of(tooLong));

      const ab = new ValidationErrors().merge(a).merge(b);
      const ba = new ValidationErrors().merge(b).merge(a);

      expect(ab.equals(ba)).toBe(true);
      expect([...ab.properties.keys()]).toEqual(['a', 'b']);
      expect([...ba.properties.keys()]).toEqual(['b', 'a']);
    });

    it('is associative', () => {
      const a = new ValidationErrors().mergeAt('a', ValidationErrors.of(tooLarge));
      const b = new ValidationErrors().mergeAt(0, ValidationErrors.of(tooLong));
      const c = ValidationErrors.of(tooManyProps).mergeAt('a', ValidationErrors.of(tooLong));

      const left = new ValidationErrors().merge(a).merge(b).merge(c);
      const right = new ValidationErrors().merge(a).merge(new ValidationErrors().merge(b).merge(c));

      expect(left.equals(right)).toBe(true);
    });

    it('detects different trees', () => {
      const a = new ValidationErrors().mergeAt('a', ValidationErrors.of(tooLarge));
      const b = new ValidationErrors().mergeAt('b', ValidationErrors.of(tooLarge));

      expect(a.equals(b)).toBe(false);
    });

    it('merges a tree into itself once', () => {
      const tree = sampleTree();

      tree.merge(tree);

      expect(tree.count()).toBe(6);
      expect(tree.violations).toEqual([tooManyProps, tooManyProps]);
      expect(tree.at(['age'])?.violations).toEqual([tooLarge, tooLarge]);
      expect(tree.at(['tags', 1])?.violations).toEqual([tooLong, tooLong]);
    });

    it('merges a subtree into its parent', () => {
      const tree = sampleTree();
      const tags = tree.at(['tags']);
      expect(tags).toBeDefined();
      if (tags === undefined) return;

      tree.merge(tags);

      expect(tree.at([1])?.violations).toEqual([tooLong]);
      expect(tree.count()).toBe(4);
    });

    it('tells NaN and infinity apart', () => {
      const nan = ValidationErrors.of({ kind: 'nonFinite', actual: Number.NaN });
      const infinite = ValidationErrors.of({ kind: 'nonFinite', actual: Infinity });

      expect(nan.equals(infinite)).toBe(false);
      expect(infinite.equals(ValidationErrors.of({ kind: 'nonFinite', actual: -Infinity }))).toBe(false);
      expect(nan.equals(ValidationErrors.of({ kind: 'nonFinite', actual: Number.NaN }))).toBe(true);
    });
  });

  describe('rendering', () => {
    it('renders messages grouped by JSON Pointer', () => {
      expect(sampleTree().render()).toEqual({
        '': ['the size of the properties must be `<= 1`.'],
        '/age': ['the number must be `<= 100`.'],
        '/tags/1': ['the length of the value must be `<= 3`.'],
      });
    });

    it('flattens in tree order', () => {
      expect(sampleTree().toFlat()).toEqual([
        { path: '', message: 'the size of the properties must be `<= 1`.' },
        { path: '/age', message: 'the number must be `<= 100`.' },
        { path: '/tags/1', message: 'the length of the value must be `<= 3`.' },
      ]);
    });

    it('serializes to a nested form', () => {
      expect(sampleTree().serialize()).toEqual({
        errors: ['the size of the properties must be `<= 1`.'],
        properties: {
          age: { errors: ['the number must be `<= 100`.'] },
          tags: {
            errors: [],
            items: {
              '1': { errors: ['the length of the value must be `<= 3`.'] },
            },
          },
        },
      });
    });

    it('uses the serialized form for JSON', () => {
      const errors = new ValidationErrors().mergeAt('age', ValidationErrors.of(tooLarge));

      expect(JSON.stringify(errors)).toBe(
        '{"errors":[],"properties":{"age":{"errors":["the number must be `<= 100`."]}}}'
      );
    });

    it('escapes pointer segments', () => {
      const errors = new ValidationErrors().mergeAt(
        'a/b~c',
        ValidationErrors.of({ kind: 'required', property: 'a/b~c' })
      );

      expect(errors.toFlat()).toEqual([
        { path: '/a~1b~0c', message: 'the property `a/b~c` is required.' },
      ]);
    });
  });

  describe('pointer helpers', () => {
    it('builds pointers from segments', () => {
      expect(toJsonPointer([])).toBe('');
      expect(toJsonPointer(['items', 0, 'name'])).toBe('/items/0/name');
      expect(escapePointerSegment('~/')).toBe('~0~1');
    });
  });
});
