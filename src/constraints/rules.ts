/**
 * Rule factories.
 *
 * These only build rule objects; consistency is checked when a schema is
 * compiled into a validator or when the rule is first evaluated.
 */

import type { ValueType } from '../types/common.js';
import type { Schema } from '../walker/types.js';
import type {
  ContainsRule,
  CustomCheck,
  CustomRule,
  EnumerateRule,
  ItemsRule,
  LengthRule,
  MultipleOfRule,
  PatternRule,
  PropertiesRule,
  RangeRule,
  TypeRule,
  UniqueItemsRule,
} from './types.js';

export function range(bounds: Omit<RangeRule, 'kind'>): RangeRule {
  return { kind: 'range', ...bounds };
}

export function minimum(value: number): RangeRule {
  return { kind: 'range', minimum: value };
}

export function maximum(value: number): RangeRule {
  return { kind: 'range', maximum: value };
}

export function exclusiveMinimum(value: number): RangeRule {
  return { kind: 'range', exclusiveMinimum: value };
}

export function exclusiveMaximum(value: number): RangeRule {
  return { kind: 'range', exclusiveMaximum: value };
}

export function multipleOf(value: number): MultipleOfRule {
  return { kind: 'multipleOf', multipleOf: value };
}

export function length(bounds: Omit<LengthRule, 'kind'>): LengthRule {
  return { kind: 'length', ...bounds };
}

export function minLength(value: number): LengthRule {
  return { kind: 'length', minLength: value };
}

export function maxLength(value: number): LengthRule {
  return { kind: 'length', maxLength: value };
}

export function pattern(source: string, flags?: string): PatternRule {
  return flags === undefined ? { kind: 'pattern', pattern: source } : { kind: 'pattern', pattern: source, flags };
}

export function enumerate(...values: unknown[]): EnumerateRule {
  return { kind: 'enumerate', values };
}

export function items(bounds: Omit<ItemsRule, 'kind'>): ItemsRule {
  return { kind: 'items', ...bounds };
}

export function minItems(value: number): ItemsRule {
  return { kind: 'items', minItems: value };
}

export function maxItems(value: number): ItemsRule {
  return { kind: 'items', maxItems: value };
}

export function uniqueItems(): UniqueItemsRule {
  return { kind: 'uniqueItems' };
}

export function contains(
  schema: Schema,
  bounds: Omit<ContainsRule, 'kind' | 'schema'> = {}
): ContainsRule {
  return { kind: 'contains', schema, ...bounds };
}

export function minProperties(value: number): PropertiesRule {
  return { kind: 'properties', minProperties: value };
}

export function maxProperties(value: number): PropertiesRule {
  return { kind: 'properties', maxProperties: value };
}

export function properties(bounds: Omit<PropertiesRule, 'kind'>): PropertiesRule {
  return { kind: 'properties', ...bounds };
}

export function type(...types: ValueType[]): TypeRule {
  return { kind: 'type', types };
}

/**
 * Wrap a predicate as a rule. `check` returns null/undefined on success,
 * or a message (optionally with a catalog id and parameters) on failure.
 */
export function custom(name: string, check: CustomCheck): CustomRule {
  return { kind: 'custom', name, check };
}
