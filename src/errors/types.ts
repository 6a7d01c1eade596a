/**
 * Violation types.
 *
 * A violation is the immutable record of one failed constraint. It carries
 * the rule parameters and the observed value (or its size) so that a
 * message can be rendered without looking at the rule again.
 */

import type { ObservedType, ValueType } from '../types/common.js';
import type { ValidationErrors } from './ValidationErrors.js';

/**
 * Named message parameter value.
 */
export type MessageParam = string | number;

export type RangeLimit = 'minimum' | 'maximum' | 'exclusiveMinimum' | 'exclusiveMaximum';

export interface RangeViolation {
  readonly kind: 'range';
  /** Bound that was crossed */
  readonly limit: RangeLimit;
  readonly minimum?: number;
  readonly maximum?: number;
  readonly exclusiveMinimum?: number;
  readonly exclusiveMaximum?: number;
  readonly actual: number;
}

/**
 * NaN or an infinity reached a numeric rule.
 */
export interface NonFiniteViolation {
  readonly kind: 'nonFinite';
  readonly actual: number;
}

export interface MultipleOfViolation {
  readonly kind: 'multipleOf';
  readonly multipleOf: number;
  readonly actual: number;
}

export interface LengthViolation {
  readonly kind: 'length';
  readonly limit: 'minLength' | 'maxLength';
  readonly minLength?: number;
  readonly maxLength?: number;
  /** Length in extended grapheme clusters */
  readonly actual: number;
}

export interface PatternViolation {
  readonly kind: 'pattern';
  readonly pattern: string;
  readonly actual: string;
}

export interface EnumerateViolation {
  readonly kind: 'enumerate';
  /** Allowed values in declared order */
  readonly values: readonly unknown[];
  readonly actual: unknown;
}

export interface ItemsViolation {
  readonly kind: 'items';
  readonly limit: 'minItems' | 'maxItems';
  readonly minItems?: number;
  readonly maxItems?: number;
  readonly actual: number;
}

export interface UniqueItemsViolation {
  readonly kind: 'uniqueItems';
  /** Index of the earlier of the two equal items */
  readonly first: number;
  /** Index of the later of the two equal items */
  readonly duplicate: number;
}

export interface ContainsViolation {
  readonly kind: 'contains';
  readonly limit: 'minContains' | 'maxContains';
  readonly minContains: number;
  readonly maxContains?: number;
  /** Number of matching items */
  readonly actual: number;
}

export interface PropertiesViolation {
  readonly kind: 'properties';
  readonly limit: 'minProperties' | 'maxProperties';
  readonly minProperties?: number;
  readonly maxProperties?: number;
  readonly actual: number;
}

export interface TypeViolation {
  readonly kind: 'type';
  readonly expected: readonly ValueType[];
  readonly actual: ObservedType;
}

export interface RequiredViolation {
  readonly kind: 'required';
  readonly property: string;
}

export interface UnexpectedPropertyViolation {
  readonly kind: 'unexpectedProperty';
  readonly property: string;
}

export interface CustomViolation {
  readonly kind: 'custom';
  /** Name of the custom rule */
  readonly name: string;
  /** Default message, used when no catalog entry exists */
  readonly message: string;
  readonly messageId?: string;
  readonly params?: Readonly<Record<string, MessageParam>>;
}

export interface AnyOfViolation {
  readonly kind: 'anyOf';
  /** Failure tree of every branch, in branch order */
  readonly branches: readonly ValidationErrors[];
}

export interface OneOfNoneViolation {
  readonly kind: 'oneOfNone';
  readonly branches: readonly ValidationErrors[];
}

export interface OneOfMultipleViolation {
  readonly kind: 'oneOfMultiple';
  readonly matched: number;
  readonly matchedIndices: readonly number[];
}

export interface NotViolation {
  readonly kind: 'not';
}

/**
 * Union of all violation types.
 */
export type Violation =
  | RangeViolation
  | NonFiniteViolation
  | MultipleOfViolation
  | LengthViolation
  | PatternViolation
  | EnumerateViolation
  | ItemsViolation
  | UniqueItemsViolation
  | ContainsViolation
  | PropertiesViolation
  | TypeViolation
  | RequiredViolation
  | UnexpectedPropertyViolation
  | CustomViolation
  | AnyOfViolation
  | OneOfNoneViolation
  | OneOfMultipleViolation
  | NotViolation;

export type ViolationKind = Violation['kind'];

/**
 * One segment of a path: a property name or an item index.
 */
export type PathSegment = string | number;

/**
 * A rendered error addressed by JSON Pointer.
 */
export interface FlatError {
  /** JSON Pointer to the failing value ("" is the root) */
  path: string;
  message: string;
}

/**
 * Serializable form of a ValidationErrors tree.
 */
export interface SerializedErrors {
  errors: string[];
  properties?: Record<string, SerializedErrors>;
  items?: Record<string, SerializedErrors>;
}
