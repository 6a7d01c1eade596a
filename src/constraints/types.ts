/**
 * Rule types.
 *
 * A rule is an immutable parameter set for one constraint kind. Rules are
 * attached to schema nodes by whoever builds the schema; evaluators receive
 * them as plain arguments.
 */

import type { ValueType } from '../types/common.js';
import type { MessageParam, Violation } from '../errors/types.js';
import type { Schema } from '../walker/types.js';

/**
 * Numeric range. Each bound is independent; any subset may be set.
 */
export interface RangeRule {
  readonly kind: 'range';
  readonly minimum?: number;
  readonly maximum?: number;
  readonly exclusiveMinimum?: number;
  readonly exclusiveMaximum?: number;
}

export interface MultipleOfRule {
  readonly kind: 'multipleOf';
  readonly multipleOf: number;
}

/**
 * Text length in extended grapheme clusters.
 */
export interface LengthRule {
  readonly kind: 'length';
  readonly minLength?: number;
  readonly maxLength?: number;
}

/**
 * Regular expression search (matches anywhere unless the pattern is
 * anchored). Patterns are always compiled with the `u` flag.
 */
export interface PatternRule {
  readonly kind: 'pattern';
  readonly pattern: string;
  /** Extra flags, e.g. "i". `g` and `y` are rejected. */
  readonly flags?: string;
}

/**
 * Membership by value equality; declared order is kept for messages.
 */
export interface EnumerateRule {
  readonly kind: 'enumerate';
  readonly values: readonly unknown[];
}

export interface ItemsRule {
  readonly kind: 'items';
  readonly minItems?: number;
  readonly maxItems?: number;
}

export interface UniqueItemsRule {
  readonly kind: 'uniqueItems';
}

/**
 * At least `minContains` (default 1) and at most `maxContains` items must
 * satisfy `schema`.
 */
export interface ContainsRule {
  readonly kind: 'contains';
  readonly schema: Schema;
  readonly minContains?: number;
  readonly maxContains?: number;
}

export interface PropertiesRule {
  readonly kind: 'properties';
  readonly minProperties?: number;
  readonly maxProperties?: number;
}

export interface TypeRule {
  readonly kind: 'type';
  readonly types: readonly ValueType[];
}

/**
 * What a custom check returns on failure: a message, or a message with a
 * catalog id and parameters.
 */
export interface CustomFailure {
  message: string;
  messageId?: string;
  params?: Record<string, MessageParam>;
}

/**
 * Custom predicate. Returns null/undefined when the value passes.
 */
export type CustomCheck = (value: unknown) => CustomFailure | string | null | undefined;

export interface CustomRule {
  readonly kind: 'custom';
  readonly name: string;
  readonly check: CustomCheck;
}

/**
 * Union of all rule types.
 */
export type Rule =
  | RangeRule
  | MultipleOfRule
  | LengthRule
  | PatternRule
  | EnumerateRule
  | ItemsRule
  | UniqueItemsRule
  | ContainsRule
  | PropertiesRule
  | TypeRule
  | CustomRule;

export type RuleKind = Rule['kind'];

/**
 * Result of one evaluator: null on success.
 */
export type ConstraintResult = Violation | null;
