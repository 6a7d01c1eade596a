/**
 * Numeric constraint evaluators: range and multiple-of.
 *
 * Both ignore non-numbers (type enforcement belongs to the `type` rule)
 * and report NaN and the infinities as `nonFinite`.
 */

import type { RangeLimit, RangeViolation } from '../errors/types.js';
import type { ConstraintResult, MultipleOfRule, RangeRule } from './types.js';
import { assertRuleConsistency } from './RuleChecks.js';

/**
 * Check the declared bounds in a fixed order and report the first one
 * crossed, carrying every bound of the rule.
 */
export function checkRange(value: unknown, rule: RangeRule): ConstraintResult {
  assertRuleConsistency(rule);
  if (typeof value !== 'number') {
    return null;
  }
  if (!Number.isFinite(value)) {
    return { kind: 'nonFinite', actual: value };
  }

  let limit: RangeLimit | undefined;
  if (rule.minimum !== undefined && value < rule.minimum) {
    limit = 'minimum';
  } else if (rule.maximum !== undefined && value > rule.maximum) {
    limit = 'maximum';
  } else if (rule.exclusiveMinimum !== undefined && value <= rule.exclusiveMinimum) {
    limit = 'exclusiveMinimum';
  } else if (rule.exclusiveMaximum !== undefined && value >= rule.exclusiveMaximum) {
    limit = 'exclusiveMaximum';
  }

  if (limit === undefined) {
    return null;
  }

  const violation: RangeViolation = {
    kind: 'range',
    limit,
    ...(rule.minimum !== undefined ? { minimum: rule.minimum } : {}),
    ...(rule.maximum !== undefined ? { maximum: rule.maximum } : {}),
    ...(rule.exclusiveMinimum !== undefined ? { exclusiveMinimum: rule.exclusiveMinimum } : {}),
    ...(rule.exclusiveMaximum !== undefined ? { exclusiveMaximum: rule.exclusiveMaximum } : {}),
    actual: value,
  };
  return violation;
}

/**
 * Whether `value` is a multiple of `divisor`, tolerating the rounding
 * error of binary floating point (0.3 is a multiple of 0.1).
 */
export function isMultipleOf(value: number, divisor: number): boolean {
  if (value === 0) {
    return true;
  }
  const quotient = value / divisor;
  const rounded = Math.round(quotient);
  const tolerance = 4 * Number.EPSILON * Math.max(1, Math.abs(quotient));
  return Math.abs(quotient - rounded) <= tolerance;
}

export function checkMultipleOf(value: unknown, rule: MultipleOfRule): ConstraintResult {
  assertRuleConsistency(rule);
  if (typeof value !== 'number') {
    return null;
  }
  if (!Number.isFinite(value)) {
    return { kind: 'nonFinite', actual: value };
  }
  if (isMultipleOf(value, rule.multipleOf)) {
    return null;
  }
  return { kind: 'multipleOf', multipleOf: rule.multipleOf, actual: value };
}
