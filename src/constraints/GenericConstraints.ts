/**
 * Constraint evaluators that apply to values of any type: enumeration,
 * type and custom checks.
 */

import { typeMatches, valueTypeOf } from '../types/common.js';
import type { ConstraintResult, CustomRule, EnumerateRule, TypeRule } from './types.js';
import { assertRuleConsistency } from './RuleChecks.js';
import { deepEqual } from './equality.js';

export function checkEnumerate(value: unknown, rule: EnumerateRule): ConstraintResult {
  assertRuleConsistency(rule);
  if (rule.values.some((allowed) => deepEqual(allowed, value))) {
    return null;
  }
  return { kind: 'enumerate', values: rule.values, actual: value };
}

export function checkType(value: unknown, rule: TypeRule): ConstraintResult {
  assertRuleConsistency(rule);
  const observed = valueTypeOf(value);
  if (rule.types.some((expected) => typeMatches(observed, expected))) {
    return null;
  }
  return { kind: 'type', expected: rule.types, actual: observed };
}

/**
 * Run a user-supplied check and wrap its failure in a `custom` violation.
 * The check's own logic is opaque here.
 */
export function checkCustom(value: unknown, rule: CustomRule): ConstraintResult {
  assertRuleConsistency(rule);
  const outcome = rule.check(value);
  if (outcome === null || outcome === undefined) {
    return null;
  }
  if (typeof outcome === 'string') {
    return { kind: 'custom', name: rule.name, message: outcome };
  }
  return {
    kind: 'custom',
    name: rule.name,
    message: outcome.message,
    ...(outcome.messageId !== undefined ? { messageId: outcome.messageId } : {}),
    ...(outcome.params !== undefined ? { params: { ...outcome.params } } : {}),
  };
}
