/**
 * Sequence and mapping constraint evaluators.
 */

import { isPlainRecord } from '../types/common.js';
import type {
  ConstraintResult,
  ContainsRule,
  ItemsRule,
  PropertiesRule,
  UniqueItemsRule,
} from './types.js';
import { assertRuleConsistency } from './RuleChecks.js';
import { deepEqual } from './equality.js';

export function checkItems(value: unknown, rule: ItemsRule): ConstraintResult {
  assertRuleConsistency(rule);
  if (!Array.isArray(value)) {
    return null;
  }

  const count = value.length;
  const bounds = {
    ...(rule.minItems !== undefined ? { minItems: rule.minItems } : {}),
    ...(rule.maxItems !== undefined ? { maxItems: rule.maxItems } : {}),
  };
  if (rule.minItems !== undefined && count < rule.minItems) {
    return { kind: 'items', limit: 'minItems', ...bounds, actual: count };
  }
  if (rule.maxItems !== undefined && count > rule.maxItems) {
    return { kind: 'items', limit: 'maxItems', ...bounds, actual: count };
  }
  return null;
}

/**
 * Report the first pair of equal items: the smallest later index, paired
 * with the earliest item equal to it.
 */
export function checkUniqueItems(value: unknown, _rule: UniqueItemsRule): ConstraintResult {
  if (!Array.isArray(value)) {
    return null;
  }

  for (let j = 1; j < value.length; j++) {
    for (let i = 0; i < j; i++) {
      if (deepEqual(value[i], value[j])) {
        return { kind: 'uniqueItems', first: i, duplicate: j };
      }
    }
  }
  return null;
}

/**
 * Count the items accepted by `matches` and compare against the
 * `minContains` (default 1) / `maxContains` bounds.
 *
 * @param matches - Whether one item satisfies `rule.schema`
 */
export function checkContains(
  value: unknown,
  rule: ContainsRule,
  matches: (item: unknown) => boolean
): ConstraintResult {
  assertRuleConsistency(rule);
  if (!Array.isArray(value)) {
    return null;
  }

  const minContains = rule.minContains ?? 1;
  const count = value.filter((item) => matches(item)).length;
  const bounds = {
    minContains,
    ...(rule.maxContains !== undefined ? { maxContains: rule.maxContains } : {}),
  };
  if (count < minContains) {
    return { kind: 'contains', limit: 'minContains', ...bounds, actual: count };
  }
  if (rule.maxContains !== undefined && count > rule.maxContains) {
    return { kind: 'contains', limit: 'maxContains', ...bounds, actual: count };
  }
  return null;
}

/**
 * Property count of a plain object or Map.
 */
export function checkProperties(value: unknown, rule: PropertiesRule): ConstraintResult {
  assertRuleConsistency(rule);
  let count: number;
  if (value instanceof Map) {
    count = value.size;
  } else if (isPlainRecord(value)) {
    count = Object.keys(value).length;
  } else {
    return null;
  }

  const bounds = {
    ...(rule.minProperties !== undefined ? { minProperties: rule.minProperties } : {}),
    ...(rule.maxProperties !== undefined ? { maxProperties: rule.maxProperties } : {}),
  };
  if (rule.minProperties !== undefined && count < rule.minProperties) {
    return { kind: 'properties', limit: 'minProperties', ...bounds, actual: count };
  }
  if (rule.maxProperties !== undefined && count > rule.maxProperties) {
    return { kind: 'properties', limit: 'maxProperties', ...bounds, actual: count };
  }
  return null;
}
