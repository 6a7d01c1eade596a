/**
 * Configuration checks for rules.
 *
 * A rule that can never be satisfied, or cannot be evaluated at all, is an
 * authoring bug. These checks throw ConfigurationError for such rules; they
 * never look at data.
 */

import { ConfigurationError } from '../errors/errors.js';
import { getPattern } from './PatternCache.js';
import type { Rule } from './types.js';

function checkFinite(kind: string, name: string, value: number | undefined): void {
  if (value !== undefined && !Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a finite number, got ${value}`, kind);
  }
}

function checkCount(kind: string, name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got ${value}`, kind);
  }
}

function checkOrder(
  kind: string,
  lowerName: string,
  lower: number | undefined,
  upperName: string,
  upper: number | undefined,
  allowEqual: boolean
): void {
  if (lower === undefined || upper === undefined) return;
  if (lower > upper || (!allowEqual && lower === upper)) {
    throw new ConfigurationError(
      `${lowerName} (${lower}) must be ${allowEqual ? 'at most' : 'less than'} ${upperName} (${upper})`,
      kind,
      { [lowerName]: lower, [upperName]: upper }
    );
  }
}

/**
 * Throw ConfigurationError when a rule is internally inconsistent.
 */
export function assertRuleConsistency(rule: Rule): void {
  switch (rule.kind) {
    case 'range':
      checkFinite(rule.kind, 'minimum', rule.minimum);
      checkFinite(rule.kind, 'maximum', rule.maximum);
      checkFinite(rule.kind, 'exclusiveMinimum', rule.exclusiveMinimum);
      checkFinite(rule.kind, 'exclusiveMaximum', rule.exclusiveMaximum);
      checkOrder(rule.kind, 'minimum', rule.minimum, 'maximum', rule.maximum, true);
      checkOrder(rule.kind, 'exclusiveMinimum', rule.exclusiveMinimum, 'maximum', rule.maximum, false);
      checkOrder(rule.kind, 'minimum', rule.minimum, 'exclusiveMaximum', rule.exclusiveMaximum, false);
      checkOrder(rule.kind, 'exclusiveMinimum', rule.exclusiveMinimum, 'exclusiveMaximum', rule.exclusiveMaximum, false);
      return;

    case 'multipleOf':
      if (!Number.isFinite(rule.multipleOf) || rule.multipleOf <= 0) {
        throw new ConfigurationError(`multipleOf must be a positive number, got ${rule.multipleOf}`, rule.kind);
      }
      return;

    case 'length':
      checkCount(rule.kind, 'minLength', rule.minLength);
      checkCount(rule.kind, 'maxLength', rule.maxLength);
      checkOrder(rule.kind, 'minLength', rule.minLength, 'maxLength', rule.maxLength, true);
      return;

    case 'pattern':
      getPattern(rule.pattern, rule.flags);
      return;

    case 'enumerate':
      if (rule.values.length === 0) {
        throw new ConfigurationError('at least one value is required', rule.kind);
      }
      return;

    case 'items':
      checkCount(rule.kind, 'minItems', rule.minItems);
      checkCount(rule.kind, 'maxItems', rule.maxItems);
      checkOrder(rule.kind, 'minItems', rule.minItems, 'maxItems', rule.maxItems, true);
      return;

    case 'uniqueItems':
      return;

    case 'contains':
      checkCount(rule.kind, 'minContains', rule.minContains);
      checkCount(rule.kind, 'maxContains', rule.maxContains);
      checkOrder(rule.kind, 'minContains', rule.minContains ?? 1, 'maxContains', rule.maxContains, true);
      return;

    case 'properties':
      checkCount(rule.kind, 'minProperties', rule.minProperties);
      checkCount(rule.kind, 'maxProperties', rule.maxProperties);
      checkOrder(rule.kind, 'minProperties', rule.minProperties, 'maxProperties', rule.maxProperties, true);
      return;

    case 'type':
      if (rule.types.length === 0) {
        throw new ConfigurationError('at least one type is required', rule.kind);
      }
      return;

    case 'custom':
      if (typeof rule.check !== 'function') {
        throw new ConfigurationError(`check for "${rule.name}" must be a function`, rule.kind);
      }
      return;

    default: {
      const unknownRule: never = rule;
      throw new ConfigurationError(`unknown rule ${JSON.stringify(unknownRule)}`, 'unknown');
    }
  }
}
