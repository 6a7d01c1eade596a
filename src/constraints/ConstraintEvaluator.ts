/**
 * ConstraintEvaluator — Dispatches a rule to its evaluator.
 *
 * The switch is exhaustive over the Rule union; adding a rule kind without
 * an evaluator is a compile error.
 */

import { ConfigurationError } from '../errors/errors.js';
import type { Schema } from '../walker/types.js';
import type { ConstraintResult, Rule } from './types.js';
import { checkMultipleOf, checkRange } from './NumericConstraints.js';
import { checkLength, checkPattern } from './StringConstraints.js';
import {
  checkContains,
  checkItems,
  checkProperties,
  checkUniqueItems,
} from './CollectionConstraints.js';
import { checkCustom, checkEnumerate, checkType } from './GenericConstraints.js';

/**
 * Hooks an evaluator may need from the surrounding walker.
 */
export interface EvaluationContext {
  /** Whether a value satisfies a nested schema (for `contains`) */
  matches?: (schema: Schema, value: unknown) => boolean;
}

/**
 * Evaluate one rule against a value.
 *
 * @returns null when the value satisfies the rule, else the violation
 * @throws ConfigurationError when the rule is inconsistent
 */
export function evaluateRule(
  value: unknown,
  rule: Rule,
  context: EvaluationContext = {}
): ConstraintResult {
  switch (rule.kind) {
    case 'range':
      return checkRange(value, rule);
    case 'multipleOf':
      return checkMultipleOf(value, rule);
    case 'length':
      return checkLength(value, rule);
    case 'pattern':
      return checkPattern(value, rule);
    case 'enumerate':
      return checkEnumerate(value, rule);
    case 'items':
      return checkItems(value, rule);
    case 'uniqueItems':
      return checkUniqueItems(value, rule);
    case 'contains': {
      const matches = context.matches;
      if (matches === undefined) {
        throw new ConfigurationError('evaluation needs a schema matcher', rule.kind);
      }
      return checkContains(value, rule, (item) => matches(rule.schema, item));
    }
    case 'properties':
      return checkProperties(value, rule);
    case 'type':
      return checkType(value, rule);
    case 'custom':
      return checkCustom(value, rule);
    default: {
      const unknownRule: never = rule;
      throw new ConfigurationError(`unknown rule ${JSON.stringify(unknownRule)}`, 'unknown');
    }
  }
}
