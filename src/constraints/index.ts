/**
 * Constraint module - rules and their evaluators.
 */

export * from './types.js';
export * from './rules.js';
export { evaluateRule } from './ConstraintEvaluator.js';
export type { EvaluationContext } from './ConstraintEvaluator.js';
export { checkRange, checkMultipleOf, isMultipleOf } from './NumericConstraints.js';
export { checkLength, checkPattern, graphemeLength } from './StringConstraints.js';
export {
  checkItems,
  checkUniqueItems,
  checkContains,
  checkProperties,
} from './CollectionConstraints.js';
export { checkEnumerate, checkType, checkCustom } from './GenericConstraints.js';
export { assertRuleConsistency } from './RuleChecks.js';
export { getPattern, patternCacheSize, clearPatternCache } from './PatternCache.js';
export { deepEqual } from './equality.js';
