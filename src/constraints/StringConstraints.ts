/**
 * Text constraint evaluators: length and pattern.
 */

import type { LengthViolation } from '../errors/types.js';
import type { ConstraintResult, LengthRule, PatternRule } from './types.js';
import { assertRuleConsistency } from './RuleChecks.js';
import { getPattern } from './PatternCache.js';

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/**
 * Length of a string in extended grapheme clusters: "e" followed by a
 * combining acute accent counts once.
 */
export function graphemeLength(text: string): number {
  return [...graphemeSegmenter.segment(text)].length;
}

export function checkLength(value: unknown, rule: LengthRule): ConstraintResult {
  assertRuleConsistency(rule);
  if (typeof value !== 'string') {
    return null;
  }

  const length = graphemeLength(value);
  let limit: LengthViolation['limit'] | undefined;
  if (rule.minLength !== undefined && length < rule.minLength) {
    limit = 'minLength';
  } else if (rule.maxLength !== undefined && length > rule.maxLength) {
    limit = 'maxLength';
  }

  if (limit === undefined) {
    return null;
  }

  return {
    kind: 'length',
    limit,
    ...(rule.minLength !== undefined ? { minLength: rule.minLength } : {}),
    ...(rule.maxLength !== undefined ? { maxLength: rule.maxLength } : {}),
    actual: length,
  };
}

/**
 * Search for the pattern anywhere in the text; anchors in the pattern
 * itself are the only way to require a full match.
 */
export function checkPattern(value: unknown, rule: PatternRule): ConstraintResult {
  const regex = getPattern(rule.pattern, rule.flags);
  if (typeof value !== 'string') {
    return null;
  }
  if (regex.test(value)) {
    return null;
  }
  return { kind: 'pattern', pattern: rule.pattern, actual: value };
}
