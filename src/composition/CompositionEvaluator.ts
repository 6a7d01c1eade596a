/**
 * CompositionEvaluator — allOf / anyOf / oneOf / not over sub-validations.
 *
 * Branches are thunks so that `anyOf` can stop at the first success.
 * `allOf` and `oneOf` always evaluate every branch: the first to report
 * every failure, the second to count matches.
 */

import { ValidationErrors } from '../errors/ValidationErrors.js';
import type { Branch, CompositionResult } from './types.js';

function passed(matchedIndices: readonly number[]): CompositionResult {
  return { passed: true, errors: new ValidationErrors(), matchedIndices };
}

/**
 * Passes when every branch passes. On failure the errors are the union
 * of all failing branch trees, merged at the same paths.
 */
export function allOf(branches: readonly Branch[]): CompositionResult {
  const errors = new ValidationErrors();
  const matchedIndices: number[] = [];

  branches.forEach((branch, index) => {
    const branchErrors = branch();
    if (branchErrors.isEmpty()) {
      matchedIndices.push(index);
    } else {
      errors.merge(branchErrors);
    }
  });

  return { passed: errors.isEmpty(), errors, matchedIndices };
}

/**
 * Passes as soon as one branch passes; later branches are not run. On
 * failure a single `anyOf` violation carries every branch tree.
 */
export function anyOf(branches: readonly Branch[]): CompositionResult {
  const failures: ValidationErrors[] = [];

  for (const [index, branch] of branches.entries()) {
    const branchErrors = branch();
    if (branchErrors.isEmpty()) {
      return passed([index]);
    }
    failures.push(branchErrors);
  }

  return {
    passed: false,
    errors: ValidationErrors.of({ kind: 'anyOf', branches: failures }),
    matchedIndices: [],
  };
}

/**
 * Passes when exactly one branch passes.
 */
export function oneOf(branches: readonly Branch[]): CompositionResult {
  const results = branches.map((branch) => branch());
  const matchedIndices = results.flatMap((errors, index) => (errors.isEmpty() ? [index] : []));

  if (matchedIndices.length === 1) {
    return passed(matchedIndices);
  }

  const errors = matchedIndices.length === 0
    ? ValidationErrors.of({ kind: 'oneOfNone', branches: results })
    : ValidationErrors.of({
        kind: 'oneOfMultiple',
        matched: matchedIndices.length,
        matchedIndices,
      });

  return { passed: false, errors, matchedIndices };
}

/**
 * Passes when the inner validation fails.
 */
export function not(inner: Branch): CompositionResult {
  if (inner().isEmpty()) {
    return {
      passed: false,
      errors: ValidationErrors.of({ kind: 'not' }),
      matchedIndices: [0],
    };
  }
  return passed([]);
}
