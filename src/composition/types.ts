/**
 * Composition types.
 */

import type { ValidationErrors } from '../errors/ValidationErrors.js';

/**
 * A sub-validation, evaluated only when the combinator needs it.
 */
export type Branch = () => ValidationErrors;

/**
 * Outcome of one combinator.
 */
export interface CompositionResult {
  /** Whether the combinator is satisfied */
  passed: boolean;
  /**
   * Errors to merge at the node: empty when passed. For `allOf` the union
   * of the failing branch trees; otherwise a single violation.
   */
  errors: ValidationErrors;
  /** Indices of the branches that passed (for `not`, [0] when the inner passed) */
  matchedIndices: readonly number[];
}
