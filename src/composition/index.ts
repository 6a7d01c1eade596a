export * from './types.js';
export { allOf, anyOf, oneOf, not } from './CompositionEvaluator.js';
