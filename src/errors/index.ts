/**
 * Error model - violations, the error tree and error classes.
 */

export * from './types.js';
export { ValidationErrors, escapePointerSegment, toJsonPointer } from './ValidationErrors.js';
export {
  ConfigurationError,
  ConversionError,
  ValidationFailedError,
} from './errors.js';
export type { SourceFormat } from './errors.js';
