/**
 * Walker module - schema nodes, the structural walker and the builder.
 */

export * from './types.js';
export {
  validateValue,
  assertSchemaConsistency,
  SchemaValidator,
} from './StructuralWalker.js';
export type { SchemaValidatorOptions } from './StructuralWalker.js';
export * from './SchemaBuilder.js';
