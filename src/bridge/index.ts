/**
 * Format bridge - schema documents and serialized input.
 */

export {
  toSchemaDocument,
  fromSchemaDocument,
  JSON_SCHEMA_DIALECT,
} from './SchemaDocument.js';
export type {
  SchemaDocument,
  SchemaDocumentNode,
  ToSchemaDocumentOptions,
} from './SchemaDocument.js';
export { fromSerialized, parseAndValidate } from './SerializedInput.js';
export type { SerializedFormat } from './SerializedInput.js';
export { toJsonValue } from './json.js';
export { DocumentValidator, createDocumentValidator } from './DocumentValidator.js';
export type {
  DocumentError,
  DocumentValidationResult,
  DocumentValidatorOptions,
} from './DocumentValidator.js';
