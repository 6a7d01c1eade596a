/**
 * DocumentValidator — Validates values against schema documents with Ajv.
 *
 * This is the "flatten" interoperability path: the same rules run through
 * a third-party JSON Schema engine instead of the structural walker.
 * Results use the same JSON Pointer paths as ValidationErrors.toFlat, and
 * the keywords that have a built-in message are rendered with it.
 *
 * - Ajv is configured ONCE at construction time
 * - Compiled documents are cached per document object, generated
 *   documents per schema object
 */

import { Ajv2020 } from 'ajv/dist/2020.js';
import type { ErrorObject, ValidateFunction } from 'ajv';
import addFormatsModule from 'ajv-formats';
import { ConversionError } from '../errors/errors.js';
import { escapePointerSegment } from '../errors/ValidationErrors.js';
import type { MessageParam } from '../errors/types.js';
import { DEFAULT_MESSAGES } from '../messages/defaultMessages.js';
import { substituteParams } from '../messages/MessageRenderer.js';
import type { Schema } from '../walker/types.js';
import { toSchemaDocument, type SchemaDocument } from './SchemaDocument.js';

const addFormats = addFormatsModule.default;

/**
 * Options for creating a document validator.
 */
export interface DocumentValidatorOptions {
  /** Whether to use strict mode (default: false; generated documents use keywords without `type`) */
  strict?: boolean;
  /** Whether to add standard formats (default: true) */
  addFormats?: boolean;
}

/**
 * One error reported by Ajv.
 */
export interface DocumentError {
  /** JSON Pointer to the failing value ("" is the root) */
  path: string;
  message: string;
  /** JSON Schema keyword that failed */
  keyword: string;
}

export interface DocumentValidationResult {
  valid: boolean;
  errors: DocumentError[];
}

const DEFAULT_OPTIONS: Required<DocumentValidatorOptions> = {
  strict: false,
  addFormats: true,
};

function param(error: ErrorObject, name: string): MessageParam | undefined {
  const value: unknown = error.params[name];
  return typeof value === 'number' || typeof value === 'string' ? value : undefined;
}

function template(id: string, params: Record<string, MessageParam>): string | undefined {
  const text = DEFAULT_MESSAGES[id];
  return text === undefined ? undefined : substituteParams(text, params);
}

/**
 * Convert an Ajv ErrorObject to a DocumentError.
 *
 * `required` and `additionalProperties` errors are reported at the
 * property's own path, as the walker does.
 */
function convertAjvError(error: ErrorObject): DocumentError {
  let path = error.instancePath;
  let message: string | undefined;

  const limit = param(error, 'limit');
  switch (error.keyword) {
    case 'minimum':
    case 'maximum':
    case 'exclusiveMinimum':
    case 'exclusiveMaximum': {
      const id = `range-${error.keyword.replace(/[A-Z]/g, (ch) => `-${ch.toLowerCase()}`)}`;
      if (limit !== undefined) message = template(id, { [error.keyword]: limit });
      break;
    }
    case 'multipleOf': {
      const multipleOf = param(error, 'multipleOf');
      if (multipleOf !== undefined) message = template('multiple-of', { multipleOf });
      break;
    }
    case 'minLength':
    case 'maxLength':
      if (limit !== undefined) {
        message = template(error.keyword === 'minLength' ? 'length-min-length' : 'length-max-length', {
          [error.keyword]: limit,
        });
      }
      break;
    case 'minItems':
    case 'maxItems':
      if (limit !== undefined) {
        message = template(error.keyword === 'minItems' ? 'items-min-items' : 'items-max-items', {
          [error.keyword]: limit,
        });
      }
      break;
    case 'minProperties':
    case 'maxProperties':
      if (limit !== undefined) {
        message = template(
          error.keyword === 'minProperties' ? 'properties-min-properties' : 'properties-max-properties',
          { [error.keyword]: limit }
        );
      }
      break;
    case 'pattern': {
      const pattern = param(error, 'pattern');
      if (pattern !== undefined) message = template('pattern', { pattern });
      break;
    }
    case 'uniqueItems': {
      const i = param(error, 'i');
      const j = param(error, 'j');
      if (typeof i === 'number' && typeof j === 'number') {
        message = template('unique-items', { first: Math.min(i, j), duplicate: Math.max(i, j) });
      }
      break;
    }
    case 'required': {
      const property = param(error, 'missingProperty');
      if (property !== undefined) {
        path = `${path}/${escapePointerSegment(property)}`;
        message = template('required', { property });
      }
      break;
    }
    case 'additionalProperties': {
      const property = param(error, 'additionalProperty');
      if (property !== undefined) {
        path = `${path}/${escapePointerSegment(property)}`;
        message = template('unexpected-property', { property });
      }
      break;
    }
  }

  return {
    path,
    message: message ?? error.message ?? 'validation failed',
    keyword: error.keyword,
  };
}

export class DocumentValidator {
  private readonly ajv: Ajv2020;
  private readonly compiled = new WeakMap<SchemaDocument, ValidateFunction>();
  private readonly documents = new WeakMap<Schema, SchemaDocument>();

  constructor(options: DocumentValidatorOptions = {}) {
    const opts = { ...DEFAULT_OPTIONS, ...options };

    this.ajv = new Ajv2020({
      strict: opts.strict,
      allErrors: true,
    });

    if (opts.addFormats) {
      addFormats(this.ajv);
    }
  }

  /**
   * Compile a document, or return the cached validate function.
   *
   * @throws ConversionError when Ajv rejects the document
   */
  compile(document: SchemaDocument): ValidateFunction {
    const cached = this.compiled.get(document);
    if (cached !== undefined) {
      return cached;
    }

    let validateFn: ValidateFunction;
    try {
      validateFn = this.ajv.compile(document);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConversionError(message, 'schema', { cause: err });
    }
    this.compiled.set(document, validateFn);
    return validateFn;
  }

  /**
   * Validate data against a document.
   */
  validate(data: unknown, document: SchemaDocument): DocumentValidationResult {
    const validateFn = this.compile(document);
    if (validateFn(data)) {
      return { valid: true, errors: [] };
    }
    return { valid: false, errors: (validateFn.errors ?? []).map(convertAjvError) };
  }

  /**
   * Translate a schema to a document and validate data against it.
   */
  validateSchema(data: unknown, schema: Schema): DocumentValidationResult {
    let document = this.documents.get(schema);
    if (document === undefined) {
      document = toSchemaDocument(schema);
      this.documents.set(schema, document);
    }
    return this.validate(data, document);
  }
}

/**
 * Create a new DocumentValidator instance.
 */
export function createDocumentValidator(options?: DocumentValidatorOptions): DocumentValidator {
  return new DocumentValidator(options);
}
