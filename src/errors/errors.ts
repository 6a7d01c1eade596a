/**
 * Error classes.
 *
 * Violations are data, not exceptions. The classes here cover the cases
 * where validation could not run, or where a caller asked for a throw.
 */

import type { ValidationErrors } from './ValidationErrors.js';

/**
 * A rule is internally inconsistent (minimum above maximum, invalid regex,
 * ...). This is an authoring bug, never a problem with the data.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly ruleKind: string,
    public readonly detail?: Record<string, unknown>
  ) {
    super(`Invalid ${ruleKind} rule: ${message}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Supported source formats for conversion.
 */
export type SourceFormat = 'json' | 'yaml' | 'toml' | 'schema';

/**
 * An external representation could not be converted (bad JSON, YAML or
 * TOML, or a schema document of an unsupported shape).
 */
export class ConversionError extends Error {
  constructor(
    message: string,
    public readonly format: SourceFormat,
    options?: { cause?: unknown }
  ) {
    super(`Cannot convert ${format} source: ${message}`, options);
    this.name = 'ConversionError';
  }
}

/**
 * Thrown by the asserting entry points when validation produced
 * violations. The message is the JSON form of the error tree.
 */
export class ValidationFailedError extends Error {
  constructor(public readonly errors: ValidationErrors) {
    super(JSON.stringify(errors.toJSON()));
    this.name = 'ValidationFailedError';
  }
}
