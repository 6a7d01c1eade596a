/**
 * StructuralWalker — Applies a schema to a value and assembles the error tree.
 *
 * The walk never stops early: every field, item and mapping value is
 * visited, and a node's own rules run regardless of how its children did.
 * Only a container of the wrong type cuts a subtree short, since there is
 * nothing to recurse into.
 */

import type { Logger } from 'pino';
import { ValidationErrors } from '../errors/ValidationErrors.js';
import { ConfigurationError, ValidationFailedError } from '../errors/errors.js';
import type { Violation } from '../errors/types.js';
import { evaluateRule, type EvaluationContext } from '../constraints/ConstraintEvaluator.js';
import { assertRuleConsistency } from '../constraints/RuleChecks.js';
import type { Rule } from '../constraints/types.js';
import { allOf, anyOf, not, oneOf } from '../composition/CompositionEvaluator.js';
import { isPlainRecord, mappingEntries, valueTypeOf, type ValueType } from '../types/common.js';
import { logger as defaultLogger } from '../logging/logger.js';
import type {
  MapSchema,
  RecordSchema,
  Schema,
  SequenceSchema,
  ValueSchema,
} from './types.js';

const context: EvaluationContext = {
  matches: (schema, value) => validateValue(schema, value).isEmpty(),
};

/**
 * Push a violation onto a node, keeping at most one `nonFinite` per node.
 */
function pushViolation(errors: ValidationErrors, violation: Violation): void {
  if (violation.kind === 'nonFinite' && errors.violations.some((v) => v.kind === 'nonFinite')) {
    return;
  }
  errors.push(violation);
}

function applyRules(errors: ValidationErrors, rules: readonly Rule[], value: unknown): void {
  for (const rule of rules) {
    const violation = evaluateRule(value, rule, context);
    if (violation !== null) {
      pushViolation(errors, violation);
    }
  }
}

function typeMismatch(expected: ValueType, value: unknown): ValidationErrors {
  return ValidationErrors.of({ kind: 'type', expected: [expected], actual: valueTypeOf(value) });
}

function walkValue(schema: ValueSchema, value: unknown): ValidationErrors {
  const errors = new ValidationErrors();
  applyRules(errors, schema.rules, value);
  return errors;
}

function walkRecord(schema: RecordSchema, value: unknown): ValidationErrors {
  if (!isPlainRecord(value)) {
    return typeMismatch('object', value);
  }

  const errors = new ValidationErrors();
  applyRules(errors, schema.rules, value);

  const declared = new Set<string>();
  for (const field of schema.fields) {
    declared.add(field.name);
    const present = Object.prototype.hasOwnProperty.call(value, field.name);
    const fieldValue = present ? value[field.name] : undefined;

    if (fieldValue === undefined && field.schema.node !== 'optional') {
      errors.mergeAt(field.name, ValidationErrors.of({ kind: 'required', property: field.name }));
      continue;
    }
    errors.mergeAt(field.name, validateValue(field.schema, fieldValue));
  }

  if (!schema.additionalFields) {
    for (const key of Object.keys(value)) {
      if (!declared.has(key)) {
        errors.mergeAt(key, ValidationErrors.of({ kind: 'unexpectedProperty', property: key }));
      }
    }
  }

  return errors;
}

function walkSequence(schema: SequenceSchema, value: unknown): ValidationErrors {
  if (!Array.isArray(value)) {
    return typeMismatch('array', value);
  }

  const errors = new ValidationErrors();
  applyRules(errors, schema.rules, value);

  const itemSchema = schema.items;
  if (itemSchema !== undefined) {
    value.forEach((item: unknown, index) => {
      errors.mergeAt(index, validateValue(itemSchema, item));
    });
  }
  return errors;
}

function walkMap(schema: MapSchema, value: unknown): ValidationErrors {
  if (!isPlainRecord(value) && !(value instanceof Map)) {
    return typeMismatch('object', value);
  }

  const errors = new ValidationErrors();
  applyRules(errors, schema.rules, value);

  const valueSchema = schema.values;
  if (valueSchema !== undefined) {
    for (const [key, entry] of mappingEntries(value)) {
      errors.mergeAt(key, validateValue(valueSchema, entry));
    }
  }
  return errors;
}

/**
 * Validate a value against a schema.
 *
 * @returns the complete error tree; empty when the value is valid
 * @throws ConfigurationError when a rule in the schema is inconsistent
 */
export function validateValue(schema: Schema, value: unknown): ValidationErrors {
  switch (schema.node) {
    case 'value':
      return walkValue(schema, value);
    case 'record':
      return walkRecord(schema, value);
    case 'sequence':
      return walkSequence(schema, value);
    case 'map':
      return walkMap(schema, value);
    case 'optional':
      return value === undefined ? new ValidationErrors() : validateValue(schema.inner, value);
    case 'allOf':
      return allOf(schema.branches.map((branch) => () => validateValue(branch, value))).errors;
    case 'anyOf':
      return anyOf(schema.branches.map((branch) => () => validateValue(branch, value))).errors;
    case 'oneOf':
      return oneOf(schema.branches.map((branch) => () => validateValue(branch, value))).errors;
    case 'not':
      return not(() => validateValue(schema.inner, value)).errors;
    default: {
      const unknownNode: never = schema;
      throw new ConfigurationError(`unknown schema node ${JSON.stringify(unknownNode)}`, 'schema');
    }
  }
}

/**
 * Check every rule reachable from a schema, including the schemas nested
 * in `contains` rules.
 *
 * @throws ConfigurationError for the first inconsistent rule found
 */
export function assertSchemaConsistency(schema: Schema): void {
  const checkRules = (rules: readonly Rule[]): void => {
    for (const rule of rules) {
      assertRuleConsistency(rule);
      if (rule.kind === 'contains') {
        assertSchemaConsistency(rule.schema);
      }
    }
  };

  switch (schema.node) {
    case 'value':
      checkRules(schema.rules);
      return;
    case 'record': {
      checkRules(schema.rules);
      const seen = new Set<string>();
      for (const field of schema.fields) {
        if (seen.has(field.name)) {
          throw new ConfigurationError(`field "${field.name}" is declared twice`, 'record');
        }
        seen.add(field.name);
        assertSchemaConsistency(field.schema);
      }
      return;
    }
    case 'sequence':
      checkRules(schema.rules);
      if (schema.items !== undefined) assertSchemaConsistency(schema.items);
      return;
    case 'map':
      checkRules(schema.rules);
      if (schema.values !== undefined) assertSchemaConsistency(schema.values);
      return;
    case 'optional':
    case 'not':
      assertSchemaConsistency(schema.inner);
      return;
    case 'allOf':
    case 'anyOf':
    case 'oneOf':
      if (schema.branches.length === 0) {
        throw new ConfigurationError('at least one branch is required', schema.node);
      }
      schema.branches.forEach(assertSchemaConsistency);
      return;
    default: {
      const unknownNode: never = schema;
      throw new ConfigurationError(`unknown schema node ${JSON.stringify(unknownNode)}`, 'schema');
    }
  }
}

/**
 * Options for SchemaValidator.
 */
export interface SchemaValidatorOptions {
  /** Logger (default: the shared valtree logger) */
  logger?: Logger;
  /** Name used in log lines */
  name?: string;
}

/**
 * SchemaValidator — A schema checked once, validated many times.
 *
 * Construction fails loudly on an inconsistent rule: the error is logged
 * at `error` level and re-thrown.
 */
export class SchemaValidator {
  private readonly logger: Logger;
  private readonly name: string;

  constructor(
    readonly schema: Schema,
    options: SchemaValidatorOptions = {}
  ) {
    this.name = options.name ?? 'schema';
    this.logger = (options.logger ?? defaultLogger).child({ validator: this.name });

    try {
      assertSchemaConsistency(schema);
    } catch (err) {
      if (err instanceof ConfigurationError) {
        this.logger.error({ err, ruleKind: err.ruleKind }, 'Invalid schema configuration');
      }
      throw err;
    }
  }

  /**
   * Validate a value and return the complete error tree.
   */
  validate(value: unknown): ValidationErrors {
    const errors = validateValue(this.schema, value);
    this.logger.debug({ violations: errors.count() }, 'Validated value');
    return errors;
  }

  isValid(value: unknown): boolean {
    return this.validate(value).isEmpty();
  }

  /**
   * Validate and throw ValidationFailedError when anything failed.
   */
  assertValid(value: unknown): void {
    const errors = this.validate(value);
    if (!errors.isEmpty()) {
      throw new ValidationFailedError(errors);
    }
  }
}
