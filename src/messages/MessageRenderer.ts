/**
 * MessageRenderer — Turns violations into human-readable strings.
 *
 * Resolution order for a violation:
 * 1. the catalog entry for its message id in the requested locale
 * 2. the built-in template for its message id
 *
 * A missing translation never fails rendering.
 */

import type { MessageParam, Violation } from '../errors/types.js';
import type { MessageContext, RenderOptions } from './types.js';
import { DEFAULT_LOCALE, DEFAULT_MESSAGES } from './defaultMessages.js';

const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Format a literal value the way it appears in messages: strings quoted,
 * everything else in its JSON form.
 */
export function formatLiteral(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return String(value);
  }
  try {
    return JSON.stringify(value);
  } catch {
    // Circular structures have no JSON form.
    return Object.prototype.toString.call(value);
  }
}

/**
 * Kebab-case suffix for a camelCase limit name ("minLength" -> "min-length").
 */
function kebab(name: string): string {
  return name.replace(/[A-Z]/g, (ch) => `-${ch.toLowerCase()}`);
}

/**
 * Build the message context for a violation.
 */
export function toMessageContext(violation: Violation): MessageContext {
  switch (violation.kind) {
    case 'range':
      return {
        id: `range-${kebab(violation.limit)}`,
        params: [
          [violation.limit, violation[violation.limit] ?? Number.NaN],
          ['actual', violation.actual],
        ],
      };

    case 'nonFinite':
      return { id: 'non-finite', params: [['actual', String(violation.actual)]] };

    case 'multipleOf':
      return {
        id: 'multiple-of',
        params: [
          ['multipleOf', violation.multipleOf],
          ['actual', violation.actual],
        ],
      };

    case 'length':
      return {
        id: `length-${kebab(violation.limit)}`,
        params: [
          [violation.limit, violation[violation.limit] ?? Number.NaN],
          ['actual', violation.actual],
        ],
      };

    case 'pattern':
      return {
        id: 'pattern',
        params: [
          ['pattern', violation.pattern],
          ['actual', violation.actual],
        ],
      };

    case 'enumerate':
      return {
        id: 'enumerate',
        params: [
          ['values', violation.values.map(formatLiteral).join(', ')],
          ['actual', formatLiteral(violation.actual)],
        ],
      };

    case 'items':
      return {
        id: `items-${kebab(violation.limit)}`,
        params: [
          [violation.limit, violation[violation.limit] ?? Number.NaN],
          ['actual', violation.actual],
        ],
      };

    case 'uniqueItems':
      return {
        id: 'unique-items',
        params: [
          ['first', violation.first],
          ['duplicate', violation.duplicate],
        ],
      };

    case 'contains':
      return {
        id: `contains-${kebab(violation.limit)}`,
        params: [
          [violation.limit, violation[violation.limit] ?? Number.NaN],
          ['actual', violation.actual],
        ],
      };

    case 'properties':
      return {
        id: `properties-${kebab(violation.limit)}`,
        params: [
          [violation.limit, violation[violation.limit] ?? Number.NaN],
          ['actual', violation.actual],
        ],
      };

    case 'type':
      return {
        id: 'type',
        params: [
          ['expected', violation.expected.join(' | ')],
          ['actual', violation.actual],
        ],
      };

    case 'required':
      return { id: 'required', params: [['property', violation.property]] };

    case 'unexpectedProperty':
      return { id: 'unexpected-property', params: [['property', violation.property]] };

    case 'custom':
      return {
        id: violation.messageId ?? 'custom',
        params: [
          ['message', violation.message],
          ...Object.entries(violation.params ?? {}),
        ],
      };

    case 'anyOf':
      return { id: 'any-of', params: [['branches', violation.branches.length]] };

    case 'oneOfNone':
      return { id: 'one-of-none', params: [['branches', violation.branches.length]] };

    case 'oneOfMultiple':
      return {
        id: 'one-of-multiple',
        params: [
          ['matched', violation.matched],
          ['matchedIndices', violation.matchedIndices.join(', ')],
        ],
      };

    case 'not':
      return { id: 'not', params: [] };

    default: {
      const unknownViolation: never = violation;
      throw new Error(`Unknown violation kind: ${JSON.stringify(unknownViolation)}`);
    }
  }
}

/**
 * Replace `{name}` placeholders with parameter values. Unknown
 * placeholders are left as they are.
 */
export function substituteParams(
  template: string,
  params: Readonly<Record<string, MessageParam>>
): string {
  return template.replace(PLACEHOLDER_PATTERN, (match, name: string) => {
    const value = params[name];
    return value === undefined ? match : String(value);
  });
}

/**
 * Built-in template for a violation. Custom violations carry their own.
 */
function defaultTemplate(violation: Violation, context: MessageContext): string {
  if (violation.kind === 'custom') {
    return violation.message;
  }
  return DEFAULT_MESSAGES[context.id] ?? context.id;
}

/**
 * Render a violation to a string.
 *
 * @param violation - The violation to render
 * @param options - Optional catalog and locale
 */
export function renderViolation(violation: Violation, options: RenderOptions = {}): string {
  const context = toMessageContext(violation);
  const params = Object.fromEntries(context.params);

  if (options.catalog !== undefined) {
    const localized = options.catalog.lookup(
      context.id,
      options.locale ?? DEFAULT_LOCALE,
      params
    );
    if (localized !== undefined) {
      return localized;
    }
  }

  return substituteParams(defaultTemplate(violation, context), params);
}
