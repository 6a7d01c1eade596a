/**
 * validatedBody — Fastify preValidation hook that checks request bodies.
 *
 * A failing body is answered with 400 and `{ errors: [{ path, message }] }`,
 * paths as JSON Pointers, messages localized for the request.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { FlatError } from '../errors/types.js';
import type { LocalizationCatalog } from '../messages/types.js';
import { DEFAULT_LOCALE } from '../messages/defaultMessages.js';
import type { Schema } from '../walker/types.js';
import { SchemaValidator } from '../walker/StructuralWalker.js';

/**
 * Options for validatedBody.
 */
export interface ValidatedBodyOptions {
  /** Catalog used to localize messages */
  catalog?: LocalizationCatalog;
  /** Locale used when the request names none (default: 'en-US') */
  defaultLocale?: string;
}

/**
 * Response body for a rejected request.
 */
export interface RejectionBody {
  errors: FlatError[];
}

/**
 * Most preferred language tag of an Accept-Language header, or undefined
 * when the header names none.
 */
export function preferredLocale(header: string | undefined): string | undefined {
  if (header === undefined) {
    return undefined;
  }

  let best: { tag: string; quality: number } | undefined;
  for (const entry of header.split(',')) {
    const [rawTag, ...params] = entry.trim().split(';');
    const tag = rawTag?.trim() ?? '';
    if (tag === '' || tag === '*') continue;

    let quality = 1;
    for (const param of params) {
      const [name, value] = param.trim().split('=');
      if (name === 'q' && value !== undefined) {
        const parsed = Number(value);
        quality = Number.isFinite(parsed) ? parsed : 0;
      }
    }

    if (quality > 0 && (best === undefined || quality > best.quality)) {
      best = { tag, quality };
    }
  }
  return best?.tag;
}

/**
 * Create a preValidation hook validating `request.body` against a schema.
 *
 * @example
 * ```ts
 * fastify.post('/users', { preValidation: validatedBody(userSchema) }, handler);
 * ```
 */
export function validatedBody(
  schema: Schema | SchemaValidator,
  options: ValidatedBodyOptions = {}
): (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined> {
  const validator = schema instanceof SchemaValidator ? schema : new SchemaValidator(schema);
  const defaultLocale = options.defaultLocale ?? DEFAULT_LOCALE;

  return async function validateBody(request, reply) {
    const errors = validator.validate(request.body);
    if (errors.isEmpty()) {
      return undefined;
    }

    const header = request.headers['accept-language'];
    const locale = preferredLocale(typeof header === 'string' ? header : undefined) ?? defaultLocale;
    const body: RejectionBody = {
      errors: errors.toFlat({
        locale,
        ...(options.catalog !== undefined ? { catalog: options.catalog } : {}),
      }),
    };

    request.log.debug({ violations: errors.count(), locale }, 'Request body rejected');
    reply.status(400);
    return reply.send(body);
  };
}
