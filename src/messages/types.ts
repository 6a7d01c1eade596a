/**
 * Types for message rendering and localization.
 */

import type { MessageParam } from '../errors/types.js';

/**
 * Message identifier plus ordered, named parameters for one violation.
 * Built on demand at render time; never stored.
 */
export interface MessageContext {
  /** Stable message id (e.g. "range-maximum") */
  id: string;
  /** Ordered named parameters used for substitution and plural selection */
  params: ReadonlyArray<readonly [string, MessageParam]>;
}

/**
 * External source of localized message templates.
 *
 * Implementations return `undefined` when they have nothing for the id or
 * locale; the renderer then falls back to the built-in template.
 */
export interface LocalizationCatalog {
  lookup(
    messageId: string,
    locale: string,
    params: Readonly<Record<string, MessageParam>>
  ): string | undefined;
}

/**
 * Options accepted by every rendering entry point.
 */
export interface RenderOptions {
  /** Catalog to consult before the built-in templates */
  catalog?: LocalizationCatalog;
  /** Target locale (default: "en-US") */
  locale?: string;
}
