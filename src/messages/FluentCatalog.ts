/**
 * FluentCatalog — LocalizationCatalog backed by Project Fluent.
 *
 * One FluentBundle per locale. Plural selection is Fluent's: a numeric
 * selector such as `{ $minItems -> [one] ... *[other] ... }` is matched
 * against the CLDR cardinal category of the bundle's locale.
 */

import { readFile } from 'node:fs/promises';
import { FluentBundle, FluentResource } from '@fluent/bundle';
import type { Logger } from 'pino';
import { logger as defaultLogger } from '../logging/logger.js';
import type { MessageParam } from '../errors/types.js';
import type { LocalizationCatalog } from './types.js';

/**
 * Options for a FluentCatalog.
 */
export interface FluentCatalogOptions {
  /** Locale consulted when the requested one has no bundle */
  fallbackLocale?: string;
  /** Wrap placeables in Unicode isolation marks (default: false) */
  useIsolating?: boolean;
  /** Logger for resource and formatting problems */
  logger?: Logger;
}

export class FluentCatalog implements LocalizationCatalog {
  private readonly bundles = new Map<string, FluentBundle>();
  private readonly fallbackLocale: string | undefined;
  private readonly useIsolating: boolean;
  private readonly logger: Logger;

  constructor(options: FluentCatalogOptions = {}) {
    this.fallbackLocale = options.fallbackLocale;
    this.useIsolating = options.useIsolating ?? false;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Add FTL source for a locale. Later resources override earlier
   * messages with the same id.
   */
  addResource(locale: string, source: string): void {
    let bundle = this.bundles.get(locale);
    if (bundle === undefined) {
      bundle = new FluentBundle(locale, { useIsolating: this.useIsolating });
      this.bundles.set(locale, bundle);
    }

    const errors = bundle.addResource(new FluentResource(source), { allowOverrides: true });
    for (const error of errors) {
      this.logger.warn({ locale, err: error }, 'Fluent resource problem');
    }
  }

  /**
   * Locales with at least one resource.
   */
  get locales(): string[] {
    return Array.from(this.bundles.keys());
  }

  /**
   * Whether a message id resolves for the locale (including fallbacks).
   */
  hasMessage(messageId: string, locale: string): boolean {
    return this.resolveBundle(locale)?.hasMessage(messageId) ?? false;
  }

  lookup(
    messageId: string,
    locale: string,
    params: Readonly<Record<string, MessageParam>>
  ): string | undefined {
    const bundle = this.resolveBundle(locale);
    if (bundle === undefined) {
      return undefined;
    }
    const pattern = bundle.getMessage(messageId)?.value;
    if (pattern === undefined || pattern === null) {
      return undefined;
    }

    const errors: Error[] = [];
    const text = bundle.formatPattern(pattern, { ...params }, errors);
    if (errors.length > 0) {
      this.logger.warn(
        { messageId, locale, errors: errors.map((e) => e.message) },
        'Fluent formatting failed, using default message'
      );
      return undefined;
    }
    return text;
  }

  /**
   * Find the bundle for a locale: exact tag, then primary language
   * subtag ("de-AT" -> "de"), then the fallback locale.
   */
  private resolveBundle(locale: string): FluentBundle | undefined {
    const exact = this.bundles.get(locale);
    if (exact !== undefined) return exact;

    const primary = locale.split('-')[0];
    if (primary !== undefined) {
      for (const [tag, bundle] of this.bundles) {
        if (tag === primary || tag.split('-')[0] === primary) {
          return bundle;
        }
      }
    }

    return this.fallbackLocale !== undefined
      ? this.bundles.get(this.fallbackLocale)
      : undefined;
  }
}

/**
 * Create a FluentCatalog from FTL sources keyed by locale.
 */
export function createFluentCatalog(
  sources: Record<string, string | string[]>,
  options: FluentCatalogOptions = {}
): FluentCatalog {
  const catalog = new FluentCatalog(options);
  for (const [locale, source] of Object.entries(sources)) {
    for (const text of Array.isArray(source) ? source : [source]) {
      catalog.addResource(locale, text);
    }
  }
  return catalog;
}

/**
 * Read `.ftl` files (locale -> file paths) into a FluentCatalog.
 */
export async function loadFluentCatalog(
  files: Record<string, string[]>,
  options: FluentCatalogOptions = {}
): Promise<FluentCatalog> {
  const sources: Record<string, string[]> = {};
  for (const [locale, paths] of Object.entries(files)) {
    sources[locale] = await Promise.all(paths.map((path) => readFile(path, 'utf-8')));
  }
  return createFluentCatalog(sources, options);
}
