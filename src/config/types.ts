/**
 * Configuration types for valtree.
 *
 * These types define the structure of valtree.config.yaml.
 */

import type { LevelWithSilent } from 'pino';

/**
 * Top-level configuration.
 */
export interface ValtreeConfig {
  /** Log level (default: 'info') */
  logLevel: LevelWithSilent;
  /** Locale used when a caller does not name one (default: 'en-US') */
  locale: string;
  /** Locale consulted when the requested one has no catalog (default: 'en-US') */
  fallbackLocale: string;
  /**
   * Fluent resource files per locale. Relative paths are resolved against
   * the directory of the config file.
   */
  catalogs: Record<string, string[]>;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ValtreeConfig = {
  logLevel: 'info',
  locale: 'en-US',
  fallbackLocale: 'en-US',
  catalogs: {},
};
