/**
 * Configuration loader for valtree.
 *
 * Loads config from a YAML file with support for:
 * - Environment variable substitution (${VAR_NAME}, ${VAR_NAME:-default})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { Logger } from 'pino';
import { createLogger, logger as defaultLogger } from '../logging/logger.js';
import { loadFluentCatalog, type FluentCatalog } from '../messages/FluentCatalog.js';
import { isPlainRecord } from '../types/common.js';
import type { ValidatedBodyOptions } from '../http/validatedBody.js';
import { DEFAULT_CONFIG, type ValtreeConfig } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.VALTREE_CONFIG or './valtree.config.yaml') */
  configPath?: string;
  /** Logger for loading problems */
  logger?: Logger;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

const configSchema = z
  .object({
    logLevel: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default(DEFAULT_CONFIG.logLevel),
    locale: z.string().min(1).default(DEFAULT_CONFIG.locale),
    fallbackLocale: z.string().min(1).default(DEFAULT_CONFIG.fallbackLocale),
    catalogs: z.record(z.string(), z.array(z.string().min(1))).default({}),
  })
  .strict();

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

function substituteEnvVars(value: string, logger: Logger): string {
  return value.replace(
    ENV_VAR_PATTERN,
    (_match: string, varName: string, defaultValue: string | undefined) => {
      const envValue = process.env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      logger.warn({ variable: varName }, 'Environment variable is not set and has no default');
      return '';
    }
  );
}

/**
 * Recursively substitute environment variables in parsed YAML.
 */
function substituteEnvVarsRecursive(value: unknown, logger: Logger): unknown {
  if (typeof value === 'string') {
    return substituteEnvVars(value, logger);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => substituteEnvVarsRecursive(item, logger));
  }
  if (isPlainRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]): [string, unknown] => [key, substituteEnvVarsRecursive(entry, logger)])
    );
  }
  return value;
}

function valueAtPath(root: unknown, path: ReadonlyArray<string | number>): unknown {
  let current = root;
  for (const segment of path) {
    if (Array.isArray(current) && typeof segment === 'number') {
      current = current[segment];
    } else if (isPlainRecord(current)) {
      current = current[String(segment)];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Validate a parsed configuration object and apply defaults.
 *
 * @throws ConfigValidationError for the first problem found
 */
export function validateConfig(config: unknown): ValtreeConfig {
  const result = configSchema.safeParse(config ?? {});
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  if (issue === undefined) {
    throw new ConfigValidationError(result.error.message, '', config);
  }
  throw new ConfigValidationError(issue.message, issue.path.join('.'), valueAtPath(config, issue.path));
}

/**
 * Load configuration from a YAML file. A missing file yields the defaults.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ValtreeConfig> {
  const logger = options.logger ?? defaultLogger;
  const configPath = options.configPath
    ?? process.env.VALTREE_CONFIG
    ?? './valtree.config.yaml';

  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    logger.warn({ path: absolutePath }, 'Config file not found, using defaults');
    return { ...DEFAULT_CONFIG, catalogs: {} };
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigValidationError(
      `failed to parse config file: ${err instanceof Error ? err.message : String(err)}`,
      '',
      absolutePath
    );
  }

  const config = validateConfig(substituteEnvVarsRecursive(parsed, logger));

  const baseDir = dirname(absolutePath);
  const catalogs: Record<string, string[]> = {};
  for (const [locale, paths] of Object.entries(config.catalogs)) {
    catalogs[locale] = paths.map((path) => resolve(baseDir, path));
  }

  return { ...config, catalogs };
}

/**
 * Build the Fluent catalog a configuration names.
 */
export async function createCatalogFromConfig(
  config: ValtreeConfig,
  logger: Logger = createLoggerFromConfig(config)
): Promise<FluentCatalog> {
  return loadFluentCatalog(config.catalogs, {
    fallbackLocale: config.fallbackLocale,
    logger,
  });
}

/**
 * Create a logger at the configured level.
 */
export function createLoggerFromConfig(config: ValtreeConfig): Logger {
  return createLogger({ level: config.logLevel });
}

/**
 * Options for validatedBody that answer in the configured locale when a
 * request names none.
 */
export function validatedBodyOptionsFromConfig(
  config: ValtreeConfig,
  catalog?: FluentCatalog
): ValidatedBodyOptions {
  return {
    defaultLocale: config.locale,
    ...(catalog !== undefined ? { catalog } : {}),
  };
}
