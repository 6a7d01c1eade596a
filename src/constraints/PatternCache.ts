/**
 * PatternCache — Process-wide cache of compiled patterns.
 *
 * Entries are populated on first use and never change afterwards. A
 * compiled RegExp without the `g` or `y` flag keeps no state between
 * `test` calls, so one instance can serve every validation.
 */

import { ConfigurationError } from '../errors/errors.js';

const FORBIDDEN_FLAGS = /[gy]/;
const cache = new Map<string, RegExp>();

/**
 * Get the compiled pattern, compiling it on first use.
 *
 * @throws ConfigurationError when the pattern or flags are invalid
 */
export function getPattern(pattern: string, flags = ''): RegExp {
  const key = `${flags}/${pattern}`;
  const cached = cache.get(key);
  if (cached !== undefined) {
    return cached;
  }

  if (FORBIDDEN_FLAGS.test(flags)) {
    throw new ConfigurationError(`flags "${flags}" make the pattern stateful`, 'pattern', { pattern, flags });
  }

  let compiled: RegExp;
  try {
    compiled = new RegExp(pattern, flags.includes('u') ? flags : `${flags}u`);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(message, 'pattern', { pattern, flags });
  }

  cache.set(key, compiled);
  return compiled;
}

/**
 * Number of compiled patterns held.
 */
export function patternCacheSize(): number {
  return cache.size;
}

/**
 * Drop every compiled pattern.
 */
export function clearPatternCache(): void {
  cache.clear();
}
