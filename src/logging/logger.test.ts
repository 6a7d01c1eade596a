import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger, isLogLevel } from './logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('recognizes pino levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });

  it('takes the level from options, then the environment', () => {
    vi.stubEnv('VALTREE_LOG_LEVEL', 'debug');

    expect(createLogger({ level: 'warn' }).level).toBe('warn');
    expect(createLogger().level).toBe('debug');
  });

  it('ignores an unknown level in the environment', () => {
    vi.stubEnv('VALTREE_LOG_LEVEL', 'verbose');
    expect(createLogger().level).toBe('info');
  });

  it('names the logger', () => {
    expect(createLogger({ name: 'api' }).bindings()).toEqual({ name: 'api' });
  });
});
