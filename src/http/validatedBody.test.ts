import { describe, it, expect, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { preferredLocale, validatedBody, type ValidatedBodyOptions } from './validatedBody.js';
import { validateConfig, validatedBodyOptionsFromConfig } from '../config/loader.js';
import { integer, record, string } from '../walker/SchemaBuilder.js';
import { minimum } from '../constraints/rules.js';
import { createFluentCatalog } from '../messages/FluentCatalog.js';
import { pino } from 'pino';

const user = record({ name: string(), age: integer(minimum(0)) });

const catalog = createFluentCatalog(
  { de: 'range-minimum = mindestens { $minimum }\n' },
  { logger: pino({ level: 'silent' }) }
);

describe('preferredLocale', () => {
  it('picks the highest quality tag', () => {
    expect(preferredLocale('fr;q=0.5, de-DE;q=0.9, en;q=0.1')).toBe('de-DE');
    expect(preferredLocale('en;q=0.5, *, de')).toBe('de');
  });

  it('keeps the first of equal tags', () => {
    expect(preferredLocale('it, es')).toBe('it');
  });

  it('ignores refused tags', () => {
    expect(preferredLocale('fr;q=0')).toBeUndefined();
    expect(preferredLocale(undefined)).toBeUndefined();
  });
});

describe('validatedBody', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  async function build(options: ValidatedBodyOptions = { catalog }): Promise<FastifyInstance> {
    const instance = Fastify({ logger: false });
    instance.post('/users', { preValidation: validatedBody(user, options) }, async () => ({ ok: true }));
    await instance.ready();
    app = instance;
    return instance;
  }

  it('passes a valid body to the handler', async () => {
    const instance = await build();

    const response = await instance.inject({ method: 'POST', url: '/users', payload: { name: 'Ada', age: 36 } });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ ok: true });
  });

  it('answers 400 with every error', async () => {
    const instance = await build();

    const response = await instance.inject({ method: 'POST', url: '/users', payload: { age: -1 } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      errors: [
        { path: '/name', message: 'the property `name` is required.' },
        { path: '/age', message: 'the number must be `>= 0`.' },
      ],
    });
  });

  it('localizes messages for the request', async () => {
    const instance = await build();

    const response = await instance.inject({
      method: 'POST',
      url: '/users',
      headers: { 'accept-language': 'fr;q=0.5, de-DE;q=0.9' },
      payload: { age: -1 },
    });

    expect(response.json()).toEqual({
      errors: [
        { path: '/name', message: 'the property `name` is required.' },
        { path: '/age', message: 'mindestens 0' },
      ],
    });
  });

  it('falls back to the configured locale', async () => {
    const instance = await build(validatedBodyOptionsFromConfig(validateConfig({ locale: 'de' }), catalog));

    const response = await instance.inject({ method: 'POST', url: '/users', payload: { name: 'Ada', age: -1 } });

    expect(response.json()).toEqual({ errors: [{ path: '/age', message: 'mindestens 0' }] });
  });
});
