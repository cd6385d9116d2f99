import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { z } from 'zod';
import { hashSecretSync, Pbkdf2PasswordHasher } from '../../src/shared/security/pbkdf2';
import { buildTestApp } from '../helpers/build-test-app';
import { fieldAt, withField } from '../helpers/record-fields';

/**
 * E2E tests for POST /hashes and POST /hashes/verify.
 * In-process via app.inject; the test app binds 1000 iterations by default.
 */

const HashResponseSchema = z.object({ record: z.string() });
const VerifyResponseSchema = z.object({ match: z.boolean() });
const ErrorResponseSchema = z.object({
  error: z.object({ code: z.string(), message: z.string() }),
});

type TestApp = Awaited<ReturnType<typeof buildTestApp>>;

describe('hashing endpoints', () => {
  let ctx: TestApp;

  beforeAll(async () => {
    ctx = await buildTestApp();
  });

  afterAll(async () => {
    await ctx.close();
  });

  async function createRecord(body: Record<string, unknown>): Promise<string> {
    const res = await ctx.app.inject({ method: 'POST', url: '/hashes', payload: body });
    expect(res.statusCode).toBe(201);
    return HashResponseSchema.parse(res.json()).record;
  }

  async function verify(secret: string, record: string): Promise<boolean> {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/hashes/verify',
      payload: { secret, record },
    });
    expect(res.statusCode).toBe(200);
    return VerifyResponseSchema.parse(res.json()).match;
  }

  it('creates a record with the configured defaults and verifies it', async () => {
    const record = await createRecord({ secret: 'correct horse battery staple' });

    expect(fieldAt(record, 0)).toBe('pbkdf2_sha256');
    expect(fieldAt(record, 1)).toBe('1000');
    expect(Buffer.from(fieldAt(record, 2), 'base64')).toHaveLength(16);
    expect(Buffer.from(fieldAt(record, 3), 'base64')).toHaveLength(32);

    expect(await verify('correct horse battery staple', record)).toBe(true);
    expect(await verify('correct horse battery stapler', record)).toBe(false);
  });

  it('honours per-request parameters', async () => {
    const record = await createRecord({ secret: 'password', iterations: 2_000, saltBytes: 24, hashBytes: 48 });

    expect(fieldAt(record, 1)).toBe('2000');
    expect(Buffer.from(fieldAt(record, 2), 'base64')).toHaveLength(24);
    expect(Buffer.from(fieldAt(record, 3), 'base64')).toHaveLength(48);
    expect(await verify('password', record)).toBe(true);
  });

  it('answers match=false for malformed records, same as for a wrong secret', async () => {
    const record = await createRecord({ secret: 'password' });

    expect(await verify('password', 'pbkdf2_sha256$abc$def')).toBe(false);
    expect(await verify('password', withField(record, 2, `${fieldAt(record, 2)}*`))).toBe(false);
    expect(await verify('password', '')).toBe(false);
    expect(await verify('', record)).toBe(false);
  });

  it('rejects a blank secret with 400', async () => {
    const res = await ctx.app.inject({ method: 'POST', url: '/hashes', payload: { secret: '   ' } });

    expect(res.statusCode).toBe(400);
    expect(ErrorResponseSchema.parse(res.json())).toEqual({
      error: { code: 'VALIDATION_ERROR', message: 'secret must not be empty or whitespace' },
    });
  });

  it('rejects iteration counts above the per-request limit', async () => {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/hashes',
      payload: { secret: 'password', iterations: 50_001 },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: { code: 'VALIDATION_ERROR', message: 'iterations must not exceed 50000' },
    });
  });

  it('answers match=false without deriving for a record above the iteration limit', async () => {
    const hostile = 'pbkdf2_sha256$30000000$AAAAAAAAAAAAAAAAAAAAAA==$AAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA=';

    const startedAt = performance.now();
    expect(await verify('password', hostile)).toBe(false);
    // 30M iterations would take seconds; the cap check returns before the KDF runs
    expect(performance.now() - startedAt).toBeLessThan(2_000);
  });

  it('verifies records at the iteration limit and refuses genuine ones above it', async () => {
    const atLimit = hashSecretSync('password', { iterations: 50_000, saltBytes: 16, hashBytes: 32 });
    const aboveLimit = hashSecretSync('password', { iterations: 50_001, saltBytes: 16, hashBytes: 32 });

    expect(await verify('password', atLimit)).toBe(true);
    expect(await verify('password', aboveLimit)).toBe(false);
  });

  it('refuses records whose hash is longer than 1024 bytes', async () => {
    const atLimit = hashSecretSync('password', { iterations: 1, saltBytes: 16, hashBytes: 1_024 });
    const aboveLimit = hashSecretSync('password', { iterations: 1, saltBytes: 16, hashBytes: 1_025 });

    expect(await verify('password', atLimit)).toBe(true);
    expect(await verify('password', aboveLimit)).toBe(false);
  });

  it.each([
    ['missing secret', {}],
    ['non-string secret', { secret: 42 }],
    ['zero iterations', { secret: 'password', iterations: 0 }],
    ['fractional salt length', { secret: 'password', saltBytes: 1.5 }],
    ['oversized hash length', { secret: 'password', hashBytes: 4096 }],
  ])('rejects a body with %s', async (_label, payload) => {
    const res = await ctx.app.inject({ method: 'POST', url: '/hashes', payload });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'Invalid request body' } });
  });

  it('rejects a verify body without a record', async () => {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/hashes/verify',
      payload: { secret: 'password' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'Invalid request body' } });
  });

  it('maps malformed JSON to 400', async () => {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/hashes',
      headers: { 'content-type': 'application/json' },
      payload: '{"secret":',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'Invalid request' } });
  });
});

describe('hashing endpoints with an injected hasher', () => {
  let ctx: TestApp;

  beforeAll(async () => {
    const passwordHasher = new Pbkdf2PasswordHasher({
      iterations: 1,
      saltBytes: 4,
      hashBytes: 64,
      fillRandom: (buf) => {
        buf.write('salt');
      },
    });
    ctx = await buildTestApp({}, { passwordHasher });
  });

  afterAll(async () => {
    await ctx.close();
  });

  it('uses the injected hasher for POST /hashes (RFC 7914 PBKDF2-HMAC-SHA256 vector)', async () => {
    const res = await ctx.app.inject({ method: 'POST', url: '/hashes', payload: { secret: 'passwd' } });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({
      record:
        'pbkdf2_sha256$1$c2FsdA==$' +
        'VawEblbjCJ/sFpHCJUS2BflBhSFt3gRl5oudV8INrLxJypzM8Xm2RZkWZLOdd+8xfHG4RbHjC9UJESBB06GXgw==',
    });
    expect(ctx.deps.passwordHasher.defaults).toEqual({ iterations: 1, saltBytes: 4, hashBytes: 64 });
  });
});
