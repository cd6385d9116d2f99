import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';

const HealthResponseSchema = z.object({
  ok: z.boolean(),
  env: z.string(),
  service: z.string(),
  requestId: z.string(),
});

type HealthResponse = z.infer<typeof HealthResponseSchema>;

describe('GET /health', () => {
  it('returns ok payload with a request id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);

      const parsed: HealthResponse = HealthResponseSchema.parse(res.json());

      expect(parsed.ok).toBe(true);
      expect(parsed.env).toBe('test');
      expect(parsed.service).toBe('pbkdf2-record-service-test');
      expect(res.headers['x-request-id']).toBe(parsed.requestId);
    } finally {
      await close();
    }
  });

  it('echoes an inbound x-request-id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'trace-42' },
      });

      const parsed = HealthResponseSchema.parse(res.json());
      expect(parsed.requestId).toBe('trace-42');
      expect(res.headers['x-request-id']).toBe('trace-42');
    } finally {
      await close();
    }
  });

  it('returns a structured 404 for unknown routes', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/nope' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
    } finally {
      await close();
    }
  });
});
