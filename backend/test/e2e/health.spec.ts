import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';

const HealthResponseSchema = z.object({
  status: z.literal('healthy'),
  env: z.string(),
  service: z.string(),
  requestId: z.string(),
});

type HealthResponse = z.infer<typeof HealthResponseSchema>;

describe('GET /health', () => {
  it('returns the bare healthy payload', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);

      const parsed: HealthResponse = HealthResponseSchema.parse(res.json());

      expect(parsed.env).toBe('test');
      expect(parsed.service).toBe('brand-portal-api');
      expect(parsed.requestId.length).toBeGreaterThan(0);
    } finally {
      await close();
    }
  });

  it('echoes a well-formed x-request-id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'req-12345678' },
      });

      const parsed = HealthResponseSchema.parse(res.json());
      expect(parsed.requestId).toBe('req-12345678');
    } finally {
      await close();
    }
  });
});

describe('GET /', () => {
  it('returns the welcome message', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ message: 'Welcome to the Brand Portal API' });
    } finally {
      await close();
    }
  });
});

describe('unknown routes', () => {
  it('return the error envelope with 404', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/nope' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({
        status: 'error',
        error: 'Route GET /nope not found',
        code: 'NOT_FOUND',
      });
    } finally {
      await close();
    }
  });
});
