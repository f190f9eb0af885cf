import { describe, it, expect } from 'vitest';
import { z } from 'zod';

import { buildTestApp } from '../helpers/build-test-app';
import { createUser } from '../helpers/fixtures';

/**
 * WHY:
 * - Brand catalogue: readable by any authenticated caller, writable by superusers only.
 * - Duplicate slugs must not mutate the existing row.
 */

const BrandSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  slug: z.string(),
  description: z.string().nullable(),
  categoryId: z.number().int().nullable(),
  configuration: z.record(z.unknown()),
  enrichmentData: z.record(z.unknown()),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const BrandResponseSchema = z.object({
  status: z.literal('success'),
  data: BrandSchema,
});

const BrandListResponseSchema = z.object({
  status: z.literal('success'),
  data: z.array(BrandSchema),
});

async function setup() {
  const built = await buildTestApp();
  const admin = await createUser({
    db: built.db,
    identity: built.identity,
    email: 'admin@example.com',
    isSuperuser: true,
  });
  const user = await createUser({ db: built.db, identity: built.identity, email: 'user@example.com' });
  return { ...built, admin, user };
}

describe('POST /brands', () => {
  it('creates a brand for a superuser', async () => {
    const { app, admin, close } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/brands',
        headers: admin.headers,
        payload: {
          name: 'Coca Cola',
          slug: 'coca-cola',
          description: 'Soft drinks',
          categoryId: 7,
          configuration: { theme: { primary: '#f40009' } },
        },
      });

      expect(res.statusCode).toBe(201);
      const parsed = BrandResponseSchema.parse(res.json());
      expect(parsed.data).toMatchObject({
        name: 'Coca Cola',
        slug: 'coca-cola',
        description: 'Soft drinks',
        categoryId: 7,
        configuration: { theme: { primary: '#f40009' } },
        enrichmentData: {},
      });
    } finally {
      await close();
    }
  });

  it('rejects a non-superuser with 403 even when the payload is invalid', async () => {
    const { app, user, close } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/brands',
        headers: user.headers,
        payload: { name: '', slug: 'NOT VALID' },
      });

      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({
        status: 'error',
        error: 'Superuser privileges required.',
        code: 'FORBIDDEN',
      });
    } finally {
      await close();
    }
  });

  it('returns 409 for a duplicate slug and leaves the existing row untouched', async () => {
    const { app, db, admin, close } = await setup();

    try {
      const first = await app.inject({
        method: 'POST',
        url: '/brands',
        headers: admin.headers,
        payload: { name: 'Original', slug: 'dup-brand' },
      });
      expect(first.statusCode).toBe(201);

      const second = await app.inject({
        method: 'POST',
        url: '/brands',
        headers: admin.headers,
        payload: { name: 'Impostor', slug: 'dup-brand', description: 'should not land' },
      });

      expect(second.statusCode).toBe(409);
      expect(second.json()).toEqual({
        status: 'error',
        error: 'Brand slug already exists',
        code: 'CONFLICT',
      });

      const rows = await db
        .selectFrom('brands')
        .select(['name', 'description'])
        .where('slug', '=', 'dup-brand')
        .execute();
      expect(rows).toEqual([{ name: 'Original', description: null }]);
    } finally {
      await close();
    }
  });

  it('returns 400 for an invalid payload from a superuser', async () => {
    const { app, admin, close } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/brands',
        headers: admin.headers,
        payload: { name: 'No Slug' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        status: 'error',
        error: 'Invalid request body',
        code: 'VALIDATION_ERROR',
      });
    } finally {
      await close();
    }
  });
});

describe('GET /brands', () => {
  it('lists brands ordered by name with filters and paging', async () => {
    const { app, admin, user, close } = await setup();

    try {
      const brands = [
        { name: 'Zest', slug: 'zest', categoryId: 1 },
        { name: 'Apple Fizz', slug: 'apple-fizz', categoryId: 2 },
        { name: 'Mango Fizz', slug: 'mango-fizz', categoryId: 1 },
      ];
      for (const payload of brands) {
        const res = await app.inject({ method: 'POST', url: '/brands', headers: admin.headers, payload });
        expect(res.statusCode).toBe(201);
      }

      const all = BrandListResponseSchema.parse(
        (await app.inject({ method: 'GET', url: '/brands', headers: user.headers })).json(),
      );
      expect(all.data.map((b) => b.slug)).toEqual(['apple-fizz', 'mango-fizz', 'zest']);

      const byCategory = BrandListResponseSchema.parse(
        (await app.inject({ method: 'GET', url: '/brands?categoryId=1', headers: user.headers })).json(),
      );
      expect(byCategory.data.map((b) => b.slug)).toEqual(['mango-fizz', 'zest']);

      const bySearch = BrandListResponseSchema.parse(
        (await app.inject({ method: 'GET', url: '/brands?search=FIZZ', headers: user.headers })).json(),
      );
      expect(bySearch.data.map((b) => b.slug)).toEqual(['apple-fizz', 'mango-fizz']);

      const paged = BrandListResponseSchema.parse(
        (await app.inject({ method: 'GET', url: '/brands?limit=1&offset=1', headers: user.headers })).json(),
      );
      expect(paged.data.map((b) => b.slug)).toEqual(['mango-fizz']);
    } finally {
      await close();
    }
  });

  it('treats % and _ in search as literal characters', async () => {
    const { app, admin, user, close } = await setup();

    try {
      for (const payload of [
        { name: 'Axb', slug: 'axb' },
        { name: '100 Percent', slug: 'pct' },
      ]) {
        const res = await app.inject({ method: 'POST', url: '/brands', headers: admin.headers, payload });
        expect(res.statusCode).toBe(201);
      }

      const underscore = BrandListResponseSchema.parse(
        (await app.inject({ method: 'GET', url: '/brands?search=a_b', headers: user.headers })).json(),
      );
      expect(underscore.data).toEqual([]);

      const percent = BrandListResponseSchema.parse(
        (await app.inject({ method: 'GET', url: '/brands?search=%25', headers: user.headers })).json(),
      );
      expect(percent.data).toEqual([]);

      const plain = BrandListResponseSchema.parse(
        (await app.inject({ method: 'GET', url: '/brands?search=percent', headers: user.headers })).json(),
      );
      expect(plain.data.map((b) => b.slug)).toEqual(['pct']);
    } finally {
      await close();
    }
  });

  it('returns 400 for an out-of-range limit', async () => {
    const { app, user, close } = await setup();

    try {
      const res = await app.inject({ method: 'GET', url: '/brands?limit=101', headers: user.headers });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        status: 'error',
        error: 'Invalid query parameters',
        code: 'VALIDATION_ERROR',
      });
    } finally {
      await close();
    }
  });

  it('returns 401 without a bearer token', async () => {
    const { app, close } = await setup();

    try {
      const res = await app.inject({ method: 'GET', url: '/brands' });
      expect(res.statusCode).toBe(401);
    } finally {
      await close();
    }
  });
});

describe('GET/PATCH/DELETE /brands/:slug', () => {
  it('reads, updates and deletes a brand', async () => {
    const { app, admin, user, close } = await setup();

    try {
      const created = await app.inject({
        method: 'POST',
        url: '/brands',
        headers: admin.headers,
        payload: { name: 'Pepper', slug: 'pepper' },
      });
      expect(created.statusCode).toBe(201);

      const read = await app.inject({ method: 'GET', url: '/brands/pepper', headers: user.headers });
      expect(read.statusCode).toBe(200);
      expect(BrandResponseSchema.parse(read.json()).data.name).toBe('Pepper');

      const patched = await app.inject({
        method: 'PATCH',
        url: '/brands/pepper',
        headers: admin.headers,
        payload: { description: 'Spicy', enrichmentData: { source: 'manual' } },
      });
      expect(patched.statusCode).toBe(200);
      expect(BrandResponseSchema.parse(patched.json()).data).toMatchObject({
        name: 'Pepper',
        slug: 'pepper',
        description: 'Spicy',
        enrichmentData: { source: 'manual' },
      });

      const deleted = await app.inject({ method: 'DELETE', url: '/brands/pepper', headers: admin.headers });
      expect(deleted.statusCode).toBe(200);
      expect(deleted.json()).toEqual({ status: 'success', data: { slug: 'pepper' } });

      const gone = await app.inject({ method: 'GET', url: '/brands/pepper', headers: user.headers });
      expect(gone.statusCode).toBe(404);
      expect(gone.json()).toEqual({ status: 'error', error: 'Brand not found', code: 'NOT_FOUND' });
    } finally {
      await close();
    }
  });

  it('returns 404 when patching or deleting a missing brand', async () => {
    const { app, admin, close } = await setup();

    try {
      const patched = await app.inject({
        method: 'PATCH',
        url: '/brands/missing',
        headers: admin.headers,
        payload: { name: 'Anything' },
      });
      expect(patched.statusCode).toBe(404);

      const deleted = await app.inject({ method: 'DELETE', url: '/brands/missing', headers: admin.headers });
      expect(deleted.statusCode).toBe(404);
    } finally {
      await close();
    }
  });

  it('rejects an empty patch', async () => {
    const { app, admin, close } = await setup();

    try {
      const res = await app.inject({
        method: 'PATCH',
        url: '/brands/anything',
        headers: admin.headers,
        payload: {},
      });
      expect(res.statusCode).toBe(400);
    } finally {
      await close();
    }
  });

  it('rejects writes from a non-superuser', async () => {
    const { app, user, close } = await setup();

    try {
      const patched = await app.inject({
        method: 'PATCH',
        url: '/brands/anything',
        headers: user.headers,
        payload: { name: 'x' },
      });
      expect(patched.statusCode).toBe(403);

      const deleted = await app.inject({ method: 'DELETE', url: '/brands/anything', headers: user.headers });
      expect(deleted.statusCode).toBe(403);
    } finally {
      await close();
    }
  });
});
