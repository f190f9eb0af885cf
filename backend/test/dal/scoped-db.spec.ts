import { describe, it, expect } from 'vitest';
import { createTestDb } from '../helpers/test-db';
import { ScopedDb } from '../../src/shared/db/scoped-db';

describe('ScopedDb', () => {
  it('sets role and JWT claims transaction-locally before running the callback', async () => {
    const { db, settings } = createTestDb();
    const scoped = new ScopedDb(db);

    try {
      const seenInside: number[] = [];

      const result = await scoped.asUser({ sub: 'usr_1', email: null }, async (trx) => {
        seenInside.push(settings.length);
        const rows = await trx.selectFrom('orgs').selectAll().execute();
        return rows.length;
      });

      expect(result).toBe(0);
      expect(seenInside).toEqual([2]);
      expect(settings).toEqual([
        { name: 'role', value: 'authenticated', isLocal: true },
        {
          name: 'request.jwt.claims',
          value: '{"sub":"usr_1","email":null,"role":"authenticated"}',
          isLocal: true,
        },
      ]);
    } finally {
      await db.destroy();
    }
  });

  it('exposes the service connection without touching settings', async () => {
    const { db, settings } = createTestDb();
    const scoped = new ScopedDb(db);

    try {
      await scoped.service.selectFrom('orgs').selectAll().execute();
      expect(settings).toEqual([]);
    } finally {
      await db.destroy();
    }
  });
});
