import { describe, it, expect } from 'vitest';
import { createTestDb } from '../helpers/test-db';
import { buildTestApp } from '../helpers/build-test-app';
import { runDevSeed } from '../../src/shared/db/seed/dev-seed';

describe('dev seed', () => {
  it('is idempotent (org + sample brand)', async () => {
    const { db } = createTestDb();

    try {
      await runDevSeed({ db, options: { orgSlug: 'demo-org' } });
      await runDevSeed({ db, options: { orgSlug: 'demo-org' } });

      const orgs = await db
        .selectFrom('orgs')
        .select(['org_slug'])
        .where('org_slug', '=', 'demo-org')
        .execute();
      expect(orgs).toHaveLength(1);

      const brands = await db.selectFrom('brands').select(['slug', 'name']).execute();
      expect(brands).toEqual([{ slug: 'coca-cola', name: 'Coca Cola' }]);
    } finally {
      await db.destroy();
    }
  });

  it('runs from buildApp when enabled outside production', async () => {
    const { db, close } = await buildTestApp({ config: { seed: { enabled: true, orgSlug: 'seeded' } } });

    try {
      const org = await db
        .selectFrom('orgs')
        .select(['org_slug'])
        .where('org_slug', '=', 'seeded')
        .executeTakeFirst();
      expect(org).toEqual({ org_slug: 'seeded' });
    } finally {
      await close();
    }
  });
});
