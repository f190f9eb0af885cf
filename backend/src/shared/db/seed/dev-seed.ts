/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates:
 * - an org (if missing)
 * - a sample brand (if missing)
 *
 * Idempotent: safe to run on every start.
 *
 * IMPORTANT:
 * - Runs on the service connection (RLS bypassed).
 * - Superusers are promoted by hand in the database; the seed never grants privileges.
 */

import type { DbExecutor } from '../db';
import { jsonb } from '../json';
import { logger } from '../../logger/logger';

type DevSeedOptions = {
  orgSlug: string;
};

const SAMPLE_BRAND = {
  name: 'Coca Cola',
  slug: 'coca-cola',
  description:
    'The Coca-Cola Company is an American multinational corporation founded in 1892, best known as the producer of Coca-Cola.',
} as const;

export async function runDevSeed(opts: {
  db: DbExecutor;
  options: DevSeedOptions;
}): Promise<void> {
  const { db, options } = opts;

  const flow = 'seed.dev';

  // 1) Ensure org exists
  const existingOrg = await db
    .selectFrom('orgs')
    .select(['org_id', 'org_slug'])
    .where('org_slug', '=', options.orgSlug)
    .executeTakeFirst();

  if (!existingOrg) {
    const inserted = await db
      .insertInto('orgs')
      .values({ org_slug: options.orgSlug })
      .returning(['org_id'])
      .executeTakeFirstOrThrow();

    logger.info('seed.org.created', {
      flow,
      orgSlug: options.orgSlug,
      orgId: Number(inserted.org_id),
    });
  } else {
    logger.info('seed.org.exists', {
      flow,
      orgSlug: options.orgSlug,
      orgId: Number(existingOrg.org_id),
    });
  }

  // 2) Ensure sample brand exists
  const existingBrand = await db
    .selectFrom('brands')
    .select(['brand_id'])
    .where('slug', '=', SAMPLE_BRAND.slug)
    .executeTakeFirst();

  if (existingBrand) {
    logger.info('seed.brand.exists', {
      flow,
      slug: SAMPLE_BRAND.slug,
      brandId: Number(existingBrand.brand_id),
    });
    return;
  }

  const created = await db
    .insertInto('brands')
    .values({
      name: SAMPLE_BRAND.name,
      slug: SAMPLE_BRAND.slug,
      description: SAMPLE_BRAND.description,
      configuration: jsonb({}),
      enrichment_data: jsonb({}),
    })
    .returning(['brand_id'])
    .executeTakeFirstOrThrow();

  logger.info('seed.brand.created', {
    flow,
    slug: SAMPLE_BRAND.slug,
    brandId: Number(created.brand_id),
  });
}
