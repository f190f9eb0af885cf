/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably (dev + deploy).
 * - Migrations are registered statically, so the runner needs no filesystem
 *   scanning and the list is type-checked.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import 'dotenv/config';

import { Migrator } from 'kysely';
import type { Migration, MigrationProvider } from 'kysely';

import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

import * as m0001 from './migrations/0001_orgs_profiles';
import * as m0002 from './migrations/0002_brands';
import * as m0003 from './migrations/0003_rls_policies';

const MIGRATIONS: Record<string, Migration> = {
  '0001_orgs_profiles': m0001,
  '0002_brands': m0002,
  '0003_rls_policies': m0003,
};

const provider: MigrationProvider = {
  getMigrations() {
    return Promise.resolve(MIGRATIONS);
  },
};

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  logger.info('migrations.start', { count: Object.keys(MIGRATIONS).length });

  const migrator = new Migrator({ db, provider });
  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migrations.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migrations.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('migrations.failed', { err: error });
    process.exit(1);
  }

  logger.info('migrations.up_to_date');
}

void runMigrations().catch((err: unknown) => {
  logger.error('migrations.fatal', { err });
  process.exit(1);
});
