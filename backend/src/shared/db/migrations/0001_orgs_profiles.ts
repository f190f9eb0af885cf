/**
 * src/shared/db/migrations/0001_orgs_profiles.ts
 *
 * WHY:
 * - Tenancy core: orgs (tenants) and profiles (app-level user records).
 * - profiles.id IS the identity-provider user id (FK to auth.users).
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 * - Keep ../database.schema.ts in sync.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await sql`
    CREATE OR REPLACE FUNCTION public.update_updated_at_column()
    RETURNS TRIGGER AS $$
    BEGIN
      NEW.updated_at = NOW();
      RETURN NEW;
    END;
    $$ LANGUAGE plpgsql;
  `.execute(db);

  // ---- orgs ----
  await db.schema
    .createTable('orgs')
    .ifNotExists()
    .addColumn('org_id', 'bigserial', (col) => col.primaryKey())
    .addColumn('org_slug', 'varchar(255)', (col) => col.notNull().unique())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  // ---- profiles ----
  await db.schema
    .createTable('profiles')
    .ifNotExists()
    .addColumn('id', 'uuid', (col) =>
      col.primaryKey().references('auth.users.id').onDelete('cascade'),
    )
    .addColumn('is_superuser', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('org_id', 'bigint', (col) => col.references('orgs.org_id').onDelete('set null'))
    .addColumn('is_activated', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('idx_profiles_org_id')
    .ifNotExists()
    .on('profiles')
    .column('org_id')
    .execute();

  for (const table of ['orgs', 'profiles']) {
    await sql`
      DROP TRIGGER IF EXISTS ${sql.raw(`update_${table}_updated_at`)} ON ${sql.table(table)};
      CREATE TRIGGER ${sql.raw(`update_${table}_updated_at`)}
        BEFORE UPDATE ON ${sql.table(table)}
        FOR EACH ROW
        EXECUTE FUNCTION public.update_updated_at_column();
    `.execute(db);
  }
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('profiles').ifExists().execute();
  await db.schema.dropTable('orgs').ifExists().execute();
  await sql`DROP FUNCTION IF EXISTS public.update_updated_at_column();`.execute(db);
}
