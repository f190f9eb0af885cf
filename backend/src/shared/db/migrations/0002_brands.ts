/**
 * src/shared/db/migrations/0002_brands.ts
 *
 * WHY:
 * - Brand catalogue. Slug is the public identifier (unique).
 * - configuration / enrichment_data are free-form jsonb objects.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('brands')
    .ifNotExists()
    .addColumn('brand_id', 'bigserial', (col) => col.primaryKey())
    .addColumn('name', 'varchar(255)', (col) => col.notNull())
    .addColumn('slug', 'varchar(255)', (col) => col.notNull().unique())
    .addColumn('description', 'text')
    .addColumn('category_id', 'bigint')
    .addColumn('configuration', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .addColumn('enrichment_data', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('idx_brands_category_id')
    .ifNotExists()
    .on('brands')
    .column('category_id')
    .execute();

  await db.schema.createIndex('idx_brands_name').ifNotExists().on('brands').column('name').execute();

  await db.schema
    .createIndex('idx_brands_enrichment_data')
    .ifNotExists()
    .on('brands')
    .using('gin')
    .column('enrichment_data')
    .execute();

  await sql`
    DROP TRIGGER IF EXISTS update_brands_updated_at ON public.brands;
    CREATE TRIGGER update_brands_updated_at
      BEFORE UPDATE ON public.brands
      FOR EACH ROW
      EXECUTE FUNCTION public.update_updated_at_column();
  `.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('brands').ifExists().execute();
}
