/**
 * backend/src/modules/brands/dal/brand.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for brands.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { Brands } from '../../../shared/db/database.schema';
import type { BrandListFilter } from '../brand.types';

export type BrandRow = Selectable<Brands>;

// LIKE metacharacters in user input match literally (backslash is Postgres' default LIKE escape).
function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export async function selectBrandBySlugSql(
  db: DbExecutor,
  slug: string,
): Promise<BrandRow | undefined> {
  return db.selectFrom('brands').selectAll().where('slug', '=', slug).executeTakeFirst();
}

export async function selectBrandsSql(
  db: DbExecutor,
  filter: BrandListFilter,
): Promise<BrandRow[]> {
  let query = db.selectFrom('brands').selectAll();

  if (filter.categoryId !== undefined) {
    query = query.where('category_id', '=', filter.categoryId);
  }

  if (filter.search !== undefined) {
    query = query.where('name', 'ilike', `%${escapeLikePattern(filter.search)}%`);
  }

  return query
    .orderBy('name')
    .orderBy('brand_id')
    .limit(filter.limit)
    .offset(filter.offset)
    .execute();
}
