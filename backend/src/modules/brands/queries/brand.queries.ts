/**
 * backend/src/modules/brands/queries/brand.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into Brand domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { toJsonObject } from '../../../shared/db/json';
import { selectBrandBySlugSql, selectBrandsSql } from '../dal/brand.query-sql';
import type { BrandRow } from '../dal/brand.query-sql';
import type { Brand, BrandListFilter } from '../brand.types';

export function toBrand(row: BrandRow): Brand {
  return {
    id: Number(row.brand_id),
    name: row.name,
    slug: row.slug,
    description: row.description ?? null,
    categoryId: row.category_id === null ? null : Number(row.category_id),
    configuration: toJsonObject(row.configuration),
    enrichmentData: toJsonObject(row.enrichment_data),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getBrandBySlug(db: DbExecutor, slug: string): Promise<Brand | undefined> {
  const row = await selectBrandBySlugSql(db, slug);
  if (!row) return undefined;
  return toBrand(row);
}

export async function listBrands(db: DbExecutor, filter: BrandListFilter): Promise<Brand[]> {
  const rows = await selectBrandsSql(db, filter);
  return rows.map(toBrand);
}
