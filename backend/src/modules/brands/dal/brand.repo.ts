/**
 * backend/src/modules/brands/dal/brand.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for brands (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 * - jsonb columns go through jsonb().
 */

import type { DbExecutor } from '../../../shared/db/db';
import { jsonb } from '../../../shared/db/json';
import type { BrandRow } from './brand.query-sql';
import type { BrandPatch, NewBrand } from '../brand.types';

export class BrandRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): BrandRepo {
    return new BrandRepo(db);
  }

  /**
   * Slug uniqueness is enforced by the DB constraint; callers translate the
   * unique violation.
   */
  async insertBrand(brand: NewBrand): Promise<BrandRow> {
    return this.db
      .insertInto('brands')
      .values({
        name: brand.name,
        slug: brand.slug,
        description: brand.description,
        category_id: brand.categoryId,
        configuration: jsonb(brand.configuration),
        enrichment_data: jsonb(brand.enrichmentData),
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /** Returns undefined when no brand has this slug. */
  async updateBrand(slug: string, patch: BrandPatch): Promise<BrandRow | undefined> {
    return this.db
      .updateTable('brands')
      .set({
        ...(patch.name !== undefined ? { name: patch.name } : {}),
        ...(patch.description !== undefined ? { description: patch.description } : {}),
        ...(patch.categoryId !== undefined ? { category_id: patch.categoryId } : {}),
        ...(patch.configuration !== undefined
          ? { configuration: jsonb(patch.configuration) }
          : {}),
        ...(patch.enrichmentData !== undefined
          ? { enrichment_data: jsonb(patch.enrichmentData) }
          : {}),
      })
      .where('slug', '=', slug)
      .returningAll()
      .executeTakeFirst();
  }

  /** Returns false when no brand has this slug. */
  async deleteBrand(slug: string): Promise<boolean> {
    const row = await this.db
      .deleteFrom('brands')
      .where('slug', '=', slug)
      .returning(['brand_id'])
      .executeTakeFirst();

    return row !== undefined;
  }
}
