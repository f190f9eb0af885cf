/**
 * backend/src/modules/brands/brand.service.ts
 *
 * WHY:
 * - Orchestrates brand catalogue reads/writes.
 * - Only place in this module allowed to start transactions.
 *
 * RULES:
 * - No raw DB access outside queries/DAL.
 * - Every operation runs RLS-scoped as the caller (scopedDb.asUser).
 * - A duplicate slug must fail without touching the existing row.
 */

import type { DbClaims, ScopedDb } from '../../shared/db/scoped-db';
import type { Logger } from '../../shared/logger/logger';
import { isUniqueViolation } from '../../shared/db/pg-errors';

import type { BrandRepo } from './dal/brand.repo';
import { getBrandBySlug, listBrands, toBrand } from './queries/brand.queries';
import { BrandErrors } from './brand.errors';
import type { Brand, BrandListFilter, BrandPatch, NewBrand } from './brand.types';

type CallerParams = {
  claims: DbClaims;
  requestId: string;
};

export class BrandService {
  constructor(
    private readonly deps: {
      scopedDb: ScopedDb;
      logger: Logger;
      brandRepo: BrandRepo;
    },
  ) {}

  async listBrands(params: CallerParams & { filter: BrandListFilter }): Promise<Brand[]> {
    return this.deps.scopedDb.asUser(params.claims, (trx) => listBrands(trx, params.filter));
  }

  async getBrand(params: CallerParams & { slug: string }): Promise<Brand> {
    const brand = await this.deps.scopedDb.asUser(params.claims, (trx) =>
      getBrandBySlug(trx, params.slug),
    );
    if (!brand) throw BrandErrors.brandNotFound({ slug: params.slug });

    return brand;
  }

  async createBrand(params: CallerParams & { brand: NewBrand }): Promise<Brand> {
    const { slug } = params.brand;

    this.deps.logger.info({
      msg: 'brands.create.start',
      flow: 'brands.create',
      requestId: params.requestId,
      slug,
    });

    const brand = await this.deps.scopedDb.asUser(params.claims, async (trx) => {
      const existing = await getBrandBySlug(trx, slug);
      if (existing) throw BrandErrors.brandSlugTaken({ slug });

      try {
        const row = await this.deps.brandRepo.withDb(trx).insertBrand(params.brand);
        return toBrand(row);
      } catch (err) {
        if (isUniqueViolation(err)) throw BrandErrors.brandSlugTaken({ slug });
        throw err;
      }
    });

    this.deps.logger.info({
      msg: 'brands.create.success',
      flow: 'brands.create',
      requestId: params.requestId,
      brandId: brand.id,
      slug,
    });

    return brand;
  }

  async updateBrand(params: CallerParams & { slug: string; patch: BrandPatch }): Promise<Brand> {
    this.deps.logger.info({
      msg: 'brands.update.start',
      flow: 'brands.update',
      requestId: params.requestId,
      slug: params.slug,
      fields: Object.keys(params.patch),
    });

    const row = await this.deps.scopedDb.asUser(params.claims, (trx) =>
      this.deps.brandRepo.withDb(trx).updateBrand(params.slug, params.patch),
    );
    if (!row) throw BrandErrors.brandNotFound({ slug: params.slug });

    return toBrand(row);
  }

  async deleteBrand(params: CallerParams & { slug: string }): Promise<{ slug: string }> {
    const deleted = await this.deps.scopedDb.asUser(params.claims, (trx) =>
      this.deps.brandRepo.withDb(trx).deleteBrand(params.slug),
    );
    if (!deleted) throw BrandErrors.brandNotFound({ slug: params.slug });

    this.deps.logger.info({
      msg: 'brands.delete.success',
      flow: 'brands.delete',
      requestId: params.requestId,
      slug: params.slug,
    });

    return { slug: params.slug };
  }
}
