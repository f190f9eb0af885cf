/**
 * backend/src/modules/brands/brand.types.ts
 *
 * WHY:
 * - Domain types for the Brands module.
 *
 * RULES:
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - brand_id / category_id are int8 in Postgres; exposed as JS numbers.
 */

import type { JsonObject } from '../../shared/db/database.schema';

export type BrandSlug = string;

export type Brand = {
  id: number;
  name: string;
  slug: BrandSlug;
  description: string | null;
  categoryId: number | null;

  configuration: JsonObject;
  enrichmentData: JsonObject;

  createdAt: Date;
  updatedAt: Date;
};

export type BrandListFilter = {
  categoryId?: number;
  /** Case-insensitive substring of the brand name. */
  search?: string;
  limit: number;
  offset: number;
};

export type NewBrand = {
  name: string;
  slug: BrandSlug;
  description: string | null;
  categoryId: number | null;
  configuration: JsonObject;
  enrichmentData: JsonObject;
};

/** Fields a superuser may change; slug is the immutable public key. */
export type BrandPatch = Partial<Omit<NewBrand, 'slug'>>;
