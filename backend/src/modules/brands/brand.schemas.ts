/**
 * backend/src/modules/brands/brand.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Brands module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Query-string numbers arrive as strings (coerce).
 */

import { z } from 'zod';

import { jsonObjectSchema } from '../../shared/validation/json';
import { slugSchema } from '../../shared/validation/slug';

export const BRAND_LIST_DEFAULT_LIMIT = 50;
export const BRAND_LIST_MAX_LIMIT = 100;

const nameSchema = z.string().trim().min(1, 'Name is required').max(255);
const descriptionSchema = z.string().trim().max(10_000).nullable();
const categoryIdSchema = z.number().int().positive().nullable();

export const createBrandSchema = z.object({
  name: nameSchema,
  slug: slugSchema,
  description: descriptionSchema.optional().default(null),
  categoryId: categoryIdSchema.optional().default(null),
  configuration: jsonObjectSchema.optional().default({}),
  enrichmentData: jsonObjectSchema.optional().default({}),
});

export const updateBrandSchema = z
  .object({
    name: nameSchema.optional(),
    description: descriptionSchema.optional(),
    categoryId: categoryIdSchema.optional(),
    configuration: jsonObjectSchema.optional(),
    enrichmentData: jsonObjectSchema.optional(),
  })
  .strict()
  .refine((patch) => Object.values(patch).some((v) => v !== undefined), {
    message: 'At least one field must be provided',
  });

export const listBrandsQuerySchema = z.object({
  categoryId: z.coerce.number().int().positive().optional(),
  search: z.string().trim().min(1).max(255).optional(),
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(BRAND_LIST_MAX_LIMIT)
    .default(BRAND_LIST_DEFAULT_LIMIT),
  offset: z.coerce.number().int().min(0).default(0),
});

export type CreateBrandInput = z.infer<typeof createBrandSchema>;
export type UpdateBrandInput = z.infer<typeof updateBrandSchema>;
export type ListBrandsQuery = z.infer<typeof listBrandsQuerySchema>;
