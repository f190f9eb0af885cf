/**
 * backend/src/modules/brands/brand.errors.ts
 *
 * WHY:
 * - Brands module owns its domain semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const BrandErrors = {
  brandNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Brand not found', meta);
  },

  brandSlugTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Brand slug already exists', meta);
  },
} as const;
