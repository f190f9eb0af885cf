/**
 * backend/src/shared/validation/slug.ts
 *
 * URL-safe slug used by orgs and brands: lowercase alphanumerics joined by single hyphens.
 */

import { z } from 'zod';

export const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export const SLUG_MAX_LENGTH = 255;

export const slugSchema = z
  .string()
  .trim()
  .min(1, 'Slug is required')
  .max(SLUG_MAX_LENGTH, `Slug must be at most ${SLUG_MAX_LENGTH} characters`)
  .regex(SLUG_PATTERN, 'Slug must be lowercase letters, digits and single hyphens');

export const slugParamsSchema = z.object({
  slug: slugSchema,
});
