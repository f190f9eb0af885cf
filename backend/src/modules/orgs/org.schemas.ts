/**
 * backend/src/modules/orgs/org.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Orgs module.
 *
 * RULES:
 * - Use Zod for runtime validation.
 */

import { z } from 'zod';

import { slugSchema } from '../../shared/validation/slug';

export const createOrgSchema = z.object({
  orgSlug: slugSchema,
});

export type CreateOrgInput = z.infer<typeof createOrgSchema>;
