/**
 * backend/src/modules/invites/invite.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Invites module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Emails are normalised to lowercase before reaching the identity provider.
 */

import { z } from 'zod';

import { slugSchema } from '../../shared/validation/slug';

export const inviteOrgParamsSchema = z.object({
  slug: slugSchema,
});

export const issueInviteSchema = z.object({
  email: z.string().trim().toLowerCase().email('Invalid email address').max(320),
});

export type IssueInviteInput = z.infer<typeof issueInviteSchema>;
