/**
 * backend/src/modules/invites/policies/invite.policy.ts
 *
 * WHY:
 * - Reads the pending invite out of the caller's identity-provider metadata.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level InviteErrors.
 */

import type { InviteMetadata } from '../../../shared/identity/identity-provider';
import { InviteErrors } from '../invite.errors';

export function buildInviteMetadata(params: { orgSlug: string; invitedBy: string }): InviteMetadata {
  return { org_slug: params.orgSlug, invited_by: params.invitedBy };
}

/**
 * Returns the org slug written at invite time.
 * Missing, non-string or blank → 422 (nothing to accept).
 */
export function readInviteOrgSlug(userMetadata: Record<string, unknown>): string {
  const value = userMetadata['org_slug'];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw InviteErrors.orgSlugMissing();
  }
  return value.trim();
}
