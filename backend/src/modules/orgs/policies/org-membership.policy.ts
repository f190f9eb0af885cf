/**
 * backend/src/modules/orgs/policies/org-membership.policy.ts
 *
 * WHY:
 * - Org existence and membership rules used by /org/me and invite issuance.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level OrgErrors.
 */

import type { Org } from '../org.types';
import { OrgErrors } from '../org.errors';

export type OrgMember = {
  userId: string;
  orgId: number | null;
  isSuperuser: boolean;
};

export function assertOrgExists(org: Org | undefined, orgSlug: string): asserts org is Org {
  if (!org) throw OrgErrors.orgNotFound({ orgSlug });
}

export function assertHasOrg(orgId: number | null, userId: string): asserts orgId is number {
  if (orgId === null) throw OrgErrors.noOrgAssigned({ userId });
}

/**
 * Members act on their own org only. Superusers act on any org.
 */
export function assertCanActOnOrg(member: OrgMember, org: Org): void {
  if (member.isSuperuser) return;

  if (member.orgId !== org.id) {
    throw OrgErrors.notAMember({ userId: member.userId, orgId: org.id });
  }
}
