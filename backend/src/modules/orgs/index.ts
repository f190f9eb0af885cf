/**
 * backend/src/modules/orgs/index.ts
 *
 * WHY:
 * - Define the public surface of the orgs module.
 * - Prevent cross-module coupling via deep imports into /queries or /policies.
 *
 * RULES:
 * - Only export stable, read-only contracts needed by other modules.
 */

export { getOrgBySlug } from './queries/org.queries';
export { assertCanActOnOrg, assertOrgExists } from './policies/org-membership.policy';
export type { Org, OrgSummary } from './org.types';
