/**
 * backend/src/modules/orgs/org.types.ts
 *
 * WHY:
 * - Domain types for the Orgs module.
 * - Queries shape DB rows into these types (keeps DB shapes isolated).
 *
 * RULES:
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - org_id is int8 in Postgres; exposed as a JS number.
 */

export type OrgId = number;

export type OrgSlug = string;

export type Org = {
  id: OrgId;
  slug: OrgSlug;

  createdAt: Date;
  updatedAt: Date;
};

/** Response shape of GET /org/me and POST /orgs. */
export type OrgSummary = {
  orgId: OrgId;
  orgSlug: OrgSlug;
};
