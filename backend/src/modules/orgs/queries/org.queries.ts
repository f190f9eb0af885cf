/**
 * backend/src/modules/orgs/queries/org.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into Org domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectOrgByIdSql, selectOrgBySlugSql } from '../dal/org.query-sql';
import type { OrgRow } from '../dal/org.query-sql';
import type { Org, OrgSummary } from '../org.types';

function toOrg(row: OrgRow): Org {
  return {
    id: Number(row.org_id),
    slug: row.org_slug,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toOrgSummary(org: Org): OrgSummary {
  return { orgId: org.id, orgSlug: org.slug };
}

export async function getOrgBySlug(db: DbExecutor, orgSlug: string): Promise<Org | undefined> {
  const row = await selectOrgBySlugSql(db, orgSlug);
  if (!row) return undefined;
  return toOrg(row);
}

export async function getOrgById(db: DbExecutor, orgId: number): Promise<Org | undefined> {
  const row = await selectOrgByIdSql(db, orgId);
  if (!row) return undefined;
  return toOrg(row);
}
