/**
 * backend/src/modules/orgs/dal/org.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for orgs.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 * - Executor decides visibility: service connection sees every org,
 *   an RLS-scoped transaction only the caller's.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { Orgs } from '../../../shared/db/database.schema';

export type OrgRow = Selectable<Orgs>;

export async function selectOrgBySlugSql(
  db: DbExecutor,
  orgSlug: string,
): Promise<OrgRow | undefined> {
  return db.selectFrom('orgs').selectAll().where('org_slug', '=', orgSlug).executeTakeFirst();
}

export async function selectOrgByIdSql(
  db: DbExecutor,
  orgId: number,
): Promise<OrgRow | undefined> {
  return db.selectFrom('orgs').selectAll().where('org_id', '=', orgId).executeTakeFirst();
}
