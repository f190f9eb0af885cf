/**
 * backend/src/modules/orgs/dal/org.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for orgs (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class OrgRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): OrgRepo {
    return new OrgRepo(db);
  }

  /**
   * Creates an org. Slug uniqueness is enforced by the DB constraint;
   * callers translate the unique violation.
   */
  async insertOrg(params: { orgSlug: string }): Promise<{ orgId: number; orgSlug: string }> {
    const row = await this.db
      .insertInto('orgs')
      .values({ org_slug: params.orgSlug })
      .returning(['org_id', 'org_slug'])
      .executeTakeFirstOrThrow();

    return { orgId: Number(row.org_id), orgSlug: row.org_slug };
  }
}
