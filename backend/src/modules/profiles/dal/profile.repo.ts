/**
 * backend/src/modules/profiles/dal/profile.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for profiles (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class ProfileRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): ProfileRepo {
    return new ProfileRepo(db);
  }

  /**
   * Creates a bare profile (no org, not activated, not superuser).
   * The id is the identity-provider user id; callers catch unique-violation
   * when racing another request for the same user.
   */
  async insertProfile(params: { userId: string }): Promise<{ id: string }> {
    const row = await this.db
      .insertInto('profiles')
      .values({ id: params.userId })
      .returning(['id'])
      .executeTakeFirstOrThrow();

    return { id: row.id };
  }

  /**
   * Points a profile at an org and marks it activated.
   * Returns false if the profile row does not exist.
   */
  async assignOrg(params: { userId: string; orgId: number }): Promise<boolean> {
    const row = await this.db
      .updateTable('profiles')
      .set({
        org_id: params.orgId,
        is_activated: true,
      })
      .where('id', '=', params.userId)
      .returning(['id'])
      .executeTakeFirst();

    return row !== undefined;
  }
}
