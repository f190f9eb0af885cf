/**
 * backend/src/modules/profiles/dal/profile.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for profiles.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { Profiles } from '../../../shared/db/database.schema';

export type ProfileRow = Selectable<Profiles>;

export async function selectProfileByIdSql(
  db: DbExecutor,
  userId: string,
): Promise<ProfileRow | undefined> {
  return db.selectFrom('profiles').selectAll().where('id', '=', userId).executeTakeFirst();
}

/** Every row the executor can see (RLS narrows it for restricted callers). */
export async function selectProfilesSql(db: DbExecutor): Promise<ProfileRow[]> {
  return db.selectFrom('profiles').selectAll().orderBy('created_at').orderBy('id').execute();
}
