/**
 * backend/src/modules/profiles/queries/profile.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into Profile domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectProfileByIdSql, selectProfilesSql } from '../dal/profile.query-sql';
import type { ProfileRow } from '../dal/profile.query-sql';
import type { Profile } from '../profile.types';

function toProfile(row: ProfileRow): Profile {
  return {
    id: row.id,
    isSuperuser: row.is_superuser === true,
    orgId: row.org_id === null ? null : Number(row.org_id),
    isActivated: row.is_activated === true,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getProfileById(
  db: DbExecutor,
  userId: string,
): Promise<Profile | undefined> {
  const row = await selectProfileByIdSql(db, userId);
  if (!row) return undefined;
  return toProfile(row);
}

export async function listProfiles(db: DbExecutor): Promise<Profile[]> {
  const rows = await selectProfilesSql(db);
  return rows.map(toProfile);
}
