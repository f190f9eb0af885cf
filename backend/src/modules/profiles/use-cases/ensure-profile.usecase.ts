/**
 * backend/src/modules/profiles/use-cases/ensure-profile.usecase.ts
 *
 * WHY:
 * - Every authenticated identity must have a profile row before any
 *   RLS-scoped query runs (policies read profiles.is_superuser / org_id).
 * - The bearer middleware and invite acceptance both need "find or create".
 *
 * WHAT IT DOES:
 * - Returns the existing profile, or inserts a bare one.
 * - A concurrent insert for the same id (unique violation) is resolved by re-reading.
 *
 * RULES:
 * - Receives an elevated executor + repo bound to it (caller owns the transaction, if any).
 * - Does NOT start a transaction.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { isUniqueViolation } from '../../../shared/db/pg-errors';
import type { ProfileRepo } from '../dal/profile.repo';
import { getProfileById } from '../queries/profile.queries';
import type { Profile } from '../profile.types';

export type EnsureProfileParams = {
  db: DbExecutor;
  profileRepo: ProfileRepo;
  userId: string;
};

export type EnsureProfileResult = {
  profile: Profile;
  /** True if the profile row was inserted by this call. */
  created: boolean;
};

export async function ensureProfile(params: EnsureProfileParams): Promise<EnsureProfileResult> {
  const { db, profileRepo, userId } = params;

  const existing = await getProfileById(db, userId);
  if (existing) return { profile: existing, created: false };

  try {
    await profileRepo.insertProfile({ userId });
  } catch (err) {
    if (!isUniqueViolation(err)) throw err;

    const raced = await getProfileById(db, userId);
    if (raced) return { profile: raced, created: false };
    throw err;
  }

  const created = await getProfileById(db, userId);
  if (!created) throw new Error(`Profile ${userId} missing right after insert`);

  return { profile: created, created: true };
}
