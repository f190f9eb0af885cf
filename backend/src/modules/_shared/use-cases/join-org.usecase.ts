/**
 * src/modules/_shared/use-cases/join-org.usecase.ts
 *
 * WHY:
 * - "Find-or-create profile + point it at an org + activate" is the core of
 *   invite acceptance, and the dev seed / future admin assignment need the same thing.
 * - Extracting here means idempotency rules are defined once and tested once.
 *
 * WHAT IT DOES:
 * - Finds or creates the profile for the identity-provider user id.
 * - Profile already on this org and activated → no-op (idempotent).
 * - Otherwise sets org_id and is_activated = true.
 * - Returns flags so the caller can shape the response and logs.
 *
 * RULES:
 * - Receives an elevated, trx-bound executor (caller owns the transaction).
 * - Does NOT start a transaction.
 * - Does NOT decide whether the caller may join (policies run before).
 */

import type { DbExecutor } from '../../../shared/db/db';
import { ensureProfile } from '../../profiles';
import type { Profile, ProfileRepo } from '../../profiles';

// ── Input ────────────────────────────────────────────────────

export type JoinOrgParams = {
  /** Transaction-bound, elevated db executor. */
  trx: DbExecutor;
  /** Transaction-bound profile repo. */
  profileRepo: ProfileRepo;
  /** Identity-provider user id (= profiles.id). */
  userId: string;
  /** Target org. */
  orgId: number;
};

// ── Output ───────────────────────────────────────────────────

export type JoinOrgResult = {
  profile: Profile;
  /** True if the profile row was inserted by this call. */
  profileCreated: boolean;
  /** True if the profile already pointed at orgId before this call. */
  alreadyMember: boolean;
};

// ── Use-case ─────────────────────────────────────────────────

export async function joinOrg(params: JoinOrgParams): Promise<JoinOrgResult> {
  const { trx, profileRepo, userId, orgId } = params;

  // ── 1. Find or create profile ─────────────────────────────

  const { profile: existing, created } = await ensureProfile({
    db: trx,
    profileRepo,
    userId,
  });

  const alreadyMember = existing.orgId === orgId;

  if (alreadyMember && existing.isActivated) {
    return { profile: existing, profileCreated: created, alreadyMember };
  }

  // ── 2. Assign org + activate ──────────────────────────────

  const updated = await profileRepo.assignOrg({ userId, orgId });
  if (!updated) throw new Error(`Profile ${userId} disappeared while joining org ${orgId}`);

  return {
    profile: { ...existing, orgId, isActivated: true },
    profileCreated: created,
    alreadyMember,
  };
}
