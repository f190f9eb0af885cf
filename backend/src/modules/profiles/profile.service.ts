/**
 * backend/src/modules/profiles/profile.service.ts
 *
 * WHY:
 * - Caller-facing profile reads (RLS-scoped).
 * - Profile bootstrap for the bearer middleware (elevated).
 *
 * RULES:
 * - No raw DB access outside queries/DAL.
 * - Only ensureProfile() uses the service connection.
 */

import type { DbClaims, ScopedDb } from '../../shared/db/scoped-db';
import type { ProfileSnapshot } from '../../shared/http/bearer-auth';
import type { Logger } from '../../shared/logger/logger';

import type { ProfileRepo } from './dal/profile.repo';
import { getProfileById, listProfiles } from './queries/profile.queries';
import { ensureProfile } from './use-cases/ensure-profile.usecase';
import { ProfileErrors } from './profile.errors';
import type { Profile } from './profile.types';

export class ProfileService {
  constructor(
    private readonly deps: {
      scopedDb: ScopedDb;
      logger: Logger;
      profileRepo: ProfileRepo;
    },
  ) {}

  async listProfiles(claims: DbClaims): Promise<Profile[]> {
    return this.deps.scopedDb.asUser(claims, (trx) => listProfiles(trx));
  }

  async getMyProfile(claims: DbClaims): Promise<Profile> {
    const profile = await this.deps.scopedDb.asUser(claims, (trx) =>
      getProfileById(trx, claims.sub),
    );
    if (!profile) throw ProfileErrors.profileNotFound({ userId: claims.sub });

    return profile;
  }

  async ensureProfile(userId: string): Promise<ProfileSnapshot> {
    const { profile, created } = await ensureProfile({
      db: this.deps.scopedDb.service,
      profileRepo: this.deps.profileRepo,
      userId,
    });

    if (created) {
      this.deps.logger.info({
        msg: 'profiles.ensure.created',
        flow: 'profiles.ensure',
        userId,
      });
    }

    return {
      isSuperuser: profile.isSuperuser,
      orgId: profile.orgId,
      isActivated: profile.isActivated,
    };
  }
}
