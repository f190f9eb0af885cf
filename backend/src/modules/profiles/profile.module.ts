/**
 * backend/src/modules/profiles/profile.module.ts
 *
 * WHY:
 * - Encapsulates Profiles module wiring.
 * - Exposes ensureProfile for the bearer middleware and profileRepo for invites.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { ScopedDb } from '../../shared/db/scoped-db';
import type { EnsureProfile } from '../../shared/http/bearer-auth';
import type { Logger } from '../../shared/logger/logger';

import { ProfileController } from './profile.controller';
import { ProfileService } from './profile.service';
import { registerProfileRoutes } from './profile.routes';
import { ProfileRepo } from './dal/profile.repo';

export type ProfileModule = ReturnType<typeof createProfileModule>;

export function createProfileModule(deps: { scopedDb: ScopedDb; logger: Logger }) {
  const profileRepo = new ProfileRepo(deps.scopedDb.service);

  const profileService = new ProfileService({
    scopedDb: deps.scopedDb,
    logger: deps.logger,
    profileRepo,
  });

  const controller = new ProfileController(profileService);

  const ensureProfile: EnsureProfile = (userId) => profileService.ensureProfile(userId);

  return {
    profileRepo,
    profileService,
    ensureProfile,
    registerRoutes(app: FastifyInstance) {
      registerProfileRoutes(app, controller);
    },
  };
}
