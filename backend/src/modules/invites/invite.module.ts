/**
 * backend/src/modules/invites/invite.module.ts
 *
 * WHY:
 * - Encapsulates Invites module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { ScopedDb } from '../../shared/db/scoped-db';
import type { IdentityProvider } from '../../shared/identity/identity-provider';
import type { Logger } from '../../shared/logger/logger';
import type { Mailer } from '../../shared/mail/mailer';
import type { ProfileRepo } from '../profiles';

import { InviteController } from './invite.controller';
import { InviteService } from './invite.service';
import { registerInviteRoutes } from './invite.routes';

export type InviteModule = ReturnType<typeof createInviteModule>;

export function createInviteModule(deps: {
  scopedDb: ScopedDb;
  identity: IdentityProvider;
  mailer: Mailer | null;
  redirectUrl: string;
  logger: Logger;
  profileRepo: ProfileRepo;
}) {
  const inviteService = new InviteService({
    scopedDb: deps.scopedDb,
    identity: deps.identity,
    mailer: deps.mailer,
    redirectUrl: deps.redirectUrl,
    logger: deps.logger,
    profileRepo: deps.profileRepo,
  });

  const controller = new InviteController(inviteService);

  return {
    inviteService,
    registerRoutes(app: FastifyInstance) {
      registerInviteRoutes(app, controller);
    },
  };
}
