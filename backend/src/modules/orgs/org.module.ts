/**
 * backend/src/modules/orgs/org.module.ts
 *
 * WHY:
 * - Encapsulates Orgs module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { ScopedDb } from '../../shared/db/scoped-db';
import type { Logger } from '../../shared/logger/logger';

import { OrgController } from './org.controller';
import { OrgService } from './org.service';
import { registerOrgRoutes } from './org.routes';
import { OrgRepo } from './dal/org.repo';

export type OrgModule = ReturnType<typeof createOrgModule>;

export function createOrgModule(deps: { scopedDb: ScopedDb; logger: Logger }) {
  const orgRepo = new OrgRepo(deps.scopedDb.service);

  const orgService = new OrgService({
    scopedDb: deps.scopedDb,
    logger: deps.logger,
    orgRepo,
  });

  const controller = new OrgController(orgService);

  return {
    orgRepo,
    orgService,
    registerRoutes(app: FastifyInstance) {
      registerOrgRoutes(app, controller);
    },
  };
}
