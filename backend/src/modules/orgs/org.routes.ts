/**
 * backend/src/modules/orgs/org.routes.ts
 *
 * WHY:
 * - Declares Orgs module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { OrgController } from './org.controller';

export function registerOrgRoutes(app: FastifyInstance, controller: OrgController) {
  app.get('/org/me', controller.getMyOrg.bind(controller));
  app.post('/orgs', controller.createOrg.bind(controller));
}
