/**
 * backend/src/modules/invites/invite.routes.ts
 *
 * WHY:
 * - Declares Invites module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * SECURITY:
 * - Acceptance reads the invite from the caller's bearer identity, never from the body.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { InviteController } from './invite.controller';

export function registerInviteRoutes(app: FastifyInstance, controller: InviteController) {
  app.post('/org/:slug/invite', controller.issueInvite.bind(controller));
  app.post('/auth/accept', controller.acceptInvite.bind(controller));
}
