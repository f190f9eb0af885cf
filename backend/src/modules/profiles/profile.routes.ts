/**
 * backend/src/modules/profiles/profile.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { ProfileController } from './profile.controller';

export function registerProfileRoutes(app: FastifyInstance, controller: ProfileController) {
  app.get('/profiles', controller.listProfiles.bind(controller));
  app.get('/profiles/me', controller.getMyProfile.bind(controller));
}
