/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/, /health)
 *   - module routes (orgs, profiles, brands, invites)
 *
 * RULES:
 * - No business logic here.
 * - `/` and `/health` return bare bodies (no envelope): clients read `.message` / `.status`.
 * - Only wiring: app.get/post + handler functions.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  app.get('/', () => {
    return { message: 'Welcome to the Brand Portal API' };
  });

  // Core health endpoint (E2E smoke + platform checks)
  app.get('/health', (req) => {
    return {
      status: 'healthy',
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      requestId: req.requestContext.requestId,
    };
  });

  // Module routes
  opts.deps.orgs.registerRoutes(app);
  opts.deps.profiles.registerRoutes(app);
  opts.deps.brands.registerRoutes(app);
  opts.deps.invites.registerRoutes(app);
}
