/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 * 1. requestContext (requestId + host)
 * 2. authContext stub (anonymous)
 * 3. bearer auth (identity provider + profile bootstrap)
 * 4. request log line
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerBearerAuth } from '../shared/http/bearer-auth';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  await app.register(cors, {
    origin: opts.config.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
  });

  registerErrorHandler(app);

  // Global context plugins
  registerRequestContext(app);
  registerAuthContext(app);
  registerBearerAuth(app, {
    identity: opts.deps.identity,
    ensureProfile: opts.deps.profiles.ensureProfile,
  });

  // Basic request logging (requestId + caller)
  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
      userId: req.authContext.userId,
    });
    done();
  });

  return app;
}
