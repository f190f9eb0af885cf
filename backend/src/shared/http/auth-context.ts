/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication (who is calling) is resolved once per request by the bearer
 *   middleware; handlers only read req.authContext.
 * - Before the middleware runs (or when no valid token is sent), every field is empty.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets the anonymous stub on every request.
 * 2. registerBearerAuth() overwrites it when the bearer token resolves to a user.
 * 3. Controllers call requireUser(req) to demand an identity.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

export type AuthContext = {
  userId: string | null;
  email: string | null;
  /** Identity-provider metadata of the caller (e.g. pending invite). */
  userMetadata: Record<string, unknown>;
  /** Raw bearer token. Never log it. */
  accessToken: string | null;

  // Profile fields (populated by bearer middleware)
  isSuperuser: boolean;
  orgId: number | null;
  isActivated: boolean;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function anonymousAuthContext(): AuthContext {
  return {
    userId: null,
    email: null,
    userMetadata: {},
    accessToken: null,
    isSuperuser: false,
    orgId: null,
    isActivated: false,
  };
}

export function registerAuthContext(app: FastifyInstance) {
  // Real value is assigned per request in the onRequest hook below.
  app.decorateRequest('authContext', null as unknown as AuthContext);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = anonymousAuthContext();
    done();
  });
}
