/**
 * backend/src/shared/http/bearer-auth.ts
 *
 * WHY:
 * - Reads `Authorization: Bearer <token>` on every request.
 * - The identity provider is the only authority on tokens: we ask it who the
 *   token belongs to instead of decoding the JWT ourselves.
 * - First authenticated request provisions the caller's profile row.
 *
 * RULES:
 * - Runs AFTER requestContext and authContext hooks (needs both to exist).
 * - Does NOT throw for missing/rejected tokens — endpoints decide if auth is required.
 * - Provider outages DO throw (surface as 500, not as a silent 401).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

import type { IdentityProvider } from '../identity/identity-provider';

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

export type ProfileSnapshot = {
  isSuperuser: boolean;
  orgId: number | null;
  isActivated: boolean;
};

/** Find-or-create the caller's profile (owned by the profiles module). */
export type EnsureProfile = (userId: string) => Promise<ProfileSnapshot>;

export function parseBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = BEARER_PATTERN.exec(header);
  return match?.[1] ?? null;
}

export function registerBearerAuth(
  app: FastifyInstance,
  deps: { identity: IdentityProvider; ensureProfile: EnsureProfile },
): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const accessToken = parseBearerToken(req.headers.authorization);
    if (!accessToken) return;

    const user = await deps.identity.getUserByAccessToken(accessToken);
    if (!user) return;

    const profile = await deps.ensureProfile(user.id);

    req.authContext = {
      userId: user.id,
      email: user.email,
      userMetadata: user.userMetadata,
      accessToken,
      isSuperuser: profile.isSuperuser,
      orgId: profile.orgId,
      isActivated: profile.isActivated,
    };
  });
}
