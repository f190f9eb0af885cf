/**
 * backend/src/shared/http/require-user.ts
 *
 * WHY:
 * - Controllers must not duplicate "require bearer identity" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or transactions.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { DbClaims } from '../db/scoped-db';

export type RequiredAuthContext = Readonly<{
  userId: string;
  email: string | null;
  userMetadata: Record<string, unknown>;
  isSuperuser: boolean;
  orgId: number | null;
  isActivated: boolean;
}>;

export type RequireUserOptions = Readonly<{
  superuser?: boolean;
}>;

/**
 * Controller guard: requires an authenticated caller, optionally a superuser.
 *
 * Guard sequence (LOCKED):
 * 1) no identity       -> 401 "Authentication required"
 * 2) not a superuser   -> 403 "Superuser privileges required." (when requested)
 */
export function requireUser(
  req: FastifyRequest,
  opts: RequireUserOptions = {},
): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx || !ctx.userId) throw AppError.unauthorized('Authentication required');

  if (opts.superuser && ctx.isSuperuser !== true) {
    throw AppError.forbidden('Superuser privileges required.');
  }

  return {
    userId: ctx.userId,
    email: ctx.email,
    userMetadata: ctx.userMetadata,
    isSuperuser: ctx.isSuperuser,
    orgId: ctx.orgId,
    isActivated: ctx.isActivated,
  };
}

/** JWT claims for restricted (RLS) store access on behalf of the caller. */
export function claimsFor(auth: RequiredAuthContext): DbClaims {
  return { sub: auth.userId, email: auth.email };
}
