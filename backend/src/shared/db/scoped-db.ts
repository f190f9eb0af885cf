/**
 * backend/src/shared/db/scoped-db.ts
 *
 * WHY:
 * - Authorization lives in Postgres row-level-security policies, not in handlers.
 * - Reads/writes done on behalf of a caller must run as `authenticated` with the
 *   caller's JWT claims set, so auth.uid() / auth.role() resolve inside the policies.
 * - Bootstrap writes (profile creation, invite acceptance) need the service
 *   connection, which bypasses RLS.
 *
 * HOW TO USE:
 * - scoped.service                        -> elevated executor
 * - scoped.asUser(claims, (trx) => ...)   -> restricted executor, one transaction
 *
 * RULES:
 * - Claims are transaction-local (set_config(..., true)); nothing leaks to the pool.
 */

import { sql } from 'kysely';

import type { Db, DbExecutor } from './db';

const AUTHENTICATED_ROLE = 'authenticated';

export type DbClaims = {
  sub: string;
  email: string | null;
};

export class ScopedDb {
  constructor(private readonly db: Db) {}

  get service(): DbExecutor {
    return this.db;
  }

  async asUser<T>(claims: DbClaims, fn: (trx: DbExecutor) => Promise<T>): Promise<T> {
    return this.db.transaction().execute(async (trx) => {
      const jwtClaims = JSON.stringify({
        sub: claims.sub,
        email: claims.email,
        role: AUTHENTICATED_ROLE,
      });

      await sql`select set_config('role', ${AUTHENTICATED_ROLE}, true) as role_setting, set_config('request.jwt.claims', ${jwtClaims}, true) as claims_setting`.execute(
        trx,
      );

      return fn(trx);
    });
  }
}
