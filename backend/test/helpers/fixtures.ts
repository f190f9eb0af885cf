import type { DbExecutor } from '../../src/shared/db/db';
import type { FakeIdentityProvider } from './fake-identity-provider';

/**
 * Row builders for E2E/DAL tests. Writes go straight to the store
 * (the service connection), the way an operator would set things up.
 */

export async function createOrg(db: DbExecutor, orgSlug: string): Promise<{ orgId: number }> {
  const row = await db
    .insertInto('orgs')
    .values({ org_slug: orgSlug })
    .returning(['org_id'])
    .executeTakeFirstOrThrow();

  return { orgId: Number(row.org_id) };
}

export type TestUser = {
  userId: string;
  email: string;
  token: string;
  headers: { authorization: string };
};

/**
 * Registers an identity and its profile row (as superuser / org member when asked).
 */
export async function createUser(opts: {
  db: DbExecutor;
  identity: FakeIdentityProvider;
  email: string;
  isSuperuser?: boolean;
  orgId?: number | null;
  userMetadata?: Record<string, unknown>;
}): Promise<TestUser> {
  const { userId, token } = opts.identity.signIn({
    email: opts.email,
    userMetadata: opts.userMetadata,
  });

  await opts.db
    .insertInto('profiles')
    .values({
      id: userId,
      is_superuser: opts.isSuperuser ?? false,
      org_id: opts.orgId ?? null,
      is_activated: (opts.orgId ?? null) !== null,
    })
    .execute();

  return { userId, email: opts.email, token, headers: bearer(token) };
}

export function bearer(token: string): { authorization: string } {
  return { authorization: `Bearer ${token}` };
}
