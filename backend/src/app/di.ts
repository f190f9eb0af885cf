/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db pool, identity provider clients) and shares them.
 * - Keeps modules testable: tests pass in-process replacements through `overrides`.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. which mail transport) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';
import { ScopedDb } from '../shared/db/scoped-db';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import type { IdentityProvider } from '../shared/identity/identity-provider';
import { SupabaseIdentityProvider } from '../shared/identity/supabase-identity-provider';

import type { Mailer } from '../shared/mail/mailer';
import { ResendMailer } from '../shared/mail/resend-mailer';

import { createOrgModule } from '../modules/orgs/org.module';
import type { OrgModule } from '../modules/orgs/org.module';

import { createProfileModule } from '../modules/profiles/profile.module';
import type { ProfileModule } from '../modules/profiles/profile.module';

import { createBrandModule } from '../modules/brands/brand.module';
import type { BrandModule } from '../modules/brands/brand.module';

import { createInviteModule } from '../modules/invites/invite.module';
import type { InviteModule } from '../modules/invites/invite.module';

export type AppDeps = {
  db: Db;
  scopedDb: ScopedDb;

  logger: Logger;

  identity: IdentityProvider;
  /** null → the identity provider delivers invite e-mails itself. */
  mailer: Mailer | null;

  // modules
  orgs: OrgModule;
  profiles: ProfileModule;
  brands: BrandModule;
  invites: InviteModule;

  // lifecycle
  close: () => Promise<void>;
};

/** In-process replacements (tests). Anything omitted is built from config. */
export type DepsOverrides = {
  db?: Db;
  identity?: IdentityProvider;
  mailer?: Mailer | null;
};

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  // The shared logger is created at import time; the validated level wins from here on.
  logger.level = config.logLevel;

  const db = overrides.db ?? createDb(config.databaseUrl);
  const scopedDb = new ScopedDb(db);

  const identity: IdentityProvider =
    overrides.identity ??
    SupabaseIdentityProvider.create({
      url: config.supabase.url,
      anonKey: config.supabase.anonKey,
      serviceRoleKey: config.supabase.serviceRoleKey,
    });

  // Relay delivery only when an e-mail provider key is configured.
  const mailer: Mailer | null =
    overrides.mailer !== undefined
      ? overrides.mailer
      : config.email.apiKey
        ? new ResendMailer({ apiKey: config.email.apiKey, from: config.email.from })
        : null;

  // modules (no HTTP / no business logic here)
  const orgs = createOrgModule({ scopedDb, logger });
  const profiles = createProfileModule({ scopedDb, logger });
  const brands = createBrandModule({ scopedDb, logger });

  const invites = createInviteModule({
    scopedDb,
    identity,
    mailer,
    redirectUrl: config.invites.redirectUrl,
    logger,
    profileRepo: profiles.profileRepo,
  });

  return {
    db,
    scopedDb,
    logger,
    identity,
    mailer,
    orgs,
    profiles,
    brands,
    invites,
    close: async () => {
      await db.destroy();
    },
  };
}
