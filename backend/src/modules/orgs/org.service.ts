/**
 * backend/src/modules/orgs/org.service.ts
 *
 * WHY:
 * - Orchestrates org reads/writes made on behalf of a caller.
 * - Only place in this module allowed to start transactions.
 *
 * RULES:
 * - No raw DB access outside queries/DAL.
 * - Caller-facing reads/writes run RLS-scoped (scopedDb.asUser).
 */

import type { ScopedDb, DbClaims } from '../../shared/db/scoped-db';
import type { Logger } from '../../shared/logger/logger';
import { isUniqueViolation } from '../../shared/db/pg-errors';

import type { OrgRepo } from './dal/org.repo';
import { getOrgById, getOrgBySlug, toOrgSummary } from './queries/org.queries';
import { assertHasOrg } from './policies/org-membership.policy';
import { OrgErrors } from './org.errors';
import type { OrgSummary } from './org.types';

export type GetMyOrgParams = {
  claims: DbClaims;
  orgId: number | null;
  requestId: string;
};

export type CreateOrgParams = {
  claims: DbClaims;
  orgSlug: string;
  requestId: string;
};

export class OrgService {
  constructor(
    private readonly deps: {
      scopedDb: ScopedDb;
      logger: Logger;
      orgRepo: OrgRepo;
    },
  ) {}

  async getMyOrg(params: GetMyOrgParams): Promise<OrgSummary> {
    const orgId = params.orgId;
    assertHasOrg(orgId, params.claims.sub);

    const org = await this.deps.scopedDb.asUser(params.claims, (trx) => getOrgById(trx, orgId));

    // Deleted org (FK set null races) or hidden by RLS: same answer as "no org".
    if (!org) throw OrgErrors.noOrgAssigned({ userId: params.claims.sub, orgId });

    return toOrgSummary(org);
  }

  async createOrg(params: CreateOrgParams): Promise<OrgSummary> {
    this.deps.logger.info({
      msg: 'orgs.create.start',
      flow: 'orgs.create',
      requestId: params.requestId,
      orgSlug: params.orgSlug,
    });

    const created = await this.deps.scopedDb.asUser(params.claims, async (trx) => {
      const existing = await getOrgBySlug(trx, params.orgSlug);
      if (existing) throw OrgErrors.orgSlugTaken({ orgSlug: params.orgSlug });

      try {
        return await this.deps.orgRepo.withDb(trx).insertOrg({ orgSlug: params.orgSlug });
      } catch (err) {
        if (isUniqueViolation(err)) throw OrgErrors.orgSlugTaken({ orgSlug: params.orgSlug });
        throw err;
      }
    });

    this.deps.logger.info({
      msg: 'orgs.create.success',
      flow: 'orgs.create',
      requestId: params.requestId,
      orgId: created.orgId,
    });

    return created;
  }
}
