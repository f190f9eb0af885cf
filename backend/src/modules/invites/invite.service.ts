/**
 * backend/src/modules/invites/invite.service.ts
 *
 * WHY:
 * - Orchestrates invite issuance and acceptance end-to-end.
 * - Only place in this module allowed to start transactions.
 *
 * RULES:
 * - No raw DB access outside queries/DAL.
 * - Org lookups and the acceptance write use the service connection (elevated):
 *   an invitee has no org yet, so RLS would hide the target org from them.
 * - Provider/mailer failures surface as 502 with the provider's message. No retry.
 * - Never log signed invite links or access tokens.
 */

import type { ScopedDb } from '../../shared/db/scoped-db';
import type { Logger } from '../../shared/logger/logger';
import {
  IdentityProviderError,
  type IdentityProvider,
  type InviteUserParams,
} from '../../shared/identity/identity-provider';
import { MailDeliveryError, type Mailer } from '../../shared/mail/mailer';

import { assertCanActOnOrg, assertOrgExists, getOrgBySlug } from '../orgs';
import type { ProfileRepo } from '../profiles';
import { joinOrg } from '../_shared/use-cases/join-org.usecase';

import { buildInviteMetadata, readInviteOrgSlug } from './policies/invite.policy';
import { InviteErrors } from './invite.errors';
import type {
  AcceptInviteResult,
  InviteCaller,
  InviteDelivery,
  IssueInviteResult,
} from './invite.types';

export type IssueInviteParams = {
  caller: InviteCaller;
  orgSlug: string;
  /** Normalised (lowercase) email. */
  email: string;
  requestId: string;
};

export type AcceptInviteParams = {
  userId: string;
  userMetadata: Record<string, unknown>;
  requestId: string;
};

export class InviteService {
  constructor(
    private readonly deps: {
      scopedDb: ScopedDb;
      identity: IdentityProvider;
      /** Present only when relay delivery is configured. */
      mailer: Mailer | null;
      redirectUrl: string;
      logger: Logger;
      profileRepo: ProfileRepo;
    },
  ) {}

  async issueInvite(params: IssueInviteParams): Promise<IssueInviteResult> {
    this.deps.logger.info({
      msg: 'invites.issue.start',
      flow: 'invites.issue',
      requestId: params.requestId,
      orgSlug: params.orgSlug,
      invitedBy: params.caller.userId,
    });

    // 1) Org boundary (LOCKED)
    const org = await getOrgBySlug(this.deps.scopedDb.service, params.orgSlug);
    assertOrgExists(org, params.orgSlug);

    // 2) Caller must belong to the org (superusers bypass)
    assertCanActOnOrg(params.caller, org);

    // 3) Deliver through the provider or our relay
    const inviteParams: InviteUserParams = {
      email: params.email,
      metadata: buildInviteMetadata({ orgSlug: org.slug, invitedBy: params.caller.userId }),
      redirectTo: this.deps.redirectUrl,
    };

    const { invitedUserId, delivery } = await this.deliver(inviteParams, params.caller);

    this.deps.logger.info({
      msg: 'invites.issue.success',
      flow: 'invites.issue',
      requestId: params.requestId,
      orgId: org.id,
      invitedUserId,
      delivery,
    });

    return {
      email: params.email,
      orgSlug: org.slug,
      invitedUserId,
      delivery,
    };
  }

  async acceptInvite(params: AcceptInviteParams): Promise<AcceptInviteResult> {
    this.deps.logger.info({
      msg: 'invites.accept.start',
      flow: 'invites.accept',
      requestId: params.requestId,
      userId: params.userId,
    });

    // 1) Invite payload lives in provider metadata
    const orgSlug = readInviteOrgSlug(params.userMetadata);

    return this.deps.scopedDb.service.transaction().execute(async (trx) => {
      // 2) Org boundary (LOCKED)
      const org = await getOrgBySlug(trx, orgSlug);
      assertOrgExists(org, orgSlug);

      // 3) Find-or-create profile, point it at the org (idempotent)
      const joined = await joinOrg({
        trx,
        profileRepo: this.deps.profileRepo.withDb(trx),
        userId: params.userId,
        orgId: org.id,
      });

      this.deps.logger.info({
        msg: 'invites.accept.success',
        flow: 'invites.accept',
        requestId: params.requestId,
        userId: params.userId,
        orgId: org.id,
        alreadyMember: joined.alreadyMember,
        profileCreated: joined.profileCreated,
      });

      return {
        userId: params.userId,
        orgId: org.id,
        orgSlug: org.slug,
        alreadyMember: joined.alreadyMember,
      };
    });
  }

  private async deliver(
    inviteParams: InviteUserParams,
    caller: InviteCaller,
  ): Promise<{ invitedUserId: string; delivery: InviteDelivery }> {
    try {
      const mailer = this.deps.mailer;

      if (!mailer) {
        const user = await this.deps.identity.inviteUserByEmail(inviteParams);
        return { invitedUserId: user.id, delivery: 'provider' };
      }

      const link = await this.deps.identity.generateInviteLink(inviteParams);

      await mailer.send({
        type: 'invite.email',
        to: inviteParams.email,
        orgSlug: inviteParams.metadata.org_slug,
        invitedBy: caller.email ?? caller.userId,
        actionLink: link.actionLink,
      });

      return { invitedUserId: link.user.id, delivery: 'relay' };
    } catch (err) {
      if (err instanceof IdentityProviderError) {
        throw InviteErrors.deliveryFailed(err.message, {
          stage: 'identity',
          providerStatus: err.providerStatus,
        });
      }
      if (err instanceof MailDeliveryError) {
        throw InviteErrors.deliveryFailed(err.message, {
          stage: 'mail',
          providerStatus: err.status,
        });
      }
      throw err;
    }
  }
}
