/**
 * backend/src/modules/invites/invite.types.ts
 *
 * WHY:
 * - Domain types for the Invites module.
 * - An invite has no table of its own: it lives as identity-provider user
 *   metadata ({ org_slug, invited_by }) until the invitee accepts it.
 *
 * RULES:
 * - Avoid leaking provider naming (snake_case) outside the identity adapter + policy.
 */

/**
 * provider: the identity provider sent the e-mail itself.
 * relay:    we generated the signed link and sent it through our mailer.
 */
export type InviteDelivery = 'provider' | 'relay';

export type InviteCaller = {
  userId: string;
  email: string | null;
  orgId: number | null;
  isSuperuser: boolean;
};

export type IssueInviteResult = {
  email: string;
  orgSlug: string;
  invitedUserId: string;
  delivery: InviteDelivery;
};

export type AcceptInviteResult = {
  userId: string;
  orgId: number;
  orgSlug: string;
  /** True when the profile already pointed at this org before the call. */
  alreadyMember: boolean;
};
