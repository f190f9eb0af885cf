/**
 * backend/src/shared/identity/identity-provider.ts
 *
 * WHY:
 * - The managed auth provider owns sign-in, invite e-mails and user metadata.
 * - Services depend on this interface only (DIP); di.ts wires the concrete adapter,
 *   tests wire an in-memory fake.
 *
 * RULES:
 * - Rejected/expired tokens resolve to null (caller decides 401).
 * - Any other provider failure throws IdentityProviderError with the provider's message.
 */

export type IdentityUser = {
  id: string;
  email: string | null;
  userMetadata: Record<string, unknown>;
};

/**
 * Stored on the invited user by the provider; read back on acceptance.
 * Keys are snake_case because they live in the provider's metadata blob.
 */
export type InviteMetadata = {
  org_slug: string;
  invited_by: string;
};

export type InviteUserParams = {
  email: string;
  metadata: InviteMetadata;
  redirectTo: string;
};

export type GeneratedInviteLink = {
  user: IdentityUser;
  actionLink: string;
};

export class IdentityProviderError extends Error {
  readonly providerStatus: number | null;

  constructor(message: string, providerStatus: number | null = null) {
    super(message);
    this.name = 'IdentityProviderError';
    this.providerStatus = providerStatus;
  }
}

export interface IdentityProvider {
  getUserByAccessToken(accessToken: string): Promise<IdentityUser | null>;

  /** Provider creates the user (if needed) and sends the invite e-mail itself. */
  inviteUserByEmail(params: InviteUserParams): Promise<IdentityUser>;

  /** Provider creates the user and returns the signed link without sending mail. */
  generateInviteLink(params: InviteUserParams): Promise<GeneratedInviteLink>;
}
