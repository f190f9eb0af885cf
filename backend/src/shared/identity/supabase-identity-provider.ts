/**
 * backend/src/shared/identity/supabase-identity-provider.ts
 *
 * WHY:
 * - Concrete IdentityProvider backed by Supabase Auth.
 * - Token lookups go through the anon client; admin calls need the service-role client.
 *
 * HOW TO USE:
 * - const identity = SupabaseIdentityProvider.create({ url, anonKey, serviceRoleKey })
 */

import { createClient, type AuthError, type SupabaseClient, type User } from '@supabase/supabase-js';

import type {
  GeneratedInviteLink,
  IdentityProvider,
  IdentityUser,
  InviteUserParams,
} from './identity-provider';
import { IdentityProviderError } from './identity-provider';

// Statuses the provider uses for "this token is not valid".
const REJECTED_TOKEN_STATUSES = new Set([400, 401, 403, 404]);

function toIdentityUser(user: User): IdentityUser {
  return {
    id: user.id,
    email: user.email ?? null,
    userMetadata: { ...(user.user_metadata ?? {}) },
  };
}

function toProviderError(error: AuthError): IdentityProviderError {
  return new IdentityProviderError(error.message, error.status ?? null);
}

export class SupabaseIdentityProvider implements IdentityProvider {
  constructor(
    private readonly anonClient: SupabaseClient,
    private readonly adminClient: SupabaseClient,
  ) {}

  static create(opts: { url: string; anonKey: string; serviceRoleKey: string }) {
    // Server-side clients: no session persistence, no background refresh timers.
    const auth = { autoRefreshToken: false, persistSession: false };

    return new SupabaseIdentityProvider(
      createClient(opts.url, opts.anonKey, { auth }),
      createClient(opts.url, opts.serviceRoleKey, { auth }),
    );
  }

  async getUserByAccessToken(accessToken: string): Promise<IdentityUser | null> {
    const { data, error } = await this.anonClient.auth.getUser(accessToken);

    if (error) {
      if (error.status !== undefined && REJECTED_TOKEN_STATUSES.has(error.status)) return null;
      throw toProviderError(error);
    }

    return data.user ? toIdentityUser(data.user) : null;
  }

  async inviteUserByEmail(params: InviteUserParams): Promise<IdentityUser> {
    const { data, error } = await this.adminClient.auth.admin.inviteUserByEmail(params.email, {
      data: params.metadata,
      redirectTo: params.redirectTo,
    });

    if (error) throw toProviderError(error);
    return toIdentityUser(data.user);
  }

  async generateInviteLink(params: InviteUserParams): Promise<GeneratedInviteLink> {
    const { data, error } = await this.adminClient.auth.admin.generateLink({
      type: 'invite',
      email: params.email,
      options: {
        data: params.metadata,
        redirectTo: params.redirectTo,
      },
    });

    if (error) throw toProviderError(error);

    return {
      user: toIdentityUser(data.user),
      actionLink: data.properties.action_link,
    };
  }
}
