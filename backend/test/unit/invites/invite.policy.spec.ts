import { describe, it, expect } from 'vitest';
import { AppError } from '../../../src/shared/http/errors';
import {
  buildInviteMetadata,
  readInviteOrgSlug,
} from '../../../src/modules/invites/policies/invite.policy';

describe('buildInviteMetadata', () => {
  it('writes the provider metadata keys', () => {
    expect(buildInviteMetadata({ orgSlug: 'acme', invitedBy: 'usr_1' })).toEqual({
      org_slug: 'acme',
      invited_by: 'usr_1',
    });
  });
});

describe('readInviteOrgSlug', () => {
  it('returns the trimmed org slug', () => {
    expect(readInviteOrgSlug({ org_slug: ' acme ', invited_by: 'usr_1' })).toBe('acme');
  });

  it.each([
    ['missing', {}],
    ['blank', { org_slug: '   ' }],
    ['not a string', { org_slug: 42 }],
  ])('throws 422 when org_slug is %s', (_label, metadata: Record<string, unknown>) => {
    try {
      readInviteOrgSlug(metadata);
      expect.unreachable('readInviteOrgSlug should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(AppError);
      if (!(err instanceof AppError)) return;
      expect(err.status).toBe(422);
      expect(err.code).toBe('UNPROCESSABLE');
      expect(err.message).toBe('No organization found in invite');
    }
  });
});
