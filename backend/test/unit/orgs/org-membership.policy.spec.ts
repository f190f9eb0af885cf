import { describe, it, expect } from 'vitest';
import { AppError } from '../../../src/shared/http/errors';
import {
  assertCanActOnOrg,
  assertHasOrg,
  assertOrgExists,
} from '../../../src/modules/orgs/policies/org-membership.policy';
import type { Org } from '../../../src/modules/orgs/org.types';

const org: Org = {
  id: 7,
  slug: 'acme',
  createdAt: new Date('2024-01-01T00:00:00Z'),
  updatedAt: new Date('2024-01-01T00:00:00Z'),
};

function catchAppError(fn: () => void): AppError {
  try {
    fn();
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected an AppError');
}

describe('assertOrgExists', () => {
  it('throws 404 for a missing org', () => {
    const e = catchAppError(() => assertOrgExists(undefined, 'ghost'));
    expect(e.status).toBe(404);
    expect(e.message).toBe('Organization not found');
    expect(e.meta).toEqual({ orgSlug: 'ghost' });
  });

  it('passes for an existing org', () => {
    expect(() => assertOrgExists(org, 'acme')).not.toThrow();
  });
});

describe('assertHasOrg', () => {
  it('throws 404 when the profile has no org', () => {
    const e = catchAppError(() => assertHasOrg(null, 'usr_1'));
    expect(e.status).toBe(404);
    expect(e.message).toBe('You are not a member of any organization.');
  });
});

describe('assertCanActOnOrg', () => {
  it('allows members of the org', () => {
    expect(() => assertCanActOnOrg({ userId: 'u', orgId: 7, isSuperuser: false }, org)).not.toThrow();
  });

  it('allows superusers from anywhere', () => {
    expect(() => assertCanActOnOrg({ userId: 'u', orgId: null, isSuperuser: true }, org)).not.toThrow();
  });

  it('rejects members of another org and users without one', () => {
    const other = catchAppError(() => assertCanActOnOrg({ userId: 'u', orgId: 8, isSuperuser: false }, org));
    expect(other.status).toBe(403);
    expect(other.message).toBe('You are not a member of this organization.');

    const none = catchAppError(() => assertCanActOnOrg({ userId: 'u', orgId: null, isSuperuser: false }, org));
    expect(none.status).toBe(403);
  });
});
