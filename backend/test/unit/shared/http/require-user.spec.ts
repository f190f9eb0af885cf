import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { AppError } from '../../../../src/shared/http/errors';
import { anonymousAuthContext } from '../../../../src/shared/http/auth-context';
import type { AuthContext } from '../../../../src/shared/http/auth-context';
import { claimsFor, requireUser } from '../../../../src/shared/http/require-user';

function makeReq(authContext: AuthContext): FastifyRequest {
  return { authContext } as unknown as FastifyRequest;
}

function signedIn(overrides: Partial<AuthContext> = {}): AuthContext {
  return {
    userId: 'usr_1',
    email: 'user@example.com',
    userMetadata: {},
    accessToken: 'test-token',
    isSuperuser: false,
    orgId: 3,
    isActivated: true,
    ...overrides,
  };
}

function catchAppError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected an AppError');
}

describe('requireUser', () => {
  it('throws 401 when no identity is present', () => {
    const e = catchAppError(() => requireUser(makeReq(anonymousAuthContext())));

    expect(e.status).toBe(401);
    expect(e.message).toBe('Authentication required');
  });

  it('throws 403 when a superuser is required and the caller is not one', () => {
    const e = catchAppError(() => requireUser(makeReq(signedIn()), { superuser: true }));

    expect(e.status).toBe(403);
    expect(e.message).toBe('Superuser privileges required.');
  });

  it('returns the narrowed context for a signed-in caller', () => {
    const ctx = requireUser(makeReq(signedIn({ isSuperuser: true })), { superuser: true });

    expect(ctx).toEqual({
      userId: 'usr_1',
      email: 'user@example.com',
      userMetadata: {},
      isSuperuser: true,
      orgId: 3,
      isActivated: true,
    });
  });

  it('never exposes the access token', () => {
    const ctx = requireUser(makeReq(signedIn()));
    expect(Object.keys(ctx)).not.toContain('accessToken');
  });
});

describe('claimsFor', () => {
  it('maps the caller to JWT claims', () => {
    const ctx = requireUser(makeReq(signedIn()));
    expect(claimsFor(ctx)).toEqual({ sub: 'usr_1', email: 'user@example.com' });
  });
});
