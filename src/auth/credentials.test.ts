import { describe, it, expect } from 'vitest';
import { AuthenticationError } from '../utils/errors.js';
import { issueCredential, resolveRole, toPrincipal, verifyCredential } from './credentials.js';
import { T0, TEST_ISSUER, TEST_SECRET, credentialFor } from '../test/fixtures.js';

const keys = { secret: TEST_SECRET, issuer: TEST_ISSUER };

function authError(fn: () => unknown): AuthenticationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AuthenticationError) return error;
    throw error;
  }
  throw new Error('expected AuthenticationError');
}

describe('verifyCredential', () => {
  it('returns the claims of a valid credential', () => {
    const token = credentialFor({
      subject: 'officer_7',
      roles: ['loan_officer', 'offline_access'],
      scope: { branch: 'north' },
      credentialId: 'jti-1',
    });

    expect(verifyCredential(token, keys, T0)).toEqual({
      subject: 'officer_7',
      roles: ['loan_officer', 'offline_access'],
      scope: { branch: 'north' },
      expiresAt: T0 / 1000 + 3600,
      credentialId: 'jti-1',
    });
  });

  it('accepts a credential one second before expiry and rejects it one second after', () => {
    const token = credentialFor({ subject: 'b-1', roles: ['borrower'], expiresInSeconds: 60 });
    const expiry = T0 + 60_000;

    expect(verifyCredential(token, keys, expiry - 1000).subject).toBe('b-1');
    expect(authError(() => verifyCredential(token, keys, expiry + 1000)).reason).toBe('expired');
  });

  it('rejects a credential signed with another secret', () => {
    const token = credentialFor({ subject: 'b-1', roles: ['borrower'], secret: 'other-secret' });
    expect(authError(() => verifyCredential(token, keys, T0)).reason).toBe('invalid_signature');
  });

  it('rejects a credential from another issuer', () => {
    const token = issueCredential(
      { subject: 'b-1', roles: ['borrower'], expiresInSeconds: 60 },
      { secret: TEST_SECRET, issuer: 'someone-else', now: T0 },
    );
    expect(authError(() => verifyCredential(token, keys, T0)).reason).toBe('malformed');
  });

  it('rejects garbage and empty input', () => {
    expect(authError(() => verifyCredential('not-a-jwt', keys, T0)).reason).toBe('malformed');
    expect(authError(() => verifyCredential('', keys, T0)).reason).toBe('missing');
  });

  it('defaults to an empty scope', () => {
    const token = issueCredential(
      { subject: 'b-1', roles: ['borrower'], expiresInSeconds: 60 },
      { ...keys, now: T0 },
    );
    expect(verifyCredential(token, keys, T0).scope).toEqual({});
  });
});

describe('resolveRole', () => {
  it('resolves exactly one known role', () => {
    expect(resolveRole({ roles: ['default-roles-lending', 'underwriter'] })).toEqual({
      ok: true,
      role: 'underwriter',
    });
  });

  it('treats duplicates of the same role as one', () => {
    expect(resolveRole({ roles: ['ceo', 'ceo'] })).toEqual({ ok: true, role: 'ceo' });
  });

  it('refuses principals with no known role', () => {
    expect(resolveRole({ roles: ['offline_access'] })).toEqual({
      ok: false,
      reason: 'no_known_role',
      knownRoles: [],
    });
  });

  it('refuses principals with several roles', () => {
    expect(resolveRole({ roles: ['admin', 'borrower'] })).toEqual({
      ok: false,
      reason: 'multiple_roles',
      knownRoles: ['admin', 'borrower'],
    });
  });
});

describe('toPrincipal', () => {
  it('builds a principal with a frozen scope', () => {
    const principal = toPrincipal(
      { subject: 'officer_7', roles: ['loan_officer'], scope: {}, expiresAt: T0 / 1000, credentialId: null },
      'loan_officer',
    );

    expect(principal).toEqual({
      id: 'officer_7',
      role: 'loan_officer',
      scopeAttributes: {},
      tokenExpiry: new Date(T0),
      credentialId: null,
    });
    expect(Object.isFrozen(principal.scopeAttributes)).toBe(true);
  });
});
