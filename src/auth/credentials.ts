/**
 * Signed credentials.
 *
 * HS256 JWTs carrying the subject, the role claim (an array, so that
 * misconfigured identities with several roles can be detected rather than
 * silently resolved) and the scope attributes used by data-scope templates.
 *
 * The role is resolved from the verified claims on every call; nothing
 * derived from a credential is cached between requests.
 *
 * @module auth/credentials
 */

import jwt from 'jsonwebtoken';
import { isRole, type Principal, type Role } from '../types/index.js';
import { AuthenticationError } from '../utils/errors.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface CredentialClaims {
  subject: string;
  /** Raw role claim; may contain names that are not platform roles. */
  roles: string[];
  scope: Record<string, string>;
  /** Expiry, seconds since epoch. */
  expiresAt: number;
  credentialId: string | null;
}

export interface CredentialKeys {
  secret: string;
  issuer: string;
}

export interface IssueCredentialInput {
  subject: string;
  roles: string[];
  scope?: Record<string, string>;
  expiresInSeconds: number;
  credentialId?: string;
}

export type RoleResolution =
  | { ok: true; role: Role }
  | { ok: false; reason: 'no_known_role' | 'multiple_roles'; knownRoles: Role[] };

// ─── Issue ───────────────────────────────────────────────────────────────────

/**
 * Sign a credential. Used by the identity provider integration and by tests;
 * the gateway itself only verifies.
 */
export function issueCredential(
  input: IssueCredentialInput,
  keys: CredentialKeys & { now?: number },
): string {
  const iat = Math.floor((keys.now ?? Date.now()) / 1000);
  const options: jwt.SignOptions = {
    algorithm: 'HS256',
    subject: input.subject,
    issuer: keys.issuer,
  };
  if (input.credentialId !== undefined) options.jwtid = input.credentialId;

  return jwt.sign(
    { roles: input.roles, scope: input.scope ?? {}, iat, exp: iat + input.expiresInSeconds },
    keys.secret,
    options,
  );
}

// ─── Verify ──────────────────────────────────────────────────────────────────

function readScope(value: unknown): Record<string, string> {
  const scope: Record<string, string> = {};
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    for (const [key, attr] of Object.entries(value)) {
      if (typeof attr === 'string') scope[key] = attr;
    }
  }
  return scope;
}

/**
 * Verify signature, issuer and expiry.
 *
 * @param now - Current time in epoch milliseconds.
 * @throws {AuthenticationError}
 */
export function verifyCredential(token: string, keys: CredentialKeys, now: number = Date.now()): CredentialClaims {
  if (!token) {
    throw new AuthenticationError('No credential presented', 'missing');
  }

  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, keys.secret, {
      algorithms: ['HS256'],
      issuer: keys.issuer,
      clockTimestamp: Math.floor(now / 1000),
    });
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      throw new AuthenticationError('Credential expired', 'expired', error);
    }
    if (error instanceof jwt.JsonWebTokenError && error.message === 'invalid signature') {
      throw new AuthenticationError('Credential signature invalid', 'invalid_signature', error);
    }
    throw new AuthenticationError('Credential could not be verified', 'malformed', error);
  }

  if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || typeof decoded.exp !== 'number') {
    throw new AuthenticationError('Credential is missing required claims', 'malformed');
  }

  const rolesClaim: unknown = decoded['roles'];
  return {
    subject: decoded.sub,
    roles: Array.isArray(rolesClaim) ? rolesClaim.filter((r): r is string => typeof r === 'string') : [],
    scope: readScope(decoded['scope']),
    expiresAt: decoded.exp,
    credentialId: typeof decoded.jti === 'string' ? decoded.jti : null,
  };
}

// ─── Role resolution ─────────────────────────────────────────────────────────

/**
 * Pick the single platform role from the role claim. Unknown role names
 * (identity-provider defaults and the like) are ignored; zero or several
 * known roles is a configuration anomaly and resolves to nothing.
 */
export function resolveRole(claims: Pick<CredentialClaims, 'roles'>): RoleResolution {
  const knownRoles = [...new Set(claims.roles.filter(isRole))];
  const [only] = knownRoles;
  if (knownRoles.length === 1 && only !== undefined) {
    return { ok: true, role: only };
  }
  return {
    ok: false,
    reason: knownRoles.length === 0 ? 'no_known_role' : 'multiple_roles',
    knownRoles,
  };
}

export function toPrincipal(claims: CredentialClaims, role: Role): Principal {
  return {
    id: claims.subject,
    role,
    scopeAttributes: Object.freeze({ ...claims.scope }),
    tokenExpiry: new Date(claims.expiresAt * 1000),
    credentialId: claims.credentialId,
  };
}
