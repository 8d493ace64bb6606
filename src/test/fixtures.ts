/**
 * Shared test fixtures: the default policy document, compiled snapshots
 * and signed credentials.
 *
 * @module test/fixtures
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { issueCredential } from '../auth/credentials.js';
import { compilePolicy } from '../policy/policySnapshot.js';
import { parsePolicyDocument } from '../policy/policyLoader.js';
import type { PolicySnapshot } from '../policy/types.js';
import type { Role } from '../types/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_POLICY_PATH = path.resolve(__dirname, '..', '..', 'config', 'policy.yaml');

export const TEST_SECRET = 'test-secret';
export const TEST_ISSUER = 'lendgate-test';

/** 2026-01-15T12:00:00.000Z, a whole second. */
export const T0 = Date.UTC(2026, 0, 15, 12, 0, 0);

export function readDefaultPolicy(): string {
  return readFileSync(DEFAULT_POLICY_PATH, 'utf8');
}

export function defaultSnapshot(revision = 1): PolicySnapshot {
  const document = parsePolicyDocument(readDefaultPolicy(), 'yaml', DEFAULT_POLICY_PATH);
  return compilePolicy(document, { revision, loadedAt: new Date(T0), source: DEFAULT_POLICY_PATH });
}

export interface TestCredentialInput {
  subject: string;
  roles: string[];
  scope?: Record<string, string>;
  /** Seconds from `now`. Defaults to one hour. */
  expiresInSeconds?: number;
  credentialId?: string;
  now?: number;
  secret?: string;
}

export function credentialFor(input: TestCredentialInput): string {
  return issueCredential(
    {
      subject: input.subject,
      roles: input.roles,
      scope: input.scope ?? {},
      expiresInSeconds: input.expiresInSeconds ?? 3600,
      credentialId: input.credentialId,
    },
    { secret: input.secret ?? TEST_SECRET, issuer: TEST_ISSUER, now: input.now ?? T0 },
  );
}

export function credentialForRole(role: Role, subject = `${role}_1`, now = T0): string {
  return credentialFor({ subject, roles: [role], now });
}
