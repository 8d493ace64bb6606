/**
 * Credential revocation lists, keyed by JWT `jti`.
 *
 * Entries expire together with the credential they revoke, so the list never
 * grows past the set of still-valid credentials.
 *
 * @module auth/revocation
 */

import type { Redis } from 'ioredis';

export interface RevocationList {
  isRevoked(credentialId: string): Promise<boolean>;
  revoke(credentialId: string, expiresAt: Date): Promise<void>;
}

/** Key prefix used in Redis to namespace revocation entries. */
export const REVOCATION_PREFIX = 'revoked:';

export function createRedisRevocationList(
  redis: Redis,
  clock: () => number = Date.now,
): RevocationList {
  return {
    async isRevoked(credentialId) {
      return (await redis.exists(`${REVOCATION_PREFIX}${credentialId}`)) === 1;
    },
    async revoke(credentialId, expiresAt) {
      const ttlMs = Math.max(1, expiresAt.getTime() - clock());
      await redis.set(`${REVOCATION_PREFIX}${credentialId}`, '1', 'PX', ttlMs);
    },
  };
}

export class InMemoryRevocationList implements RevocationList {
  private readonly entries = new Map<string, number>();

  constructor(private readonly clock: () => number = Date.now) {}

  async isRevoked(credentialId: string): Promise<boolean> {
    const expiresAt = this.entries.get(credentialId);
    if (expiresAt === undefined) return false;
    if (expiresAt <= this.clock()) {
      this.entries.delete(credentialId);
      return false;
    }
    return true;
  }

  async revoke(credentialId: string, expiresAt: Date): Promise<void> {
    this.entries.set(credentialId, expiresAt.getTime());
  }
}
