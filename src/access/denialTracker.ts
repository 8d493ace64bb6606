/**
 * Sliding-window denial counter, used to spot principals that keep hitting
 * the gateway with requests they are not allowed to make.
 *
 * The Redis version keeps one sorted set per principal, scored by timestamp;
 * expired members are pruned on every record. The in-memory version does the
 * same with an array and serves single-process deployments and tests.
 *
 * @module access/denialTracker
 */

import type { Redis } from 'ioredis';

export interface DenialTracker {
  /**
   * Record one denial and return how many denials the principal has in the
   * window, including this one.
   */
  record(principalId: string, windowSeconds: number): Promise<number>;
}

/** Key prefix used in Redis to namespace denial windows. */
export const DENIAL_PREFIX = 'denials:';

export function denialKey(principalId: string): string {
  return `${DENIAL_PREFIX}${principalId}`;
}

/**
 * Algorithm (executed atomically via Lua script):
 * 1. Remove members older than `now - windowSeconds`.
 * 2. Add this denial.
 * 3. Refresh the key TTL to the window.
 * 4. Return the member count.
 */
const RECORD_DENIAL_SCRIPT = `
  redis.call('ZREMRANGEBYSCORE', KEYS[1], '-inf', ARGV[1])
  redis.call('ZADD', KEYS[1], ARGV[2], ARGV[3])
  redis.call('EXPIRE', KEYS[1], ARGV[4])
  return redis.call('ZCARD', KEYS[1])
`;

export function createRedisDenialTracker(
  redis: Redis,
  clock: () => number = Date.now,
): DenialTracker {
  return {
    async record(principalId, windowSeconds) {
      const now = clock();
      const windowStart = now - windowSeconds * 1000;
      // Unique member so same-millisecond denials are all counted
      const member = `${now}:${Math.random().toString(36).slice(2)}`;

      const count: unknown = await redis.eval(
        RECORD_DENIAL_SCRIPT,
        1,
        denialKey(principalId),
        windowStart.toString(),
        now.toString(),
        member,
        windowSeconds.toString(),
      );
      if (typeof count !== 'number') {
        throw new Error(`Unexpected reply from denial window script: ${String(count)}`);
      }
      return count;
    },
  };
}

export class InMemoryDenialTracker implements DenialTracker {
  private readonly windows = new Map<string, number[]>();

  constructor(private readonly clock: () => number = Date.now) {}

  async record(principalId: string, windowSeconds: number): Promise<number> {
    const now = this.clock();
    const windowStart = now - windowSeconds * 1000;
    const kept = (this.windows.get(principalId) ?? []).filter((at) => at > windowStart);
    kept.push(now);
    this.windows.set(principalId, kept);
    return kept.length;
  }
}
