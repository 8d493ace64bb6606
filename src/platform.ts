/**
 * Production wiring: builds the gateway, router and ledger over PostgreSQL,
 * Redis (when configured) and the policy file, and hands back the pieces
 * `createApp` needs together with a single `close()`.
 *
 * @module platform
 */

import { Redis } from 'ioredis';
import type pg from 'pg';

import { AccessGateway } from './access/gateway.js';
import { createRedisDenialTracker, InMemoryDenialTracker, type DenialTracker } from './access/denialTracker.js';
import { createLogAlertTransport, createOperatorAlerts, type OperatorAlerts } from './alerting/operatorAlerts.js';
import { createRedisRevocationList, InMemoryRevocationList, type RevocationList } from './auth/revocation.js';
import type { AppConfig } from './config/index.js';
import { DualPathRouter } from './isolation/index.js';
import { AuditLedger } from './ledger/auditLedger.js';
import { PgLedgerStore } from './ledger/pgLedgerStore.js';
import type { Logger } from './logging/logger.js';
import { createFilePolicySource } from './policy/policyLoader.js';
import { PolicyStore } from './policy/policyStore.js';
import { watchPolicyFile, type PolicyFileWatcher } from './policy/policyWatcher.js';
import { createPgApplicationRepository, type ApplicationRepository } from './repositories/applicationRepository.js';
import { toError } from './utils/errors.js';
import { createPool } from './utils/db.js';

// ─── Policy Swaps ────────────────────────────────────────────────────────────

/** Subset of the ledger used to record swaps. */
export interface SwapLedger {
  append: AuditLedger['append'];
}

/**
 * Record every snapshot swap as a `system` ledger event. Returns the
 * unsubscribe function from {@link PolicyStore.onSwap}.
 */
export function recordPolicySwaps(store: Pick<PolicyStore, 'onSwap'>, ledger: SwapLedger): () => void {
  return store.onSwap(async (next, previous) => {
    await ledger.append({
      eventType: 'system',
      principalId: null,
      roleAtTime: null,
      subjectId: null,
      payload: {
        action: 'policy_swap',
        version: next.version,
        revision: next.revision,
        previousVersion: previous?.version ?? null,
        previousRevision: previous?.revision ?? null,
        source: next.source,
      },
    });
  });
}

// ─── Platform ────────────────────────────────────────────────────────────────

export interface Platform {
  gateway: AccessGateway;
  router: DualPathRouter;
  ledger: AuditLedger;
  applications: ApplicationRepository;
  policy: PolicyStore;
  alerts: OperatorAlerts;
  close(): Promise<void>;
}

export async function createPlatform(config: AppConfig, logger: Logger): Promise<Platform> {
  const pool: pg.Pool = createPool(config.generalDb);
  const redis = config.redisUrl ? new Redis(config.redisUrl) : null;
  redis?.on('error', (error: Error) => logger.error('Redis connection error', error));

  const alerts = createOperatorAlerts({ transports: [createLogAlertTransport(logger)], logger });
  const ledger = new AuditLedger({
    store: new PgLedgerStore(pool),
    partition: config.ledger.partition,
    retries: config.ledger.retries,
    retryBaseDelayMs: config.ledger.retryBaseDelayMs,
    alerts,
    logger,
  });

  const policy = new PolicyStore({
    source: createFilePolicySource(config.policy.path),
    logger,
    fetchTimeoutMs: config.policy.fetchTimeoutMs,
    fetchRetries: config.policy.fetchRetries,
    retryBaseDelayMs: config.policy.retryBaseDelayMs,
    reloadIntervalMs: config.policy.reloadIntervalMs,
  });
  recordPolicySwaps(policy, ledger);
  await policy.load();

  let watcher: PolicyFileWatcher | null = null;
  if (config.policy.watch) {
    watcher = watchPolicyFile(policy, config.policy.path, { logger });
  }

  // Without Redis, revocation and denial windows are per process.
  const revocations: RevocationList = redis ? createRedisRevocationList(redis) : new InMemoryRevocationList();
  const denials: DenialTracker = redis ? createRedisDenialTracker(redis) : new InMemoryDenialTracker();
  if (!redis) logger.warn('REDIS_URL not set; revocations and denial counts are held in memory');

  const applications = createPgApplicationRepository(pool);
  const router = DualPathRouter.create({
    storage: { kind: 'postgres', config: config.isolatedDb },
    ledger,
    outcomes: (subjectIds) => applications.outcomesFor(subjectIds),
    alerts,
    logger,
  });

  const gateway = new AccessGateway({
    keys: { secret: config.jwt.secret, issuer: config.jwt.issuer },
    policy,
    ledger,
    revocations,
    denials,
    alerts,
    logger,
  });

  return {
    gateway,
    router,
    ledger,
    applications,
    policy,
    alerts,
    async close() {
      watcher?.close();
      const results = await Promise.allSettled([router.close(), pool.end(), redis ? redis.quit() : Promise.resolve()]);
      for (const result of results) {
        if (result.status === 'rejected') logger.error('Shutdown step failed', toError(result.reason));
      }
    },
  };
}
