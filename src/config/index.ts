/**
 * Runtime configuration from environment variables.
 *
 * Authorization tunables (roles, scopes, masks, isolation thresholds) live in
 * the policy document instead; this covers process wiring only.
 *
 * @module config
 */

import { getDbConfig, type DbConfig } from '../utils/db.js';
import { isLogLevel, type LogLevel } from '../logging/index.js';

export interface AppConfig {
  serviceName: string;
  logLevel: LogLevel;
  port: number;
  jwt: {
    secret: string;
    issuer: string;
  };
  policy: {
    path: string;
    reloadIntervalMs: number;
    fetchTimeoutMs: number;
    fetchRetries: number;
    retryBaseDelayMs: number;
    watch: boolean;
  };
  ledger: {
    partition: string;
    retries: number;
    retryBaseDelayMs: number;
  };
  /** Budget for one HTTP request, authorization included. */
  requestTimeoutMs: number;
  aggregateTimeoutMs: number;
  redisUrl: string | null;
  generalDb: DbConfig;
  isolatedDb: DbConfig;
}

function intFrom(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`${key} must be a non-negative integer`);
  }
  return parsed;
}

/**
 * Get the credential signing secret. Throws when unset; there is no usable
 * default for a secret.
 */
function requireSecret(env: NodeJS.ProcessEnv): string {
  const secret = env['JWT_SECRET'];
  if (!secret) {
    throw new Error('JWT_SECRET environment variable is required');
  }
  return secret;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const level = env['LOG_LEVEL'] ?? 'info';
  if (!isLogLevel(level)) {
    throw new Error('LOG_LEVEL must be one of debug, info, warn, error, fatal');
  }

  return {
    serviceName: env['SERVICE_NAME'] ?? 'lendgate',
    logLevel: level,
    port: intFrom(env, 'PORT', 3000),
    jwt: {
      secret: requireSecret(env),
      issuer: env['JWT_ISSUER'] ?? 'lendgate',
    },
    policy: {
      path: env['POLICY_PATH'] ?? 'config/policy.yaml',
      reloadIntervalMs: intFrom(env, 'POLICY_RELOAD_INTERVAL_MS', 60_000),
      fetchTimeoutMs: intFrom(env, 'POLICY_FETCH_TIMEOUT_MS', 2_000),
      fetchRetries: intFrom(env, 'POLICY_FETCH_RETRIES', 3),
      retryBaseDelayMs: intFrom(env, 'POLICY_RETRY_BASE_DELAY_MS', 100),
      watch: env['POLICY_WATCH'] !== 'false',
    },
    ledger: {
      partition: env['LEDGER_PARTITION'] ?? 'main',
      retries: intFrom(env, 'LEDGER_RETRIES', 3),
      retryBaseDelayMs: intFrom(env, 'LEDGER_RETRY_BASE_DELAY_MS', 50),
    },
    requestTimeoutMs: intFrom(env, 'REQUEST_TIMEOUT_MS', 10_000),
    aggregateTimeoutMs: intFrom(env, 'AGGREGATE_TIMEOUT_MS', 5_000),
    redisUrl: env['REDIS_URL'] || null,
    generalDb: getDbConfig('DB', env),
    isolatedDb: getDbConfig('ISOLATED_DB', env),
  };
}
