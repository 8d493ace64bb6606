/**
 * Database connection pool utility.
 *
 * Provides the general-path PostgreSQL pool, configured from `DB_*`
 * environment variables. The isolated partition builds its own pool from
 * `ISOLATED_DB_*` inside `src/isolation/`; nothing here connects with that
 * credential.
 *
 * @module utils/db
 */

import pg from 'pg';

const { Pool } = pg;

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  ssl?: boolean;
}

/**
 * Build database configuration from environment variables under the given
 * prefix (`DB` or `ISOLATED_DB`).
 */
export function getDbConfig(prefix = 'DB', env: NodeJS.ProcessEnv = process.env): DbConfig {
  return {
    host: env[`${prefix}_HOST`] ?? 'localhost',
    port: parseInt(env[`${prefix}_PORT`] ?? '5432', 10),
    database: env[`${prefix}_NAME`] ?? 'lendgate',
    user: env[`${prefix}_USER`] ?? (prefix === 'DB' ? 'lending_app' : 'compliance_app'),
    password: env[`${prefix}_PASSWORD`] ?? '',
    max: parseInt(env[`${prefix}_POOL_MAX`] ?? '20', 10),
    idleTimeoutMillis: parseInt(env[`${prefix}_IDLE_TIMEOUT`] ?? '30000', 10),
    connectionTimeoutMillis: parseInt(env[`${prefix}_CONNECT_TIMEOUT`] ?? '5000', 10),
    ssl: env[`${prefix}_SSL`] === 'true',
  };
}

export function createPool(config: DbConfig): pg.Pool {
  return new Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.max,
    idleTimeoutMillis: config.idleTimeoutMillis,
    connectionTimeoutMillis: config.connectionTimeoutMillis,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
  });
}

/** Singleton general-path pool, lazily initialized. */
let pool: pg.Pool | null = null;

export function getPool(): pg.Pool {
  if (!pool) {
    pool = createPool(getDbConfig('DB'));
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

// ─── Error classification ────────────────────────────────────────────────────

/** SQLSTATE for insufficient_privilege. */
export const PG_INSUFFICIENT_PRIVILEGE = '42501';

export function pgErrorCode(error: unknown): string | undefined {
  if (error !== null && typeof error === 'object' && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

export function isPermissionDenied(error: unknown): boolean {
  return pgErrorCode(error) === PG_INSUFFICIENT_PRIVILEGE;
}
