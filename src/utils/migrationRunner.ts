/**
 * Applies the numbered SQL files under `migrations/` in name order.
 *
 * `schema_migrations` records each applied file with the SHA-256 of its
 * contents. A file edited after it was applied stops the run: the ledger and
 * partition grants must match what is deployed. Runners on several hosts are
 * serialized by a session advisory lock.
 *
 * @module utils/migrationRunner
 */

import { createHash } from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type pg from 'pg';
import { silentLogger, type Logger } from '../logging/index.js';
import { getPool } from './db.js';
import { toError } from './errors.js';

/** `<repo>/migrations`, reached from both `src/utils` and `dist/utils`. */
export const DEFAULT_MIGRATIONS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'migrations');

export const MIGRATION_LOCK_KEY = 7312;

export interface MigrationFile {
  name: string;
  sql: string;
  checksum: string;
}

export interface MigrationOptions {
  migrationsDir?: string;
  pool?: pg.Pool;
  logger?: Logger;
}

export function checksumOf(sql: string): string {
  return createHash('sha256').update(sql, 'utf8').digest('hex');
}

/** SQL files in name order; a missing directory has none. */
export async function loadMigrations(migrationsDir: string = DEFAULT_MIGRATIONS_DIR): Promise<MigrationFile[]> {
  let names: string[];
  try {
    names = await readdir(migrationsDir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
    throw error;
  }
  const files: MigrationFile[] = [];
  for (const name of names.filter((n) => n.endsWith('.sql')).sort()) {
    const sql = await readFile(path.join(migrationsDir, name), 'utf8');
    files.push({ name, sql, checksum: checksumOf(sql) });
  }
  return files;
}

async function appliedChecksums(client: pg.PoolClient): Promise<Map<string, string>> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      filename   TEXT PRIMARY KEY,
      checksum   CHAR(64) NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  const result = await client.query<{ filename: string; checksum: string }>(
    'SELECT filename, checksum FROM schema_migrations',
  );
  return new Map(result.rows.map((row) => [row.filename, row.checksum]));
}

/** @returns filenames applied in this run. */
export async function runMigrations(options: MigrationOptions = {}): Promise<string[]> {
  const logger = options.logger ?? silentLogger;
  const migrations = await loadMigrations(options.migrationsDir);
  const client = await (options.pool ?? getPool()).connect();
  const applied: string[] = [];

  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_KEY]);
    try {
      const done = await appliedChecksums(client);
      for (const migration of migrations) {
        const recorded = done.get(migration.name);
        if (recorded !== undefined) {
          if (recorded !== migration.checksum) {
            throw new Error(`Migration ${migration.name} was modified after it was applied`);
          }
          continue;
        }

        await client.query('BEGIN');
        try {
          await client.query(migration.sql);
          await client.query('INSERT INTO schema_migrations (filename, checksum) VALUES ($1, $2)', [
            migration.name,
            migration.checksum,
          ]);
          await client.query('COMMIT');
        } catch (error) {
          await client.query('ROLLBACK');
          throw new Error(`Migration ${migration.name} failed: ${toError(error).message}`, { cause: error });
        }
        applied.push(migration.name);
        logger.info('Applied migration', { file: migration.name });
      }
    } finally {
      await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_KEY]);
    }
  } finally {
    client.release();
  }

  return applied;
}
