/**
 * PostgreSQL isolated partition over `hmda.demographics`.
 *
 * Only the `compliance_app` role holds grants on the `hmda` schema. Queries
 * run on the pool the credential carries, so a general-path pool is refused
 * by the database with SQLSTATE 42501 even if it got past the credential
 * check.
 *
 * @module isolation/pgIsolatedPartition
 */

import type pg from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { createPool, isPermissionDenied, type DbConfig } from '../utils/db.js';
import { IsolationViolation } from '../utils/errors.js';
import {
  reportViolation,
  type IsolatedPartition,
  type PartitionOperation,
  type ViolationHandler,
} from './isolatedPartition.js';
import { isIsolatedCredential, type PartitionCredential } from './partitionCredential.js';
import { COLLECTION_METHODS, type CollectionMethod, type IsolatedRecord, type IsolatedRecordInput } from './types.js';

const COLUMNS = 'id, subject_id, race, ethnicity, sex, age_band, collection_method, collected_at';

/** Pool for the isolated database role. Only the router calls this. */
export function createIsolatedPool(config: DbConfig): pg.Pool {
  return createPool(config);
}

// ─── Row Mapping ─────────────────────────────────────────────────────────────

interface DemographicsRow {
  id: string;
  subject_id: string;
  race: string | null;
  ethnicity: string | null;
  sex: string | null;
  age_band: string | null;
  collection_method: string;
  collected_at: Date;
}

function isCollectionMethod(value: string): value is CollectionMethod {
  return COLLECTION_METHODS.some((entry) => entry === value);
}

export function mapRowToIsolatedRecord(row: DemographicsRow): IsolatedRecord {
  if (!isCollectionMethod(row.collection_method)) {
    throw new Error(`Unknown collection method "${row.collection_method}" on ${row.id}`);
  }
  return {
    id: row.id,
    subjectId: row.subject_id,
    race: row.race,
    ethnicity: row.ethnicity,
    sex: row.sex,
    ageBand: row.age_band,
    collectionMethod: row.collection_method,
    collectedAt: row.collected_at,
  };
}

// ─── Partition ───────────────────────────────────────────────────────────────

export class PgIsolatedPartition implements IsolatedPartition {
  readonly kind = 'postgres';
  private readonly handlers: ViolationHandler[] = [];

  /** @param ownedPool ended by {@link close}. */
  constructor(private readonly ownedPool: pg.Pool | null = null) {}

  onViolation(handler: ViolationHandler): void {
    this.handlers.push(handler);
  }

  async insert(credential: PartitionCredential, input: IsolatedRecordInput): Promise<IsolatedRecord> {
    const result = await this.run<DemographicsRow>(
      credential,
      'insert',
      `INSERT INTO hmda.demographics (id, subject_id, race, ethnicity, sex, age_band, collection_method)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${COLUMNS}`,
      [input.id ?? uuidv4(), input.subjectId, input.race, input.ethnicity, input.sex, input.ageBand, input.collectionMethod],
    );
    const row = result.rows[0];
    if (!row) throw new Error('Insert into hmda.demographics returned no row');
    return mapRowToIsolatedRecord(row);
  }

  async readBySubject(credential: PartitionCredential, subjectId: string): Promise<IsolatedRecord[]> {
    const result = await this.run<DemographicsRow>(
      credential,
      'read',
      `SELECT ${COLUMNS} FROM hmda.demographics WHERE subject_id = $1 ORDER BY collected_at ASC`,
      [subjectId],
    );
    return result.rows.map(mapRowToIsolatedRecord);
  }

  async readAll(credential: PartitionCredential): Promise<IsolatedRecord[]> {
    const result = await this.run<DemographicsRow>(
      credential,
      'read',
      `SELECT ${COLUMNS} FROM hmda.demographics ORDER BY collected_at ASC`,
      [],
    );
    return result.rows.map(mapRowToIsolatedRecord);
  }

  async close(): Promise<void> {
    await this.ownedPool?.end();
  }

  private async run<T extends pg.QueryResultRow>(
    credential: PartitionCredential,
    operation: PartitionOperation,
    text: string,
    params: unknown[],
  ): Promise<pg.QueryResult<T>> {
    if (!isIsolatedCredential(credential)) {
      throw await this.violation(credential, operation);
    }
    if (!credential.connection) {
      throw new Error('Isolated credential carries no connection');
    }
    try {
      return await credential.connection.query<T>(text, params);
    } catch (err) {
      if (isPermissionDenied(err)) throw await this.violation(credential, operation, err);
      throw err;
    }
  }

  private violation(
    credential: PartitionCredential,
    operation: PartitionOperation,
    cause?: unknown,
  ): Promise<IsolationViolation> {
    const violation = new IsolationViolation(
      `permission denied for schema hmda (${operation})`,
      credential.holder,
      cause,
    );
    return reportViolation(this.handlers, violation, operation);
  }
}
