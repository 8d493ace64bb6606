/**
 * PostgreSQL ledger store over the `ledger_events` table.
 *
 * Appends run in one transaction holding a per-partition advisory lock, so
 * concurrent writers from any number of processes still produce a gap-free
 * sequence. The connecting role is granted INSERT and SELECT only; UPDATE
 * and DELETE fail with SQLSTATE 42501 and surface as
 * {@link LedgerPermissionError}.
 *
 * @module ledger/pgLedgerStore
 */

import type pg from 'pg';
import { OperationTimeout } from '../utils/errors.js';
import { assertBeforeDeadline, remainingMs } from '../utils/deadline.js';
import { isPermissionDenied, pgErrorCode } from '../utils/db.js';
import { isPlainRecord } from '../logging/piiScrubber.js';
import { isRole } from '../types/index.js';
import { GENESIS_TAIL } from './hashChain.js';
import { LedgerPermissionError, type AppendOptions, type LedgerStore, type TimeCriteria } from './ledgerStore.js';
import { isLedgerEventType, type ChainTail, type LedgerEvent } from './types.js';

/** First key of the two-key advisory lock; the second is the partition hash. */
export const LEDGER_LOCK_NAMESPACE = 7311;

const PG_QUERY_CANCELED = '57014';

const COLUMNS =
  'partition, sequence_no, prev_hash, this_hash, event_type, principal_id, role_at_time, subject_id, payload, created_at';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

interface LedgerEventRow {
  partition: string;
  sequence_no: string;
  prev_hash: string;
  this_hash: string;
  event_type: string;
  principal_id: string | null;
  role_at_time: string | null;
  subject_id: string | null;
  payload: unknown;
  created_at: Date;
}

/**
 * Values that do not fit the domain types are nulled or emptied rather than
 * rejected; the altered row then fails hash verification.
 */
export function mapRowToEvent(row: LedgerEventRow): LedgerEvent {
  if (!isLedgerEventType(row.event_type)) {
    throw new Error(`Unknown ledger event type "${row.event_type}" at #${row.sequence_no}`);
  }
  return {
    partition: row.partition,
    sequenceNo: Number(row.sequence_no),
    prevHash: row.prev_hash,
    thisHash: row.this_hash,
    eventType: row.event_type,
    principalId: row.principal_id,
    roleAtTime: isRole(row.role_at_time) ? row.role_at_time : null,
    subjectId: row.subject_id,
    payload: isPlainRecord(row.payload) ? row.payload : {},
    createdAt: row.created_at,
  };
}

// ─── Store ───────────────────────────────────────────────────────────────────

export class PgLedgerStore implements LedgerStore {
  constructor(private readonly pool: pg.Pool) {}

  async append(
    partition: string,
    build: (tail: ChainTail) => LedgerEvent,
    options: AppendOptions = {},
  ): Promise<LedgerEvent> {
    assertBeforeDeadline(options.deadline, 'ledger append');
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const budget = remainingMs(options.deadline);
      if (budget !== undefined) {
        await client.query(`SET LOCAL statement_timeout = ${Math.max(1, Math.ceil(budget))}`);
      }
      await client.query('SELECT pg_advisory_xact_lock($1, hashtext($2))', [LEDGER_LOCK_NAMESPACE, partition]);

      const tailResult = await client.query<{ sequence_no: string; this_hash: string }>(
        'SELECT sequence_no, this_hash FROM ledger_events WHERE partition = $1 ORDER BY sequence_no DESC LIMIT 1',
        [partition],
      );
      const last = tailResult.rows[0];
      const tail: ChainTail = last ? { sequenceNo: Number(last.sequence_no), thisHash: last.this_hash } : { ...GENESIS_TAIL };

      const event = build(tail);
      assertBeforeDeadline(options.deadline, 'ledger append');
      await client.query(
        `INSERT INTO ledger_events (${COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
        [
          event.partition,
          event.sequenceNo,
          event.prevHash,
          event.thisHash,
          event.eventType,
          event.principalId,
          event.roleAtTime,
          event.subjectId,
          JSON.stringify(event.payload),
          event.createdAt,
        ],
      );
      await client.query('COMMIT');
      return event;
    } catch (error) {
      await client.query('ROLLBACK');
      if (pgErrorCode(error) === PG_QUERY_CANCELED) {
        throw new OperationTimeout('ledger append');
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async tail(partition: string): Promise<ChainTail> {
    const result = await this.pool.query<{ sequence_no: string; this_hash: string }>(
      'SELECT sequence_no, this_hash FROM ledger_events WHERE partition = $1 ORDER BY sequence_no DESC LIMIT 1',
      [partition],
    );
    const last = result.rows[0];
    return last ? { sequenceNo: Number(last.sequence_no), thisHash: last.this_hash } : { ...GENESIS_TAIL };
  }

  async readRange(partition: string, from: number, to: number, limit: number): Promise<LedgerEvent[]> {
    const result = await this.pool.query<LedgerEventRow>(
      `SELECT ${COLUMNS} FROM ledger_events
        WHERE partition = $1 AND sequence_no BETWEEN $2 AND $3
        ORDER BY sequence_no ASC LIMIT $4`,
      [partition, from, to, limit],
    );
    return result.rows.map(mapRowToEvent);
  }

  async readBySubject(partition: string, subjectId: string, after: number, limit: number): Promise<LedgerEvent[]> {
    const result = await this.pool.query<LedgerEventRow>(
      `SELECT ${COLUMNS} FROM ledger_events
        WHERE partition = $1 AND subject_id = $2 AND sequence_no > $3
        ORDER BY sequence_no ASC LIMIT $4`,
      [partition, subjectId, after, limit],
    );
    return result.rows.map(mapRowToEvent);
  }

  async readByTime(partition: string, criteria: TimeCriteria, after: number, limit: number): Promise<LedgerEvent[]> {
    const conditions = ['partition = $1', 'sequence_no > $2'];
    const params: unknown[] = [partition, after];
    if (criteria.from) {
      params.push(criteria.from);
      conditions.push(`created_at >= $${params.length}`);
    }
    if (criteria.to) {
      params.push(criteria.to);
      conditions.push(`created_at <= $${params.length}`);
    }
    if (criteria.eventTypes && criteria.eventTypes.length > 0) {
      params.push([...criteria.eventTypes]);
      conditions.push(`event_type = ANY($${params.length})`);
    }
    params.push(limit);
    const result = await this.pool.query<LedgerEventRow>(
      `SELECT ${COLUMNS} FROM ledger_events
        WHERE ${conditions.join(' AND ')}
        ORDER BY sequence_no ASC LIMIT $${params.length}`,
      params,
    );
    return result.rows.map(mapRowToEvent);
  }

  async findDecision(partition: string, decisionId: string): Promise<LedgerEvent | null> {
    const result = await this.pool.query<LedgerEventRow>(
      `SELECT ${COLUMNS} FROM ledger_events
        WHERE partition = $1 AND event_type IN ('decision', 'override') AND payload ->> 'decisionId' = $2
        ORDER BY sequence_no ASC LIMIT 1`,
      [partition, decisionId],
    );
    const row = result.rows[0];
    return row ? mapRowToEvent(row) : null;
  }

  async update(partition: string, sequenceNo: number, payload: Record<string, unknown>): Promise<void> {
    try {
      await this.pool.query('UPDATE ledger_events SET payload = $3 WHERE partition = $1 AND sequence_no = $2', [
        partition,
        sequenceNo,
        JSON.stringify(payload),
      ]);
    } catch (error) {
      if (isPermissionDenied(error)) throw new LedgerPermissionError('UPDATE', sequenceNo, error);
      throw error;
    }
  }

  async delete(partition: string, sequenceNo: number): Promise<void> {
    try {
      await this.pool.query('DELETE FROM ledger_events WHERE partition = $1 AND sequence_no = $2', [
        partition,
        sequenceNo,
      ]);
    } catch (error) {
      if (isPermissionDenied(error)) throw new LedgerPermissionError('DELETE', sequenceNo, error);
      throw error;
    }
  }
}
