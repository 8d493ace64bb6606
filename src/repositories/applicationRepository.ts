/**
 * Application repository for the general-path `applications` table.
 *
 * Every listing takes the gateway's scope filter and turns it into a WHERE
 * condition; single-record reads are used by lookup resolvers, which check
 * scope themselves. Handles snake_case ↔ camelCase mapping.
 *
 * @module repositories/applicationRepository
 */

import type pg from 'pg';
import { toSqlCondition, type ScopeFilter } from '../access/scopeFilter.js';
import { getPool } from '../utils/db.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export const APPLICATION_STATUSES = ['draft', 'submitted', 'in_review', 'decided', 'withdrawn'] as const;

export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export interface Application {
  id: string;
  borrowerId: string;
  assignedTo: string | null;
  status: ApplicationStatus;
  loanAmount: number;
  decisionOutcome: string | null;
  borrowerName: string;
  ssn: string | null;
  /** ISO date (`YYYY-MM-DD`). */
  dob: string | null;
  accountNumber: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ListOptions {
  limit?: number;
  offset?: number;
}

export interface ApplicationRepository {
  list(scope: ScopeFilter | null, options?: ListOptions): Promise<Application[]>;
  findById(id: string): Promise<Application | null>;
  /** Decision outcome per subject, for aggregate outcome joins. */
  outcomesFor(subjectIds: readonly string[]): Promise<Map<string, string | null>>;
}

/** Columns a scope template may reference, keyed as stored. */
export function toScopeRow(application: Application): Record<string, unknown> {
  return {
    id: application.id,
    borrower_id: application.borrowerId,
    assigned_to: application.assignedTo,
  };
}

// ─── Row Mapping ─────────────────────────────────────────────────────────────

interface ApplicationRow {
  id: string;
  borrower_id: string;
  assigned_to: string | null;
  status: string;
  loan_amount: string;
  decision_outcome: string | null;
  borrower_name: string;
  ssn: string | null;
  dob: Date | string | null;
  account_number: string | null;
  created_at: Date;
  updated_at: Date;
}

function toStatus(value: string): ApplicationStatus {
  const match = APPLICATION_STATUSES.find((status) => status === value);
  if (!match) throw new Error(`Unknown application status "${value}"`);
  return match;
}

function toIsoDate(value: Date | string | null): string | null {
  if (value === null) return null;
  return value instanceof Date ? value.toISOString().slice(0, 10) : value;
}

export function mapRowToApplication(row: ApplicationRow): Application {
  return {
    id: row.id,
    borrowerId: row.borrower_id,
    assignedTo: row.assigned_to,
    status: toStatus(row.status),
    // NUMERIC arrives as a string
    loanAmount: Number(row.loan_amount),
    decisionOutcome: row.decision_outcome,
    borrowerName: row.borrower_name,
    ssn: row.ssn,
    dob: toIsoDate(row.dob),
    accountNumber: row.account_number,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const COLUMNS =
  'id, borrower_id, assigned_to, status, loan_amount, decision_outcome, borrower_name, ssn, dob, account_number, created_at, updated_at';

// ─── Repository ──────────────────────────────────────────────────────────────

export function createPgApplicationRepository(pool: pg.Pool = getPool()): ApplicationRepository {
  return {
    async list(scope, options = {}) {
      const condition = toSqlCondition(scope, 1);
      const params: unknown[] = [...condition.params, options.limit ?? 100, options.offset ?? 0];
      const result = await pool.query<ApplicationRow>(
        `SELECT ${COLUMNS} FROM applications WHERE ${condition.text}
          ORDER BY created_at DESC, id ASC
          LIMIT $${params.length - 1} OFFSET $${params.length}`,
        params,
      );
      return result.rows.map(mapRowToApplication);
    },

    async findById(id) {
      const result = await pool.query<ApplicationRow>(`SELECT ${COLUMNS} FROM applications WHERE id = $1`, [id]);
      const row = result.rows[0];
      return row ? mapRowToApplication(row) : null;
    },

    async outcomesFor(subjectIds) {
      const outcomes = new Map<string, string | null>();
      if (subjectIds.length === 0) return outcomes;
      const result = await pool.query<{ id: string; decision_outcome: string | null }>(
        'SELECT id, decision_outcome FROM applications WHERE id = ANY($1)',
        [[...subjectIds]],
      );
      for (const row of result.rows) outcomes.set(row.id, row.decision_outcome);
      return outcomes;
    },
  };
}
