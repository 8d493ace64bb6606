/**
 * Audit ledger types.
 *
 * @module ledger/types
 */

import type { Role } from '../types/index.js';
import type { PolicySnapshot } from '../policy/types.js';

export const LEDGER_EVENT_TYPES = [
  'query',
  'tool_call',
  'data_access',
  'decision',
  'override',
  'security_event',
  'system',
] as const;

export type LedgerEventType = (typeof LEDGER_EVENT_TYPES)[number];

export function isLedgerEventType(value: unknown): value is LedgerEventType {
  return typeof value === 'string' && LEDGER_EVENT_TYPES.some((entry) => entry === value);
}

export interface LedgerEventInput {
  eventType: LedgerEventType;
  principalId: string | null;
  roleAtTime: Role | null;
  subjectId: string | null;
  payload: Record<string, unknown>;
}

export interface LedgerEvent extends LedgerEventInput {
  partition: string;
  /** 1-based, gap-free per partition. */
  sequenceNo: number;
  prevHash: string;
  thisHash: string;
  createdAt: Date;
}

/** Hashed part of an event: everything except the two hashes. */
export type LedgerEventBody = Omit<LedgerEvent, 'prevHash' | 'thisHash' | 'createdAt'> & {
  createdAt: Date | string;
};

export interface ChainTail {
  sequenceNo: number;
  thisHash: string;
}

export interface ChainVerification {
  valid: boolean;
  /** Sequence number of the first event that fails verification. */
  firstBrokenAt: number | null;
  eventsChecked: number;
  details: string;
}

// ─── Queries ─────────────────────────────────────────────────────────────────

export type JsonScalar = string | number | boolean | null;

export type PayloadCondition =
  | { path: string; op: 'eq' | 'neq'; value: JsonScalar }
  | { path: string; op: 'in'; values: JsonScalar[] }
  | { path: string; op: 'exists' };

export type PayloadPredicate =
  | PayloadCondition
  | { all: PayloadPredicate[] }
  | { any: PayloadPredicate[] };

export type LedgerQuery =
  | { kind: 'subject'; subjectId: string }
  | { kind: 'decision_trace'; decisionId: string }
  | {
      kind: 'pattern';
      from?: Date;
      to?: Date;
      eventTypes?: LedgerEventType[];
      predicate?: PayloadPredicate;
      limit?: number;
    };

/** Whoever reads the ledger; masks come from their own policy snapshot. */
export interface LedgerViewer {
  principalId: string;
  role: Role;
  snapshot: PolicySnapshot;
}

export interface LedgerActor {
  principalId: string | null;
  role: Role | null;
  requestId?: string;
}

// ─── Export ──────────────────────────────────────────────────────────────────

export type ExportFormat = 'csv' | 'jsonl';

export interface ExportFilter {
  subjectId?: string;
  from?: Date;
  to?: Date;
  eventTypes?: LedgerEventType[];
  fromSequence?: number;
  toSequence?: number;
}
