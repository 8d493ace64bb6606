/**
 * Storage contract for the audit ledger.
 *
 * Stores hold append + read rights only. `update` and `delete` exist so the
 * ledger can route a mutation attempt to storage and record the refusal;
 * a conforming store always rejects them with {@link LedgerPermissionError}.
 *
 * @module ledger/ledgerStore
 */

import type { ChainTail, LedgerEvent, LedgerEventType } from './types.js';

export interface AppendOptions {
  deadline?: number;
}

export interface TimeCriteria {
  from?: Date;
  to?: Date;
  eventTypes?: readonly LedgerEventType[];
}

export interface LedgerStore {
  /**
   * Seal and write the next event. `build` runs while the partition tail is
   * held, so the event it returns must extend exactly that tail.
   */
  append(partition: string, build: (tail: ChainTail) => LedgerEvent, options?: AppendOptions): Promise<LedgerEvent>;
  tail(partition: string): Promise<ChainTail>;
  /** Ascending, `from` and `to` inclusive. */
  readRange(partition: string, from: number, to: number, limit: number): Promise<LedgerEvent[]>;
  /** Ascending events for the subject with `sequenceNo > after`. */
  readBySubject(partition: string, subjectId: string, after: number, limit: number): Promise<LedgerEvent[]>;
  /** Ascending events matching the criteria with `sequenceNo > after`. */
  readByTime(partition: string, criteria: TimeCriteria, after: number, limit: number): Promise<LedgerEvent[]>;
  findDecision(partition: string, decisionId: string): Promise<LedgerEvent | null>;
  update(partition: string, sequenceNo: number, payload: Record<string, unknown>): Promise<void>;
  delete(partition: string, sequenceNo: number): Promise<void>;
}

export class LedgerPermissionError extends Error {
  public readonly code = 'LEDGER_PERMISSION_DENIED';

  constructor(
    public readonly operation: 'UPDATE' | 'DELETE',
    public readonly sequenceNo: number,
    cause?: unknown,
  ) {
    super(`Ledger storage refused ${operation} of #${sequenceNo}`, { cause });
    this.name = 'LedgerPermissionError';
  }
}

export function matchesTimeCriteria(event: LedgerEvent, criteria: TimeCriteria): boolean {
  const at = event.createdAt.getTime();
  if (criteria.from && at < criteria.from.getTime()) return false;
  if (criteria.to && at > criteria.to.getTime()) return false;
  if (criteria.eventTypes && criteria.eventTypes.length > 0 && !criteria.eventTypes.includes(event.eventType)) {
    return false;
  }
  return true;
}
