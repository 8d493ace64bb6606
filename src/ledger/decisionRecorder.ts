/**
 * Records business decisions on the ledger. A decision whose human outcome
 * differs from the recommender's is written as an `override`.
 *
 * @module ledger/decisionRecorder
 */

import { v4 as uuidv4 } from 'uuid';
import type { DecisionRecord, Principal } from '../types/index.js';
import type { AuditLedger, AppendContext } from './auditLedger.js';
import { canonicalize } from './hashChain.js';
import type { LedgerEvent } from './types.js';

export interface RecordedDecision {
  decisionId: string;
  overridden: boolean;
  event: LedgerEvent;
}

function outcomeOf(output: Record<string, unknown>): unknown {
  return Object.prototype.hasOwnProperty.call(output, 'outcome') ? output['outcome'] : output;
}

export function isOverride(record: DecisionRecord): boolean {
  if (record.humanOutput === null) return false;
  return canonicalize(outcomeOf(record.humanOutput)) !== canonicalize(outcomeOf(record.recommenderOutput));
}

export class DecisionRecorder {
  constructor(private readonly ledger: AuditLedger) {}

  async record(
    record: DecisionRecord,
    principal: Principal,
    context: AppendContext & { requestId?: string } = {},
  ): Promise<RecordedDecision> {
    const decisionId = record.decisionId ?? uuidv4();
    const overridden = isOverride(record);
    const event = await this.ledger.append(
      {
        eventType: overridden ? 'override' : 'decision',
        principalId: principal.id,
        roleAtTime: principal.role,
        subjectId: record.subjectId,
        payload: {
          decisionId,
          outcome: record.outcome,
          rationale: record.rationale,
          recommenderOutput: record.recommenderOutput,
          humanOutput: record.humanOutput,
          linkedSequenceNos: record.linkedSequenceNos ?? [],
          requestId: context.requestId,
        },
      },
      { deadline: context.deadline },
    );
    return { decisionId, overridden, event };
  }
}
