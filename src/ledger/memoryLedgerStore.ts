/**
 * In-process ledger store. Appends are serialized per partition through a
 * {@link SerialQueue}; rows are cloned on the way in and out so callers
 * cannot reach stored state except through {@link InMemoryLedgerStore.rows}.
 *
 * @module ledger/memoryLedgerStore
 */

import { assertBeforeDeadline } from '../utils/deadline.js';
import { SerialQueue } from '../utils/serialQueue.js';
import { GENESIS_TAIL } from './hashChain.js';
import {
  LedgerPermissionError,
  matchesTimeCriteria,
  type AppendOptions,
  type LedgerStore,
  type TimeCriteria,
} from './ledgerStore.js';
import type { ChainTail, LedgerEvent } from './types.js';

function clone(event: LedgerEvent): LedgerEvent {
  return structuredClone(event);
}

export class InMemoryLedgerStore implements LedgerStore {
  private readonly queues = new Map<string, SerialQueue>();

  /**
   * @param rows - backing array, exposed so tests can tamper with stored
   *   events out of band
   */
  constructor(
    public readonly rows: LedgerEvent[] = [],
    private readonly clock: () => number = Date.now,
  ) {}

  append(
    partition: string,
    build: (tail: ChainTail) => LedgerEvent,
    options: AppendOptions = {},
  ): Promise<LedgerEvent> {
    return this.queueFor(partition).run(async () => {
      assertBeforeDeadline(options.deadline, 'ledger append', this.clock());
      const tail = this.currentTail(partition);
      const event = build(tail);
      if (event.partition !== partition || event.sequenceNo !== tail.sequenceNo + 1 || event.prevHash !== tail.thisHash) {
        throw new Error(`Event #${event.sequenceNo} does not extend the ${partition} tail`);
      }
      assertBeforeDeadline(options.deadline, 'ledger append', this.clock());
      this.rows.push(clone(event));
      return clone(event);
    });
  }

  async tail(partition: string): Promise<ChainTail> {
    return this.currentTail(partition);
  }

  async readRange(partition: string, from: number, to: number, limit: number): Promise<LedgerEvent[]> {
    return this.select(
      (e) => e.partition === partition && e.sequenceNo >= from && e.sequenceNo <= to,
      limit,
    );
  }

  async readBySubject(partition: string, subjectId: string, after: number, limit: number): Promise<LedgerEvent[]> {
    return this.select(
      (e) => e.partition === partition && e.subjectId === subjectId && e.sequenceNo > after,
      limit,
    );
  }

  async readByTime(partition: string, criteria: TimeCriteria, after: number, limit: number): Promise<LedgerEvent[]> {
    return this.select(
      (e) => e.partition === partition && e.sequenceNo > after && matchesTimeCriteria(e, criteria),
      limit,
    );
  }

  async findDecision(partition: string, decisionId: string): Promise<LedgerEvent | null> {
    const found = this.rows.find(
      (e) =>
        e.partition === partition &&
        (e.eventType === 'decision' || e.eventType === 'override') &&
        e.payload['decisionId'] === decisionId,
    );
    return found ? clone(found) : null;
  }

  async update(_partition: string, sequenceNo: number, _payload: Record<string, unknown>): Promise<void> {
    throw new LedgerPermissionError('UPDATE', sequenceNo);
  }

  async delete(_partition: string, sequenceNo: number): Promise<void> {
    throw new LedgerPermissionError('DELETE', sequenceNo);
  }

  private queueFor(partition: string): SerialQueue {
    let queue = this.queues.get(partition);
    if (!queue) {
      queue = new SerialQueue();
      this.queues.set(partition, queue);
    }
    return queue;
  }

  private currentTail(partition: string): ChainTail {
    for (let i = this.rows.length - 1; i >= 0; i--) {
      const row = this.rows[i];
      if (row && row.partition === partition) {
        return { sequenceNo: row.sequenceNo, thisHash: row.thisHash };
      }
    }
    return { ...GENESIS_TAIL };
  }

  private select(predicate: (event: LedgerEvent) => boolean, limit: number): LedgerEvent[] {
    return this.rows
      .filter(predicate)
      .sort((a, b) => a.sequenceNo - b.sequenceNo)
      .slice(0, limit)
      .map(clone);
  }
}
