/**
 * Isolated Partition
 *
 * Storage for demographic records. Every operation takes a
 * {@link PartitionCredential}; a general-path credential is refused with an
 * {@link IsolationViolation} after the registered violation handlers have run.
 *
 * The in-memory partition enforces the same grants the SQL migration sets
 * up for the `compliance_app` role and is used by tests and local runs.
 *
 * @module isolation/isolatedPartition
 */

import { v4 as uuidv4 } from 'uuid';
import { IsolationViolation } from '../utils/errors.js';
import { isIsolatedCredential, type PartitionCredential } from './partitionCredential.js';
import type { IsolatedRecord, IsolatedRecordInput } from './types.js';

export type PartitionOperation = 'insert' | 'read';

export type ViolationHandler = (violation: IsolationViolation, operation: PartitionOperation) => Promise<void>;

export interface IsolatedPartition {
  readonly kind: 'memory' | 'postgres';
  insert(credential: PartitionCredential, input: IsolatedRecordInput): Promise<IsolatedRecord>;
  readBySubject(credential: PartitionCredential, subjectId: string): Promise<IsolatedRecord[]>;
  readAll(credential: PartitionCredential): Promise<IsolatedRecord[]>;
  onViolation(handler: ViolationHandler): void;
  close(): Promise<void>;
}

/** Runs every handler, then returns the violation for the caller to throw. */
export async function reportViolation(
  handlers: readonly ViolationHandler[],
  violation: IsolationViolation,
  operation: PartitionOperation,
): Promise<IsolationViolation> {
  for (const handler of handlers) {
    await handler(violation, operation);
  }
  return violation;
}

export class InMemoryIsolatedPartition implements IsolatedPartition {
  readonly kind = 'memory';
  private readonly records: IsolatedRecord[] = [];
  private readonly handlers: ViolationHandler[] = [];

  constructor(private readonly clock: () => number = Date.now) {}

  onViolation(handler: ViolationHandler): void {
    this.handlers.push(handler);
  }

  async insert(credential: PartitionCredential, input: IsolatedRecordInput): Promise<IsolatedRecord> {
    await this.authorize(credential, 'insert');
    const record: IsolatedRecord = { ...input, id: input.id ?? uuidv4(), collectedAt: new Date(this.clock()) };
    this.records.push(record);
    return { ...record, collectedAt: new Date(record.collectedAt) };
  }

  async readBySubject(credential: PartitionCredential, subjectId: string): Promise<IsolatedRecord[]> {
    await this.authorize(credential, 'read');
    return this.records.filter((r) => r.subjectId === subjectId).map(copy);
  }

  async readAll(credential: PartitionCredential): Promise<IsolatedRecord[]> {
    await this.authorize(credential, 'read');
    return this.records.map(copy);
  }

  async close(): Promise<void> {
    this.records.length = 0;
  }

  private async authorize(credential: PartitionCredential, operation: PartitionOperation): Promise<void> {
    if (isIsolatedCredential(credential)) return;
    const violation = new IsolationViolation(
      `permission denied for schema hmda (${operation})`,
      credential.holder,
    );
    throw await reportViolation(this.handlers, violation, operation);
  }
}

function copy(record: IsolatedRecord): IsolatedRecord {
  return { ...record, collectedAt: new Date(record.collectedAt) };
}
