/**
 * Audit Ledger
 *
 * Append-only, hash-chained record of every access decision, isolated-data
 * access and business decision. Appends are serialized per partition by the
 * store; storage faults are retried with bounded backoff and then surface as
 * {@link LedgerUnavailable} so the triggering operation fails instead of
 * running unaudited.
 *
 * Reads re-apply the viewer's field masks on the way out. Mutation attempts
 * are sent to storage, refused there, and recorded as `security_event`s.
 *
 * @module ledger/auditLedger
 */

import { maskRecord, type FieldMask } from '../access/fieldMask.js';
import type { AlertSink } from '../alerting/operatorAlerts.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { rolePolicyFor } from '../policy/policySnapshot.js';
import { LedgerMutationDenied, LedgerUnavailable, OperationTimeout, toError } from '../utils/errors.js';
import { sleep as defaultSleep, withRetry } from '../utils/retry.js';
import { ChainVerifier, GENESIS_HASH, computeEventHash, storableText, toJsonRecord } from './hashChain.js';
import { formatCsvHeader, formatCsvRow, formatJsonLine } from './ledgerExport.js';
import { LedgerPermissionError, matchesTimeCriteria, type LedgerStore } from './ledgerStore.js';
import type {
  ChainTail,
  ChainVerification,
  ExportFilter,
  ExportFormat,
  LedgerActor,
  LedgerEvent,
  LedgerEventInput,
  LedgerQuery,
  LedgerViewer,
  PayloadPredicate,
} from './types.js';

export interface AuditLedgerOptions {
  store: LedgerStore;
  partition?: string;
  logger?: Logger;
  alerts?: AlertSink;
  /** Storage retries after the first attempt. */
  retries?: number;
  retryBaseDelayMs?: number;
  pageSize?: number;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface AppendContext {
  deadline?: number;
}

// ─── Payload predicates ──────────────────────────────────────────────────────

function valueAtPath(payload: Record<string, unknown>, path: string): { found: boolean; value: unknown } {
  let current: unknown = payload;
  for (const segment of path.split('.')) {
    if (current === null || typeof current !== 'object' || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return { found: false, value: undefined };
    }
    current = Reflect.get(current, segment);
  }
  return { found: true, value: current };
}

export function matchesPredicate(payload: Record<string, unknown>, predicate: PayloadPredicate): boolean {
  if ('all' in predicate) return predicate.all.every((p) => matchesPredicate(payload, p));
  if ('any' in predicate) return predicate.any.some((p) => matchesPredicate(payload, p));

  const { found, value } = valueAtPath(payload, predicate.path);
  switch (predicate.op) {
    case 'exists':
      return found;
    case 'eq':
      return found && value === predicate.value;
    case 'neq':
      return !found || value !== predicate.value;
    case 'in':
      return found && predicate.values.some((candidate) => candidate === value);
  }
}

function linkedSequenceNos(event: LedgerEvent): number[] {
  const linked = event.payload['linkedSequenceNos'];
  if (!Array.isArray(linked)) return [];
  return linked.filter((n): n is number => Number.isInteger(n) && n > 0 && n < event.sequenceNo);
}

// ─── Ledger ──────────────────────────────────────────────────────────────────

export class AuditLedger {
  readonly partition: string;

  private readonly store: LedgerStore;
  private readonly logger: Logger;
  private readonly alerts: AlertSink | undefined;
  private readonly retries: number;
  private readonly retryBaseDelayMs: number;
  private readonly pageSize: number;
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: AuditLedgerOptions) {
    this.store = options.store;
    this.partition = options.partition ?? 'main';
    this.logger = (options.logger ?? silentLogger).child({ operation: 'ledger' });
    this.alerts = options.alerts;
    this.retries = options.retries ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 50;
    this.pageSize = options.pageSize ?? 500;
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  // ── Append ─────────────────────────────────────────────────────────────

  /**
   * Append one event. Content is never a reason to fail: the payload is
   * normalised to plain JSON before sealing.
   *
   * @throws OperationTimeout when the deadline passes before the row is written
   * @throws LedgerUnavailable when storage keeps failing
   */
  async append(input: LedgerEventInput, context: AppendContext = {}): Promise<LedgerEvent> {
    const sealed: LedgerEventInput = {
      ...input,
      principalId: input.principalId === null ? null : storableText(input.principalId),
      subjectId: input.subjectId === null ? null : storableText(input.subjectId),
      payload: toJsonRecord(input.payload),
    };
    try {
      return await this.withStorage('append', () =>
        this.store.append(this.partition, (tail) => this.seal(tail, sealed), { deadline: context.deadline }),
      );
    } catch (error) {
      if (error instanceof OperationTimeout) throw error;
      this.alerts?.raise({
        kind: 'ledger_unavailable',
        severity: 'critical',
        principalId: input.principalId,
        summary: 'Ledger append failed; the triggering operation was refused',
        details: { eventType: input.eventType, partition: this.partition },
      });
      throw error;
    }
  }

  private seal(tail: ChainTail, input: LedgerEventInput): LedgerEvent {
    const body = {
      partition: this.partition,
      sequenceNo: tail.sequenceNo + 1,
      eventType: input.eventType,
      principalId: input.principalId,
      roleAtTime: input.roleAtTime,
      subjectId: input.subjectId,
      payload: input.payload,
      createdAt: new Date(this.clock()),
    };
    return { ...body, prevHash: tail.thisHash, thisHash: computeEventHash(tail.thisHash, body) };
  }

  // ── Verification ───────────────────────────────────────────────────────

  /** Verify `[from, to]` (defaults: the whole partition). */
  async verifyChain(range: { from?: number; to?: number } = {}): Promise<ChainVerification> {
    const from = Math.max(1, range.from ?? 1);
    const to = range.to ?? Number.MAX_SAFE_INTEGER;

    let start: ChainTail = { sequenceNo: 0, thisHash: GENESIS_HASH };
    if (from > 1) {
      const [anchor] = await this.withStorage('read', () =>
        this.store.readRange(this.partition, from - 1, from - 1, 1),
      );
      if (!anchor) {
        return {
          valid: false,
          firstBrokenAt: from - 1,
          eventsChecked: 0,
          details: `Anchor event #${from - 1} is missing`,
        };
      }
      start = { sequenceNo: anchor.sequenceNo, thisHash: anchor.thisHash };
    }

    const verifier = new ChainVerifier(start);
    for await (const event of this.scanRange(from, to)) {
      if (!verifier.push(event)) break;
    }
    const result = verifier.result();
    if (!result.valid) {
      this.logger.error('Ledger chain verification failed', undefined, {
        firstBrokenAt: result.firstBrokenAt,
        details: result.details,
      });
    }
    return result;
  }

  // ── Queries ────────────────────────────────────────────────────────────

  /** Stream matching events with the viewer's masks applied. */
  async *query(pattern: LedgerQuery, viewer: LedgerViewer): AsyncGenerator<LedgerEvent> {
    const mask = this.maskFor(viewer);
    const view = (event: LedgerEvent): LedgerEvent =>
      mask ? { ...event, payload: maskRecord(event.payload, mask) } : event;
    yield* this.select(pattern, view);
  }

  /** Predicates see the masked payload, so a masked value cannot be tested by guessing. */
  private async *select(pattern: LedgerQuery, view: (event: LedgerEvent) => LedgerEvent): AsyncGenerator<LedgerEvent> {
    switch (pattern.kind) {
      case 'subject':
        for await (const event of this.scanSubject(pattern.subjectId, Number.MAX_SAFE_INTEGER)) yield view(event);
        return;
      case 'decision_trace':
        for await (const event of this.trace(pattern.decisionId)) yield view(event);
        return;
      case 'pattern': {
        const limit = pattern.limit ?? Number.POSITIVE_INFINITY;
        let emitted = 0;
        let after = 0;
        while (emitted < limit) {
          const page = await this.withStorage('read', () =>
            this.store.readByTime(this.partition, pattern, after, this.pageSize),
          );
          for (const stored of page) {
            const event = view(stored);
            if (pattern.predicate && !matchesPredicate(event.payload, pattern.predicate)) continue;
            yield event;
            if (++emitted >= limit) return;
          }
          const last = page[page.length - 1];
          if (!last || page.length < this.pageSize) return;
          after = last.sequenceNo;
        }
        return;
      }
    }
  }

  /**
   * The decision event plus every earlier event that shares its subject or
   * is named in its `linkedSequenceNos`, in sequence order.
   */
  private async *trace(decisionId: string): AsyncGenerator<LedgerEvent> {
    const decision = await this.withStorage('read', () => this.store.findDecision(this.partition, decisionId));
    if (!decision) return;

    const events = new Map<number, LedgerEvent>([[decision.sequenceNo, decision]]);
    if (decision.subjectId !== null) {
      for await (const event of this.scanSubject(decision.subjectId, decision.sequenceNo)) {
        events.set(event.sequenceNo, event);
      }
    }
    for (const sequenceNo of linkedSequenceNos(decision)) {
      if (events.has(sequenceNo)) continue;
      const [linked] = await this.withStorage('read', () =>
        this.store.readRange(this.partition, sequenceNo, sequenceNo, 1),
      );
      if (linked) events.set(linked.sequenceNo, linked);
    }
    yield* [...events.values()].sort((a, b) => a.sequenceNo - b.sequenceNo);
  }

  private async *scanSubject(subjectId: string, upTo: number): AsyncGenerator<LedgerEvent> {
    let after = 0;
    for (;;) {
      const page = await this.withStorage('read', () =>
        this.store.readBySubject(this.partition, subjectId, after, this.pageSize),
      );
      for (const event of page) {
        if (event.sequenceNo > upTo) return;
        yield event;
      }
      const last = page[page.length - 1];
      if (!last || page.length < this.pageSize) return;
      after = last.sequenceNo;
    }
  }

  private async *scanRange(from: number, to: number): AsyncGenerator<LedgerEvent> {
    let next = from;
    while (next <= to) {
      const page = await this.withStorage('read', () =>
        this.store.readRange(this.partition, next, to, this.pageSize),
      );
      yield* page;
      const last = page[page.length - 1];
      if (!last || page.length < this.pageSize) return;
      next = last.sequenceNo + 1;
    }
  }

  // ── Mutation attempts ──────────────────────────────────────────────────

  async update(sequenceNo: number, payload: Record<string, unknown>, actor: LedgerActor): Promise<never> {
    return this.attemptMutation('UPDATE', sequenceNo, actor, () =>
      this.store.update(this.partition, sequenceNo, payload),
    );
  }

  async delete(sequenceNo: number, actor: LedgerActor): Promise<never> {
    return this.attemptMutation('DELETE', sequenceNo, actor, () => this.store.delete(this.partition, sequenceNo));
  }

  private async attemptMutation(
    operation: 'UPDATE' | 'DELETE',
    targetSequenceNo: number,
    actor: LedgerActor,
    attempt: () => Promise<void>,
  ): Promise<never> {
    let refused = false;
    try {
      await attempt();
    } catch (error) {
      if (!(error instanceof LedgerPermissionError)) {
        this.logger.error('Ledger mutation attempt failed in storage', toError(error), { operation, targetSequenceNo });
        throw new LedgerUnavailable(`Ledger storage failed during ${operation}`, error);
      }
      refused = true;
    }

    const event = await this.append({
      eventType: 'security_event',
      principalId: actor.principalId,
      roleAtTime: actor.role,
      subjectId: null,
      payload: {
        kind: 'ledger_mutation_attempt',
        attemptedOperation: operation,
        targetSequenceNo,
        refusedByStorage: refused,
        severity: refused ? 'elevated' : 'critical',
        requestId: actor.requestId,
      },
    });
    this.alerts?.raise({
      kind: 'ledger_mutation_attempt',
      severity: refused ? 'high' : 'critical',
      principalId: actor.principalId,
      summary: `${operation} attempted on ledger event #${targetSequenceNo}`,
      details: { targetSequenceNo, securityEventSequenceNo: event.sequenceNo, refusedByStorage: refused },
    });
    this.logger.warn('Ledger mutation attempt recorded', {
      operation,
      targetSequenceNo,
      securityEventSequenceNo: event.sequenceNo,
    });

    if (!refused) {
      throw new Error(`Ledger storage accepted ${operation} of #${targetSequenceNo}; its grants are misconfigured`);
    }
    throw new LedgerMutationDenied(targetSequenceNo, operation, event.sequenceNo);
  }

  // ── Export ─────────────────────────────────────────────────────────────

  /**
   * Record the export as `data_access`, then return the row stream. Nothing
   * is produced if the access event cannot be written.
   */
  async export(
    filter: ExportFilter,
    format: ExportFormat,
    viewer: LedgerViewer,
    context: { requestId?: string } = {},
  ): Promise<AsyncIterable<string>> {
    const mask = this.maskFor(viewer);
    await this.append({
      eventType: 'data_access',
      principalId: viewer.principalId,
      roleAtTime: viewer.role,
      subjectId: filter.subjectId ?? null,
      payload: {
        action: 'ledger_export',
        format,
        filter: {
          subjectId: filter.subjectId,
          from: filter.from,
          to: filter.to,
          eventTypes: filter.eventTypes,
          fromSequence: filter.fromSequence,
          toSequence: filter.toSequence,
        },
        masked: mask !== null,
        requestId: context.requestId,
      },
    });
    return this.exportRows(filter, format, mask);
  }

  private async *exportRows(
    filter: ExportFilter,
    format: ExportFormat,
    mask: FieldMask | null,
  ): AsyncGenerator<string> {
    if (format === 'csv') yield formatCsvHeader();
    const source =
      filter.subjectId !== undefined
        ? this.scanSubject(filter.subjectId, filter.toSequence ?? Number.MAX_SAFE_INTEGER)
        : this.scanRange(Math.max(1, filter.fromSequence ?? 1), filter.toSequence ?? Number.MAX_SAFE_INTEGER);
    for await (const event of source) {
      if (filter.fromSequence !== undefined && event.sequenceNo < filter.fromSequence) continue;
      if (!matchesTimeCriteria(event, filter)) continue;
      const out = mask ? { ...event, payload: maskRecord(event.payload, mask) } : event;
      yield format === 'csv' ? formatCsvRow(out, mask !== null) : formatJsonLine(out, mask !== null);
    }
  }

  // ── Internals ──────────────────────────────────────────────────────────

  private maskFor(viewer: LedgerViewer): FieldMask | null {
    const rules = rolePolicyFor(viewer.snapshot, viewer.role)?.masks ?? [];
    return rules.length > 0 ? { role: viewer.role, rules } : null;
  }

  private async withStorage<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, {
        maxRetries: this.retries,
        baseDelayMs: this.retryBaseDelayMs,
        sleep: this.sleep,
        isRetryable: (error) => !(error instanceof OperationTimeout),
        onRetry: (error, attempt, delayMs) =>
          this.logger.warn('Ledger storage call failed, retrying', {
            operation,
            attempt,
            delayMs,
            error: toError(error).message,
          }),
      });
    } catch (error) {
      if (error instanceof OperationTimeout) throw error;
      this.logger.error('Ledger storage unavailable', toError(error), { operation });
      throw new LedgerUnavailable(`Ledger ${operation} failed after ${this.retries + 1} attempts`, error);
    }
  }
}
