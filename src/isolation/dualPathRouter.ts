/**
 * Dual-Path Data Router
 *
 * The only component that holds the isolated credential. Demographic data
 * is written through {@link DualPathRouter.writeIsolated} and leaves the
 * isolated path only as the output of {@link DualPathRouter.aggregate}.
 * {@link DualPathRouter.excludeIfDetected} and
 * {@link DualPathRouter.screenOutput} catch demographic content that arrives
 * some other way.
 *
 * Every isolated access is written to the ledger without demographic values.
 * Writes append their `data_access` event before the row is inserted, so no
 * record reaches the partition unaudited.
 *
 * @module isolation/dualPathRouter
 */

import type pg from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { isAllowed, isGatewayIssued } from '../access/gateway.js';
import type { AuthorizationResult } from '../access/types.js';
import type { AlertSink } from '../alerting/operatorAlerts.js';
import type { AuditLedger } from '../ledger/auditLedger.js';
import type { LedgerActor } from '../ledger/types.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { ExtractedContent, Principal } from '../types/index.js';
import { assertBeforeDeadline, withDeadline } from '../utils/deadline.js';
import type { DbConfig } from '../utils/db.js';
import { AuthorizationDenied, IsolationViolation, toError } from '../utils/errors.js';
import { AggregateQuerySchema, computeAggregate, subjectsOf } from './aggregator.js';
import { DemographicDetector } from './demographicDetector.js';
import { InMemoryIsolatedPartition, type IsolatedPartition, type PartitionOperation } from './isolatedPartition.js';
import { screenText } from './outputScanner.js';
import { mintIsolatedCredential, type PartitionCredential } from './partitionCredential.js';
import { createIsolatedPool, PgIsolatedPartition } from './pgIsolatedPartition.js';
import {
  COLLECTION_METHODS,
  type AggregateOutcome,
  type CollectionMethod,
  type ExclusionResult,
  type IsolatedRecordInput,
  type OutcomeSource,
  type ScreenedOutput,
} from './types.js';

export type IsolatedStorage =
  | { kind: 'memory'; clock?: () => number }
  | { kind: 'postgres'; config: DbConfig };

export interface DualPathRouterOptions {
  storage: IsolatedStorage;
  ledger: AuditLedger;
  /** Decision outcomes from the general path, for aggregate joins. */
  outcomes?: OutcomeSource;
  alerts?: AlertSink;
  logger?: Logger;
  detector?: DemographicDetector;
}

export interface RouterCallContext {
  deadline?: number;
  requestId?: string;
}

/** Attributes submitted on a designated collection path. */
export interface DemographicsSubmission {
  subjectId: string;
  race?: string | null;
  ethnicity?: string | null;
  sex?: string | null;
  ageBand?: string | null;
  collectionMethod?: CollectionMethod;
}

export class DualPathRouter {
  private constructor(
    private readonly partition: IsolatedPartition,
    private readonly credential: PartitionCredential,
    private readonly ledger: AuditLedger,
    private readonly detector: DemographicDetector,
    private readonly outcomes: OutcomeSource | undefined,
    private readonly alerts: AlertSink | undefined,
    private readonly logger: Logger,
  ) {
    partition.onViolation((violation, operation) => this.escalate(violation, operation));
  }

  static create(options: DualPathRouterOptions): DualPathRouter {
    let partition: IsolatedPartition;
    let connection: pg.Pool | null = null;
    if (options.storage.kind === 'postgres') {
      connection = createIsolatedPool(options.storage.config);
      partition = new PgIsolatedPartition(connection);
    } else {
      partition = new InMemoryIsolatedPartition(options.storage.clock);
    }
    return DualPathRouter.over(partition, options, connection);
  }

  /** Router over an existing partition. */
  static over(
    partition: IsolatedPartition,
    options: Omit<DualPathRouterOptions, 'storage'>,
    connection: pg.Pool | null = null,
  ): DualPathRouter {
    return new DualPathRouter(
      partition,
      mintIsolatedCredential(connection),
      options.ledger,
      options.detector ?? new DemographicDetector(),
      options.outcomes,
      options.alerts,
      (options.logger ?? silentLogger).child({ operation: 'dual_path_router' }),
    );
  }

  // ── Collection ─────────────────────────────────────────────────────────

  /**
   * Write one record to the isolated partition. The authorization must be a
   * gateway-issued ALLOW for a designated collection operation.
   *
   * @throws IsolationViolation for any other authorization
   */
  async writeIsolated(
    authorization: AuthorizationResult,
    submission: DemographicsSubmission,
    context: RouterCallContext = {},
  ): Promise<string> {
    const operation = authorization.decision.operation.name;
    if (
      !isGatewayIssued(authorization) ||
      !isAllowed(authorization) ||
      !authorization.policy.isolation.collectionOperations.includes(operation)
    ) {
      const violation = new IsolationViolation(
        `Isolated writes require an allowed collection operation, got "${operation}"`,
        authorization.principal?.id ?? 'unknown',
      );
      await this.escalate(violation, 'insert');
      throw violation;
    }

    const input: IsolatedRecordInput = {
      id: uuidv4(),
      subjectId: submission.subjectId,
      race: submission.race ?? null,
      ethnicity: submission.ethnicity ?? null,
      sex: submission.sex ?? null,
      ageBand: submission.ageBand ?? null,
      collectionMethod: submission.collectionMethod ?? 'self_reported',
    };
    if (!COLLECTION_METHODS.includes(input.collectionMethod)) {
      throw new Error(`Unknown collection method "${input.collectionMethod}"`);
    }

    assertBeforeDeadline(context.deadline, 'writeIsolated');
    await this.ledger.append(
      {
        eventType: 'data_access',
        principalId: authorization.principal.id,
        roleAtTime: authorization.principal.role,
        subjectId: input.subjectId,
        payload: {
          action: 'isolated_write',
          recordId: input.id,
          collectionMethod: input.collectionMethod,
          operation,
          requestId: context.requestId ?? authorization.decision.requestId,
        },
      },
      { deadline: context.deadline },
    );
    const record = await this.partition.insert(this.credential, input);
    return record.id;
  }

  // ── Aggregation ────────────────────────────────────────────────────────

  /**
   * Compute statistics inside the isolated path. Never cached.
   *
   * @throws AuthorizationDenied unless `authorization` is a gateway ALLOW for
   *   a designated aggregate operation
   * @throws OperationTimeout when the deadline passes first
   */
  async aggregate(
    authorization: AuthorizationResult,
    querySpec: unknown,
    context: RouterCallContext = {},
  ): Promise<AggregateOutcome> {
    const operation = authorization.decision.operation.name;
    if (
      !isGatewayIssued(authorization) ||
      !isAllowed(authorization) ||
      !authorization.policy.isolation.aggregateOperations.includes(operation)
    ) {
      throw new AuthorizationDenied('Aggregate requires an allowed aggregate operation', operation);
    }
    const query = AggregateQuerySchema.parse(querySpec);
    assertBeforeDeadline(context.deadline, 'aggregate');
    const policy = authorization.policy.isolation;

    const outcome = await withDeadline(
      (async () => {
        const records = await this.partition.readAll(this.credential);
        let outcomes: Map<string, string | null> | undefined;
        if (query.joinOutcomes) {
          if (!this.outcomes) throw new Error('No outcome source configured for aggregate joins');
          outcomes = await this.outcomes(subjectsOf(records));
        }
        return computeAggregate(records, query, policy, outcomes);
      })(),
      context.deadline,
      'aggregate',
    );

    await this.ledger.append(
      {
        eventType: 'data_access',
        principalId: authorization.principal.id,
        roleAtTime: authorization.principal.role,
        subjectId: null,
        payload: {
          action: 'aggregate',
          groupBy: query.groupBy,
          joinOutcomes: query.joinOutcomes ?? false,
          result: outcome.kind,
          cellCount: outcome.kind === 'statistic' ? outcome.values.length : 0,
          requestId: context.requestId ?? authorization.decision.requestId,
        },
      },
      { deadline: context.deadline },
    );
    return outcome;
  }

  // ── Incidental capture ─────────────────────────────────────────────────

  /**
   * Strip demographic fields from extracted content. When the content names
   * a subject, the stripped values go to the isolated partition as
   * `document_extraction`.
   */
  async excludeIfDetected(
    content: ExtractedContent,
    actor: LedgerActor,
    context: RouterCallContext = {},
  ): Promise<ExclusionResult> {
    const scan = this.detector.scan(content.payload);
    if (scan.findings.length === 0) {
      return { cleanedPayload: scan.cleaned, excludedFields: [], isolatedRecordId: null };
    }

    const captured = scan.captured;
    const isolated: IsolatedRecordInput | null =
      content.subjectId && Object.keys(captured).length > 0
        ? {
            id: uuidv4(),
            subjectId: content.subjectId,
            race: captured.race ?? null,
            ethnicity: captured.ethnicity ?? null,
            sex: captured.sex ?? null,
            ageBand: captured.ageBand ?? null,
            collectionMethod: 'document_extraction',
          }
        : null;
    const isolatedRecordId = isolated?.id ?? null;

    const excludedFields = scan.findings.map((f) => f.path);
    await this.ledger.append(
      {
        eventType: 'data_access',
        principalId: actor.principalId,
        roleAtTime: actor.role,
        subjectId: content.subjectId ?? null,
        payload: {
          action: 'exclude_demographics',
          reason: 'demographic_content_detected',
          sourceRef: content.sourceRef,
          excludedFields,
          methods: [...new Set(scan.findings.map((f) => f.method))],
          isolatedRecordId,
          requestId: context.requestId ?? actor.requestId ?? null,
        },
      },
      { deadline: context.deadline },
    );
    if (isolated) await this.partition.insert(this.credential, isolated);

    this.logger.info('Excluded demographic fields from extracted content', {
      sourceRef: content.sourceRef,
      excludedCount: excludedFields.length,
      routedToIsolation: isolatedRecordId !== null,
    });
    return { cleanedPayload: scan.cleaned, excludedFields, isolatedRecordId };
  }

  /** Redact demographic statements from generated text. */
  async screenOutput(principal: Principal, text: string, context: RouterCallContext = {}): Promise<ScreenedOutput> {
    const screened = screenText(text, this.detector);
    if (screened.findings.length === 0) return screened;

    await this.ledger.append(
      {
        eventType: 'security_event',
        principalId: principal.id,
        roleAtTime: principal.role,
        subjectId: null,
        payload: {
          kind: 'demographic_output_leak',
          severity: 'elevated',
          findings: screened.findings,
          requestId: context.requestId ?? null,
        },
      },
      { deadline: context.deadline },
    );
    this.alerts?.raise({
      kind: 'demographic_output_leak',
      severity: 'high',
      principalId: principal.id,
      summary: `Generated output for ${principal.id} contained demographic content`,
      details: { findingCount: screened.findings.length, requestId: context.requestId ?? null },
    });
    return screened;
  }

  async close(): Promise<void> {
    await this.partition.close();
  }

  // ── Escalation ─────────────────────────────────────────────────────────

  private async escalate(violation: IsolationViolation, operation: PartitionOperation): Promise<void> {
    this.logger.fatal('Isolated partition access refused', violation, {
      attemptedBy: violation.attemptedBy,
      operation,
    });
    this.alerts?.raise({
      kind: 'isolation_violation',
      severity: 'critical',
      principalId: null,
      summary: `Isolated partition ${operation} refused for ${violation.attemptedBy}`,
      details: { attemptedBy: violation.attemptedBy, operation },
    });
    try {
      await this.ledger.append({
        eventType: 'security_event',
        principalId: null,
        roleAtTime: null,
        subjectId: null,
        payload: {
          kind: 'isolation_violation',
          severity: 'critical',
          attemptedBy: violation.attemptedBy,
          attemptedOperation: operation,
        },
      });
    } catch (err) {
      // The violation is still thrown to the caller.
      this.logger.error('Failed to record isolation violation', toError(err), {
        attemptedBy: violation.attemptedBy,
      });
    }
  }
}
