/**
 * Controllers for the lending routes: scoped application reads, demographic
 * collection and aggregation, document extraction and decision recording.
 *
 * Each takes the raw request input, the {@link ControllerContext} the gateway
 * guard produced and its own dependencies. Input is parsed with zod; a parse
 * failure propagates as a `ZodError` and renders as VALIDATION_FAILED.
 *
 * @module controllers/lendingController
 */

import { z } from 'zod';
import { maskRecord } from '../access/fieldMask.js';
import { assertInScope, matchesScope } from '../access/scopeFilter.js';
import { COLLECTION_METHODS, type AggregateOutcome, type DualPathRouter } from '../isolation/index.js';
import type { DecisionRecorder } from '../ledger/decisionRecorder.js';
import { toScopeRow, type ApplicationRepository } from '../repositories/applicationRepository.js';
import type { DataResponse } from '../types/index.js';
import { deadlineIn } from '../utils/deadline.js';
import { formatDataResponse } from '../utils/responses.js';
import { actorOf, type ControllerContext } from './context.js';

// ─── Dependency Interfaces ───────────────────────────────────────────────────

/** Subset of the application repository used by the application routes. */
export interface ApplicationsDependencies {
  applications: Pick<ApplicationRepository, 'list' | 'findById'>;
}

/** Subset of the router used by the demographic routes. */
export interface HmdaDependencies {
  router: Pick<DualPathRouter, 'writeIsolated' | 'aggregate'>;
  /** Tighter budget for aggregation than the request as a whole. */
  aggregateTimeoutMs?: number;
  clock?: () => number;
}

export interface ExtractionDependencies {
  router: Pick<DualPathRouter, 'excludeIfDetected'>;
}

export interface DecisionDependencies {
  decisions: Pick<DecisionRecorder, 'record'>;
}

// ─── Schemas ─────────────────────────────────────────────────────────────────

export const ListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export const ApplicationParamsSchema = z.object({ applicationId: z.string().min(1) });

const AttributeValue = z.string().trim().min(1).max(100).nullable().optional();

export const CollectSchema = z
  .object({
    subjectId: z.string().min(1),
    race: AttributeValue,
    ethnicity: AttributeValue,
    sex: AttributeValue,
    ageBand: AttributeValue,
    collectionMethod: z.enum(COLLECTION_METHODS).optional(),
  })
  .strict();

export const ExtractionSchema = z.object({
  payload: z.record(z.string(), z.unknown()),
  sourceRef: z.string().min(1).max(500),
  subjectId: z.string().min(1).optional(),
});

export const DecisionSchema = z.object({
  subjectId: z.string().min(1),
  outcome: z.string().min(1),
  rationale: z.string().min(1),
  recommenderOutput: z.record(z.string(), z.unknown()),
  humanOutput: z.record(z.string(), z.unknown()).nullable().default(null),
  linkedSequenceNos: z.array(z.number().int().positive()).optional(),
  decisionId: z.string().uuid().optional(),
});

// ─── Applications ────────────────────────────────────────────────────────────

/**
 * GET /api/applications. The repository filters by scope in SQL; rows are
 * checked again here and masked for the role.
 */
export async function listApplications(
  query: unknown,
  ctx: ControllerContext,
  deps: ApplicationsDependencies,
): Promise<DataResponse<Array<Record<string, unknown>>>> {
  const { limit, offset } = ListQuerySchema.parse(query);
  const { scopeFilterApplied: filter, fieldMask } = ctx.access.decision;
  const rows = await deps.applications.list(filter, { limit, offset });
  const visible = rows
    .filter((application) => !filter || matchesScope(filter, toScopeRow(application)))
    .map((application) => maskRecord({ ...application }, fieldMask));
  return formatDataResponse(visible, ctx.requestId);
}

/**
 * GET /api/applications/:applicationId. Returns null when the record is
 * gone; a record outside scope throws ScopeViolation. Both render as the
 * same not-found body.
 */
export async function getApplication(
  params: unknown,
  ctx: ControllerContext,
  deps: ApplicationsDependencies,
): Promise<DataResponse<Record<string, unknown>> | null> {
  const { applicationId } = ApplicationParamsSchema.parse(params);
  const application = await deps.applications.findById(applicationId);
  if (!application) return null;
  assertInScope(ctx.access.decision.scopeFilterApplied, toScopeRow(application));
  return formatDataResponse(maskRecord({ ...application }, ctx.access.decision.fieldMask), ctx.requestId);
}

// ─── Demographics ────────────────────────────────────────────────────────────

/** POST /api/hmda/collect. The response never echoes the submitted values. */
export async function collectDemographics(
  body: unknown,
  ctx: ControllerContext,
  deps: HmdaDependencies,
): Promise<DataResponse<{ recordId: string }>> {
  const submission = CollectSchema.parse(body);
  const recordId = await deps.router.writeIsolated(ctx.access, submission, {
    requestId: ctx.requestId,
    deadline: ctx.deadline,
  });
  return formatDataResponse({ recordId }, ctx.requestId);
}

/** POST /api/hmda/aggregate. An insufficient sample is a result, not an error. */
export async function aggregateDemographics(
  body: unknown,
  ctx: ControllerContext,
  deps: HmdaDependencies,
): Promise<DataResponse<AggregateOutcome>> {
  let deadline = ctx.deadline;
  if (deps.aggregateTimeoutMs !== undefined) {
    const own = deadlineIn(deps.aggregateTimeoutMs, (deps.clock ?? Date.now)());
    deadline = deadline === undefined ? own : Math.min(deadline, own);
  }
  const outcome = await deps.router.aggregate(ctx.access, body, { requestId: ctx.requestId, deadline });
  return formatDataResponse(outcome, ctx.requestId);
}

// ─── Documents ───────────────────────────────────────────────────────────────

export interface ExtractionResponse {
  cleanedPayload: Record<string, unknown>;
  excludedFields: string[];
  routedToIsolation: boolean;
}

/** POST /api/documents/extractions */
export async function submitExtraction(
  body: unknown,
  ctx: ControllerContext,
  deps: ExtractionDependencies,
): Promise<DataResponse<ExtractionResponse>> {
  const content = ExtractionSchema.parse(body);
  const result = await deps.router.excludeIfDetected(content, actorOf(ctx), {
    requestId: ctx.requestId,
    deadline: ctx.deadline,
  });
  return formatDataResponse(
    {
      cleanedPayload: result.cleanedPayload,
      excludedFields: result.excludedFields,
      routedToIsolation: result.isolatedRecordId !== null,
    },
    ctx.requestId,
  );
}

// ─── Decisions ───────────────────────────────────────────────────────────────

export interface DecisionResponse {
  decisionId: string;
  overridden: boolean;
  sequenceNo: number;
}

/** POST /api/decisions */
export async function recordDecision(
  body: unknown,
  ctx: ControllerContext,
  deps: DecisionDependencies,
): Promise<DataResponse<DecisionResponse>> {
  const record = DecisionSchema.parse(body);
  const recorded = await deps.decisions.record(record, ctx.access.principal, {
    requestId: ctx.requestId,
    deadline: ctx.deadline,
  });
  return formatDataResponse(
    { decisionId: recorded.decisionId, overridden: recorded.overridden, sequenceNo: recorded.event.sequenceNo },
    ctx.requestId,
  );
}
