/**
 * Controllers for the ledger query routes. Every read goes through
 * {@link AuditLedger} query interfaces, which apply the reader's masks.
 *
 * @module controllers/auditController
 */

import { z } from 'zod';
import type { AuditLedger } from '../ledger/auditLedger.js';
import {
  LEDGER_EVENT_TYPES,
  type ChainVerification,
  type ExportFilter,
  type ExportFormat,
  type LedgerEvent,
  type PayloadPredicate,
} from '../ledger/types.js';
import type { DataResponse } from '../types/index.js';
import { formatDataResponse } from '../utils/responses.js';
import { viewerOf, type ControllerContext } from './context.js';

/** Subset of the ledger used by the audit routes. */
export interface AuditDependencies {
  ledger: Pick<AuditLedger, 'query' | 'verifyChain' | 'export'>;
}

// ─── Schemas ─────────────────────────────────────────────────────────────────

const JsonScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const PayloadPredicateSchema: z.ZodType<PayloadPredicate> = z.lazy(() =>
  z.union([
    z.object({ path: z.string().min(1), op: z.enum(['eq', 'neq']), value: JsonScalarSchema }),
    z.object({ path: z.string().min(1), op: z.literal('in'), values: z.array(JsonScalarSchema) }),
    z.object({ path: z.string().min(1), op: z.literal('exists') }),
    z.object({ all: z.array(PayloadPredicateSchema).min(1) }),
    z.object({ any: z.array(PayloadPredicateSchema).min(1) }),
  ]),
);

const EventTypeSchema = z.enum(LEDGER_EVENT_TYPES);

export const SearchSchema = z.object({
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
  eventTypes: z.array(EventTypeSchema).min(1).optional(),
  predicate: PayloadPredicateSchema.optional(),
  limit: z.number().int().min(1).max(1000).default(100),
});

const SequenceNo = z.coerce.number().int().positive();

export const VerifyQuerySchema = z.object({
  from: SequenceNo.optional(),
  to: SequenceNo.optional(),
});

/** `eventTypes` arrives as a comma-separated list in the query string. */
const EventTypeList = z
  .string()
  .transform((value) => value.split(',').map((part) => part.trim()).filter(Boolean))
  .pipe(z.array(EventTypeSchema));

export const ExportQuerySchema = z.object({
  format: z.enum(['csv', 'jsonl']).default('jsonl'),
  subjectId: z.string().min(1).optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
  eventTypes: EventTypeList.optional(),
  fromSequence: SequenceNo.optional(),
  toSequence: SequenceNo.optional(),
});

const SubjectParamsSchema = z.object({ subjectId: z.string().min(1) });
const DecisionParamsSchema = z.object({ decisionId: z.string().min(1) });

async function collect(events: AsyncIterable<LedgerEvent>): Promise<LedgerEvent[]> {
  const out: LedgerEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

// ─── Queries ─────────────────────────────────────────────────────────────────

/** GET /api/audit/subjects/:subjectId */
export async function subjectHistory(
  params: unknown,
  ctx: ControllerContext,
  deps: AuditDependencies,
): Promise<DataResponse<LedgerEvent[]>> {
  const { subjectId } = SubjectParamsSchema.parse(params);
  const events = await collect(deps.ledger.query({ kind: 'subject', subjectId }, viewerOf(ctx)));
  return formatDataResponse(events, ctx.requestId);
}

/** GET /api/audit/decisions/:decisionId/trace. Null for an unknown decision. */
export async function decisionTrace(
  params: unknown,
  ctx: ControllerContext,
  deps: AuditDependencies,
): Promise<DataResponse<LedgerEvent[]> | null> {
  const { decisionId } = DecisionParamsSchema.parse(params);
  const events = await collect(deps.ledger.query({ kind: 'decision_trace', decisionId }, viewerOf(ctx)));
  if (events.length === 0) return null;
  return formatDataResponse(events, ctx.requestId);
}

/** POST /api/audit/search */
export async function searchLedger(
  body: unknown,
  ctx: ControllerContext,
  deps: AuditDependencies,
): Promise<DataResponse<LedgerEvent[]>> {
  const search = SearchSchema.parse(body);
  const events = await collect(deps.ledger.query({ kind: 'pattern', ...search }, viewerOf(ctx)));
  return formatDataResponse(events, ctx.requestId);
}

/** GET /api/audit/verify */
export async function verifyLedger(
  query: unknown,
  ctx: ControllerContext,
  deps: AuditDependencies,
): Promise<DataResponse<ChainVerification>> {
  const range = VerifyQuerySchema.parse(query);
  return formatDataResponse(await deps.ledger.verifyChain(range), ctx.requestId);
}

export interface LedgerExportStream {
  format: ExportFormat;
  contentType: string;
  rows: AsyncIterable<string>;
}

/** GET /api/audit/export. The export itself is recorded before any row is produced. */
export async function exportLedger(
  query: unknown,
  ctx: ControllerContext,
  deps: AuditDependencies,
): Promise<LedgerExportStream> {
  const { format, ...filter } = ExportQuerySchema.parse(query);
  const exportFilter: ExportFilter = filter;
  const rows = await deps.ledger.export(exportFilter, format, viewerOf(ctx), { requestId: ctx.requestId });
  return {
    format,
    contentType: format === 'csv' ? 'text/csv; charset=utf-8' : 'application/x-ndjson; charset=utf-8',
    rows,
  };
}
