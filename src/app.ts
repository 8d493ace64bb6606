/**
 * Express application factory with dependency injection.
 *
 * Middleware is wired in order:
 * 1. Request context (request id, deadline) and request logging
 * 2. JSON body parser
 * 3. One gateway guard per route, in front of its controller
 * 4. The unmatched-route handler, which still goes through the gateway
 * 5. Global error handling
 *
 * No handler runs before the gateway has returned ALLOW for its route.
 *
 * @module app
 */

import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

import type { AccessGateway } from './access/gateway.js';
import type { ResourceResolver } from './access/types.js';
import type { ControllerContext } from './controllers/context.js';
import {
  decisionTrace,
  exportLedger,
  searchLedger,
  subjectHistory,
  verifyLedger,
} from './controllers/auditController.js';
import {
  aggregateDemographics,
  collectDemographics,
  getApplication,
  listApplications,
  recordDecision,
  submitExtraction,
} from './controllers/lendingController.js';
import type { DualPathRouter } from './isolation/index.js';
import type { AuditLedger } from './ledger/auditLedger.js';
import { DecisionRecorder } from './ledger/decisionRecorder.js';
import { silentLogger, type Logger } from './logging/logger.js';
import {
  accessOf,
  createErrorHandler,
  createRouteGuard,
  createUnmatchedRouteHandler,
  requestContext,
} from './middleware/gatewayMiddleware.js';
import { requestLogger } from './middleware/requestLogger.js';
import { toScopeRow, type ApplicationRepository } from './repositories/applicationRepository.js';
import type { DataResponse } from './types/index.js';
import { generateRequestId, NOT_FOUND_BODY } from './utils/responses.js';

// ─── Dependency Types ────────────────────────────────────────────────────────

export interface AppDependencies {
  gateway: AccessGateway;
  router: DualPathRouter;
  ledger: AuditLedger;
  applications: ApplicationRepository;
  /** Defaults to a recorder over `ledger`. */
  decisions?: DecisionRecorder;
  logger?: Logger;
  /** Budget for one request, authorization and ledger writes included. */
  requestTimeoutMs?: number;
  aggregateTimeoutMs?: number;
  clock?: () => number;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function contextOf(req: Request): ControllerContext {
  return { access: accessOf(req), requestId: req.requestId ?? generateRequestId(), deadline: req.deadline };
}

/** Run a controller and send its result; `null` is the shared not-found body. */
function respond<T>(
  status: number,
  controller: (req: Request, ctx: ControllerContext) => Promise<DataResponse<T> | null>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const run = async (): Promise<void> => {
      const result = await controller(req, contextOf(req));
      if (result === null) {
        res.status(404).json(NOT_FOUND_BODY);
        return;
      }
      res.status(status).json(result);
    };
    run().catch(next);
  };
}

function param(req: Request, name: string): string | undefined {
  return req.params[name] || undefined;
}

/** A non-empty string field of the parsed JSON body; validation happens in the controller. */
function bodyField(req: Request, name: string): string | undefined {
  const body: unknown = req.body;
  if (body === null || typeof body !== 'object') return undefined;
  const value: unknown = Reflect.get(body, name);
  return typeof value === 'string' && value !== '' ? value : undefined;
}

// ─── Application Factory ────────────────────────────────────────────────────

export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const logger = deps.logger ?? silentLogger;
  const guard = createRouteGuard(deps.gateway);
  const decisions = deps.decisions ?? new DecisionRecorder(deps.ledger);
  const { applications, router, ledger } = deps;
  const hmda = { router, aggregateTimeoutMs: deps.aggregateTimeoutMs, clock: deps.clock };
  const resolveApplication =
    (id: string | undefined): ResourceResolver =>
    async () => {
      const application = id ? await applications.findById(id) : null;
      return application ? toScopeRow(application) : null;
    };

  // ── Global Middleware (order matters) ──────────────────────────────────

  app.disable('x-powered-by');
  app.use(requestContext({ requestTimeoutMs: deps.requestTimeoutMs, clock: deps.clock }));
  app.use(requestLogger(logger, deps.clock));
  app.use(express.json({ limit: '1mb' }));

  // ── Applications ──────────────────────────────────────────────────────

  app.get(
    '/api/applications',
    guard('GET /api/applications'),
    respond(200, (req, ctx) => listApplications(req.query, ctx, { applications })),
  );

  app.get(
    '/api/applications/:applicationId',
    guard('GET /api/applications/:applicationId', {
      resolveResource: (req) => resolveApplication(param(req, 'applicationId')),
      subjectOf: (req) => param(req, 'applicationId'),
    }),
    respond(200, (req, ctx) => getApplication(req.params, ctx, { applications })),
  );

  // ── Demographics ──────────────────────────────────────────────────────

  app.post(
    '/api/hmda/collect',
    guard('POST /api/hmda/collect', {
      resolveResource: (req) => resolveApplication(bodyField(req, 'subjectId')),
      subjectOf: (req) => bodyField(req, 'subjectId'),
    }),
    respond(201, (req, ctx) => collectDemographics(req.body, ctx, hmda)),
  );

  app.post(
    '/api/hmda/aggregate',
    guard('POST /api/hmda/aggregate'),
    respond(200, (req, ctx) => aggregateDemographics(req.body, ctx, hmda)),
  );

  // ── Documents and Decisions ───────────────────────────────────────────

  app.post(
    '/api/documents/extractions',
    guard('POST /api/documents/extractions'),
    respond(200, (req, ctx) => submitExtraction(req.body, ctx, { router })),
  );

  app.post(
    '/api/decisions',
    guard('POST /api/decisions'),
    respond(201, (req, ctx) => recordDecision(req.body, ctx, { decisions })),
  );

  // ── Audit ─────────────────────────────────────────────────────────────

  app.get(
    '/api/audit/subjects/:subjectId',
    guard('GET /api/audit/subjects/:subjectId', { subjectOf: (req) => param(req, 'subjectId') }),
    respond(200, (req, ctx) => subjectHistory(req.params, ctx, { ledger })),
  );

  app.get(
    '/api/audit/decisions/:decisionId/trace',
    guard('GET /api/audit/decisions/:decisionId/trace'),
    respond(200, (req, ctx) => decisionTrace(req.params, ctx, { ledger })),
  );

  app.post(
    '/api/audit/search',
    guard('POST /api/audit/search'),
    respond(200, (req, ctx) => searchLedger(req.body, ctx, { ledger })),
  );

  app.get(
    '/api/audit/verify',
    guard('GET /api/audit/verify'),
    respond(200, (req, ctx) => verifyLedger(req.query, ctx, { ledger })),
  );

  app.get('/api/audit/export', guard('GET /api/audit/export'), (req: Request, res: Response, next: NextFunction) => {
    const run = async (): Promise<void> => {
      const stream = await exportLedger(req.query, contextOf(req), { ledger });
      res.status(200);
      res.attachment(`ledger-export.${stream.format}`);
      res.type(stream.contentType);
      for await (const row of stream.rows) res.write(row);
      res.end();
    };
    run().catch(next);
  });

  // ── Fallthrough ───────────────────────────────────────────────────────

  app.use(createUnmatchedRouteHandler(deps.gateway));
  app.use(createErrorHandler(logger));

  return app;
}
