/**
 * Express middleware around the Access Control Gateway.
 *
 * - {@link requestContext} assigns the request id and deadline
 * - {@link createRouteGuard} authorizes one named route before its handler
 * - {@link createUnmatchedRouteHandler} sends requests no route claimed
 *   through the gateway too, so they are denied and recorded
 * - {@link createErrorHandler} renders typed errors with public codes
 *
 * @module middleware/gatewayMiddleware
 */

import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { isAllowed, type AccessGateway } from '../access/gateway.js';
import type { AllowedAuthorization, ResourceResolver } from '../access/types.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { ERROR_CODES, type ErrorCode } from '../types/index.js';
import { deadlineIn } from '../utils/deadline.js';
import { toError } from '../utils/errors.js';
import {
  formatInternalError,
  formatValidationError,
  generateRequestId,
  isErrorCode,
  NOT_FOUND_BODY,
  renderError,
} from '../utils/responses.js';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      /** Absolute epoch-ms deadline for the whole request. */
      deadline?: number;
      /** Set by the route guard on ALLOW. */
      access?: AllowedAuthorization;
    }
  }
}

const REQUEST_ID_HEADER = 'x-request-id';
const REQUEST_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

// ─── Request Context ─────────────────────────────────────────────────────────

export function requestContext(options: { requestTimeoutMs?: number; clock?: () => number } = {}): RequestHandler {
  const clock = options.clock ?? Date.now;
  return (req: Request, _res: Response, next: NextFunction): void => {
    const supplied = req.get(REQUEST_ID_HEADER);
    req.requestId = supplied && REQUEST_ID_PATTERN.test(supplied) ? supplied : generateRequestId();
    if (options.requestTimeoutMs !== undefined) {
      req.deadline = deadlineIn(options.requestTimeoutMs, clock());
    }
    next();
  };
}

/** The token of an `Authorization: Bearer <token>` header, or `''`. */
export function extractBearer(header: string | undefined): string {
  if (!header) return '';
  return /^Bearer\s+(\S+)$/i.exec(header.trim())?.[1] ?? '';
}

// ─── Route Guard ─────────────────────────────────────────────────────────────

export interface RouteGuardOptions {
  /** For lookup routes: loads the addressed record's scope columns. */
  resolveResource?: (req: Request) => ResourceResolver;
  /** Recorded as the decision event's subject. */
  subjectOf?: (req: Request) => string | undefined;
}

export type RouteGuard = (operation: string, options?: RouteGuardOptions) => RequestHandler;

async function authorizeRoute(
  gateway: AccessGateway,
  operation: string,
  options: RouteGuardOptions,
  req: Request,
  res: Response,
  next: NextFunction,
): Promise<void> {
  const requestId = req.requestId ?? generateRequestId();
  const result = await gateway.authorize(
    {
      credential: extractBearer(req.get('authorization')),
      operation: { kind: 'route', name: operation },
      params: { ...req.params },
    },
    {
      requestId,
      deadline: req.deadline,
      resolveResource: options.resolveResource?.(req),
      subjectId: options.subjectOf?.(req),
    },
  );
  if (!isAllowed(result)) {
    const { denialReason, role } = result.decision;
    const rendered = renderError(denialReason ?? ERROR_CODES.AUTHORIZATION_DENIED, requestId, role);
    res.status(rendered.status).json(rendered.body);
    return;
  }
  req.access = result;
  next();
}

/**
 * Guard factory bound to one gateway. `operation` is the route pattern as
 * the policy names it, e.g. `GET /api/applications/:applicationId`.
 */
export function createRouteGuard(gateway: AccessGateway): RouteGuard {
  return (operation, options = {}) =>
    (req: Request, res: Response, next: NextFunction): void => {
      authorizeRoute(gateway, operation, options, req, res, next).catch(next);
    };
}

/**
 * The authorization the guard attached. Throws if a handler is mounted
 * without a guard in front of it.
 */
export function accessOf(req: Request): AllowedAuthorization {
  if (!req.access) {
    throw new Error(`No gateway authorization on ${req.method} ${req.path}`);
  }
  return req.access;
}

/**
 * Requests no route matched. The gateway still decides them (normally
 * UNKNOWN_OPERATION) so the attempt is on the ledger; an ALLOW here means a
 * policy route the app does not serve, which is a plain not-found.
 */
export function createUnmatchedRouteHandler(gateway: AccessGateway): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const notFound = (): void => {
      res.status(404).json(NOT_FOUND_BODY);
    };
    authorizeRoute(gateway, `${req.method} ${req.path}`, {}, req, res, notFound).catch(next);
  };
}

// ─── Error Handler ───────────────────────────────────────────────────────────

function codeOf(error: unknown): ErrorCode | null {
  if (error instanceof Error && 'code' in error && isErrorCode(error.code)) return error.code;
  return null;
}

function zodFields(error: ZodError): Record<string, string[]> {
  const fields: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : 'body';
    (fields[key] ??= []).push(issue.message);
  }
  return fields;
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

export function createErrorHandler(logger: Logger = silentLogger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    const requestId = req.requestId ?? generateRequestId();
    const log = logger.child({ correlationId: requestId, principalId: req.access?.principal.id });

    if (res.headersSent) {
      // Mid-stream failure (an export): Express closes the connection.
      log.error('Response failed after headers were sent', toError(err), { method: req.method, path: req.path });
      next(err);
      return;
    }

    if (err instanceof ZodError) {
      res.status(400).json(formatValidationError(zodFields(err), requestId));
      return;
    }
    if (isBodyParseError(err)) {
      res.status(400).json(formatValidationError({ body: ['Malformed JSON'] }, requestId));
      return;
    }

    const code = codeOf(err);
    if (code) {
      const rendered = renderError(code, requestId, req.access?.principal.role ?? null);
      const metadata = { method: req.method, path: req.path, code, status: rendered.status };
      if (rendered.status >= 500) log.error('Request failed', toError(err), metadata);
      else log.warn('Request refused', metadata);
      res.status(rendered.status).json(rendered.body);
      return;
    }

    log.error('Unhandled error', toError(err), { method: req.method, path: req.path });
    res.status(500).json(formatInternalError(requestId));
  };
}
