/**
 * API response formatters for consistent JSON response structure.
 *
 * - Success responses carry `success: true`, the data and the request id
 * - Error responses carry `success: false`, an error object with code and
 *   message (and field errors for validation failures) and the request id
 *
 * Denials are rendered with public codes and generic messages only. The
 * not-found body has no request id, so a missing record and an out-of-scope
 * record produce byte-identical responses.
 *
 * @module utils/responses
 */

import { v4 as uuidv4 } from 'uuid';
import type { DataResponse, ErrorCode, ErrorResponse, Role } from '../types/index.js';

// ─── Error Code to HTTP Status Mapping ───────────────────────────────────────

export type PublicErrorCode =
  | 'UNAUTHENTICATED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'SERVICE_UNAVAILABLE'
  | 'TIMEOUT'
  | 'VALIDATION_FAILED'
  | 'INTERNAL_ERROR';

/** Internal code → public code. Reason codes never reach the client. */
const PUBLIC_CODE: Record<ErrorCode, PublicErrorCode> = {
  AUTHENTICATION_FAILED: 'UNAUTHENTICATED',
  NO_VALID_ROLE: 'FORBIDDEN',
  UNKNOWN_OPERATION: 'FORBIDDEN',
  AUTHORIZATION_DENIED: 'FORBIDDEN',
  ISOLATION_VIOLATION: 'FORBIDDEN',
  LEDGER_MUTATION_DENIED: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  SCOPE_VIOLATION: 'NOT_FOUND',
  POLICY_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  POLICY_LOAD_ERROR: 'SERVICE_UNAVAILABLE',
  LEDGER_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  INSUFFICIENT_SAMPLE: 'VALIDATION_FAILED',
  OPERATION_TIMEOUT: 'TIMEOUT',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
};

const STATUS: Record<PublicErrorCode, number> = {
  UNAUTHENTICATED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  VALIDATION_FAILED: 400,
  SERVICE_UNAVAILABLE: 503,
  TIMEOUT: 504,
  INTERNAL_ERROR: 500,
};

const FORBIDDEN_MESSAGE: Record<Role, string> = {
  prospect: 'Please create an account to continue.',
  borrower: 'That information is not available to you. Please contact your loan officer.',
  loan_officer: 'You do not have access to this operation.',
  underwriter: 'You do not have access to this operation.',
  ceo: 'You do not have access to this operation.',
  admin: 'You do not have access to this operation.',
};

const MESSAGE: Record<Exclude<PublicErrorCode, 'FORBIDDEN'>, string> = {
  UNAUTHENTICATED: 'Authentication required.',
  NOT_FOUND: 'Resource not found.',
  SERVICE_UNAVAILABLE: 'Service temporarily unavailable. Please try again later.',
  TIMEOUT: 'The request took too long. Please try again.',
  VALIDATION_FAILED: 'Request validation failed.',
  INTERNAL_ERROR: 'An unexpected error occurred. Please try again later.',
};

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(PUBLIC_CODE, value);
}

/** HTTP status for an internal error code. */
export function getHttpStatusForError(code: ErrorCode): number {
  return STATUS[PUBLIC_CODE[code]];
}

/** The generic message a caller with `role` sees for `code`. */
export function publicMessage(code: ErrorCode, role: Role | null = null): string {
  const publicCode = PUBLIC_CODE[code];
  if (publicCode === 'FORBIDDEN') {
    return role ? FORBIDDEN_MESSAGE[role] : 'You do not have access to this operation.';
  }
  return MESSAGE[publicCode];
}

// ─── Correlation ID ──────────────────────────────────────────────────────────

/**
 * Generate a unique request correlation ID (UUID v4).
 * Used to trace requests across logs and error responses.
 */
export function generateRequestId(): string {
  return uuidv4();
}

// ─── Success Formatters ──────────────────────────────────────────────────────

export function formatDataResponse<T>(data: T, requestId: string): DataResponse<T> {
  return { success: true, data, requestId };
}

// ─── Error Formatters ────────────────────────────────────────────────────────

/**
 * Format an error response with error code, message, optional field errors,
 * and a correlation ID for debugging.
 *
 * @param requestId - Correlation ID; auto-generated if not provided
 */
export function formatErrorResponse(
  code: string,
  message: string,
  requestId?: string,
  fields?: Record<string, string[]>,
): ErrorResponse {
  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message,
    },
    requestId: requestId ?? generateRequestId(),
  };

  if (fields && Object.keys(fields).length > 0) {
    response.error.fields = fields;
  }

  return response;
}

/** The one not-found body. Carries no request id. */
export const NOT_FOUND_BODY: Readonly<ErrorResponse> = Object.freeze({
  success: false,
  error: Object.freeze({ code: 'NOT_FOUND', message: MESSAGE.NOT_FOUND }),
});

export interface RenderedError {
  status: number;
  body: Readonly<ErrorResponse>;
}

/** Status and body for an internal error code, as the client sees them. */
export function renderError(code: ErrorCode, requestId: string, role: Role | null = null): RenderedError {
  const publicCode = PUBLIC_CODE[code];
  if (publicCode === 'NOT_FOUND') return { status: STATUS.NOT_FOUND, body: NOT_FOUND_BODY };
  return {
    status: STATUS[publicCode],
    body: formatErrorResponse(publicCode, publicMessage(code, role), requestId),
  };
}

/**
 * Format a validation error response with field-specific details.
 */
export function formatValidationError(fields: Record<string, string[]>, requestId?: string): ErrorResponse {
  return formatErrorResponse('VALIDATION_FAILED', MESSAGE.VALIDATION_FAILED, requestId, fields);
}

/**
 * Format an internal server error response.
 * Always carries the generic message.
 */
export function formatInternalError(requestId?: string): ErrorResponse {
  return formatErrorResponse('INTERNAL_ERROR', MESSAGE.INTERNAL_ERROR, requestId);
}
