/**
 * Core type definitions shared by the gateway, router and ledger.
 *
 * @module types
 */

// ─── Roles ───────────────────────────────────────────────────────────────────

export const ROLES = [
  'prospect',
  'borrower',
  'loan_officer',
  'underwriter',
  'ceo',
  'admin',
] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.some((entry) => entry === value);
}

// ─── Identity ────────────────────────────────────────────────────────────────

/**
 * Authenticated identity, rebuilt from the signed credential on every call.
 * Never persisted.
 */
export interface Principal {
  id: string;
  role: Role;
  scopeAttributes: Readonly<Record<string, string>>;
  tokenExpiry: Date;
  /** JWT `jti`, used for revocation lookups. */
  credentialId: string | null;
}

// ─── Operations ──────────────────────────────────────────────────────────────

export type OperationKind = 'route' | 'tool';

/**
 * An HTTP route pattern (`GET /api/applications/:applicationId`) or an
 * agent tool name (`application_status`).
 */
export interface Operation {
  kind: OperationKind;
  name: string;
}

export interface AuthenticatedRequest {
  credential: string;
  operation: Operation;
  params: Record<string, unknown>;
}

// ─── Inbound payloads ────────────────────────────────────────────────────────

export interface ExtractedContent {
  payload: Record<string, unknown>;
  sourceRef: string;
  subjectId?: string;
}

export interface DecisionRecord {
  subjectId: string;
  outcome: string;
  rationale: string;
  recommenderOutput: Record<string, unknown>;
  humanOutput: Record<string, unknown> | null;
  /** Earlier ledger events this decision relied on. */
  linkedSequenceNos?: number[];
  decisionId?: string;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export const ERROR_CODES = {
  AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
  NO_VALID_ROLE: 'NO_VALID_ROLE',
  POLICY_UNAVAILABLE: 'POLICY_UNAVAILABLE',
  UNKNOWN_OPERATION: 'UNKNOWN_OPERATION',
  AUTHORIZATION_DENIED: 'AUTHORIZATION_DENIED',
  NOT_FOUND: 'NOT_FOUND',
  SCOPE_VIOLATION: 'SCOPE_VIOLATION',
  ISOLATION_VIOLATION: 'ISOLATION_VIOLATION',
  INSUFFICIENT_SAMPLE: 'INSUFFICIENT_SAMPLE',
  LEDGER_UNAVAILABLE: 'LEDGER_UNAVAILABLE',
  LEDGER_MUTATION_DENIED: 'LEDGER_MUTATION_DENIED',
  POLICY_LOAD_ERROR: 'POLICY_LOAD_ERROR',
  OPERATION_TIMEOUT: 'OPERATION_TIMEOUT',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Denial codes the gateway can attach to a DENY decision. */
export type DenialCode =
  | typeof ERROR_CODES.AUTHENTICATION_FAILED
  | typeof ERROR_CODES.NO_VALID_ROLE
  | typeof ERROR_CODES.POLICY_UNAVAILABLE
  | typeof ERROR_CODES.UNKNOWN_OPERATION
  | typeof ERROR_CODES.AUTHORIZATION_DENIED
  | typeof ERROR_CODES.NOT_FOUND;

// ─── API Responses ───────────────────────────────────────────────────────────

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    fields?: Record<string, string[]>;
  };
  requestId?: string;
}

export interface DataResponse<T> {
  success: true;
  data: T;
  requestId: string;
}
