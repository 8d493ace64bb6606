/**
 * Typed errors raised across the access, isolation and ledger layers.
 *
 * Each carries a machine-readable `code` that maps to an HTTP status in
 * `utils/responses`.
 *
 * @module utils/errors
 */

import { ERROR_CODES } from '../types/index.js';

export class AuthenticationError extends Error {
  public readonly code = ERROR_CODES.AUTHENTICATION_FAILED;

  constructor(
    message: string,
    public readonly reason: 'missing' | 'malformed' | 'invalid_signature' | 'expired' | 'revoked',
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'AuthenticationError';
  }
}

export class AuthorizationDenied extends Error {
  public readonly code = ERROR_CODES.AUTHORIZATION_DENIED;

  constructor(
    message: string,
    public readonly operation: string,
  ) {
    super(message);
    this.name = 'AuthorizationDenied';
  }
}

/**
 * Raised internally when a resource exists but sits outside the caller's
 * scope. Surfaced to callers as NOT_FOUND, never under its own code.
 */
export class ScopeViolation extends Error {
  public readonly code = ERROR_CODES.SCOPE_VIOLATION;

  constructor(
    message: string,
    public readonly scopeFilter: string,
  ) {
    super(message);
    this.name = 'ScopeViolation';
  }
}

export class IsolationViolation extends Error {
  public readonly code = ERROR_CODES.ISOLATION_VIOLATION;
  public readonly severity = 'critical';

  constructor(
    message: string,
    public readonly attemptedBy: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'IsolationViolation';
  }
}

export class LedgerUnavailable extends Error {
  public readonly code = ERROR_CODES.LEDGER_UNAVAILABLE;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'LedgerUnavailable';
  }
}

export class LedgerMutationDenied extends Error {
  public readonly code = ERROR_CODES.LEDGER_MUTATION_DENIED;

  constructor(
    public readonly targetSequenceNo: number,
    public readonly attemptedOperation: 'UPDATE' | 'DELETE',
    public readonly securityEventSequenceNo: number,
  ) {
    super(`${attemptedOperation} of ledger event #${targetSequenceNo} is not permitted`);
    this.name = 'LedgerMutationDenied';
  }
}

export class PolicyLoadError extends Error {
  public readonly code = ERROR_CODES.POLICY_LOAD_ERROR;

  constructor(
    message: string,
    public readonly kind: 'unreadable' | 'timeout' | 'malformed' | 'invalid',
    public readonly issues: string[] = [],
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'PolicyLoadError';
  }
}

export class OperationTimeout extends Error {
  public readonly code = ERROR_CODES.OPERATION_TIMEOUT;

  constructor(public readonly operation: string) {
    super(`${operation} exceeded its deadline`);
    this.name = 'OperationTimeout';
  }
}

/** Normalise a caught value for logging. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
