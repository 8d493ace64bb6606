/**
 * Type definitions for the Access Control Gateway.
 *
 * @module access/types
 */

import type { DenialCode, Operation, Principal, Role } from '../types/index.js';
import type { PolicySnapshot } from '../policy/types.js';
import type { FieldMask } from './fieldMask.js';
import type { ScopeFilter } from './scopeFilter.js';

export type DecisionOutcome = 'ALLOW' | 'DENY';

/** One gateway decision. Frozen, and always written to the ledger. */
export interface AccessDecision {
  readonly principalId: string | null;
  readonly role: Role | null;
  readonly operation: Operation;
  readonly outcome: DecisionOutcome;
  readonly denialReason: DenialCode | null;
  readonly scopeFilterApplied: ScopeFilter | null;
  readonly fieldMask: FieldMask | null;
  readonly policyVersion: string | null;
  readonly requestId: string;
  readonly timestamp: Date;
}

/**
 * Loads the scope-relevant attributes of the record a lookup addresses, or
 * `null` when it does not exist.
 */
export type ResourceResolver = (resource: string) => Promise<Readonly<Record<string, unknown>> | null>;

export interface AuthorizationContext {
  requestId: string;
  /** Absolute epoch-ms deadline for the whole decision, ledger write included. */
  deadline?: number;
  /** Session-pinned snapshot; when absent one is acquired for this request. */
  snapshot?: PolicySnapshot;
  resolveResource?: ResourceResolver;
  /** Recorded as the ledger event's subject. */
  subjectId?: string;
}

export interface AuthorizationResult {
  readonly decision: AccessDecision;
  readonly principal: Principal | null;
  readonly policy: PolicySnapshot | null;
  readonly ledgerSequenceNo: number;
}

export interface AllowedAuthorization extends AuthorizationResult {
  readonly decision: AccessDecision & { readonly outcome: 'ALLOW' };
  readonly principal: Principal;
  readonly policy: PolicySnapshot;
}

/** Anything with a request-boundary snapshot, e.g. the policy store. */
export interface PolicyProvider {
  acquire(): Promise<PolicySnapshot | undefined>;
}
