/**
 * Access Control Gateway
 *
 * Every HTTP route and agent tool call passes through
 * {@link AccessGateway.authorize} before business logic runs. The gateway
 * verifies the credential, resolves the role from its claims, evaluates the
 * policy snapshot for the request, builds the data-scope filter and field
 * mask, and records exactly one ledger event per call.
 *
 * Default-deny: anything the gateway cannot confirm is a DENY.
 *
 * @module access/gateway
 */

import {
  resolveRole,
  toPrincipal,
  verifyCredential,
  type CredentialClaims,
  type CredentialKeys,
} from '../auth/credentials.js';
import type { RevocationList } from '../auth/revocation.js';
import type { AlertSink } from '../alerting/operatorAlerts.js';
import type { AuditLedger } from '../ledger/auditLedger.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import {
  findRouteRule,
  findToolRule,
  rolePolicyFor,
  scopeTemplateFor,
} from '../policy/policySnapshot.js';
import type { PolicySnapshot } from '../policy/types.js';
import {
  ERROR_CODES,
  type AuthenticatedRequest,
  type DenialCode,
  type Principal,
  type Role,
} from '../types/index.js';
import { assertBeforeDeadline } from '../utils/deadline.js';
import { AuthenticationError, toError } from '../utils/errors.js';
import type { DenialTracker } from './denialTracker.js';
import type { FieldMask } from './fieldMask.js';
import { buildScopeFilter, formatScopeFilter, matchesScope, type ScopeFilter } from './scopeFilter.js';
import type {
  AccessDecision,
  AllowedAuthorization,
  AuthorizationContext,
  AuthorizationResult,
  PolicyProvider,
} from './types.js';

export interface AccessGatewayOptions {
  keys: CredentialKeys;
  policy: PolicyProvider;
  ledger: AuditLedger;
  revocations?: RevocationList;
  denials?: DenialTracker;
  alerts?: AlertSink;
  logger?: Logger;
  clock?: () => number;
}

/** Used when no snapshot is available to say otherwise. */
const DEFAULT_ALERT_POLICY = { repeatedDenialThreshold: 5, repeatedDenialWindowSeconds: 300 };

const issued = new WeakSet<AuthorizationResult>();

/** True only for results produced by {@link AccessGateway.authorize}. */
export function isGatewayIssued(result: AuthorizationResult): boolean {
  return issued.has(result);
}

export function isAllowed(result: AuthorizationResult): result is AllowedAuthorization {
  return result.decision.outcome === 'ALLOW' && result.principal !== null && result.policy !== null;
}

// ─── Evaluation ──────────────────────────────────────────────────────────────

interface Evaluation {
  outcome: 'ALLOW' | 'DENY';
  denialReason: DenialCode | null;
  principal: Principal | null;
  /** Known after signature verification even when no role resolves. */
  principalId: string | null;
  role: Role | null;
  snapshot: PolicySnapshot | null;
  scopeFilter: ScopeFilter | null;
  fieldMask: FieldMask | null;
  /** Extra ledger detail, never shown to the caller. */
  detail: string | null;
  /** Set when the resolver failed; rethrown once the decision is recorded. */
  failure?: unknown;
}

function denial(
  code: DenialCode,
  detail: string,
  partial: Partial<Evaluation> = {},
): Evaluation {
  return {
    outcome: 'DENY',
    denialReason: code,
    principal: null,
    principalId: null,
    role: null,
    snapshot: null,
    scopeFilter: null,
    fieldMask: null,
    ...partial,
    detail,
  };
}

export class AccessGateway {
  private readonly keys: CredentialKeys;
  private readonly policy: PolicyProvider;
  private readonly ledger: AuditLedger;
  private readonly revocations: RevocationList | undefined;
  private readonly denials: DenialTracker | undefined;
  private readonly alerts: AlertSink | undefined;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(options: AccessGatewayOptions) {
    this.keys = options.keys;
    this.policy = options.policy;
    this.ledger = options.ledger;
    this.revocations = options.revocations;
    this.denials = options.denials;
    this.alerts = options.alerts;
    this.logger = (options.logger ?? silentLogger).child({ operation: 'authorize' });
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Decide one operation.
   *
   * @throws LedgerUnavailable when the decision cannot be recorded; no ALLOW
   *   is returned in that case
   * @throws OperationTimeout when the deadline passes first
   */
  async authorize(request: AuthenticatedRequest, context: AuthorizationContext): Promise<AuthorizationResult> {
    const now = this.clock();
    assertBeforeDeadline(context.deadline, 'authorize', now);
    const log = this.logger.child({ correlationId: context.requestId });

    const evaluation = await this.evaluate(request, context, now, log);

    const decision: AccessDecision = Object.freeze({
      principalId: evaluation.principalId,
      role: evaluation.role,
      operation: Object.freeze({ ...request.operation }),
      outcome: evaluation.outcome,
      denialReason: evaluation.denialReason,
      scopeFilterApplied: evaluation.scopeFilter,
      fieldMask: evaluation.fieldMask,
      policyVersion: evaluation.snapshot?.version ?? null,
      requestId: context.requestId,
      timestamp: new Date(now),
    });

    const event = await this.ledger.append(
      {
        eventType: request.operation.kind === 'tool' ? 'tool_call' : 'query',
        principalId: decision.principalId,
        roleAtTime: decision.role,
        subjectId: context.subjectId ?? null,
        payload: {
          operation: request.operation.name,
          outcome: decision.outcome,
          denialReason: decision.denialReason,
          scopeFilter: decision.scopeFilterApplied ? formatScopeFilter(decision.scopeFilterApplied) : null,
          maskedFields: decision.fieldMask?.rules.map((rule) => rule.field) ?? [],
          policyVersion: decision.policyVersion,
          policyRevision: evaluation.snapshot?.revision ?? null,
          requestId: context.requestId,
          detail: evaluation.detail,
        },
      },
      { deadline: context.deadline },
    );

    if (evaluation.failure !== undefined) throw evaluation.failure;

    if (decision.outcome === 'DENY') {
      log.warn('Access denied', {
        operation: request.operation.name,
        principalId: decision.principalId,
        role: decision.role,
        denialReason: decision.denialReason,
        detail: evaluation.detail,
      });
      await this.trackDenial(decision, evaluation.snapshot, log);
    } else {
      log.debug('Access allowed', { operation: request.operation.name, principalId: decision.principalId });
    }

    const result: AuthorizationResult = Object.freeze({
      decision,
      principal: evaluation.principal,
      policy: evaluation.snapshot,
      ledgerSequenceNo: event.sequenceNo,
    });
    issued.add(result);
    return result;
  }

  private async evaluate(
    request: AuthenticatedRequest,
    context: AuthorizationContext,
    now: number,
    log: Logger,
  ): Promise<Evaluation> {
    // 1. Credential: signature and expiry. No policy lookup on failure.
    let claims: CredentialClaims;
    try {
      claims = verifyCredential(request.credential, this.keys, now);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        return denial(ERROR_CODES.AUTHENTICATION_FAILED, `credential_${error.reason}`);
      }
      throw error;
    }

    if (claims.credentialId !== null && this.revocations) {
      try {
        if (await this.revocations.isRevoked(claims.credentialId)) {
          return denial(ERROR_CODES.AUTHENTICATION_FAILED, 'credential_revoked', { principalId: claims.subject });
        }
      } catch (error) {
        log.error('Revocation check failed; denying', toError(error), { principalId: claims.subject });
        return denial(ERROR_CODES.AUTHENTICATION_FAILED, 'revocation_unavailable', { principalId: claims.subject });
      }
    }

    // 2. Role, fresh from the claims.
    const resolution = resolveRole(claims);
    if (!resolution.ok) {
      log.error('Credential carries no single platform role', undefined, {
        principalId: claims.subject,
        reason: resolution.reason,
        knownRoles: resolution.knownRoles,
      });
      this.alerts?.raise({
        kind: 'role_anomaly',
        severity: 'warning',
        principalId: claims.subject,
        summary: `Credential resolved to ${resolution.reason === 'multiple_roles' ? 'several roles' : 'no role'}`,
        details: { reason: resolution.reason, knownRoles: resolution.knownRoles },
      });
      return denial(ERROR_CODES.NO_VALID_ROLE, resolution.reason, { principalId: claims.subject });
    }
    const principal = toPrincipal(claims, resolution.role);
    const who = { principal, principalId: principal.id, role: principal.role };

    // 3. Snapshot for this request.
    const snapshot = context.snapshot ?? (await this.policy.acquire());
    if (!snapshot) {
      return denial(ERROR_CODES.POLICY_UNAVAILABLE, 'no_policy_loaded', who);
    }
    const withPolicy = { ...who, snapshot };

    // 4. Operation and role membership.
    const rolePolicy = rolePolicyFor(snapshot, principal.role);
    let resource: string | null;
    let lookup: boolean;
    if (request.operation.kind === 'route') {
      const rule = findRouteRule(snapshot, request.operation.name);
      if (!rule) return denial(ERROR_CODES.UNKNOWN_OPERATION, 'unknown_route', withPolicy);
      if (!rolePolicy?.routes.includes(rule.pattern)) {
        return denial(ERROR_CODES.AUTHORIZATION_DENIED, 'route_not_allowed_for_role', withPolicy);
      }
      resource = rule.resource;
      lookup = rule.lookup;
    } else {
      const rule = findToolRule(snapshot, request.operation.name);
      if (!rule) return denial(ERROR_CODES.UNKNOWN_OPERATION, 'unknown_tool', withPolicy);
      if (!rolePolicy?.tools.includes(rule.name)) {
        return denial(ERROR_CODES.AUTHORIZATION_DENIED, 'tool_not_allowed_for_role', withPolicy);
      }
      if (!rule.requiredRoles.includes(principal.role)) {
        return denial(ERROR_CODES.AUTHORIZATION_DENIED, 'role_not_in_tool_required_roles', withPolicy);
      }
      resource = rule.resource;
      lookup = rule.lookup;
    }

    // 5. Data scope. A template the principal cannot fill denies.
    let scopeFilter: ScopeFilter | null = null;
    if (resource !== null) {
      const template = scopeTemplateFor(snapshot, resource, principal.role);
      if (template) {
        scopeFilter = buildScopeFilter(resource, template, principal);
        if (!scopeFilter) {
          return denial(ERROR_CODES.AUTHORIZATION_DENIED, 'scope_attribute_missing', withPolicy);
        }
      }
    }

    // 6. Single-record lookups: missing and out-of-scope look the same.
    if (lookup && resource !== null) {
      if (!context.resolveResource) {
        log.error('Lookup operation authorized without a resource resolver', undefined, {
          operation: request.operation.name,
        });
        return denial(ERROR_CODES.NOT_FOUND, 'resolver_missing', withPolicy);
      }
      let record: Readonly<Record<string, unknown>> | null;
      try {
        record = await context.resolveResource(resource);
      } catch (error) {
        return denial(ERROR_CODES.NOT_FOUND, 'resolver_failed', { ...withPolicy, failure: error });
      }
      if (!record) return denial(ERROR_CODES.NOT_FOUND, 'resource_missing', withPolicy);
      if (scopeFilter && !matchesScope(scopeFilter, record)) {
        return denial(ERROR_CODES.NOT_FOUND, 'resource_out_of_scope', withPolicy);
      }
    }

    const masks = rolePolicy?.masks ?? [];
    return {
      outcome: 'ALLOW',
      denialReason: null,
      ...withPolicy,
      scopeFilter,
      fieldMask: masks.length > 0 ? Object.freeze({ role: principal.role, rules: masks }) : null,
      detail: null,
    };
  }

  private async trackDenial(decision: AccessDecision, snapshot: PolicySnapshot | null, log: Logger): Promise<void> {
    if (!this.denials || decision.principalId === null) return;
    const policy = snapshot?.alerts ?? DEFAULT_ALERT_POLICY;
    let count: number;
    try {
      count = await this.denials.record(decision.principalId, policy.repeatedDenialWindowSeconds);
    } catch (error) {
      log.error('Denial tracking failed', toError(error), { principalId: decision.principalId });
      return;
    }
    if (count === policy.repeatedDenialThreshold) {
      this.alerts?.raise({
        kind: 'repeated_denials',
        severity: 'high',
        principalId: decision.principalId,
        summary: `${count} denials within ${policy.repeatedDenialWindowSeconds}s`,
        details: {
          count,
          windowSeconds: policy.repeatedDenialWindowSeconds,
          lastOperation: decision.operation.name,
          role: decision.role,
        },
      });
    }
  }
}
