/**
 * Compiles a validated policy document into a deep-frozen snapshot, and the
 * lookups the gateway runs against one.
 *
 * @module policy/policySnapshot
 */

import { ROLES, type Role } from '../types/index.js';
import { SCOPE_TEMPLATE_PATTERN, type PolicyDocument } from './policySchema.js';
import type {
  PolicySnapshot,
  ResourcePolicy,
  RolePolicy,
  RouteRule,
  ScopeTemplate,
  ToolRule,
} from './types.js';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function own<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function parseScopeTemplate(expression: string): ScopeTemplate {
  const match = SCOPE_TEMPLATE_PATTERN.exec(expression);
  const field = match?.[1];
  const source = match?.[2];
  if (field === undefined || source === undefined) {
    throw new Error(`Invalid scope template "${expression}"`);
  }
  return {
    expression: expression.trim(),
    field,
    source:
      source === 'id'
        ? { kind: 'principal_id' }
        : { kind: 'scope_attribute', name: source.slice('scope.'.length) },
  };
}

// ─── Compilation ─────────────────────────────────────────────────────────────

export interface SnapshotMeta {
  revision: number;
  loadedAt: Date;
  source: string;
}

export function compilePolicy(document: PolicyDocument, meta: SnapshotMeta): PolicySnapshot {
  const resources: Record<string, ResourcePolicy> = {};
  for (const [name, definition] of Object.entries(document.resources)) {
    const scopes: Partial<Record<Role, ScopeTemplate>> = {};
    for (const role of ROLES) {
      const expression = own(definition.scopes, role);
      if (expression !== undefined) scopes[role] = parseScopeTemplate(expression);
    }
    resources[name] = { scopes };
  }

  const routes: Record<string, RouteRule> = {};
  for (const [pattern, rule] of Object.entries(document.routes)) {
    routes[pattern] = { pattern, resource: rule.resource ?? null, lookup: rule.lookup };
  }

  const tools: Record<string, ToolRule> = {};
  for (const [name, rule] of Object.entries(document.tools)) {
    tools[name] = {
      name,
      requiredRoles: [...new Set(rule.requiredRoles)],
      resource: rule.resource ?? null,
      lookup: rule.lookup,
    };
  }

  const roles: Partial<Record<Role, RolePolicy>> = {};
  for (const role of ROLES) {
    const policy = own(document.roles, role);
    if (policy !== undefined) {
      roles[role] = { routes: policy.routes, tools: policy.tools, masks: policy.masks };
    }
  }

  return deepFreeze({
    version: document.version,
    revision: meta.revision,
    loadedAt: meta.loadedAt.toISOString(),
    source: meta.source,
    isolation: {
      minimumSampleSize: document.isolation.minimumSampleSize,
      disparityRatioFloor: document.isolation.disparityRatioFloor,
      collectionOperations: document.isolation.collectionOperations,
      aggregateOperations: document.isolation.aggregateOperations,
    },
    alerts: {
      repeatedDenialThreshold: document.alerts.repeatedDenialThreshold,
      repeatedDenialWindowSeconds: document.alerts.repeatedDenialWindowSeconds,
    },
    resources,
    routes,
    tools,
    roles,
  });
}

// ─── Lookups ─────────────────────────────────────────────────────────────────

/**
 * Match a concrete request line (`GET /api/applications/42`) or a pattern
 * against a catalogue pattern (`GET /api/applications/:applicationId`).
 */
export function routePatternMatches(pattern: string, name: string): boolean {
  if (pattern === name) return true;
  const [patternMethod, patternPath] = pattern.split(' ', 2);
  const [method, path] = name.split(' ', 2);
  if (patternMethod !== method || patternPath === undefined || path === undefined) return false;

  const expected = patternPath.split('/');
  const actual = path.split('/');
  if (expected.length !== actual.length) return false;
  return expected.every((segment, i) => {
    const candidate = actual[i] ?? '';
    return segment.startsWith(':') ? candidate.length > 0 : segment === candidate;
  });
}

export function findRouteRule(snapshot: PolicySnapshot, name: string): RouteRule | undefined {
  const exact = own(snapshot.routes, name);
  if (exact) return exact;
  return Object.values(snapshot.routes).find((rule) => routePatternMatches(rule.pattern, name));
}

export function findToolRule(snapshot: PolicySnapshot, name: string): ToolRule | undefined {
  return own(snapshot.tools, name);
}

export function rolePolicyFor(snapshot: PolicySnapshot, role: Role): RolePolicy | undefined {
  return snapshot.roles[role];
}

export function scopeTemplateFor(
  snapshot: PolicySnapshot,
  resource: string,
  role: Role,
): ScopeTemplate | undefined {
  return own(snapshot.resources, resource)?.scopes[role];
}

export function isCollectionOperation(snapshot: PolicySnapshot, operationName: string): boolean {
  return snapshot.isolation.collectionOperations.includes(operationName);
}
