/**
 * Compiled, deep-frozen policy snapshot types.
 *
 * @module policy/types
 */

import type { Role } from '../types/index.js';

export type MaskStrategy = 'ssn' | 'dob' | 'account_number' | 'redact';

export interface FieldMaskRule {
  readonly field: string;
  readonly strategy: MaskStrategy;
}

export type ScopeSource =
  | { readonly kind: 'principal_id' }
  | { readonly kind: 'scope_attribute'; readonly name: string };

/** Parsed form of a template such as `assigned_to = principal.id`. */
export interface ScopeTemplate {
  readonly expression: string;
  readonly field: string;
  readonly source: ScopeSource;
}

export interface ResourcePolicy {
  readonly scopes: Readonly<Partial<Record<Role, ScopeTemplate>>>;
}

export interface RouteRule {
  readonly pattern: string;
  readonly resource: string | null;
  /** Whether the route addresses one record that must be resolved and scope-checked. */
  readonly lookup: boolean;
}

export interface ToolRule {
  readonly name: string;
  readonly requiredRoles: readonly Role[];
  readonly resource: string | null;
  readonly lookup: boolean;
}

export interface RolePolicy {
  readonly routes: readonly string[];
  readonly tools: readonly string[];
  readonly masks: readonly FieldMaskRule[];
}

export interface IsolationPolicy {
  readonly minimumSampleSize: number;
  readonly disparityRatioFloor: number;
  readonly collectionOperations: readonly string[];
  /** Operations whose ALLOW may read statistics from the isolated partition. */
  readonly aggregateOperations: readonly string[];
}

export interface AlertPolicy {
  readonly repeatedDenialThreshold: number;
  readonly repeatedDenialWindowSeconds: number;
}

export interface PolicySnapshot {
  readonly version: string;
  /** Monotonic per store; increments on every successful load. */
  readonly revision: number;
  readonly loadedAt: string;
  readonly source: string;
  readonly isolation: IsolationPolicy;
  readonly alerts: AlertPolicy;
  readonly resources: Readonly<Record<string, ResourcePolicy>>;
  readonly routes: Readonly<Record<string, RouteRule>>;
  readonly tools: Readonly<Record<string, ToolRule>>;
  readonly roles: Readonly<Partial<Record<Role, RolePolicy>>>;
}
