/**
 * Data-scope filters.
 *
 * A filter is built from a policy template (`assigned_to = principal.id`)
 * and the principal's identity, then applied by whoever reads the data:
 * the SQL repositories turn it into a WHERE condition, in-process code
 * matches records against it.
 *
 * @module access/scopeFilter
 */

import type { Principal } from '../types/index.js';
import type { ScopeTemplate } from '../policy/types.js';
import { ScopeViolation } from '../utils/errors.js';

export interface ScopeFilter {
  readonly resource: string;
  readonly field: string;
  readonly value: string;
}

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

/**
 * Instantiate a template for a principal. Returns `null` when the template
 * needs a scope attribute the principal does not carry.
 */
export function buildScopeFilter(
  resource: string,
  template: ScopeTemplate,
  principal: Principal,
): ScopeFilter | null {
  const value =
    template.source.kind === 'principal_id'
      ? principal.id
      : principal.scopeAttributes[template.source.name];
  if (value === undefined || value === '') return null;
  return Object.freeze({ resource, field: template.field, value });
}

export function formatScopeFilter(filter: ScopeFilter): string {
  return `${filter.field} = ${filter.value}`;
}

export function matchesScope(filter: ScopeFilter, record: Readonly<Record<string, unknown>>): boolean {
  const actual = record[filter.field];
  return actual !== undefined && actual !== null && String(actual) === filter.value;
}

export function assertInScope(filter: ScopeFilter | null, record: Readonly<Record<string, unknown>>): void {
  if (filter && !matchesScope(filter, record)) {
    throw new ScopeViolation('Record is outside the caller scope', formatScopeFilter(filter));
  }
}

/**
 * Render a filter as a parameterised SQL condition.
 *
 * @param paramIndex - Position of the placeholder (`$n`).
 */
export function toSqlCondition(
  filter: ScopeFilter | null,
  paramIndex: number,
): { text: string; params: string[] } {
  if (!filter) return { text: 'TRUE', params: [] };
  if (!IDENTIFIER.test(filter.field)) {
    throw new Error(`Scope field "${filter.field}" is not a plain column name`);
  }
  return { text: `"${filter.field}" = $${paramIndex}`, params: [filter.value] };
}
