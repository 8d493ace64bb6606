/**
 * Field masking for roles that see records without direct identifiers.
 *
 * Masks are applied by field name, at any depth, to HTTP responses, agent
 * tool output and ledger query results.
 *
 * @module access/fieldMask
 */

import type { Role } from '../types/index.js';
import type { FieldMaskRule, MaskStrategy } from '../policy/types.js';

export interface FieldMask {
  readonly role: Role;
  readonly rules: readonly FieldMaskRule[];
}

export const REDACTED = '[REDACTED]';

/** `123-45-6789` → `***-**-6789`. */
export function maskSsn(value: string): string {
  const digits = value.replace(/\D/g, '');
  return digits.length >= 4 ? `***-**-${digits.slice(-4)}` : '***-**-****';
}

/** `1985-06-15` → `1985-**-**`. */
export function maskDob(value: string): string {
  const year = /^(\d{4})/.exec(value)?.[1];
  return year ? `${year}-**-**` : '****-**-**';
}

/** `12345678` → `****5678`. */
export function maskAccountNumber(value: string): string {
  const digits = value.replace(/\D/g, '');
  return digits.length >= 4 ? `****${digits.slice(-4)}` : '****';
}

const MASKERS: Record<MaskStrategy, (value: string) => string> = {
  ssn: maskSsn,
  dob: maskDob,
  account_number: maskAccountNumber,
  redact: () => REDACTED,
};

function maskScalar(value: unknown, strategy: MaskStrategy): unknown {
  if (value === null || value === undefined) return value;
  if (value instanceof Date) return MASKERS[strategy](value.toISOString());
  if (typeof value === 'string' || typeof value === 'number') return MASKERS[strategy](String(value));
  return REDACTED;
}

function maskValue(value: unknown, rules: ReadonlyMap<string, MaskStrategy>): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => maskValue(item, rules));
  }
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    const result: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      const strategy = rules.get(key);
      result[key] = strategy ? maskScalar(child, strategy) : maskValue(child, rules);
    }
    return result;
  }
  return value;
}

/**
 * Return a masked copy of `value`. With no mask (or an empty one) the value
 * is returned unchanged.
 */
export function applyFieldMask(value: unknown, mask: FieldMask | null): unknown {
  if (!mask || mask.rules.length === 0) return value;
  return maskValue(value, new Map(mask.rules.map((rule) => [rule.field, rule.strategy])));
}

/** {@link applyFieldMask} for a record, keeping the record type. */
export function maskRecord(
  record: Record<string, unknown>,
  mask: FieldMask | null,
): Record<string, unknown> {
  if (!mask || mask.rules.length === 0) return record;
  const rules = new Map(mask.rules.map((rule) => [rule.field, rule.strategy]));
  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(record)) {
    const strategy = rules.get(key);
    result[key] = strategy ? maskScalar(child, strategy) : maskValue(child, rules);
  }
  return result;
}
