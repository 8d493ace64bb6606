/**
 * PII Scrubber
 *
 * Detects and redacts borrower identifiers (SSNs, emails, US phone numbers,
 * bank account numbers) from log messages and structured metadata.
 *
 * @module logging/piiScrubber
 */

// ─── Types ───────────────────────────────────────────────────────────────────

export interface PIIPattern {
  name: string;
  pattern: RegExp;
  replacement: string;
}

export interface PIIScrubber {
  scrub(text: string): string;
  scrubObject(obj: Record<string, unknown>): Record<string, unknown>;
  addPattern(name: string, pattern: RegExp, replacement: string): void;
}

// ─── Default Patterns ────────────────────────────────────────────────────────

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

/** 123-45-6789 or 123 45 6789. */
const SSN_PATTERN = /\b\d{3}[- ]\d{2}[- ]\d{4}\b/g;

/** (555) 123-4567, 555-123-4567, 555.123.4567, +1 555 123 4567. */
const US_PHONE_PATTERN = /(?:\+1[\s.-]?)?(?:\(\d{3}\)\s?|\b\d{3}[\s.-])\d{3}[\s.-]\d{4}\b/g;

/**
 * Bare digit runs long enough to be an account number. Applied after the
 * formatted patterns; nine bare digits are treated as an unformatted SSN.
 */
const BARE_SSN_PATTERN = /\b\d{9}\b/g;
const ACCOUNT_NUMBER_PATTERN = /\b\d{10,17}\b/g;

const BUILT_IN_PATTERNS: readonly PIIPattern[] = [
  { name: 'email', pattern: EMAIL_PATTERN, replacement: '[EMAIL_REDACTED]' },
  { name: 'ssn', pattern: SSN_PATTERN, replacement: '[SSN_REDACTED]' },
  { name: 'phone', pattern: US_PHONE_PATTERN, replacement: '[PHONE_REDACTED]' },
  { name: 'bare_ssn', pattern: BARE_SSN_PATTERN, replacement: '[SSN_REDACTED]' },
  { name: 'account_number', pattern: ACCOUNT_NUMBER_PATTERN, replacement: '[ACCOUNT_REDACTED]' },
];

// ─── Implementation ──────────────────────────────────────────────────────────

export function createPIIScrubber(): PIIScrubber {
  const customPatterns: PIIPattern[] = [];

  function scrub(text: string): string {
    let result = text;
    for (const p of BUILT_IN_PATTERNS) {
      result = result.replace(p.pattern, p.replacement);
    }
    for (const p of customPatterns) {
      result = result.replace(p.pattern, p.replacement);
    }
    return result;
  }

  function scrubValue(value: unknown): unknown {
    if (typeof value === 'string') {
      return scrub(value);
    }
    if (Array.isArray(value)) {
      return value.map(scrubValue);
    }
    if (value instanceof Date) {
      return value;
    }
    if (isPlainRecord(value)) {
      return scrubObject(value);
    }
    return value;
  }

  function scrubObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const key of Object.keys(obj)) {
      result[key] = scrubValue(obj[key]);
    }
    return result;
  }

  function addPattern(name: string, pattern: RegExp, replacement: string): void {
    customPatterns.push({ name, pattern, replacement });
  }

  return { scrub, scrubObject, addPattern };
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
