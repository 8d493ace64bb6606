/**
 * Demographic Detector
 *
 * Heuristic detection of demographic content in structured payloads, by
 * field name (`applicantRace`, `Marital Status`, `co-applicant-age`) and by
 * value (`Hispanic or Latino`). Terms live in `config/demographic-terms.json`.
 *
 * Findings carry field paths only; values never leave the scan except as
 * the captured attributes handed to the isolated partition.
 *
 * @module isolation/demographicDetector
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { isPlainRecord } from '../logging/piiScrubber.js';
import { DEMOGRAPHIC_ATTRIBUTES, type DemographicAttribute, type DemographicFinding } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_TERMS_PATH = path.resolve(__dirname, '..', '..', 'config', 'demographic-terms.json');

// ─── Term List ───────────────────────────────────────────────────────────────

const AttributeSchema = z.enum(['race', 'ethnicity', 'sex', 'ageBand', 'other']);

const TermsSchema = z.object({
  fieldKeywords: z.record(z.string(), AttributeSchema),
  exactFieldNames: z.record(z.string(), AttributeSchema).default({}),
  exactValues: z.record(z.string(), z.array(z.string())).default({}),
  phrases: z.record(z.string(), z.array(z.string())).default({}),
});

export interface DemographicTerms {
  fieldKeywords: Record<string, DemographicAttribute | 'other'>;
  exactFieldNames: Record<string, DemographicAttribute | 'other'>;
  exactValues: Partial<Record<DemographicAttribute, string[]>>;
  phrases: Partial<Record<DemographicAttribute, string[]>>;
}

function isDemographicAttribute(value: string): value is DemographicAttribute {
  return DEMOGRAPHIC_ATTRIBUTES.some((entry) => entry === value);
}

function byAttribute(table: Record<string, string[]>): Partial<Record<DemographicAttribute, string[]>> {
  const out: Partial<Record<DemographicAttribute, string[]>> = {};
  for (const [attribute, terms] of Object.entries(table)) {
    if (!isDemographicAttribute(attribute)) {
      throw new Error(`Unknown demographic attribute "${attribute}" in term list`);
    }
    out[attribute] = terms.map(normalizeText);
  }
  return out;
}

export function parseDemographicTerms(raw: unknown): DemographicTerms {
  const parsed = TermsSchema.parse(raw);
  return {
    fieldKeywords: parsed.fieldKeywords,
    exactFieldNames: parsed.exactFieldNames,
    exactValues: byAttribute(parsed.exactValues),
    phrases: byAttribute(parsed.phrases),
  };
}

export function loadDemographicTerms(filePath: string = DEFAULT_TERMS_PATH): DemographicTerms {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
  return parseDemographicTerms(raw);
}

// ─── Normalisation ───────────────────────────────────────────────────────────

/** `coApplicant-Age` → `co_applicant_age`. */
export function normalizeFieldName(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .replace(/[\s.-]+/g, '_');
}

export function normalizeText(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** Bucket a numeric age; band strings such as `35-44` pass through. */
export function toAgeBand(value: unknown): string | null {
  const age = typeof value === 'number' ? value : typeof value === 'string' && /^\d{1,3}$/.test(value.trim()) ? Number(value) : null;
  if (age === null) {
    return typeof value === 'string' && value.trim() ? value.trim() : null;
  }
  if (age < 25) return '<25';
  if (age < 35) return '25-34';
  if (age < 45) return '35-44';
  if (age < 55) return '45-54';
  if (age < 65) return '55-64';
  if (age < 75) return '65-74';
  return '>74';
}

// ─── Detector ────────────────────────────────────────────────────────────────

export interface DetectionScan {
  findings: DemographicFinding[];
  /** The payload with every detected field removed. */
  cleaned: Record<string, unknown>;
  /** First stripped value per stored attribute. */
  captured: Partial<Record<DemographicAttribute, string>>;
}

interface ScanState {
  findings: DemographicFinding[];
  captured: Partial<Record<DemographicAttribute, string>>;
}

export class DemographicDetector {
  constructor(private readonly terms: DemographicTerms = loadDemographicTerms()) {}

  classifyFieldName(name: string): DemographicAttribute | 'other' | null {
    const normalized = normalizeFieldName(name);
    const exact = this.terms.exactFieldNames[normalized];
    if (exact) return exact;
    const padded = `_${normalized}_`;
    for (const [keyword, attribute] of Object.entries(this.terms.fieldKeywords)) {
      if (padded.includes(`_${keyword}_`)) return attribute;
    }
    return null;
  }

  classifyValue(value: unknown): DemographicAttribute | null {
    if (typeof value !== 'string') return null;
    const text = normalizeText(value);
    if (!text) return null;
    for (const attribute of DEMOGRAPHIC_ATTRIBUTES) {
      if (this.terms.exactValues[attribute]?.includes(text)) return attribute;
    }
    return this.findPhrase(text)?.attribute ?? null;
  }

  /** First listed phrase occurring in already-normalised text. */
  findPhrase(text: string): { attribute: DemographicAttribute; phrase: string } | null {
    for (const attribute of DEMOGRAPHIC_ATTRIBUTES) {
      for (const phrase of this.terms.phrases[attribute] ?? []) {
        if (new RegExp(`\\b${escapeRegExp(phrase)}\\b`).test(text)) return { attribute, phrase };
      }
    }
    return null;
  }

  /** Multi-word phrases safe to look for in free text, longest first. */
  phrases(): Array<{ attribute: DemographicAttribute; phrase: string }> {
    return DEMOGRAPHIC_ATTRIBUTES.flatMap((attribute) =>
      (this.terms.phrases[attribute] ?? []).map((phrase) => ({ attribute, phrase })),
    ).sort((a, b) => b.phrase.length - a.phrase.length);
  }

  scan(payload: Record<string, unknown>): DetectionScan {
    const state: ScanState = { findings: [], captured: {} };
    const cleaned = this.scanRecord(payload, '', state);
    return { findings: state.findings, cleaned, captured: state.captured };
  }

  private scanRecord(record: Record<string, unknown>, prefix: string, state: ScanState): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(record)) {
      const fieldPath = prefix ? `${prefix}.${key}` : key;
      const byName = this.classifyFieldName(key);
      if (byName) {
        state.findings.push({ path: fieldPath, method: 'field_name', attribute: byName });
        capture(state, byName, value);
        continue;
      }
      const byValue = this.classifyValue(value);
      if (byValue) {
        state.findings.push({ path: fieldPath, method: 'value_pattern', attribute: byValue });
        capture(state, byValue, value);
        continue;
      }
      out[key] = this.scanValue(value, fieldPath, state);
    }
    return out;
  }

  private scanValue(value: unknown, fieldPath: string, state: ScanState): unknown {
    if (isPlainRecord(value)) return this.scanRecord(value, fieldPath, state);
    if (!Array.isArray(value)) return value;

    const kept: unknown[] = [];
    value.forEach((item, index) => {
      const itemPath = `${fieldPath}.${index}`;
      const byValue = this.classifyValue(item);
      if (byValue) {
        state.findings.push({ path: itemPath, method: 'value_pattern', attribute: byValue });
        capture(state, byValue, item);
        return;
      }
      kept.push(this.scanValue(item, itemPath, state));
    });
    return kept;
  }
}

function capture(state: ScanState, attribute: DemographicAttribute | 'other', value: unknown): void {
  if (attribute === 'other' || state.captured[attribute] !== undefined) return;
  if (attribute === 'ageBand') {
    const band = toAgeBand(value);
    if (band) state.captured.ageBand = band;
    return;
  }
  if (typeof value === 'string' && value.trim()) state.captured[attribute] = value.trim();
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
