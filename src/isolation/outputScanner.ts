/**
 * Secondary scan over generated natural-language output. Statements such as
 * "race is ..." and listed demographic phrases are replaced with a fixed
 * marker; findings name the method and attribute, never the text.
 *
 * @module isolation/outputScanner
 */

import { escapeRegExp, type DemographicDetector } from './demographicDetector.js';
import type { OutputFinding, ScreenedOutput } from './types.js';

export const REDACTION_MARKER = '[demographic content removed]';

/** A demographic label followed by a value, up to the end of the clause. */
const STATEMENT_PATTERN =
  /\b(race|ethnicity|ethnic origin|sex|gender|age group|age band|marital status|national origin)\s*(?:is|was|:|=)\s*[^.;\n]*/gi;

export function screenText(text: string, detector: DemographicDetector): ScreenedOutput {
  const findings: OutputFinding[] = [];

  let screened = text.replace(STATEMENT_PATTERN, (_match, label: string) => {
    findings.push({ method: 'statement_pattern', attribute: detector.classifyFieldName(label) ?? 'other' });
    return REDACTION_MARKER;
  });

  for (const { attribute, phrase } of detector.phrases()) {
    const pattern = new RegExp(`\\b${escapeRegExp(phrase).replace(/ /g, '\\s+')}\\b`, 'gi');
    screened = screened.replace(pattern, () => {
      findings.push({ method: 'value_term', attribute });
      return REDACTION_MARKER;
    });
  }

  return { text: screened, findings };
}
