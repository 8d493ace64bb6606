/**
 * Load policy documents from YAML or JSON.
 *
 * A {@link PolicySource} hides where the document lives; the store only asks
 * it for the raw text and passes an abort signal so slow reads can be cut off.
 *
 * @module policy/policyLoader
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { load as parseYaml } from 'js-yaml';
import { PolicyLoadError } from '../utils/errors.js';
import { PolicyDocumentSchema, formatIssues, type PolicyDocument } from './policySchema.js';

export type PolicyFormat = 'yaml' | 'json';

export interface PolicySource {
  /** Label used in logs and error messages (usually the file path). */
  readonly name: string;
  readonly format: PolicyFormat;
  read(signal: AbortSignal): Promise<string>;
}

/** Defaults to 'yaml' for unknown extensions. */
export function detectFormat(filePath: string): PolicyFormat {
  return extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml';
}

/**
 * Parse and validate a policy document.
 *
 * @throws {PolicyLoadError} `malformed` when the text does not parse,
 *   `invalid` when it does not match the schema.
 */
export function parsePolicyDocument(
  content: string,
  format: PolicyFormat,
  source = '<string>',
): PolicyDocument {
  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new PolicyLoadError(
      `Failed to parse ${format.toUpperCase()} in "${source}": ${err instanceof Error ? err.message : String(err)}`,
      'malformed',
      [],
      err,
    );
  }

  const result = PolicyDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new PolicyLoadError(
      `Invalid policy in "${source}": ${issues.join('; ')}`,
      'invalid',
      issues,
      result.error,
    );
  }
  return result.data;
}

export function createFilePolicySource(filePath: string): PolicySource {
  return {
    name: filePath,
    format: detectFormat(filePath),
    read: (signal) => readFile(filePath, { encoding: 'utf8', signal }),
  };
}

/** A source over an in-memory document, for embedding and tests. */
export function createStaticPolicySource(
  content: string,
  format: PolicyFormat = 'yaml',
  name = '<inline>',
): PolicySource {
  return { name, format, read: async () => content };
}
