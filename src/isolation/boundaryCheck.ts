/**
 * Source-tree scan for code outside `src/isolation/` that reaches into the
 * isolated path. Secondary to the credential check; the test suite runs it
 * over the real tree.
 *
 * @module isolation/boundaryCheck
 */

import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';

export type BoundaryRule = 'internal_import' | 'isolated_schema_reference' | 'isolated_credential_reference';

export interface BoundaryViolation {
  /** Path relative to the scanned root, with forward slashes. */
  file: string;
  line: number;
  rule: BoundaryRule;
  text: string;
}

const IMPORT_PATTERN = /(?:\bfrom\s*|\bimport\s*\(\s*|\bimport\s+)['"]([^'"]+)['"]/g;
const SCHEMA_PATTERN = /\bhmda\.[a-z_]+/i;
const CREDENTIAL_PATTERN =
  /\b(?:createIsolatedPool|mintIsolatedCredential|isIsolatedCredential|PgIsolatedPartition|InMemoryIsolatedPartition)\b/;

const PUBLIC_ENTRY = new Set(['', 'index', 'index.js', 'index.ts']);

async function listSourceFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === 'node_modules') continue;
      files.push(...(await listSourceFiles(full)));
    } else if (entry.isFile() && entry.name.endsWith('.ts')) {
      files.push(full);
    }
  }
  return files;
}

function isInside(child: string, parent: string): boolean {
  const relative = path.relative(parent, child);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

export function scanSource(
  source: string,
  file: string,
  relativeName: string,
  isolationRoot: string,
): BoundaryViolation[] {
  const violations: BoundaryViolation[] = [];
  source.split('\n').forEach((text, index) => {
    const line = index + 1;
    for (const match of text.matchAll(IMPORT_PATTERN)) {
      const specifier = match[1];
      if (!specifier?.startsWith('.')) continue;
      const target = path.resolve(path.dirname(file), specifier);
      if (isInside(target, isolationRoot) && !PUBLIC_ENTRY.has(path.relative(isolationRoot, target))) {
        violations.push({ file: relativeName, line, rule: 'internal_import', text: text.trim() });
      }
    }
    if (SCHEMA_PATTERN.test(text)) {
      violations.push({ file: relativeName, line, rule: 'isolated_schema_reference', text: text.trim() });
    }
    if (CREDENTIAL_PATTERN.test(text)) {
      violations.push({ file: relativeName, line, rule: 'isolated_credential_reference', text: text.trim() });
    }
  });
  return violations;
}

/** Every violation in `.ts` files under `srcRoot`, outside `srcRoot/isolation`. */
export async function findBoundaryViolations(srcRoot: string): Promise<BoundaryViolation[]> {
  const root = path.resolve(srcRoot);
  const isolationRoot = path.join(root, 'isolation');
  const violations: BoundaryViolation[] = [];

  for (const file of await listSourceFiles(root)) {
    if (isInside(file, isolationRoot)) continue;
    const relativeName = path.relative(root, file).split(path.sep).join('/');
    violations.push(...scanSource(await readFile(file, 'utf8'), file, relativeName, isolationRoot));
  }
  return violations.sort((a, b) => a.file.localeCompare(b.file) || a.line - b.line);
}
