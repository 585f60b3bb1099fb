import { readFile, writeFile, mkdir } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { compareStrings } from '../../utils/paths.js';
import type { IngestionRules } from '../../config/validation.js';
import type { LedgerEntry } from './types.js';

export const LEDGER_FILE_NAME = 'failed_date_parsing.txt';

/** The ledger sits next to the destination root, not inside it. */
export const ledgerPathFor = (destRoot: string): string => join(dirname(resolve(destRoot)), LEDGER_FILE_NAME);

export function formatLedger(entries: readonly LedgerEntry[], rules: IngestionRules): string {
  const header = [
    '# Source files that did not produce a normalized document',
    '# Expected destination name: YYYY-MM-DD_<name>.txt',
    '# Dates are read from the file name only',
    '#',
    '# Excluded by the active rules (not listed below):',
    `# - Top-level folders other than: ${rules.sourceFolders.join(', ')}`,
    ...rules.excludeFolders.map(folder => `# - Folders named or containing: ${folder}`),
    ...rules.excludeFilePrefixes.map(prefix => `# - Files starting with: ${prefix}`),
    ...rules.excludePathPatterns.map(pattern => `# - Paths containing: ${pattern}`),
    '',
  ];

  const paths = [...new Set(entries.map(entry => entry.absolutePath))].sort(compareStrings);
  return [...header, ...paths].join('\n') + '\n';
}

export async function writeLedger(
  ledgerPath: string,
  entries: readonly LedgerEntry[],
  rules: IngestionRules
): Promise<void> {
  await mkdir(dirname(ledgerPath), { recursive: true });
  await writeFile(ledgerPath, formatLedger(entries, rules), 'utf-8');
}

export function parseLedger(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

export async function readLedger(ledgerPath: string): Promise<string[]> {
  return parseLedger(await readFile(ledgerPath, 'utf-8'));
}
