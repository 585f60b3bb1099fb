import { access } from 'fs/promises';
import { basename } from 'path';
import { formatIsoDate } from '../../domain/dates/CalendarDate.js';
import { dateResolver as defaultResolver, type DateResolver } from '../dates/DateResolver.js';
import { readLedger } from '../ingestion/RejectionLedger.js';

export interface LedgerDiagnosis {
  path: string;
  exists: boolean;
  resolvedDate: string | null;
  rule: string | null;
  verdict: 'missing' | 'no_date' | 'date_resolves';
}

/** Re-checks each ledger path: does it still exist, and what does its name resolve to now. */
export async function explainLedger(ledgerPath: string, resolver: DateResolver = defaultResolver): Promise<LedgerDiagnosis[]> {
  const diagnoses: LedgerDiagnosis[] = [];
  for (const path of await readLedger(ledgerPath)) {
    const exists = await access(path).then(
      () => true,
      () => false
    );
    const match = resolver.matchFilename(basename(path));
    diagnoses.push({
      path,
      exists,
      resolvedDate: match ? formatIsoDate(match.date) : null,
      rule: match?.rule ?? null,
      verdict: !exists ? 'missing' : match ? 'date_resolves' : 'no_date',
    });
  }
  return diagnoses;
}
