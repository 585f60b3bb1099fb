import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { join } from 'path';
import { writeFile } from 'fs/promises';
import { explainLedger } from '../LedgerDiagnosis.js';
import { makeTempDir, removeDir, writeTree } from '../../../test-support/fsFixtures.js';

describe('explainLedger', () => {
  let root: string;

  beforeAll(async () => {
    root = await makeTempDir('explain-');
    await writeTree(root, {
      'raw/reddit/2019 News.docx': 'a',
      'raw/reddit/Oct_2018 News.docx': 'b',
    });
  });

  afterAll(async () => {
    await removeDir(root);
  });

  it('reports existence and what each name resolves to now', async () => {
    const undated = join(root, 'raw', 'reddit', '2019 News.docx');
    const renamed = join(root, 'raw', 'reddit', 'Oct_2018 News.docx');
    const gone = join(root, 'raw', 'reddit', 'gone 2021-01-01.txt');
    const ledgerPath = join(root, 'failed_date_parsing.txt');
    await writeFile(ledgerPath, `# header\n\n${undated}\n${renamed}\n${gone}\n`, 'utf-8');

    expect(await explainLedger(ledgerPath)).toEqual([
      { path: undated, exists: true, resolvedDate: null, rule: null, verdict: 'no_date' },
      { path: renamed, exists: true, resolvedDate: '2018-10-01', rule: 'month-name-year', verdict: 'date_resolves' },
      { path: gone, exists: false, resolvedDate: '2021-01-01', rule: 'year-month-day', verdict: 'missing' },
    ]);
  });
});
