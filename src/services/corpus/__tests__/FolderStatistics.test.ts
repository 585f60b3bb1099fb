import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { join } from 'path';
import { countNormalizedFiles, toCsv } from '../FolderStatistics.js';
import { makeTempDir, removeDir, writeTree } from '../../../test-support/fsFixtures.js';

describe('FolderStatistics', () => {
  let destRoot: string;

  beforeAll(async () => {
    destRoot = await makeTempDir('stats-');
    await writeTree(destRoot, {
      'reddit/2021/2021-01-01_a.txt': 'a',
      'reddit/2021-01-02_b.txt': 'b',
      'news/2021-01-03_c.txt': 'c',
      'news/notes.txt': 'ignored',
      '2021-01-04_root.txt': 'd',
    });
  });

  afterAll(async () => {
    await removeDir(destRoot);
  });

  it('counts normalized files per top-level folder', async () => {
    const counts = await countNormalizedFiles(destRoot);
    expect(counts).toEqual([
      { folder: '.', fileCount: 1 },
      { folder: 'news', fileCount: 1 },
      { folder: 'reddit', fileCount: 2 },
    ]);
    expect(toCsv(counts)).toBe('Folder,File_Count\n.,1\nnews,1\nreddit,2\n');
  });

  it('returns nothing for a missing tree', async () => {
    expect(await countNormalizedFiles(join(destRoot, 'absent'))).toEqual([]);
  });

  it('quotes folder names that need it', () => {
    expect(toCsv([{ folder: 'a,b', fileCount: 3 }])).toBe('Folder,File_Count\n"a,b",3\n');
  });
});
