import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { readFile, writeFile } from 'fs/promises';
import { IngestionOrchestrator, planExecution, type ProgressSink } from '../IngestionOrchestrator.js';
import { FileNormalizer } from '../FileNormalizer.js';
import { FileSystemStorage } from '../../storage/FileSystemStorage.js';
import { listNormalizedFiles } from '../../corpus/normalizedTree.js';
import { readLedger } from '../RejectionLedger.js';
import type { FileTask, IngestionOptions } from '../types.js';
import { SetupError } from '../../../utils/errors.js';
import { makeTempDir, removeDir, stubExtractor, writeRules, writeTree } from '../../../test-support/fsFixtures.js';

describe('planExecution', () => {
  it('stays sequential at or below the threshold', () => {
    expect(planExecution(10, 8, 10, 0.7)).toEqual({ mode: 'sequential', workers: 1 });
  });

  it('uses a fraction of the available parallelism above the threshold', () => {
    expect(planExecution(11, 8, 10, 0.7)).toEqual({ mode: 'parallel', workers: 5 });
  });

  it('never plans more workers than files', () => {
    expect(planExecution(12, 32, 10, 0.7)).toEqual({ mode: 'parallel', workers: 12 });
  });

  it('falls back to sequential when only one worker fits', () => {
    expect(planExecution(50, 2, 10, 0.7)).toEqual({ mode: 'sequential', workers: 1 });
  });
});

describe('IngestionOrchestrator', () => {
  let root: string;
  let options: IngestionOptions;

  const pad = (value: number): string => String(value).padStart(3, '0');

  beforeEach(async () => {
    root = await makeTempDir('ingest-');
    options = {
      sourceRoot: join(root, 'raw'),
      destRoot: join(root, 'out'),
      rulesPath: await writeRules(join(root, 'rules.yaml'), {
        sourceGroups: ['reddit', ['news']],
        excludeFolders: ['_files'],
        excludeFilePrefixes: ['fig_'],
      }),
    };
  });

  afterEach(async () => {
    await removeDir(root);
  });

  const orchestrator = (task?: FileTask): IngestionOrchestrator =>
    new IngestionOrchestrator({
      task,
      extractor: stubExtractor(() => 'Post body'),
      availableParallelism: () => 8,
      parallelThreshold: 10,
      workerFraction: 0.7,
    });

  it('normalizes a dated source into the mirrored folder', async () => {
    await writeTree(options.sourceRoot, { 'reddit/2021/Apr. 15, 2021_post.pdf': '%PDF-stub' });

    const report = await orchestrator().run(options);

    expect(report.mode).toBe('sequential');
    expect(report.total).toBe(1);
    expect(report.accepted).toEqual(['reddit/2021/Apr. 15, 2021_post.pdf']);
    expect(report.rejected).toEqual([]);
    expect(report.ledgerPath).toBe(join(root, 'failed_date_parsing.txt'));
    expect(
      await readFile(join(options.destRoot, 'reddit', '2021', '2021-04-15_Apr_15_2021_post.txt'), 'utf-8')
    ).toBe('Post body');
    expect(await readLedger(report.ledgerPath)).toEqual([]);
  });

  it('records an undated source in the ledger and writes nothing for it', async () => {
    await writeTree(options.sourceRoot, {
      'reddit/2019/2019 News.docx': 'stub',
      'reddit/2019/fig_2019-01-01.pdf': 'excluded',
      'elsewhere/2019-01-01_x.txt': 'outside',
    });

    const report = await orchestrator().run(options);
    const source = join(options.sourceRoot, 'reddit', '2019', '2019 News.docx');

    expect(report.total).toBe(1);
    expect(report.accepted).toEqual([]);
    expect(report.rejected).toEqual([{ relativePath: 'reddit/2019/2019 News.docx', absolutePath: source, reason: 'no_date' }]);
    expect(await listNormalizedFiles(options.destRoot)).toEqual([]);
    expect(await readLedger(report.ledgerPath)).toEqual([source]);
  });

  it('is idempotent and never overwrites an existing destination', async () => {
    await writeTree(options.sourceRoot, { 'news/2020-03-04_brief.txt': 'source' });
    const destination = join(options.destRoot, 'news', '2020-03-04_2020-03-04_brief.txt');

    const first = await orchestrator().run(options);
    await writeFile(destination, 'edited', 'utf-8');
    const second = await orchestrator().run(options);

    expect(second.accepted).toEqual(first.accepted);
    expect(second.rejected).toEqual(first.rejected);
    expect(await readFile(destination, 'utf-8')).toBe('edited');
  });

  it('recovers a source whose task crashed when its destination already exists', async () => {
    await writeTree(options.sourceRoot, { 'news/2020-03-04_brief.txt': 'source' });
    await orchestrator().run(options);

    const crashing: FileTask = {
      normalize: async () => {
        throw new Error('worker died');
      },
    };
    const report = await orchestrator(crashing).run(options);

    expect(report.accepted).toEqual(['news/2020-03-04_brief.txt']);
    expect(report.trulyMissing).toEqual([]);
    expect(await readLedger(report.ledgerPath)).toEqual([]);
  });

  it('reports conversion failures in the ledger', async () => {
    await writeTree(options.sourceRoot, { 'news/2020-03-04_scan.html': '<html><body></body></html>' });
    const report = await new IngestionOrchestrator({ availableParallelism: () => 1 }).run(options);

    expect(report.rejected.map(entry => entry.reason)).toEqual(['conversion_failed']);
    expect(await readLedger(report.ledgerPath)).toEqual([join(options.sourceRoot, 'news', '2020-03-04_scan.html')]);
  });

  it('surfaces a file whose parallel task died as truly missing', async () => {
    const files: Record<string, string> = {};
    for (let i = 0; i < 100; i++) {
      files[`news/report ${pad(i)} 2021-03-15.txt`] = `report ${i}`;
    }
    for (let i = 0; i < 5; i++) {
      files[`news/undated ${i}.txt`] = 'no date';
    }
    await writeTree(options.sourceRoot, files);

    const normalizer = new FileNormalizer({
      destRoot: options.destRoot,
      storage: new FileSystemStorage(options.destRoot),
    });
    const task: FileTask = {
      normalize: async source => {
        if (source.relativePath === 'news/report 057 2021-03-15.txt') {
          throw new Error('worker died');
        }
        return normalizer.normalize(source);
      },
    };

    const warnings: string[] = [];
    const progress: ProgressSink = {
      update: () => undefined,
      complete: () => undefined,
      warn: message => {
        warnings.push(message);
      },
    };

    const report = await orchestrator(task).run(options, progress);

    expect(report.mode).toBe('parallel');
    expect(report.workers).toBe(5);
    expect(report.total).toBe(105);
    expect(report.accepted).toHaveLength(99);
    expect(report.trulyMissing).toEqual(['news/report 057 2021-03-15.txt']);
    expect(report.rejected.filter(entry => entry.reason === 'no_date')).toHaveLength(5);
    expect(warnings).toEqual(['1 files were not reported by their tasks', '1 unreported files added to the ledger']);

    const ledger = await readLedger(report.ledgerPath);
    expect(ledger).toHaveLength(6);
    expect(ledger).toContain(join(options.sourceRoot, 'news', 'report 057 2021-03-15.txt'));
    expect(await listNormalizedFiles(options.destRoot)).toHaveLength(99);
  });

  it('writes one file per destination and ledgers the sources that collide with it', async () => {
    await writeTree(options.sourceRoot, {
      'reddit/2021/Apr. 15, 2021 post.txt': 'first spelling',
      'reddit/2021/Apr 15, 2021_post.txt': 'second spelling',
    });
    const loser = join(options.sourceRoot, 'reddit', '2021', 'Apr. 15, 2021 post.txt');
    const expectedRejection = {
      relativePath: 'reddit/2021/Apr. 15, 2021 post.txt',
      absolutePath: loser,
      reason: 'error:destination collision with reddit/2021/Apr 15, 2021_post.txt',
    };

    for (let round = 0; round < 2; round++) {
      const report = await new IngestionOrchestrator({ availableParallelism: () => 1 }).run(options);

      expect(report.accepted).toEqual(['reddit/2021/Apr 15, 2021_post.txt']);
      expect(report.rejected).toEqual([expectedRejection]);
      expect(report.trulyMissing).toEqual([]);
      expect(await readLedger(report.ledgerPath)).toEqual([loser]);
    }

    const written = await listNormalizedFiles(options.destRoot);
    expect(written.map(file => file.relativePath)).toEqual(['reddit/2021/2021-04-15_Apr_15_2021_post.txt']);
    expect(await readFile(written[0].absolutePath, 'utf-8')).toBe('second spelling');
  });

  it('fails setup for a missing rules file or source directory', async () => {
    await expect(orchestrator().run({ ...options, rulesPath: join(root, 'absent.yaml') })).rejects.toBeInstanceOf(
      SetupError
    );
    await expect(orchestrator().run(options)).rejects.toBeInstanceOf(SetupError);
  });

  it('fails setup when the destination cannot be created', async () => {
    await writeTree(root, { 'raw/news/2020-01-01_a.txt': 'a', blocker: 'a regular file' });
    await expect(orchestrator().run({ ...options, destRoot: join(root, 'blocker', 'out') })).rejects.toBeInstanceOf(
      SetupError
    );
  });
});
