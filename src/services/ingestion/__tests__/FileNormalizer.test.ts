import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { readFile, writeFile, mkdir } from 'fs/promises';
import { FileNormalizer } from '../FileNormalizer.js';
import { FileSystemStorage } from '../../storage/FileSystemStorage.js';
import type { DocumentStorage } from '../../storage/DocumentStorage.interface.js';
import type { SourceFile } from '../../../domain/entities/SourceFile.js';
import { ConversionError } from '../../../utils/errors.js';
import { makeTempDir, removeDir, stubExtractor, writeTree } from '../../../test-support/fsFixtures.js';

describe('FileNormalizer', () => {
  let root: string;
  let sourceRoot: string;
  let destRoot: string;

  const source = (relativePath: string): SourceFile => ({
    absolutePath: join(sourceRoot, ...relativePath.split('/')),
    relativePath,
    kind: 'text',
  });

  beforeEach(async () => {
    root = await makeTempDir('normalizer-');
    sourceRoot = join(root, 'raw');
    destRoot = join(root, 'out');
    await writeTree(sourceRoot, {
      'news/2020-03-04_minutes.txt': 'Minutes body',
      'news/no date here.txt': 'x',
    });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('writes the extracted text to the dated destination', async () => {
    const normalizer = new FileNormalizer({ destRoot, storage: new FileSystemStorage(destRoot) });
    const outcome = await normalizer.normalize(source('news/2020-03-04_minutes.txt'));

    const destination = join(destRoot, 'news', '2020-03-04_2020-03-04_minutes.txt');
    expect(outcome).toEqual({
      status: 'accepted',
      source: source('news/2020-03-04_minutes.txt'),
      destination,
      date: '2020-03-04',
      written: true,
    });
    expect(await readFile(destination, 'utf-8')).toBe('Minutes body');
  });

  it('leaves an existing destination untouched', async () => {
    const destination = join(destRoot, 'news', '2020-03-04_2020-03-04_minutes.txt');
    await mkdir(join(destRoot, 'news'), { recursive: true });
    await writeFile(destination, 'edited by hand', 'utf-8');

    const normalizer = new FileNormalizer({ destRoot, storage: new FileSystemStorage(destRoot) });
    const outcome = await normalizer.normalize(source('news/2020-03-04_minutes.txt'));

    expect(outcome).toMatchObject({ status: 'accepted', destination, written: false });
    expect(await readFile(destination, 'utf-8')).toBe('edited by hand');
  });

  it('rejects names without a date', async () => {
    const normalizer = new FileNormalizer({ destRoot, storage: new FileSystemStorage(destRoot) });
    const outcome = await normalizer.normalize(source('news/no date here.txt'));
    expect(outcome).toMatchObject({ status: 'rejected', reason: 'no_date' });
  });

  it('rejects a source that vanished before processing', async () => {
    const normalizer = new FileNormalizer({ destRoot, storage: new FileSystemStorage(destRoot) });
    const outcome = await normalizer.normalize(source('news/2020-05-05_gone.txt'));
    expect(outcome).toMatchObject({ status: 'rejected', reason: 'source_missing' });
  });

  it('reports conversion failures', async () => {
    const normalizer = new FileNormalizer({
      destRoot,
      storage: new FileSystemStorage(destRoot),
      extractor: {
        extract: async () => {
          throw new ConversionError('PDF extraction produced no text: scan.pdf');
        },
      },
    });
    const outcome = await normalizer.normalize(source('news/2020-03-04_minutes.txt'));
    expect(outcome).toEqual({
      status: 'rejected',
      source: source('news/2020-03-04_minutes.txt'),
      reason: 'conversion_failed',
      detail: 'PDF extraction produced no text: scan.pdf',
    });
  });

  it('tags any other failure with its message', async () => {
    const storage: DocumentStorage = {
      init: async () => undefined,
      store: async () => {
        throw new Error('disk full');
      },
      retrieve: async () => '',
      exists: async () => false,
    };
    const normalizer = new FileNormalizer({ destRoot, storage, extractor: stubExtractor() });
    const outcome = await normalizer.normalize(source('news/2020-03-04_minutes.txt'));
    expect(outcome).toMatchObject({ status: 'rejected', reason: 'error:disk full' });
  });
});
