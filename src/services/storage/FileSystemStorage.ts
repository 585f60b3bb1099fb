import { mkdir, writeFile, readFile, access } from 'fs/promises';
import { dirname } from 'path';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { DocumentStorageError } from '../../utils/errors.js';
import type { DocumentStorage, StoredDocument } from './DocumentStorage.interface.js';

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

export class FileSystemStorage implements DocumentStorage {
  readonly basePath: string;

  constructor(basePath: string = config.pipeline.destDir) {
    this.basePath = basePath;
  }

  async init(): Promise<void> {
    try {
      await mkdir(this.basePath, { recursive: true });
      logger.info({ path: this.basePath }, 'Document storage initialized');
    } catch (error) {
      logger.error({ error, path: this.basePath }, 'Failed to initialize storage');
      throw new DocumentStorageError('Storage initialization failed', error);
    }
  }

  /** Writes UTF-8 text; an existing file at `path` is never overwritten. */
  async store(path: string, text: string): Promise<StoredDocument> {
    const content = Buffer.from(text, 'utf-8');
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, new Uint8Array(content), { flag: 'wx' });

      logger.debug({ path, size: content.length }, 'Document stored');
      return { path, size: content.length, written: true };
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        logger.debug({ path }, 'Document already present, left untouched');
        return { path, size: content.length, written: false };
      }
      logger.error({ error, path }, 'Failed to store document');
      throw new DocumentStorageError('Document storage failed', error);
    }
  }

  async retrieve(path: string): Promise<string> {
    try {
      const content = await readFile(path, 'utf-8');
      logger.debug({ path, size: content.length }, 'Document retrieved');
      return content;
    } catch (error) {
      logger.error({ error, path }, 'Failed to retrieve document');
      throw new DocumentStorageError('Document retrieval failed', error);
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }
}
