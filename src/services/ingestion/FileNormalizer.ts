import { access } from 'fs/promises';
import { basename } from 'path';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import {
  ConversionError,
  DateUnresolvedError,
  SourceMissingError,
  errorMessage,
} from '../../utils/errors.js';
import { formatIsoDate } from '../../domain/dates/CalendarDate.js';
import type { SourceFile } from '../../domain/entities/SourceFile.js';
import { dateResolver as defaultResolver, type DateResolver } from '../dates/DateResolver.js';
import { buildDestination } from '../naming/PathBuilder.js';
import type { DocumentStorage } from '../storage/DocumentStorage.interface.js';
import { DocumentProcessor, type TextExtractor } from './DocumentProcessor.js';
import type { FileOutcome, FileTask, RejectedOutcome } from './types.js';

export interface FileNormalizerOptions {
  destRoot: string;
  storage: DocumentStorage;
  extractor?: TextExtractor;
  resolver?: DateResolver;
  pathLimit?: number;
}

/** One source file: resolve date, place, extract, write. */
export class FileNormalizer implements FileTask {
  private destRoot: string;
  private storage: DocumentStorage;
  private extractor: TextExtractor;
  private resolver: DateResolver;
  private pathLimit: number;

  constructor(options: FileNormalizerOptions) {
    this.destRoot = options.destRoot;
    this.storage = options.storage;
    this.extractor = options.extractor ?? new DocumentProcessor();
    this.resolver = options.resolver ?? defaultResolver;
    this.pathLimit = options.pathLimit ?? config.pipeline.pathLimit;
  }

  async normalize(source: SourceFile): Promise<FileOutcome> {
    try {
      return await this.process(source);
    } catch (error) {
      return this.reject(source, error);
    }
  }

  private async process(source: SourceFile): Promise<FileOutcome> {
    const date = this.resolver.resolveFromFilename(basename(source.absolutePath));
    if (!date) {
      throw new DateUnresolvedError(`No date pattern in file name: ${source.relativePath}`);
    }

    const destination = buildDestination(source.relativePath, date, this.destRoot, this.pathLimit);

    try {
      await access(source.absolutePath);
    } catch (error) {
      throw new SourceMissingError(`Source file vanished: ${source.relativePath}`, error);
    }

    const isoDate = formatIsoDate(date);
    if (await this.storage.exists(destination)) {
      logger.debug({ file: source.relativePath, destination }, 'Destination already present');
      return { status: 'accepted', source, destination, date: isoDate, written: false };
    }

    const extracted = await this.extractor.extract(source);
    const stored = await this.storage.store(destination, extracted.text);

    logger.debug({ file: source.relativePath, destination, date: isoDate }, 'Normalized file');
    return { status: 'accepted', source, destination, date: isoDate, written: stored.written };
  }

  private reject(source: SourceFile, error: unknown): RejectedOutcome {
    if (error instanceof DateUnresolvedError) {
      logger.debug({ file: source.relativePath }, error.message);
      return { status: 'rejected', source, reason: 'no_date' };
    }
    if (error instanceof SourceMissingError) {
      logger.warn({ file: source.relativePath }, error.message);
      return { status: 'rejected', source, reason: 'source_missing' };
    }
    if (error instanceof ConversionError) {
      logger.warn({ file: source.relativePath, detail: error.message }, 'Text conversion failed');
      return { status: 'rejected', source, reason: 'conversion_failed', detail: error.message };
    }

    const message = errorMessage(error);
    logger.warn({ error, file: source.relativePath }, 'Unexpected failure while normalizing');
    return { status: 'rejected', source, reason: `error:${message}`, detail: message };
  }
}
