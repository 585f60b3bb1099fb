import { basename, dirname } from 'path';
import { logger } from '../../utils/logger.js';
import { formatIsoDate, parseIsoDate } from '../../domain/dates/CalendarDate.js';
import { dateResolver as defaultResolver, type DateResolver } from '../dates/DateResolver.js';
import { FileSystemStorage } from '../storage/FileSystemStorage.js';
import type { DocumentStorage } from '../storage/DocumentStorage.interface.js';
import { compareStrings } from '../../utils/paths.js';
import { listNormalizedFiles } from './normalizedTree.js';

export interface NormalizedDocument {
  docId: string;
  date: string;
  title: string;
  source: string;
  text: string;
  path: string;
}

export interface LoadOptions {
  /** Also read a date from the body; it wins over the file name prefix when the two disagree. */
  crossValidate?: boolean;
  resolver?: DateResolver;
  storage?: DocumentStorage;
}

const HEADER_LINE = /^(title|date|source):/i;

export function parseHeaderField(text: string, field: 'Title' | 'Source'): string | null {
  const match = new RegExp(`^${field}:\\s*(.+?)\\s*$`, 'im').exec(text);
  return match ? match[1] : null;
}

/** Drops `Title:`/`Date:`/`Source:` header lines; once a header has been seen, blank lines go too. */
export function extractBody(text: string): string {
  const body: string[] = [];
  let afterHeaders = false;

  for (const line of text.split('\n')) {
    if (HEADER_LINE.test(line)) {
      afterHeaders = true;
      continue;
    }
    if (afterHeaders && line.trim().length === 0) continue;
    body.push(line);
  }

  return body.join('\n').trim();
}

/**
 * Reads the normalized tree back as documents. The `YYYY-MM-DD_` prefix is the
 * date unless `crossValidate` asks for the body to be consulted as well.
 */
export async function loadNormalizedDocuments(destRoot: string, options: LoadOptions = {}): Promise<NormalizedDocument[]> {
  const resolver = options.resolver ?? defaultResolver;
  const storage = options.storage ?? new FileSystemStorage(destRoot);
  const documents: NormalizedDocument[] = [];

  for (const file of await listNormalizedFiles(destRoot)) {
    const prefixDate = parseIsoDate(file.isoDate);
    if (!prefixDate) {
      logger.warn({ file: file.relativePath }, 'Invalid date prefix, skipping');
      continue;
    }

    const content = await storage.retrieve(file.absolutePath);
    let date = prefixDate;
    if (options.crossValidate) {
      const contentDate = resolver.resolveFromContent(content, prefixDate);
      date = resolver.reconcileDates(contentDate, prefixDate, { file: file.relativePath }) ?? prefixDate;
    }

    const text = extractBody(content);
    if (text.length === 0) {
      logger.warn({ file: file.relativePath }, 'Empty text, skipping');
      continue;
    }

    const stem = basename(file.relativePath, '.txt');
    documents.push({
      docId: `${stem}_${basename(dirname(file.absolutePath))}`,
      date: formatIsoDate(date),
      title: parseHeaderField(content, 'Title') ?? stem,
      source: parseHeaderField(content, 'Source') ?? 'unknown',
      text,
      path: file.absolutePath,
    });
  }

  return documents.sort((a, b) => compareStrings(a.date, b.date) || compareStrings(a.docId, b.docId));
}
