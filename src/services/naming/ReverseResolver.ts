import { readdir } from 'fs/promises';
import { join, relative, dirname, basename, isAbsolute, posix } from 'path';
import { logger } from '../../utils/logger.js';
import { compareStrings, toPosix } from '../../utils/paths.js';
import { datesEqual, parseIsoDate, type FullDate } from '../../domain/dates/CalendarDate.js';
import { sourceKindOf, stemOf, type SourceFile } from '../../domain/entities/SourceFile.js';
import { dateResolver as defaultResolver, type DateResolver } from '../dates/DateResolver.js';
import { sanitizeStem, UNBOUNDED_STEM_LENGTH } from './NameSanitizer.js';

const NORMALIZED_NAME = /^(\d{4}-\d{2}-\d{2})_(.*)\.txt$/;
const LOOSE_PREFIX_LENGTH = 20;

export interface ParsedNormalizedName {
  isoDate: string;
  stem: string;
}

export function parseNormalizedName(fileName: string): ParsedNormalizedName | null {
  const match = NORMALIZED_NAME.exec(fileName);
  return match ? { isoDate: match[1], stem: match[2] } : null;
}

export interface Candidate {
  source: SourceFile;
  sanitized: string;
  date: FullDate | null;
}

/** Candidate lists keyed by source folder, shared across lookups of one reconciliation pass. */
export type CandidateCache = Map<string, Promise<Candidate[]>>;

export const createCandidateCache = (): CandidateCache => new Map();

/**
 * Recovers the source file a normalized file was written from. Dates are the
 * authoritative filter; sanitized names only break ties between same-day files.
 */
export class ReverseResolver {
  constructor(private resolver: DateResolver = defaultResolver) {}

  async findSource(
    destPath: string,
    destRoot: string,
    sourceRoot: string,
    cache: CandidateCache = createCandidateCache()
  ): Promise<SourceFile | null> {
    try {
      return await this.resolve(destPath, destRoot, sourceRoot, cache);
    } catch (error) {
      logger.debug({ error, destPath }, 'Reverse resolution failed');
      return null;
    }
  }

  private async resolve(
    destPath: string,
    destRoot: string,
    sourceRoot: string,
    cache: CandidateCache
  ): Promise<SourceFile | null> {
    const parsed = parseNormalizedName(basename(destPath));
    if (!parsed) return null;
    const date = parseIsoDate(parsed.isoDate);
    if (!date) return null;

    const folder = relative(destRoot, dirname(destPath));
    if (folder.startsWith('..') || isAbsolute(folder)) return null;
    const posixFolder = toPosix(folder);

    const folderPath = join(sourceRoot, folder);
    let listing = cache.get(folderPath);
    if (!listing) {
      listing = this.listCandidates(folderPath, posixFolder);
      cache.set(folderPath, listing);
    }
    const dated = (await listing).filter(candidate => candidate.date !== null && datesEqual(candidate.date, date));

    if (dated.length === 0) return null;
    if (dated.length === 1) return dated[0].source;

    const stored = parsed.stem;
    const exact = dated.find(c => c.sanitized === stored);
    if (exact) return exact.source;

    const prefixed = dated.find(c => c.sanitized.startsWith(stored) || stored.startsWith(c.sanitized));
    if (prefixed) return prefixed.source;

    const head = stored.toLowerCase().slice(0, LOOSE_PREFIX_LENGTH);
    const loose = head ? dated.find(c => c.sanitized.toLowerCase().startsWith(head)) : undefined;
    if (loose) return loose.source;

    logger.debug(
      { destPath, candidates: dated.map(c => c.source.relativePath) },
      'Several same-day sources and no name match, falling back to the first'
    );
    return dated[0].source;
  }

  private async listCandidates(folderPath: string, posixFolder: string): Promise<Candidate[]> {
    // a folder missing on the source side simply has no candidates
    const entries = await readdir(folderPath, { withFileTypes: true }).catch(() => null);
    if (!entries) return [];

    const candidates: Candidate[] = [];
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const kind = sourceKindOf(entry.name);
      if (!kind) continue;

      const relativePath = posixFolder === '' || posixFolder === '.' ? entry.name : posix.join(posixFolder, entry.name);
      candidates.push({
        source: { absolutePath: join(folderPath, entry.name), relativePath, kind },
        sanitized: sanitizeStem(stemOf(entry.name), UNBOUNDED_STEM_LENGTH),
        date: this.resolver.resolveFromFilename(entry.name),
      });
    }

    return candidates.sort((a, b) => compareStrings(a.source.relativePath, b.source.relativePath));
  }
}
