import { join } from 'path';
import { logger } from '../../utils/logger.js';
import { toPosix } from '../../utils/paths.js';
import { formatIsoDate, type FullDate } from '../../domain/dates/CalendarDate.js';
import { stemOf } from '../../domain/entities/SourceFile.js';
import { sanitizeStem, UNBOUNDED_STEM_LENGTH } from './NameSanitizer.js';

export const DEFAULT_PATH_LIMIT = 200;
export const SHORT_STEM_LENGTH = 50;
export const NORMALIZED_EXTENSION = '.txt';

// `YYYY-MM-DD_` plus `.txt`
const NAME_FRAME_LENGTH = 11 + NORMALIZED_EXTENSION.length;

export interface DestinationPath {
  path: string;
  stem: string;
  stage: 'full' | 'short' | 'budget' | 'overflow';
}

const fileNameFor = (date: FullDate, stem: string): string =>
  `${formatIsoDate(date)}_${stem}${NORMALIZED_EXTENSION}`;

export function planDestination(
  sourceRelativePath: string,
  date: FullDate,
  destRoot: string,
  limit: number = DEFAULT_PATH_LIMIT
): DestinationPath {
  const segments = toPosix(sourceRelativePath).split('/');
  const fileName = segments.pop() ?? '';
  const folderPath = join(destRoot, ...segments);
  const originalStem = stemOf(fileName);

  const full = sanitizeStem(originalStem, UNBOUNDED_STEM_LENGTH);
  const fullPath = join(folderPath, fileNameFor(date, full));
  if (fullPath.length <= limit) {
    return { path: fullPath, stem: full, stage: 'full' };
  }

  const short = sanitizeStem(originalStem, SHORT_STEM_LENGTH);
  const shortPath = join(folderPath, fileNameFor(date, short));
  if (shortPath.length <= limit) {
    return { path: shortPath, stem: short, stage: 'short' };
  }

  const available = limit - (folderPath.length + 1) - 1;
  if (available > NAME_FRAME_LENGTH) {
    const stem = sanitizeStem(originalStem, available - NAME_FRAME_LENGTH);
    return { path: join(folderPath, fileNameFor(date, stem)), stem, stage: 'budget' };
  }

  logger.warn(
    { folder: folderPath, limit, length: shortPath.length },
    'Destination folder leaves no room for a file name within the path limit'
  );
  return { path: shortPath, stem: short, stage: 'overflow' };
}

/** `destRoot/<same folder>/<YYYY-MM-DD>_<sanitized stem>.txt`, shortened in stages to fit `limit`. */
export function buildDestination(
  sourceRelativePath: string,
  date: FullDate,
  destRoot: string,
  limit: number = DEFAULT_PATH_LIMIT
): string {
  return planDestination(sourceRelativePath, date, destRoot, limit).path;
}
