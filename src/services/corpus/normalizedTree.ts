import type { Dirent } from 'fs';
import { readdir } from 'fs/promises';
import { join, posix } from 'path';
import { logger } from '../../utils/logger.js';
import { compareStrings } from '../../utils/paths.js';
import { parseNormalizedName } from '../naming/ReverseResolver.js';

export interface NormalizedFileRef {
  absolutePath: string;
  /** Relative to the destination root, `/`-separated. */
  relativePath: string;
  isoDate: string;
  stem: string;
}

/** Every `YYYY-MM-DD_*.txt` file below `destRoot`; an absent root yields an empty list. */
export async function listNormalizedFiles(destRoot: string): Promise<NormalizedFileRef[]> {
  const found: NormalizedFileRef[] = [];
  await walk(destRoot, '', found);
  return found.sort((a, b) => compareStrings(a.relativePath, b.relativePath));
}

async function walk(root: string, relativeDir: string, found: NormalizedFileRef[]): Promise<void> {
  const absoluteDir = relativeDir ? join(root, ...relativeDir.split('/')) : root;
  let entries: Dirent[];
  try {
    entries = await readdir(absoluteDir, { withFileTypes: true });
  } catch (error) {
    logger.debug({ error, folder: absoluteDir }, 'Normalized folder not readable');
    return;
  }

  for (const entry of entries) {
    const relativePath = relativeDir ? posix.join(relativeDir, entry.name) : entry.name;
    if (entry.isDirectory()) {
      await walk(root, relativePath, found);
      continue;
    }
    const parsed = entry.isFile() ? parseNormalizedName(entry.name) : null;
    if (parsed) {
      found.push({ absolutePath: join(absoluteDir, entry.name), relativePath, ...parsed });
    }
  }
}
