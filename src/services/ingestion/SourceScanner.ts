import type { Dirent } from 'fs';
import { readdir } from 'fs/promises';
import { join, posix } from 'path';
import { logger } from '../../utils/logger.js';
import { compareStrings } from '../../utils/paths.js';
import { sourceKindOf, type SourceFile } from '../../domain/entities/SourceFile.js';
import type { IngestionRules } from '../../config/validation.js';

export type ExclusionReason = 'outside-source-folders' | 'excluded-folder' | 'excluded-path' | 'excluded-prefix';

/** Why a `/`-separated relative path is left out, or null when it is included. */
export function exclusionReason(relativePath: string, rules: IngestionRules): ExclusionReason | null {
  const parts = relativePath.split('/');
  const fileName = parts[parts.length - 1];
  const folders = parts.slice(0, -1);

  if (folders.length === 0 || !rules.sourceFolders.includes(folders[0])) {
    return 'outside-source-folders';
  }
  if (rules.excludeFolders.some(blocked => folders.some(folder => folder.includes(blocked)))) {
    return 'excluded-folder';
  }
  if (rules.excludePathPatterns.some(pattern => relativePath.includes(pattern))) {
    return 'excluded-path';
  }
  if (rules.excludeFilePrefixes.some(prefix => fileName.startsWith(prefix))) {
    return 'excluded-prefix';
  }
  return null;
}

export const isIncluded = (relativePath: string, rules: IngestionRules): boolean =>
  exclusionReason(relativePath, rules) === null;

export class SourceScanner {
  constructor(private rules: IngestionRules) {}

  /** Every supported file under the source root that the rules let through, sorted by relative path. */
  async scan(sourceRoot: string): Promise<SourceFile[]> {
    const files: SourceFile[] = [];
    await this.walk(sourceRoot, '', files);
    return files.sort((a, b) => compareStrings(a.relativePath, b.relativePath));
  }

  private async walk(root: string, relativeDir: string, files: SourceFile[]): Promise<void> {
    const absoluteDir = relativeDir ? join(root, ...relativeDir.split('/')) : root;
    let entries: Dirent[];
    try {
      entries = await readdir(absoluteDir, { withFileTypes: true });
    } catch (error) {
      if (!relativeDir) throw error;
      logger.warn({ error, folder: absoluteDir }, 'Skipping unreadable folder');
      return;
    }

    for (const entry of entries) {
      const relativePath = relativeDir ? posix.join(relativeDir, entry.name) : entry.name;

      if (entry.isDirectory()) {
        await this.walk(root, relativePath, files);
        continue;
      }
      if (!entry.isFile()) continue;

      const kind = sourceKindOf(entry.name);
      if (!kind || !isIncluded(relativePath, this.rules)) continue;

      files.push({ absolutePath: join(absoluteDir, entry.name), relativePath, kind });
    }
  }
}
