import { listNormalizedFiles } from './normalizedTree.js';
import { compareStrings } from '../../utils/paths.js';

export interface FolderCount {
  folder: string;
  fileCount: number;
}

/** Normalized files per top-level folder; files directly under the root count as `.`. */
export async function countNormalizedFiles(destRoot: string): Promise<FolderCount[]> {
  const counts = new Map<string, number>();
  for (const file of await listNormalizedFiles(destRoot)) {
    const slash = file.relativePath.indexOf('/');
    const folder = slash === -1 ? '.' : file.relativePath.slice(0, slash);
    counts.set(folder, (counts.get(folder) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([folder, fileCount]) => ({ folder, fileCount }))
    .sort((a, b) => compareStrings(a.folder, b.folder));
}

export function toCsv(counts: readonly FolderCount[]): string {
  const quote = (value: string): string => (/[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value);
  return ['Folder,File_Count', ...counts.map(c => `${quote(c.folder)},${c.fileCount}`)].join('\n') + '\n';
}
