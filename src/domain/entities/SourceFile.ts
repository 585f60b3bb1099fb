import { extname } from 'path';

export type SourceKind = 'text' | 'pdf' | 'docx' | 'html';

export interface SourceFile {
  absolutePath: string;
  /** Relative to the source root, always `/`-separated. */
  relativePath: string;
  kind: SourceKind;
}

const KIND_BY_EXTENSION: Record<string, SourceKind> = {
  '.txt': 'text',
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.html': 'html',
  '.htm': 'html',
};

export const SUPPORTED_EXTENSIONS = new Set(Object.keys(KIND_BY_EXTENSION));

export function sourceKindOf(fileName: string): SourceKind | null {
  return KIND_BY_EXTENSION[extname(fileName).toLowerCase()] ?? null;
}

export function stemOf(fileName: string): string {
  const ext = extname(fileName);
  return ext ? fileName.slice(0, -ext.length) : fileName;
}
