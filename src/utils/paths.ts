import { sep } from 'path';

/** Converts a platform relative path to the `/`-separated form used in ledgers and sets. */
export const toPosix = (relativePath: string): string =>
  sep === '/' ? relativePath : relativePath.split(sep).join('/');

export const compareStrings = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);
