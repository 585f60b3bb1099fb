const DISALLOWED = /[^\p{L}\p{N}\s_-]/gu;
const SEPARATOR_RUNS = /[\s_]+/gu;
const EDGE_UNDERSCORES = /^_+|_+$/g;

export const UNBOUNDED_STEM_LENGTH = 1000;

const truncate = (value: string, maxLength: number): string => {
  if (value.length <= maxLength) return value;
  const cut = value.slice(0, Math.max(0, maxLength));
  const last = cut.charCodeAt(cut.length - 1);
  // never leave half of a surrogate pair behind
  return last >= 0xd800 && last <= 0xdbff ? cut.slice(0, -1) : cut;
};

/**
 * Restricts a file stem to letters, digits, `-` and `_`, collapses separator
 * runs into a single `_`, and caps it at `maxLength` UTF-16 code units.
 */
export function sanitizeStem(stem: string, maxLength: number = UNBOUNDED_STEM_LENGTH): string {
  const cleaned = stem
    .replace(DISALLOWED, '_')
    .replace(SEPARATOR_RUNS, '_')
    .replace(EDGE_UNDERSCORES, '');

  return truncate(cleaned, maxLength).replace(/_+$/, '');
}
