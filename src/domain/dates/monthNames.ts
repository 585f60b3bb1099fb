const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
] as const;

const MONTH_LOOKUP = new Map<string, number>();
MONTHS.forEach((name, index) => {
  MONTH_LOOKUP.set(name, index + 1);
  MONTH_LOOKUP.set(name.slice(0, 3), index + 1);
});
MONTH_LOOKUP.set('sept', 9);

/**
 * Alternation of every month spelling, longest first so that `june` wins over `jun`.
 * A trailing period is matched separately by the patterns that use it.
 */
export const MONTH_NAME_PATTERN = [...MONTH_LOOKUP.keys()]
  .sort((a, b) => b.length - a.length || a.localeCompare(b))
  .join('|');

export const WEEKDAY_PATTERN =
  'monday|tuesday|wednesday|thursday|friday|saturday|sunday|mon|tue|tues|wed|thu|thur|thurs|fri|sat|sun';

export function monthFromName(name: string): number | null {
  const key = name.toLowerCase().replace(/\.$/, '');
  return MONTH_LOOKUP.get(key) ?? null;
}
