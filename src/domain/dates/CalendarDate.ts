export interface FullDate {
  kind: 'full';
  year: number;
  month: number;
  day: number;
}

/** Month and day read from a body that never states the year. */
export interface PartialDate {
  kind: 'partial';
  month: number;
  day: number;
}

export type ResolvedDate = FullDate | PartialDate;

const isMonth = (month: number): boolean => Number.isInteger(month) && month >= 1 && month <= 12;
const isDay = (day: number): boolean => Number.isInteger(day) && day >= 1 && day <= 31;

export function createFullDate(year: number, month: number, day: number): FullDate | null {
  if (!Number.isInteger(year) || year < 0 || year > 9999) return null;
  if (!isMonth(month) || !isDay(day)) return null;
  return { kind: 'full', year, month, day };
}

export function createPartialDate(month: number, day: number): PartialDate | null {
  if (!isMonth(month) || !isDay(day)) return null;
  return { kind: 'partial', month, day };
}

export function completePartialDate(partial: PartialDate, year: number): FullDate | null {
  return createFullDate(year, partial.month, partial.day);
}

/** Two-digit years pivot at 50: 49 is 2049, 50 is 1950. */
export function expandTwoDigitYear(yy: number): number {
  return yy < 50 ? 2000 + yy : 1900 + yy;
}

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

export function formatIsoDate(date: FullDate): string {
  return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

export function parseIsoDate(value: string): FullDate | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return null;
  return createFullDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function datesEqual(a: FullDate, b: FullDate): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

export function describeDate(date: ResolvedDate): string {
  return date.kind === 'full' ? formatIsoDate(date) : `????-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}
