import {
  createFullDate,
  createPartialDate,
  expandTwoDigitYear,
  type ResolvedDate,
} from '../../../domain/dates/CalendarDate.js';
import { MONTH_NAME_PATTERN, WEEKDAY_PATTERN, monthFromName } from '../../../domain/dates/monthNames.js';
import { defineRule, monthDayOrder, type DateRule } from './DateRule.interface.js';

const MONTH = `(?<![a-z])(${MONTH_NAME_PATTERN})(?![a-z])\\.?`;

export const dateFieldRule = defineRule<ResolvedDate>(
  'date-field',
  'date:\\s*(\\d{4})-(\\d{2})-(\\d{2})(?!\\d)',
  m => createFullDate(Number(m[1]), Number(m[2]), Number(m[3]))
);

export const slashDateRule = defineRule<ResolvedDate>(
  'slash-date',
  '(?<![\\d/])(\\d{1,2})/(\\d{1,2})/(\\d{4}|\\d{2})(?![\\d/])',
  m => {
    const order = monthDayOrder(Number(m[1]), Number(m[2]));
    if (!order) return null;
    const year = m[3].length === 2 ? expandTwoDigitYear(Number(m[3])) : Number(m[3]);
    return createFullDate(year, order.month, order.day);
  }
);

export const dayMonthNameYearRule = defineRule<ResolvedDate>(
  'day-month-name-year',
  `(?<!\\d)(\\d{1,2})\\s+${MONTH},?\\s+(\\d{4})(?!\\d)`,
  m => {
    const month = monthFromName(m[2]);
    return month ? createFullDate(Number(m[3]), month, Number(m[1])) : null;
  }
);

export const monthNameDayYearRule = defineRule<ResolvedDate>(
  'month-name-day-year',
  `${MONTH}\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})(?!\\d)`,
  m => {
    const month = monthFromName(m[1]);
    return month ? createFullDate(Number(m[3]), month, Number(m[2])) : null;
  }
);

export const publishedRule = defineRule<ResolvedDate>(
  'updated-or-published',
  '(?:updated|published)\\s*:?\\s*(\\d{4})[-/.](\\d{1,2})[-/.](\\d{1,2})(?!\\d)',
  m => createFullDate(Number(m[1]), Number(m[2]), Number(m[3]))
);

export const broadcastRule = defineRule<ResolvedDate>(
  'broadcast',
  `broadcast\\s*:?\\s*(?:${WEEKDAY_PATTERN})\\.?,?\\s+${MONTH}\\s+(\\d{1,2})(?!\\d)(?:,?\\s+(\\d{4})(?!\\d))?`,
  m => {
    const month = monthFromName(m[1]);
    if (!month) return null;
    const year: string | undefined = m[3];
    return year === undefined
      ? createPartialDate(month, Number(m[2]))
      : createFullDate(Number(year), month, Number(m[2]));
  }
);

export const CONTENT_RULES: readonly DateRule<ResolvedDate>[] = [
  dateFieldRule,
  slashDateRule,
  dayMonthNameYearRule,
  monthNameDayYearRule,
  publishedRule,
  broadcastRule,
];
