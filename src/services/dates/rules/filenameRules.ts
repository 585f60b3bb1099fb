import { createFullDate, expandTwoDigitYear, type FullDate } from '../../../domain/dates/CalendarDate.js';
import { MONTH_NAME_PATTERN, monthFromName } from '../../../domain/dates/monthNames.js';
import { defineRule, monthDayOrder, type DateRule } from './DateRule.interface.js';

const MONTH = `(?<![a-z])(${MONTH_NAME_PATTERN})(?![a-z])\\.?`;

const numericMonthDay = (first: string, second: string, year: number): FullDate | null => {
  const order = monthDayOrder(Number(first), Number(second));
  return order ? createFullDate(year, order.month, order.day) : null;
};

const namedMonth = (name: string, year: string, day: number): FullDate | null => {
  const month = monthFromName(name);
  return month ? createFullDate(Number(year), month, day) : null;
};

export const isoPrefixRule = defineRule<FullDate>(
  'iso-prefix',
  '^(\\d{4})-(\\d{2})-(\\d{2})_',
  m => createFullDate(Number(m[1]), Number(m[2]), Number(m[3]))
);

export const isoAnywhereRule = defineRule<FullDate>(
  'year-month-day',
  '(?<!\\d)(\\d{4})[-_.](\\d{2})[-_.](\\d{2})(?!\\d)',
  m => createFullDate(Number(m[1]), Number(m[2]), Number(m[3]))
);

export const monthDayYearRule = defineRule<FullDate>(
  'month-day-year',
  '(?<!\\d)(\\d{1,2})[-_](\\d{1,2})[-_](\\d{4})(?!\\d)',
  m => numericMonthDay(m[1], m[2], Number(m[3]))
);

export const monthDayShortYearRule = defineRule<FullDate>(
  'month-day-short-year',
  '(?<!\\d)(\\d{1,2})[-_](\\d{1,2})[-_](\\d{2})(?!\\d)',
  m => numericMonthDay(m[1], m[2], expandTwoDigitYear(Number(m[3])))
);

export const monthNameDayYearRule = defineRule<FullDate>(
  'month-name-day-year',
  `${MONTH}\\s+(\\d{1,2}),?\\s+(\\d{4})(?!\\d)`,
  m => namedMonth(m[1], m[3], Number(m[2]))
);

export const monthNameYearRule = defineRule<FullDate>(
  'month-name-year',
  `${MONTH}[-_](\\d{4})(?!\\d)`,
  m => namedMonth(m[1], m[2], 1)
);

export const monthYearRule = defineRule<FullDate>(
  'month-year',
  '(?<!\\d)(\\d{1,2})[-_](\\d{4})(?!\\d)',
  m => createFullDate(Number(m[2]), Number(m[1]), 1)
);

export const yearMonthRule = defineRule<FullDate>(
  'year-month',
  '(?<!\\d)(\\d{4})[-_.](\\d{1,2})(?!\\d)',
  m => createFullDate(Number(m[1]), Number(m[2]), 1)
);

export const FILENAME_RULES: readonly DateRule<FullDate>[] = [
  isoPrefixRule,
  isoAnywhereRule,
  monthDayYearRule,
  monthDayShortYearRule,
  monthNameDayYearRule,
  monthNameYearRule,
  monthYearRule,
  yearMonthRule,
];
