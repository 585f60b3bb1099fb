import type { ResolvedDate } from '../../../domain/dates/CalendarDate.js';

export interface DateRule<T extends ResolvedDate = ResolvedDate> {
  readonly name: string;
  /** Always global; every match is offered to `toDate` from left to right. */
  readonly pattern: RegExp;
  toDate(match: RegExpMatchArray): T | null;
}

export interface RuleMatch<T extends ResolvedDate> {
  date: T;
  rule: string;
  matched: string;
}

export function defineRule<T extends ResolvedDate>(
  name: string,
  source: string,
  toDate: (match: RegExpMatchArray) => T | null,
  flags = 'gi'
): DateRule<T> {
  return {
    name,
    pattern: new RegExp(source, flags.includes('g') ? flags : `${flags}g`),
    toDate,
  };
}

/**
 * First rule with a valid match wins. Out-of-range matches are skipped, which
 * lets a later match of the same rule, or a lower-priority rule, take over.
 */
export function applyRules<T extends ResolvedDate>(rules: readonly DateRule<T>[], input: string): RuleMatch<T> | null {
  for (const rule of rules) {
    for (const match of input.matchAll(rule.pattern)) {
      const date = rule.toDate(match);
      if (date) {
        return { date, rule: rule.name, matched: match[0] };
      }
    }
  }
  return null;
}

/** Orders an ambiguous `a-b` pair as month/day, swapping when only the second can be a month. */
export function monthDayOrder(first: number, second: number): { month: number; day: number } | null {
  if (first >= 1 && first <= 12) return { month: first, day: second };
  if (second >= 1 && second <= 12) return { month: second, day: first };
  return null;
}
