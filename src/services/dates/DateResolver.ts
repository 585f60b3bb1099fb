import { basename } from 'path';
import { logger } from '../../utils/logger.js';
import {
  completePartialDate,
  datesEqual,
  describeDate,
  formatIsoDate,
  type FullDate,
  type ResolvedDate,
} from '../../domain/dates/CalendarDate.js';
import { applyRules, type DateRule, type RuleMatch } from './rules/DateRule.interface.js';
import { FILENAME_RULES } from './rules/filenameRules.js';
import { CONTENT_RULES } from './rules/contentRules.js';

export interface DateResolverOptions {
  filenameRules?: readonly DateRule<FullDate>[];
  contentRules?: readonly DateRule<ResolvedDate>[];
}

export class DateResolver {
  private readonly filenameRules: readonly DateRule<FullDate>[];
  private readonly contentRules: readonly DateRule<ResolvedDate>[];

  constructor(options: DateResolverOptions = {}) {
    this.filenameRules = options.filenameRules ?? FILENAME_RULES;
    this.contentRules = options.contentRules ?? CONTENT_RULES;
  }

  /** Accepts a bare file name or a path; only the last segment is inspected. */
  resolveFromFilename(name: string): FullDate | null {
    return this.matchFilename(name)?.date ?? null;
  }

  matchFilename(name: string): RuleMatch<FullDate> | null {
    return applyRules(this.filenameRules, basename(name));
  }

  /**
   * Resolves a date from a document body. A year-less match is completed from
   * `preferred` when one is given; otherwise the PartialDate is returned as is.
   */
  resolveFromContent(text: string, preferred?: FullDate | null): ResolvedDate | null {
    const match = applyRules(this.contentRules, text);
    if (!match) return null;

    if (match.date.kind === 'partial' && preferred) {
      const completed = completePartialDate(match.date, preferred.year);
      logger.debug(
        { partial: describeDate(match.date), year: preferred.year, rule: match.rule },
        'Completed partial content date'
      );
      return completed;
    }
    return match.date;
  }

  /**
   * Content wins over the filename. A disagreement is worth a warning and
   * nothing more. A content date still missing its year cannot win.
   */
  reconcileDates(
    contentDate: ResolvedDate | null,
    filenameDate: FullDate | null,
    context: { file: string }
  ): FullDate | null {
    let fromContent: FullDate | null = null;
    if (contentDate?.kind === 'full') {
      fromContent = contentDate;
    } else if (contentDate?.kind === 'partial' && filenameDate) {
      fromContent = completePartialDate(contentDate, filenameDate.year);
    }

    if (fromContent && filenameDate && !datesEqual(fromContent, filenameDate)) {
      logger.warn(
        { file: context.file, content: formatIsoDate(fromContent), filename: formatIsoDate(filenameDate) },
        'Date mismatch between content and filename, using content date'
      );
    }
    return fromContent ?? filenameDate;
  }
}

export const dateResolver = new DateResolver();
