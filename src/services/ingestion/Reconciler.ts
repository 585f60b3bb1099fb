import { compareStrings } from '../../utils/paths.js';
import type { SourceFile } from '../../domain/entities/SourceFile.js';
import type { FileOutcome, LedgerEntry } from './types.js';

export interface ReconciliationInput {
  /** Included source files, re-enumerated after the batch. */
  universe: SourceFile[];
  outcomes: FileOutcome[];
  /** Source relative paths recovered from files already in the destination tree. */
  recovered: Iterable<string>;
}

export interface Reconciliation {
  accepted: string[];
  rejected: LedgerEntry[];
  trulyMissing: string[];
}

/**
 * Folds everything the batch did not account for into the rejection set, so that
 * accepted, rejected and truly missing together cover the whole universe.
 * A reported rejection is never overridden by a recovered destination file.
 */
export function reconcile({ universe, outcomes, recovered }: ReconciliationInput): Reconciliation {
  const accepted = new Set<string>();
  const rejections = new Map<string, LedgerEntry>();

  for (const outcome of outcomes) {
    const { relativePath, absolutePath } = outcome.source;
    if (outcome.status === 'accepted') {
      accepted.add(relativePath);
    } else {
      rejections.set(relativePath, { relativePath, absolutePath, reason: outcome.reason });
    }
  }

  const universePaths = new Set(universe.map(source => source.relativePath));
  for (const relativePath of recovered) {
    if (universePaths.has(relativePath) && !rejections.has(relativePath)) {
      accepted.add(relativePath);
    }
  }

  const trulyMissing: string[] = [];
  for (const source of universe) {
    if (accepted.has(source.relativePath) || rejections.has(source.relativePath)) continue;
    trulyMissing.push(source.relativePath);
    rejections.set(source.relativePath, {
      relativePath: source.relativePath,
      absolutePath: source.absolutePath,
      reason: 'unreported',
    });
  }

  return {
    accepted: [...accepted].sort(compareStrings),
    rejected: [...rejections.values()].sort((a, b) => compareStrings(a.relativePath, b.relativePath)),
    trulyMissing: trulyMissing.sort(compareStrings),
  };
}
