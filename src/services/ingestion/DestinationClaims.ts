import type { SourceFile } from '../../domain/entities/SourceFile.js';
import type { RejectedOutcome } from './types.js';

export interface DestinationClaims {
  /** Sources that own their destination, or whose destination could not be computed. */
  runnable: SourceFile[];
  collisions: RejectedOutcome[];
}

/**
 * Assigns every destination to the first source that maps to it. Later sources
 * with the same destination are rejected up front, so one file is written per
 * destination and the others reach the ledger. `sources` must already be sorted.
 */
export function claimDestinations(
  sources: readonly SourceFile[],
  destinationOf: (source: SourceFile) => string | null
): DestinationClaims {
  const owners = new Map<string, SourceFile>();
  const runnable: SourceFile[] = [];
  const collisions: RejectedOutcome[] = [];

  for (const source of sources) {
    const destination = destinationOf(source);
    if (destination === null) {
      runnable.push(source);
      continue;
    }

    const owner = owners.get(destination);
    if (owner) {
      const detail = `destination collision with ${owner.relativePath}`;
      collisions.push({ status: 'rejected', source, reason: `error:${detail}`, detail });
      continue;
    }
    owners.set(destination, source);
    runnable.push(source);
  }

  return { runnable, collisions };
}
