import type { SourceFile } from '../../domain/entities/SourceFile.js';

export type RejectionReason =
  | 'no_date'
  | 'conversion_failed'
  | 'source_missing'
  /** Never reported by its task; surfaced only by reconciliation. */
  | 'unreported'
  | `error:${string}`;

export interface AcceptedOutcome {
  status: 'accepted';
  source: SourceFile;
  destination: string;
  date: string;
  /** False when the destination was already present from an earlier run. */
  written: boolean;
}

export interface RejectedOutcome {
  status: 'rejected';
  source: SourceFile;
  reason: RejectionReason;
  detail?: string;
}

export type FileOutcome = AcceptedOutcome | RejectedOutcome;

export interface FileTask {
  /** Must resolve for every input; failures come back as a rejected outcome. */
  normalize(source: SourceFile): Promise<FileOutcome>;
}

export interface LedgerEntry {
  relativePath: string;
  absolutePath: string;
  reason: RejectionReason;
}

export type ExecutionMode = 'sequential' | 'parallel';

export interface IngestionOptions {
  sourceRoot: string;
  destRoot: string;
  rulesPath: string;
}

export interface IngestionReport {
  mode: ExecutionMode;
  workers: number;
  total: number;
  accepted: string[];
  rejected: LedgerEntry[];
  trulyMissing: string[];
  ledgerPath: string;
}

export interface IngestionProgress {
  phase: 'scanning' | 'normalizing' | 'reconciling';
  current: number;
  total: number;
  currentFile?: string;
}
