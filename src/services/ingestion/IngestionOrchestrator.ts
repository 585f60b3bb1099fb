import { stat } from 'fs/promises';
import { availableParallelism } from 'os';
import { basename } from 'path';
import pLimit from 'p-limit';
import { config } from '../../config/index.js';
import { loadIngestionRules } from '../../config/rules.js';
import type { IngestionRules } from '../../config/validation.js';
import { logger } from '../../utils/logger.js';
import { SetupError, errorMessage } from '../../utils/errors.js';
import type { SourceFile } from '../../domain/entities/SourceFile.js';
import { dateResolver as defaultResolver, type DateResolver } from '../dates/DateResolver.js';
import { buildDestination } from '../naming/PathBuilder.js';
import { ReverseResolver, createCandidateCache } from '../naming/ReverseResolver.js';
import { listNormalizedFiles } from '../corpus/normalizedTree.js';
import type { DocumentStorage } from '../storage/DocumentStorage.interface.js';
import { FileSystemStorage } from '../storage/FileSystemStorage.js';
import type { TextExtractor } from './DocumentProcessor.js';
import { FileNormalizer } from './FileNormalizer.js';
import { claimDestinations } from './DestinationClaims.js';
import { SourceScanner } from './SourceScanner.js';
import { reconcile } from './Reconciler.js';
import { ledgerPathFor, writeLedger } from './RejectionLedger.js';
import type {
  ExecutionMode,
  FileOutcome,
  FileTask,
  IngestionOptions,
  IngestionProgress,
  IngestionReport,
} from './types.js';

export interface ProgressSink {
  update(progress: IngestionProgress): void;
  complete(message: string): void;
  warn(message: string): void;
}

const silentProgress: ProgressSink = {
  update: () => undefined,
  complete: () => undefined,
  warn: () => undefined,
};

export interface IngestionOrchestratorDeps {
  /** Replaces the per-file task entirely; `storage`, `extractor` and `resolver` then go unused by it. */
  task?: FileTask;
  storage?: DocumentStorage;
  extractor?: TextExtractor;
  resolver?: DateResolver;
  reverseResolver?: ReverseResolver;
  availableParallelism?: () => number;
  parallelThreshold?: number;
  workerFraction?: number;
  pathLimit?: number;
}

export interface ExecutionPlan {
  mode: ExecutionMode;
  workers: number;
}

/** Pool start-up only pays off for batches above the threshold. */
export function planExecution(
  fileCount: number,
  parallelism: number,
  threshold: number,
  fraction: number
): ExecutionPlan {
  const maxWorkers = Math.max(1, Math.floor(parallelism * fraction));
  const workers = Math.min(maxWorkers, fileCount);
  if (fileCount > threshold && workers > 1) {
    return { mode: 'parallel', workers };
  }
  return { mode: 'sequential', workers: 1 };
}

export class IngestionOrchestrator {
  private resolver: DateResolver;
  private reverseResolver: ReverseResolver;
  private parallelism: () => number;
  private parallelThreshold: number;
  private workerFraction: number;
  private pathLimit: number;

  constructor(private deps: IngestionOrchestratorDeps = {}) {
    this.resolver = deps.resolver ?? defaultResolver;
    this.reverseResolver = deps.reverseResolver ?? new ReverseResolver(this.resolver);
    this.parallelism = deps.availableParallelism ?? availableParallelism;
    this.parallelThreshold = deps.parallelThreshold ?? config.pipeline.parallelThreshold;
    this.workerFraction = deps.workerFraction ?? config.pipeline.workerFraction;
    this.pathLimit = deps.pathLimit ?? config.pipeline.pathLimit;
  }

  async run(options: IngestionOptions, progress: ProgressSink = silentProgress): Promise<IngestionReport> {
    const { rules, task } = await this.setup(options);
    const scanner = new SourceScanner(rules);

    progress.update({ phase: 'scanning', current: 0, total: 0 });
    const files = await scanner.scan(options.sourceRoot);
    progress.complete(`Found ${files.length} files`);

    const { runnable, collisions } = claimDestinations(files, source => {
      const date = this.resolver.resolveFromFilename(basename(source.absolutePath));
      return date ? buildDestination(source.relativePath, date, options.destRoot, this.pathLimit) : null;
    });
    if (collisions.length > 0) {
      logger.warn(
        { count: collisions.length, files: collisions.map(c => c.source.relativePath) },
        'Sources sharing a destination with an earlier source were rejected'
      );
      progress.warn(`${collisions.length} files share a destination with another source`);
    }

    const plan = planExecution(runnable.length, this.parallelism(), this.parallelThreshold, this.workerFraction);
    logger.info({ files: files.length, mode: plan.mode, workers: plan.workers }, 'Starting normalization');

    const processed =
      plan.mode === 'parallel'
        ? await this.runParallel(runnable, task, plan.workers, progress)
        : await this.runSequential(runnable, task, progress);
    const outcomes = [...processed, ...collisions];

    if (outcomes.length !== files.length) {
      const missing = files.length - outcomes.length;
      logger.warn(
        { expected: files.length, observed: outcomes.length, missing },
        'Processed file count does not match the scanned count, check the reconciliation output'
      );
      progress.warn(`${missing} files were not reported by their tasks`);
    }
    progress.complete(`Normalized ${outcomes.filter(o => o.status === 'accepted').length} of ${files.length} files`);

    progress.update({ phase: 'reconciling', current: 0, total: 0 });
    const universe = await scanner.scan(options.sourceRoot);
    const recovered = await this.recoverSources(options.destRoot, options.sourceRoot);
    const reconciliation = reconcile({ universe, outcomes, recovered });

    const ledgerPath = ledgerPathFor(options.destRoot);
    await writeLedger(ledgerPath, reconciliation.rejected, rules);

    if (reconciliation.trulyMissing.length > 0) {
      logger.warn(
        { count: reconciliation.trulyMissing.length, files: reconciliation.trulyMissing, ledgerPath },
        'Files missing from the normalized tree were added to the ledger'
      );
      progress.warn(`${reconciliation.trulyMissing.length} unreported files added to the ledger`);
    }

    logger.info(
      {
        total: universe.length,
        accepted: reconciliation.accepted.length,
        rejected: reconciliation.rejected.length,
        trulyMissing: reconciliation.trulyMissing.length,
        ledgerPath,
      },
      'Normalization complete'
    );
    progress.complete(
      `Reconciled: ${reconciliation.accepted.length} accepted, ${reconciliation.rejected.length} rejected`
    );

    return {
      mode: plan.mode,
      workers: plan.workers,
      total: universe.length,
      accepted: reconciliation.accepted,
      rejected: reconciliation.rejected,
      trulyMissing: reconciliation.trulyMissing,
      ledgerPath,
    };
  }

  private async setup(options: IngestionOptions): Promise<{ rules: IngestionRules; task: FileTask }> {
    let rules: IngestionRules;
    try {
      rules = await loadIngestionRules(options.rulesPath);
    } catch (error) {
      throw new SetupError(`Cannot load ingestion rules: ${errorMessage(error)}`, error);
    }

    const sourceIsDirectory = await stat(options.sourceRoot).then(
      stats => stats.isDirectory(),
      () => false
    );
    if (!sourceIsDirectory) {
      throw new SetupError(`Source directory not found: ${options.sourceRoot}`);
    }

    const storage = this.deps.storage ?? new FileSystemStorage(options.destRoot);
    try {
      await storage.init();
    } catch (error) {
      throw new SetupError(`Cannot create destination directory: ${options.destRoot}`, error);
    }

    const task =
      this.deps.task ??
      new FileNormalizer({
        destRoot: options.destRoot,
        storage,
        extractor: this.deps.extractor,
        resolver: this.resolver,
        pathLimit: this.pathLimit,
      });

    return { rules, task };
  }

  private async runSequential(files: SourceFile[], task: FileTask, progress: ProgressSink): Promise<FileOutcome[]> {
    const outcomes: FileOutcome[] = [];
    for (let i = 0; i < files.length; i++) {
      progress.update({ phase: 'normalizing', current: i + 1, total: files.length, currentFile: files[i].relativePath });
      try {
        outcomes.push(await task.normalize(files[i]));
      } catch (error) {
        this.logUnreported(files[i], error);
      }
    }
    return outcomes;
  }

  private async runParallel(
    files: SourceFile[],
    task: FileTask,
    workers: number,
    progress: ProgressSink
  ): Promise<FileOutcome[]> {
    const limit = pLimit(workers);
    let completed = 0;

    const settled = await Promise.allSettled(
      files.map(file =>
        limit(async () => {
          const outcome = await task.normalize(file);
          completed++;
          progress.update({ phase: 'normalizing', current: completed, total: files.length, currentFile: file.relativePath });
          return outcome;
        })
      )
    );

    const outcomes: FileOutcome[] = [];
    settled.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        outcomes.push(result.value);
      } else {
        this.logUnreported(files[i], result.reason);
      }
    });
    return outcomes;
  }

  private logUnreported(file: SourceFile, error: unknown): void {
    logger.error({ error, file: file.relativePath }, 'Task ended without reporting an outcome');
  }

  private async recoverSources(destRoot: string, sourceRoot: string): Promise<Set<string>> {
    const recovered = new Set<string>();
    const candidates = createCandidateCache();
    for (const normalized of await listNormalizedFiles(destRoot)) {
      const source = await this.reverseResolver.findSource(normalized.absolutePath, destRoot, sourceRoot, candidates);
      if (source) {
        recovered.add(source.relativePath);
      }
    }
    return recovered;
  }
}
