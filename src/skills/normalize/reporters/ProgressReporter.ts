import type { ProgressSink } from '../../../services/ingestion/IngestionOrchestrator.js';
import type { IngestionProgress } from '../../../services/ingestion/types.js';

export interface ReporterStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

const BAR_WIDTH = 20;

const PHASE_LABELS: Record<IngestionProgress['phase'], string> = {
  scanning: 'Scanning sources',
  normalizing: 'Normalizing to TXT',
  reconciling: 'Reconciling source and destination trees',
};

export function renderProgress(progress: IngestionProgress): string {
  const label = PHASE_LABELS[progress.phase];
  if (progress.total <= 0) return label;

  const filled = Math.min(BAR_WIDTH, Math.round((progress.current / progress.total) * BAR_WIDTH));
  const bar = `[${'#'.repeat(filled)}${'.'.repeat(BAR_WIDTH - filled)}]`;
  const file = progress.currentFile ? ` ${progress.currentFile}` : '';
  return `${label} ${bar} ${progress.current}/${progress.total}${file}`;
}

/**
 * Redraws one status line in place on a terminal. Off a terminal only errors are
 * printed; warnings are always kept for the final summary.
 */
export class ProgressReporter implements ProgressSink {
  readonly warnings: string[] = [];
  private live: boolean;
  private drawn = 0;

  constructor(
    private stream: ReporterStream = process.stdout,
    enabled: boolean = true
  ) {
    this.live = enabled && stream.isTTY === true;
  }

  update(progress: IngestionProgress): void {
    if (!this.live) return;
    this.clear();
    const line = renderProgress(progress);
    this.stream.write(line);
    this.drawn = line.length;
  }

  complete(message: string): void {
    if (this.live) this.println(`${GREEN}✓${RESET} ${message}`);
  }

  warn(message: string): void {
    this.warnings.push(message);
    if (this.live) this.println(`${YELLOW}⚠${RESET} ${message}`);
  }

  error(message: string): void {
    this.println(`${RED}✗${RESET} ${message}`);
  }

  private println(text: string): void {
    this.clear();
    this.stream.write(`${text}\n`);
  }

  private clear(): void {
    if (this.drawn === 0) return;
    this.stream.write(`\r${' '.repeat(this.drawn)}\r`);
    this.drawn = 0;
  }
}
