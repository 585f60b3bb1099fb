#!/usr/bin/env node
import { writeFile } from 'fs/promises';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { IngestionOrchestrator } from '../../services/ingestion/IngestionOrchestrator.js';
import { ledgerPathFor } from '../../services/ingestion/RejectionLedger.js';
import { countNormalizedFiles, toCsv } from '../../services/corpus/FolderStatistics.js';
import { explainLedger } from '../../services/corpus/LedgerDiagnosis.js';
import type { IngestionReport } from '../../services/ingestion/types.js';
import { ProgressReporter } from './reporters/ProgressReporter.js';

type Command = 'normalize' | 'stats' | 'explain';

interface CliArgs {
  command: Command;
  sourceDir?: string;
  destDir?: string;
  rules?: string;
  ledger?: string;
  csv?: string;
  format?: 'table' | 'json';
  help?: boolean;
}

const HELP = `
Dated document normalization - turn dated source files into YYYY-MM-DD_<name>.txt

Usage:
  normalize-docs [normalize] [options]
  normalize-docs stats [--dest-dir <path>] [--csv <file>]
  normalize-docs explain [--ledger <file>]

Options:
  --source-dir <path>  Source tree (default: ${config.pipeline.sourceDir})
  --dest-dir <path>    Normalized tree (default: ${config.pipeline.destDir})
  --rules <file>       Ingestion rules YAML (default: ${config.pipeline.rulesPath})
  --ledger <file>      Ledger to explain (default: next to --dest-dir)
  --csv <file>         Also write folder statistics as CSV
  --format <fmt>       Output format: table or json (default: table)
  --help               Show this help message

Examples:
  normalize-docs --source-dir data/raw_txt --dest-dir data/filtered_data
  normalize-docs stats --csv output/file_counts.csv
  normalize-docs explain
`;

const COMMANDS = new Set<string>(['normalize', 'stats', 'explain']);
const isCommand = (value: string): value is Command => COMMANDS.has(value);

const parseArgs = (): CliArgs => {
  const argv = process.argv.slice(2);
  const args: CliArgs = { command: 'normalize' };

  const first = argv[0];
  if (first && isCommand(first)) {
    args.command = first;
    argv.shift();
  }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--source-dir':
        args.sourceDir = argv[++i];
        break;
      case '--dest-dir':
        args.destDir = argv[++i];
        break;
      case '--rules':
        args.rules = argv[++i];
        break;
      case '--ledger':
        args.ledger = argv[++i];
        break;
      case '--csv':
        args.csv = argv[++i];
        break;
      case '--format':
        args.format = argv[++i] === 'json' ? 'json' : 'table';
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
    }
  }

  return args;
};

const printSummary = (report: IngestionReport, warnings: readonly string[]): void => {
  const byReason = new Map<string, number>();
  for (const entry of report.rejected) {
    const reason = entry.reason.startsWith('error:') ? 'error' : entry.reason;
    byReason.set(reason, (byReason.get(reason) ?? 0) + 1);
  }

  console.log('\nSummary:');
  console.log(`  Mode:      ${report.mode} (${report.workers} workers)`);
  console.log(`  Total:     ${report.total}`);
  console.log(`  Accepted:  ${report.accepted.length}`);
  console.log(`  Rejected:  ${report.rejected.length}`);
  for (const [reason, count] of byReason) {
    console.log(`    ${reason}: ${count}`);
  }
  console.log(`  Ledger:    ${report.ledgerPath}`);
  for (const warning of warnings) {
    console.log(`  Warning:   ${warning}`);
  }
};

const runNormalize = async (args: CliArgs): Promise<void> => {
  const progressReporter = new ProgressReporter(process.stdout, args.format !== 'json');
  const orchestrator = new IngestionOrchestrator();
  const report = await orchestrator.run(
    {
      sourceRoot: args.sourceDir ?? config.pipeline.sourceDir,
      destRoot: args.destDir ?? config.pipeline.destDir,
      rulesPath: args.rules ?? config.pipeline.rulesPath,
    },
    progressReporter
  );

  if (args.format === 'json') {
    console.log(JSON.stringify(report, null, 2));
    return;
  }
  printSummary(report, progressReporter.warnings);
  if (report.trulyMissing.length > 0) {
    progressReporter.error(`${report.trulyMissing.length} files were never reported; see ${report.ledgerPath}`);
  }
};

const runStats = async (args: CliArgs): Promise<void> => {
  const counts = await countNormalizedFiles(args.destDir ?? config.pipeline.destDir);
  if (args.csv) {
    await writeFile(args.csv, toCsv(counts), 'utf-8');
    logger.info({ path: args.csv }, 'Statistics saved');
  }
  if (args.format === 'json') {
    console.log(JSON.stringify(counts, null, 2));
    return;
  }
  const width = Math.max(6, ...counts.map(c => c.folder.length));
  console.log(`${'Folder'.padEnd(width)} | Files`);
  console.log('-'.repeat(width + 8));
  for (const { folder, fileCount } of counts) {
    console.log(`${folder.padEnd(width)} | ${fileCount}`);
  }
};

const runExplain = async (args: CliArgs): Promise<void> => {
  const ledgerPath = args.ledger ?? ledgerPathFor(args.destDir ?? config.pipeline.destDir);
  const diagnoses = await explainLedger(ledgerPath);
  if (args.format === 'json') {
    console.log(JSON.stringify(diagnoses, null, 2));
    return;
  }
  for (const d of diagnoses) {
    const detail = d.resolvedDate ? `${d.resolvedDate} via ${d.rule}` : 'no date in name';
    console.log(`[${d.verdict}] ${d.path}\n    exists: ${d.exists}, ${detail}`);
  }
};

const main = async (): Promise<void> => {
  const args = parseArgs();

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }

  try {
    switch (args.command) {
      case 'normalize':
        await runNormalize(args);
        break;
      case 'stats':
        await runStats(args);
        break;
      case 'explain':
        await runExplain(args);
        break;
    }
  } catch (error) {
    logger.error({ error }, `${args.command} failed`);
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
};

void main();
