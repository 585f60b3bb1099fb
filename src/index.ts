export {
  createFullDate,
  createPartialDate,
  completePartialDate,
  expandTwoDigitYear,
  formatIsoDate,
  parseIsoDate,
  datesEqual,
} from './domain/dates/CalendarDate.js';
export type { FullDate, PartialDate, ResolvedDate } from './domain/dates/CalendarDate.js';
export type { SourceFile, SourceKind } from './domain/entities/SourceFile.js';

export { DateResolver, dateResolver } from './services/dates/DateResolver.js';
export { defineRule, applyRules } from './services/dates/rules/DateRule.interface.js';
export type { DateRule, RuleMatch } from './services/dates/rules/DateRule.interface.js';
export { FILENAME_RULES } from './services/dates/rules/filenameRules.js';
export { CONTENT_RULES } from './services/dates/rules/contentRules.js';

export { sanitizeStem } from './services/naming/NameSanitizer.js';
export { buildDestination, planDestination, DEFAULT_PATH_LIMIT } from './services/naming/PathBuilder.js';
export { ReverseResolver, createCandidateCache, parseNormalizedName } from './services/naming/ReverseResolver.js';
export type { CandidateCache } from './services/naming/ReverseResolver.js';

export { IngestionOrchestrator, planExecution } from './services/ingestion/IngestionOrchestrator.js';
export type { ProgressSink, IngestionOrchestratorDeps } from './services/ingestion/IngestionOrchestrator.js';
export { FileNormalizer } from './services/ingestion/FileNormalizer.js';
export { DocumentProcessor } from './services/ingestion/DocumentProcessor.js';
export type { TextExtractor, ExtractedText } from './services/ingestion/DocumentProcessor.js';
export { SourceScanner, isIncluded, exclusionReason } from './services/ingestion/SourceScanner.js';
export { reconcile } from './services/ingestion/Reconciler.js';
export { claimDestinations } from './services/ingestion/DestinationClaims.js';
export { ledgerPathFor, formatLedger, readLedger, LEDGER_FILE_NAME } from './services/ingestion/RejectionLedger.js';
export type * from './services/ingestion/types.js';

export { loadNormalizedDocuments } from './services/corpus/DocumentLoader.js';
export type { NormalizedDocument } from './services/corpus/DocumentLoader.js';
export { countNormalizedFiles } from './services/corpus/FolderStatistics.js';
export { explainLedger } from './services/corpus/LedgerDiagnosis.js';

export { loadIngestionRules, defineIngestionRules } from './config/rules.js';
export type { IngestionRules } from './config/validation.js';
export * from './utils/errors.js';
