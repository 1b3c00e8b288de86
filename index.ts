/**
 * Public API: single-document cleaning and analysis, plus the batch handlers
 * the CLI wraps.
 */

export {
  listAvailableScripts,
  cleanText,
  analyzeText,
  analyzeTables,
  ALWAYS_KEEP_SCRIPTS
} from './lib/text-analysis.js'
export { TEXT_MISSING_MARKER, DEFAULT_MIN_REMOVED_FOR_MARKER } from './lib/line-sanitizer.js'
export type { CleanDocumentOptions } from './lib/document-cleaner.js'
export { countArtifacts } from './lib/artifact-counter.js'
export { countMalformedTables } from './lib/table-validator.js'

export { batchCleanMarkdownFiles } from './handlers/batch-clean.js'
export { generateAnalysisReport, type AnalysisReportResult } from './handlers/analysis-report.js'
export {
  generateTableSummary,
  generateDetailedTableReport,
  type TableReportResult
} from './handlers/table-report.js'
export { runFullPipeline, type FullPipelineResult } from './handlers/full-pipeline.js'

export {
  UnknownScriptError,
  InvalidOptionsError,
  DirectoryError,
  FileProcessingError,
  getUserFriendlyError
} from './lib/errors.js'

export type {
  SanitizedLine,
  QualityMetrics,
  TableIssue,
  TableIssueKind,
  TableScan,
  ArtifactCounts
} from './types/analysis.js'
export type {
  BatchCleanOptions,
  AnalysisReportOptions,
  TableReportOptions,
  FullPipelineOptions,
  BatchSummary
} from './types/job-schemas.js'
