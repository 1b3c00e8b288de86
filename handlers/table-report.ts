/**
 * Table report handlers.
 *
 * Both scan every markdown file under the input directory for malformed
 * tables. The summary variant writes one row per file; the detailed variant
 * writes one row per issue.
 */

import {
  TableReportOptionsSchema,
  parseOptions,
  type BatchSummary,
  type TableReportOptions
} from '../types/job-schemas.js'
import type { TableScan } from '../types/analysis.js'
import {
  processDirectory,
  type DiscoveredFile,
  type FileResult
} from '../lib/directory-processor.js'
import { analyzeTables, countMalformedTables } from '../lib/table-validator.js'
import {
  TABLE_DETAIL_HEADER,
  TABLE_SUMMARY_HEADER,
  tableDetailRows,
  writeCsv
} from '../lib/csv-report.js'
import { createLogger } from '../lib/logger.js'

const log = createLogger('TableReport')

export interface TableReportResult {
  summary: BatchSummary
  /** Scans of the files that were read successfully, by relative path */
  scans: Array<{ file: string; scan: TableScan }>
}

/** Limits a scan to some of the markdown files under the input directory */
export type TableScanFilter = (file: DiscoveredFile) => boolean

async function scanDirectory(inputDir: string, threads: number, include?: TableScanFilter): Promise<{
  summary: BatchSummary
  results: Array<FileResult<TableScan>>
}> {
  return processDirectory<TableScan>({
    inputDir,
    threads,
    include,
    operation: content => ({ result: analyzeTables(content) })
  })
}

function toScans(results: Array<FileResult<TableScan>>): TableReportResult['scans'] {
  return results.map(({ file, result }) => ({ file: file.relativePath, scan: result }))
}

/**
 * Writes `file,total_tables,malformed_tables` for every file.
 *
 * @example
 * await generateTableSummary({ inputDir: './markdown', outputCsv: './tables.csv' })
 * // tables.csv:
 * // file,total_tables,malformed_tables
 * // a.md,2,1
 */
export async function generateTableSummary(input: TableReportOptions): Promise<TableReportResult> {
  const options = parseOptions(TableReportOptionsSchema, input)
  const { summary, results } = await scanDirectory(options.inputDir, options.threads)
  const scans = toScans(results)

  await writeCsv(
    options.outputCsv,
    TABLE_SUMMARY_HEADER,
    scans.map(({ file, scan }) => [file, scan.totalTables, countMalformedTables(scan)])
  )
  log.info(`Table summary written to ${options.outputCsv} (${scans.length} files)`)

  return { summary, scans }
}

/**
 * Writes one row per table issue. Files without issues contribute no rows.
 * With `include`, only the matching files are scanned.
 */
export async function generateDetailedTableReport(
  input: TableReportOptions,
  include?: TableScanFilter
): Promise<TableReportResult> {
  const options = parseOptions(TableReportOptionsSchema, input)
  const { summary, results } = await scanDirectory(options.inputDir, options.threads, include)
  const scans = toScans(results)

  const rows = scans.flatMap(({ file, scan }) => tableDetailRows(file, scan.issues))
  await writeCsv(options.outputCsv, TABLE_DETAIL_HEADER, rows)

  const malformed = scans.filter(({ scan }) => scan.issues.length > 0).length
  log.info(`Table report written to ${options.outputCsv}: ${rows.length} issues in ${malformed} files`)

  return { summary, scans }
}
