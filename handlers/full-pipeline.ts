/**
 * Full pipeline handler.
 *
 * 1. Clean every file into the final output directory and score each one
 *    against its original (analysis CSV)
 * 2. Scan the files step 1 wrote for malformed tables (detailed table CSV).
 *    Other markdown already in the output directory is left out.
 */

import * as path from 'path'
import {
  FullPipelineOptionsSchema,
  parseOptions,
  type BatchSummary,
  type FullPipelineOptions
} from '../types/job-schemas.js'
import { generateAnalysisReport } from './analysis-report.js'
import { generateDetailedTableReport } from './table-report.js'
import { createLogger } from '../lib/logger.js'

const log = createLogger('FullPipeline')

export const DEFAULT_TABLE_REPORT_NAME = 'table_issues.csv'

export interface FullPipelineResult {
  analysis: BatchSummary
  tables: BatchSummary
  reportCsv: string
  tableReportCsv: string
}

/**
 * @example
 * const result = await runFullPipeline({
 *   inputDir: './markdown',
 *   finalOutputDir: './cleaned',
 *   reportCsv: './report.csv',
 *   scripts: ['greek', 'latin']
 * })
 * // ./cleaned/**.md, ./report.csv, ./cleaned/table_issues.csv
 */
export async function runFullPipeline(input: FullPipelineOptions): Promise<FullPipelineResult> {
  const options = parseOptions(FullPipelineOptionsSchema, input)
  const tableReportCsv = options.tableReportCsv ?? path.join(options.finalOutputDir, DEFAULT_TABLE_REPORT_NAME)
  const startTime = Date.now()

  log.info(`Step 1/2: cleaning and scoring ${options.inputDir}`)
  const { summary: analysis, rows } = await generateAnalysisReport({
    inputDir: options.inputDir,
    outputDir: options.finalOutputDir,
    reportCsv: options.reportCsv,
    scripts: options.scripts,
    threads: options.threads
  })

  const cleaned = new Set(rows.map(row => row.file))
  log.info(`Step 2/2: scanning tables in ${cleaned.size} cleaned files under ${options.finalOutputDir}`)
  const { summary: tables } = await generateDetailedTableReport(
    {
      inputDir: options.finalOutputDir,
      outputCsv: tableReportCsv,
      threads: options.threads
    },
    file => cleaned.has(file.relativePath)
  )

  log.info(`Pipeline finished in ${Date.now() - startTime}ms`)

  return {
    analysis,
    tables,
    reportCsv: options.reportCsv,
    tableReportCsv
  }
}
