/**
 * Analysis report handler.
 *
 * Scores every markdown file under the input directory and writes one CSV row
 * per file: badness, per-script retention and raw artifact counts. Cleaned
 * files are written too when an output directory is given.
 */

import {
  AnalysisReportOptionsSchema,
  parseOptions,
  type AnalysisReportOptions,
  type BatchSummary
} from '../types/job-schemas.js'
import { processDirectory } from '../lib/directory-processor.js'
import { buildAllowedCharSet } from '../lib/text-analysis.js'
import { cleanDocument } from '../lib/document-cleaner.js'
import { TEXT_MISSING_MARKER } from '../lib/line-sanitizer.js'
import { score } from '../lib/badness-scorer.js'
import { countArtifacts, countGlyphTokens } from '../lib/artifact-counter.js'
import { unusualChars } from '../lib/script-registry.js'
import {
  analysisReportHeader,
  analysisReportRows,
  writeCsv,
  type AnalysisReportRow
} from '../lib/csv-report.js'
import { createLogger } from '../lib/logger.js'

const log = createLogger('AnalysisReport')

export interface AnalysisReportResult {
  summary: BatchSummary
  rows: AnalysisReportRow[]
}

/**
 * @throws UnknownScriptError / InvalidOptionsError / DirectoryError before any file is read
 */
export async function generateAnalysisReport(input: AnalysisReportOptions): Promise<AnalysisReportResult> {
  const options = parseOptions(AnalysisReportOptionsSchema, input)

  const allowed = buildAllowedCharSet(options.scripts)
  const unusual = unusualChars()

  const { summary, results } = await processDirectory<AnalysisReportRow>({
    inputDir: options.inputDir,
    outputDir: options.outputDir,
    threads: options.threads,
    operation: (content, file) => {
      const cleaned = cleanDocument(content, allowed, unusual)
      const original = countArtifacts(content)
      const markers = countArtifacts(cleaned)
      const metrics = score(content, cleaned, TEXT_MISSING_MARKER, {
        scriptsToKeep: options.scripts,
        glyphCount: countGlyphTokens(content),
        unusualCount: original.unusualCount
      })

      return {
        content: cleaned,
        result: {
          file: file.relativePath,
          metrics,
          artifacts: {
            ...original,
            // Markers only exist after cleaning
            markedLineCount: markers.markedLineCount,
            maxConsecutiveMarkers: markers.maxConsecutiveMarkers
          }
        }
      }
    }
  })

  const rows = results.map(({ result }) => result)

  if (options.reportCsv !== undefined) {
    await writeCsv(
      options.reportCsv,
      analysisReportHeader(options.scripts),
      analysisReportRows(rows, options.scripts)
    )
    log.info(`Analysis report written to ${options.reportCsv} (${rows.length} rows)`)
  }

  return { summary, rows }
}
