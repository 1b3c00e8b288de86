/**
 * CSV serialization for batch reports.
 *
 * Reports are written whole at the end of a batch, with rows already in file
 * order, so runs over the same input produce identical files.
 */

import { promises as fs } from 'fs'
import * as path from 'path'
import type { ArtifactCounts, QualityMetrics, TableIssue } from '../types/analysis.js'
import { FileProcessingError, toError } from './errors.js'

export type CsvValue = string | number | undefined

/**
 * Quotes a field when it contains a comma, quote or line break.
 *
 * @example
 * escapeCsvField('a,b')     // '"a,b"'
 * escapeCsvField('say "hi"') // '"say ""hi"""'
 */
export function escapeCsvField(value: CsvValue): string {
  if (value === undefined) return ''
  const text = String(value)
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`
  }
  return text
}

export function toCsv(header: string[], rows: CsvValue[][]): string {
  const lines = [header, ...rows].map(row => row.map(escapeCsvField).join(','))
  return `${lines.join('\n')}\n`
}

export async function writeCsv(filePath: string, header: string[], rows: CsvValue[][]): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true })
    await fs.writeFile(filePath, toCsv(header, rows), 'utf8')
  } catch (error) {
    throw new FileProcessingError(filePath, 'write', toError(error))
  }
}

/** Rounds to four decimals for report readability */
function round4(value: number): number {
  return Math.round(value * 10000) / 10000
}

export interface AnalysisReportRow {
  file: string
  metrics: QualityMetrics
  artifacts: ArtifactCounts
}

export function analysisReportHeader(scripts: string[]): string[] {
  return [
    'file_name',
    'badness',
    ...scripts.map(key => `${key}_percentage`),
    'glyph_count',
    'unusual_count',
    'layout_tag_count',
    'html_entity_count',
    'marker_count',
    'max_consecutive_markers'
  ]
}

export function analysisReportRows(rows: AnalysisReportRow[], scripts: string[]): CsvValue[][] {
  return rows.map(({ file, metrics, artifacts }) => [
    file,
    round4(metrics.badness),
    ...scripts.map(key => round4(metrics.scriptPercentages[key] ?? 0)),
    metrics.glyphCount,
    metrics.unusualCount,
    artifacts.layoutTagCount,
    artifacts.htmlEntityCount,
    metrics.markerCount,
    artifacts.maxConsecutiveMarkers
  ])
}

export const TABLE_SUMMARY_HEADER = ['file', 'total_tables', 'malformed_tables']

export const TABLE_DETAIL_HEADER = [
  'file',
  'line_number',
  'description',
  'expected_columns',
  'found_columns'
]

export function tableDetailRows(file: string, issues: TableIssue[]): CsvValue[][] {
  return issues.map(issue => [
    file,
    issue.lineNumber,
    issue.description,
    issue.expectedColumns,
    issue.foundColumns
  ])
}
