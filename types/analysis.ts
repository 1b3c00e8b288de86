/**
 * Type definitions for document sanitization, scoring and table validation.
 */

/**
 * Result of sanitizing a single line.
 */
export interface SanitizedLine {
  /** Line content after tag, glyph and unusual-character removal */
  line: string
  /** Non-whitespace characters removed from this line across all passes */
  removedCount: number
}

/**
 * Quality metrics for one document, derived from a cleaning pass.
 *
 * @example
 * {
 *   totalChars: 120,
 *   totalNonWhitespace: 100,
 *   cleanedChars: 110,
 *   cleanedNonWhitespace: 95,
 *   markerCount: 0,
 *   badCount: 5,
 *   goodCount: 95,
 *   badness: 0.05,
 *   scriptPercentages: { greek: 81.05, latin: 3.16 },
 *   glyphCount: 1,
 *   unusualCount: 4
 * }
 */
export interface QualityMetrics {
  /** Characters in the original text */
  totalChars: number
  /** Non-whitespace characters in the original text */
  totalNonWhitespace: number
  /** Characters in the cleaned text, markers included */
  cleanedChars: number
  /** Non-whitespace characters in the cleaned text, markers included */
  cleanedNonWhitespace: number
  /** Occurrences of the missing-text marker in the cleaned text */
  markerCount: number
  badCount: number
  goodCount: number
  /** badCount / totalNonWhitespace, 0 for empty input */
  badness: number
  /** Share (0-100) of cleaned non-whitespace characters per requested script */
  scriptPercentages: Record<string, number>
  /** Whitespace-delimited tokens containing "glyph" in the original text */
  glyphCount: number
  /** Characters of the original text that belong to the unusual set */
  unusualCount: number
}

export type TableIssueKind =
  | 'header_separator_mismatch'
  | 'separator_without_header'
  | 'inconsistent_row'

/**
 * One structural finding inside a markdown table.
 */
export interface TableIssue {
  kind: TableIssueKind
  /** 1-based index of the table in the document */
  tableNumber: number
  /** 1-based line number */
  lineNumber: number
  description: string
  expectedColumns?: number
  foundColumns?: number
}

/**
 * Tables found in one document and their issues, in scan order.
 */
export interface TableScan {
  totalTables: number
  issues: TableIssue[]
}

/**
 * Raw extraction artifacts counted in a document.
 */
export interface ArtifactCounts {
  /** glyph<c=..,font=/..> placeholders, raw or HTML-escaped */
  glyphTagCount: number
  /** Standalone layout tags, comments excluded */
  layoutTagCount: number
  htmlEntityCount: number
  unusualCount: number
  /** Lines carrying the missing-text marker */
  markedLineCount: number
  /** Longest run of consecutive lines carrying the missing-text marker */
  maxConsecutiveMarkers: number
}
