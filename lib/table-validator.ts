/**
 * Table Structure Validator
 *
 * Single forward pass over a document's lines that finds markdown tables by
 * their separator row (`|---|:--:|`) and reports column-count mismatches
 * between the header, the separator and the body rows.
 *
 * Tables never overlap: once a separator is found, its contiguous body rows
 * belong to that table and scanning resumes after them.
 */

import type { TableIssue, TableScan } from '../types/analysis.js'
import { splitLines } from './document-cleaner.js'
import { trimWhitespace } from './line-sanitizer.js'

const TABLE_ROW_REGEX = /^\p{White_Space}*\|[^\n]*\|\p{White_Space}*$/u
const SEPARATOR_CELL_REGEX = /^\p{White_Space}*[-:]+\p{White_Space}*$/u

export const TABLE_ISSUE_DESCRIPTIONS = {
  header_separator_mismatch: 'Table header and separator column count mismatch',
  separator_without_header: 'Table separator without header row',
  inconsistent_row: 'Table row has inconsistent column count'
} as const

type ScanState =
  | { kind: 'scanning' }
  | { kind: 'in_table'; tableNumber: number; separatorColumns: number }

export function isTableRow(line: string): boolean {
  return TABLE_ROW_REGEX.test(line)
}

/**
 * A row whose cells are all made of dashes and colons.
 *
 * @example
 * isSeparatorRow('| --- | :---: |') // true
 * isSeparatorRow('| --- | abc |')   // false
 */
export function isSeparatorRow(line: string): boolean {
  if (!isTableRow(line)) return false

  const trimmed = trimWhitespace(line)
  const inner = trimmed.slice(1, -1)
  return inner.split('|').every(cell => SEPARATOR_CELL_REGEX.test(cell))
}

/**
 * Counts the cells of a pipe-delimited row: interior pipes + 1, once the
 * outer pipes are stripped. Anything that is not a complete row has 0.
 *
 * @example
 * countTableColumns('| a | b |') // 2
 * countTableColumns('|')         // 0
 */
export function countTableColumns(row: string): number {
  const trimmed = trimWhitespace(row)
  if (trimmed.length < 2 || !trimmed.startsWith('|') || !trimmed.endsWith('|')) {
    return 0
  }
  const inner = trimmed.slice(1, -1)
  return inner.split('|').length
}

/**
 * Scans lines for tables and their structural issues.
 *
 * @param lines - Document lines without newlines
 * @returns Table count and issues in ascending line order
 */
export function scanTables(lines: string[]): TableScan {
  const issues: TableIssue[] = []
  let totalTables = 0
  let state: ScanState = { kind: 'scanning' }
  let cursor = 0

  while (cursor < lines.length) {
    if (state.kind === 'scanning') {
      const line = lines[cursor]
      if (!isSeparatorRow(line)) {
        cursor++
        continue
      }

      totalTables++
      const separatorColumns = countTableColumns(line)
      const header = cursor > 0 ? lines[cursor - 1] : undefined

      if (header !== undefined && isTableRow(header)) {
        const headerColumns = countTableColumns(header)
        if (headerColumns !== separatorColumns) {
          issues.push({
            kind: 'header_separator_mismatch',
            tableNumber: totalTables,
            lineNumber: cursor + 1,
            description: TABLE_ISSUE_DESCRIPTIONS.header_separator_mismatch,
            expectedColumns: headerColumns,
            foundColumns: separatorColumns
          })
        }
      } else {
        issues.push({
          kind: 'separator_without_header',
          tableNumber: totalTables,
          lineNumber: cursor + 1,
          description: TABLE_ISSUE_DESCRIPTIONS.separator_without_header,
          foundColumns: separatorColumns
        })
      }

      state = { kind: 'in_table', tableNumber: totalTables, separatorColumns }
      cursor++
      continue
    }

    // in_table: consume body rows until the first non-row line
    const row = lines[cursor]
    if (!isTableRow(row)) {
      state = { kind: 'scanning' }
      continue
    }

    const rowColumns = countTableColumns(row)
    if (state.separatorColumns > 0 && rowColumns !== state.separatorColumns) {
      issues.push({
        kind: 'inconsistent_row',
        tableNumber: state.tableNumber,
        lineNumber: cursor + 1,
        description: TABLE_ISSUE_DESCRIPTIONS.inconsistent_row,
        expectedColumns: state.separatorColumns,
        foundColumns: rowColumns
      })
    }
    cursor++
  }

  return { totalTables, issues }
}

/**
 * Scans a markdown document for malformed tables.
 *
 * @example
 * analyzeTables('| A | B |\n|---|----|\n| 1 | 2 | 3 |')
 * // {
 * //   totalTables: 1,
 * //   issues: [{ kind: 'inconsistent_row', lineNumber: 3, expectedColumns: 2, foundColumns: 3, ... }]
 * // }
 */
export function analyzeTables(text: string): TableScan {
  return scanTables(splitLines(text))
}

/**
 * Number of tables with at least one issue.
 */
export function countMalformedTables(scan: TableScan): number {
  return new Set(scan.issues.map(issue => issue.tableNumber)).size
}
