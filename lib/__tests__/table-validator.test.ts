/**
 * Tests for markdown table structure validation
 */

import {
  TABLE_ISSUE_DESCRIPTIONS,
  analyzeTables,
  countMalformedTables,
  countTableColumns,
  isSeparatorRow,
  isTableRow,
  scanTables
} from '../table-validator.js'

describe('row helpers', () => {
  it('recognizes pipe-delimited rows', () => {
    expect(isTableRow('| a | b |')).toBe(true)
    expect(isTableRow('  |a|  ')).toBe(true)
    expect(isTableRow('| a | b')).toBe(false)
    expect(isTableRow('|')).toBe(false)
  })

  it('recognizes separator rows with alignment colons', () => {
    expect(isSeparatorRow('|---|----|')).toBe(true)
    expect(isSeparatorRow('| :--- | ---: | :-: |')).toBe(true)
    expect(isSeparatorRow('| --- | abc |')).toBe(false)
    expect(isSeparatorRow('||')).toBe(false)
    expect(isSeparatorRow('---')).toBe(false)
  })

  it('counts columns between the outer pipes', () => {
    expect(countTableColumns('| a | b |')).toBe(2)
    expect(countTableColumns('| 1 | 2 | 3 |')).toBe(3)
    expect(countTableColumns('||')).toBe(1)
    expect(countTableColumns('|')).toBe(0)
    expect(countTableColumns('a | b')).toBe(0)
  })

  it('uses Unicode White_Space around rows', () => {
    expect(isTableRow('| a |\u0085')).toBe(true)
    expect(countTableColumns('| a |\u0085')).toBe(1)
    expect(isSeparatorRow('\u3000| --- |\u00a0')).toBe(true)
    // U+FEFF is not White_Space
    expect(isTableRow('\ufeff| a |')).toBe(false)
    expect(countTableColumns('\ufeff| a |')).toBe(0)
  })
})

describe('scanTables', () => {
  it('reads a row containing a line separator as one row', () => {
    const scan = scanTables(['| a | b |', '|---|---|', '| x\u2028y | z | w |'])

    expect(scan.totalTables).toBe(1)
    expect(scan.issues).toEqual([
      {
        kind: 'inconsistent_row',
        tableNumber: 1,
        lineNumber: 3,
        description: TABLE_ISSUE_DESCRIPTIONS.inconsistent_row,
        expectedColumns: 2,
        foundColumns: 3
      }
    ])
  })

  it('reports a body row with too many columns', () => {
    const scan = scanTables(['| A | B |', '|---|----|', '| 1 | 2 | 3 |'])

    expect(scan.totalTables).toBe(1)
    expect(scan.issues).toEqual([
      {
        kind: 'inconsistent_row',
        tableNumber: 1,
        lineNumber: 3,
        description: TABLE_ISSUE_DESCRIPTIONS.inconsistent_row,
        expectedColumns: 2,
        foundColumns: 3
      }
    ])
  })

  it('reports a separator without a header row', () => {
    const scan = scanTables(['|---|', '| x |'])

    expect(scan.totalTables).toBe(1)
    expect(scan.issues).toEqual([
      {
        kind: 'separator_without_header',
        tableNumber: 1,
        lineNumber: 1,
        description: 'Table separator without header row',
        foundColumns: 1
      }
    ])
  })

  it('reports a header that does not match its separator', () => {
    const scan = scanTables(['Intro', '| A |', '| --- | --- |', '| 1 | 2 |'])

    expect(scan.issues).toEqual([
      {
        kind: 'header_separator_mismatch',
        tableNumber: 1,
        lineNumber: 3,
        description: 'Table header and separator column count mismatch',
        expectedColumns: 1,
        foundColumns: 2
      }
    ])
  })

  it('numbers tables and resumes scanning after each body', () => {
    const scan = scanTables([
      '| A | B |',
      '|---|---|',
      '| 1 | 2 |',
      'text',
      '| C |',
      '| --- | --- |',
      '| 3 | 4 | 5 |'
    ])

    expect(scan.totalTables).toBe(2)
    expect(scan.issues.map(issue => [issue.kind, issue.tableNumber, issue.lineNumber])).toEqual([
      ['header_separator_mismatch', 2, 6],
      ['inconsistent_row', 2, 7]
    ])
    expect(countMalformedTables(scan)).toBe(1)
  })

  it('finds nothing in text without tables', () => {
    expect(scanTables(['# Title', 'a | b', ''])).toEqual({ totalTables: 0, issues: [] })
    expect(scanTables([])).toEqual({ totalTables: 0, issues: [] })
  })
})

describe('analyzeTables', () => {
  it('scans the lines of a document', () => {
    const scan = analyzeTables('| A | B |\r\n|---|----|\r\n| 1 | 2 | 3 |\r\n')
    expect(scan.totalTables).toBe(1)
    expect(scan.issues[0].lineNumber).toBe(3)
    expect(scan.issues[0].foundColumns).toBe(3)
  })
})
