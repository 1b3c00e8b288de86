/**
 * Document Cleaner
 *
 * Runs the line sanitizer over every line of a document while keeping the
 * line structure and the document's trailing newline exactly as they were.
 */

import {
  sanitizeLine,
  DEFAULT_MIN_REMOVED_FOR_MARKER
} from './line-sanitizer.js'

export interface CleanDocumentOptions {
  /** Removed characters per line needed before a marker is added (default: 5) */
  minRemovedForMarker?: number
}

export interface CleanedDocument {
  lines: string[]
  endsWithNewline: boolean
}

/**
 * Splits text into lines on `\n`. A trailing newline does not open an extra
 * line, and one `\r` left over from CRLF endings is dropped per line.
 *
 * @example
 * splitLines('a\r\nb\n') // ['a', 'b']
 * splitLines('')         // []
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return []

  const lines = text.split('\n')
  if (text.endsWith('\n')) {
    lines.pop()
  }
  return lines.map(line => (line.endsWith('\r') ? line.slice(0, -1) : line))
}

export function cleanDocumentLines(
  text: string,
  allowed: ReadonlySet<string>,
  unusual: ReadonlySet<string>,
  options: CleanDocumentOptions = {}
): CleanedDocument {
  const { minRemovedForMarker = DEFAULT_MIN_REMOVED_FOR_MARKER } = options

  const lines = splitLines(text).map(
    line => sanitizeLine(line, allowed, unusual, minRemovedForMarker).line
  )

  return {
    lines,
    endsWithNewline: text.length > 0 && text.endsWith('\n')
  }
}

export function renderCleanedDocument(doc: CleanedDocument): string {
  const body = doc.lines.join('\n')
  if (doc.endsWithNewline) {
    return `${body}\n`
  }
  return body.replace(/\n+$/, '')
}

/**
 * Cleans a whole document.
 *
 * @param text - Raw markdown
 * @param allowed - Characters to keep even when they are in the unusual set
 * @param unusual - Characters considered extraction errors
 * @returns Cleaned markdown; ends with a newline only if `text` did
 *
 * @example
 * cleanDocument('a\nb\n', allowed, unusual) // 'a\nb\n'
 * cleanDocument('a\nb', allowed, unusual)   // 'a\nb'
 */
export function cleanDocument(
  text: string,
  allowed: ReadonlySet<string>,
  unusual: ReadonlySet<string>,
  options: CleanDocumentOptions = {}
): string {
  return renderCleanedDocument(cleanDocumentLines(text, allowed, unusual, options))
}
