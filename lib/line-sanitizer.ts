/**
 * Line Sanitizer
 *
 * Removes OCR extraction artifacts from one line of markdown:
 * 1. Layout tags (`<span ...>`, `</td>`), keeping HTML comments
 * 2. Glyph placeholders (`glyph<c=3,font=/ABCDEE+Arial>`), as whole tokens
 * 3. Unusual characters that are not in the caller's allow-list
 *
 * Each pass is a pure function of the previous pass's output and reports how
 * many non-whitespace characters it removed. The combined count decides
 * whether the line gets the missing-text marker.
 */

import type { SanitizedLine } from '../types/analysis.js'

/** Inserted where a line lost content. Consumers grep for this exact text. */
export const TEXT_MISSING_MARKER = '<!-- text-missing -->'

export const DEFAULT_MIN_REMOVED_FOR_MARKER = 5

const TAG_REGEX = /<[^>]*>/g
// Lines never contain \n, so [^\n] spans any other character, \r included
const COMMENT_REGEX = /<!--[^\n]*?-->/
const GLYPH_WORD_REGEX = /[^\p{White_Space}]*glyph[^\p{White_Space}]*/gu
const WHITESPACE_REGEX = /\p{White_Space}/u

interface PassResult {
  text: string
  removed: number
}

export function isWhitespace(ch: string): boolean {
  return WHITESPACE_REGEX.test(ch)
}

export function countNonWhitespace(text: string): number {
  let count = 0
  for (const ch of text) {
    if (!isWhitespace(ch)) count++
  }
  return count
}

export function isBlank(text: string): boolean {
  return countNonWhitespace(text) === 0
}

// White_Space code points are all in the BMP, so code units can be tested one by one

export function trimTrailingWhitespace(text: string): string {
  let end = text.length
  while (end > 0 && isWhitespace(text[end - 1])) end--
  return text.slice(0, end)
}

/**
 * Trims Unicode White_Space only. Unlike String#trim, U+FEFF is kept and
 * U+0085 is removed.
 */
export function trimWhitespace(text: string): string {
  const trimmed = trimTrailingWhitespace(text)
  let start = 0
  while (start < trimmed.length && isWhitespace(trimmed[start])) start++
  return trimmed.slice(start)
}

/**
 * Deletes every match of `pattern` unless `keep` says otherwise, counting the
 * non-whitespace characters of what was deleted.
 */
function stripMatches(
  text: string,
  pattern: RegExp,
  keep: (match: string) => boolean = () => false
): PassResult {
  let removed = 0
  const stripped = text.replace(pattern, (match) => {
    if (keep(match)) return match
    removed += countNonWhitespace(match)
    return ''
  })
  return { text: stripped, removed }
}

export function stripTags(text: string): PassResult {
  return stripMatches(text, TAG_REGEX, tag => COMMENT_REGEX.test(tag))
}

export function stripGlyphTokens(text: string): PassResult {
  return stripMatches(text, GLYPH_WORD_REGEX)
}

export function stripUnusualChars(
  text: string,
  allowed: ReadonlySet<string>,
  unusual: ReadonlySet<string>
): PassResult {
  let kept = ''
  let removed = 0
  for (const ch of text) {
    if (unusual.has(ch) && !allowed.has(ch)) {
      if (!isWhitespace(ch)) removed++
    } else {
      kept += ch
    }
  }
  return { text: kept, removed }
}

/**
 * Sanitizes one line and applies the marker rule.
 *
 * @param line - Line without its newline
 * @param allowed - Characters the caller wants kept
 * @param unusual - Characters considered extraction errors
 * @param minRemovedForMarker - Removed characters needed before a marker is added
 *
 * @example
 * sanitizeLine('Άρθρο 5 glyph<c=3,font=/AAAA+Arial>', allowed, unusual)
 * // { line: 'Άρθρο 5 <!-- text-missing -->', removedCount: 27 }
 */
export function sanitizeLine(
  line: string,
  allowed: ReadonlySet<string>,
  unusual: ReadonlySet<string>,
  minRemovedForMarker: number = DEFAULT_MIN_REMOVED_FOR_MARKER
): SanitizedLine {
  const afterTags = stripTags(line)
  const afterGlyphs = stripGlyphTokens(afterTags.text)
  const afterUnusual = stripUnusualChars(afterGlyphs.text, allowed, unusual)

  const removedCount = afterTags.removed + afterGlyphs.removed + afterUnusual.removed
  const processed = afterUnusual.text
  const enoughRemoved = removedCount >= minRemovedForMarker

  if (!isBlank(processed)) {
    if (enoughRemoved) {
      return { line: `${trimTrailingWhitespace(processed)} ${TEXT_MISSING_MARKER}`, removedCount }
    }
    return { line: processed, removedCount }
  }

  // Never fabricate a marker for a line that was blank to begin with
  if (enoughRemoved && !isBlank(line)) {
    return { line: TEXT_MISSING_MARKER, removedCount }
  }
  return { line: processed, removedCount }
}
