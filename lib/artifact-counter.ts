/**
 * Raw extraction-artifact counts for a document, used by the analysis report
 * to show what kind of damage a file carried before cleaning.
 */

import type { ArtifactCounts } from '../types/analysis.js'
import { TEXT_MISSING_MARKER } from './line-sanitizer.js'
import { splitLines } from './document-cleaner.js'
import { unusualChars } from './script-registry.js'

// Tags and glyph placeholders only count between whitespace. The boundary
// after a match is consumed, so `<a> <b>` counts once.
const GLYPH_TAG_REGEX_RAW = /(?:^|\p{White_Space})glyph<c=\d+,font=\/[^>]+>(?:\p{White_Space}|$)/gu
const GLYPH_TAG_REGEX_HTML = /(?:^|\p{White_Space})glyph&lt;c=\d+,font=\/[^>]+&gt;(?:\p{White_Space}|$)/gu
const LAYOUT_TAG_REGEX = /(?:^|\p{White_Space})(<[^>]*>)(?:\p{White_Space}|$)/gu
const HTML_ENTITY_REGEX = /&[a-zA-Z]+;|&#\d+;/g
const GLYPH_WORD_REGEX = /[^\p{White_Space}]*glyph[^\p{White_Space}]*/gu

function countMatches(text: string, pattern: RegExp): number {
  return Array.from(text.matchAll(pattern)).length
}

export function countGlyphTokens(text: string): number {
  return countMatches(text, GLYPH_WORD_REGEX)
}

export function countUnusualChars(text: string, unusual: ReadonlySet<string> = unusualChars()): number {
  let count = 0
  for (const ch of text) {
    if (unusual.has(ch)) count++
  }
  return count
}

export function countLayoutTags(text: string): number {
  let count = 0
  for (const match of text.matchAll(LAYOUT_TAG_REGEX)) {
    if (!match[1].startsWith('<!--')) count++
  }
  return count
}

/**
 * Longest run of consecutive lines that carry the missing-text marker.
 */
export function maxConsecutiveMarkers(text: string, marker: string = TEXT_MISSING_MARKER): number {
  let longest = 0
  let current = 0
  for (const line of splitLines(text)) {
    if (line.includes(marker)) {
      current++
      longest = Math.max(longest, current)
    } else {
      current = 0
    }
  }
  return longest
}

/**
 * Counts extraction artifacts in a document.
 *
 * @param text - Raw or cleaned markdown
 *
 * @example
 * countArtifacts('Κείμενο glyph<c=3,font=/AAAA+Arial> &amp; <br>')
 * // { glyphTagCount: 1, layoutTagCount: 1, htmlEntityCount: 1, unusualCount: 0, markedLineCount: 0, maxConsecutiveMarkers: 0 }
 */
export function countArtifacts(text: string): ArtifactCounts {
  return {
    glyphTagCount: countMatches(text, GLYPH_TAG_REGEX_RAW) + countMatches(text, GLYPH_TAG_REGEX_HTML),
    layoutTagCount: countLayoutTags(text),
    htmlEntityCount: countMatches(text, HTML_ENTITY_REGEX),
    unusualCount: countUnusualChars(text),
    markedLineCount: splitLines(text).reduce(
      (total, line) => total + (line.includes(TEXT_MISSING_MARKER) ? 1 : 0),
      0
    ),
    maxConsecutiveMarkers: maxConsecutiveMarkers(text)
  }
}
