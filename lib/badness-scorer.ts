/**
 * Badness Scorer
 *
 * Compares an original document with its cleaned version to estimate how much
 * of the original was extraction garbage.
 *
 * Key Metrics:
 * - badness: share of original non-whitespace characters that did not survive
 * - script retention: which scripts make up the cleaned text
 *
 * Markers are synthetic, so their characters are subtracted from the cleaned
 * count before comparing.
 */

import type { QualityMetrics } from '../types/analysis.js'
import { countNonWhitespace, isWhitespace } from './line-sanitizer.js'
import { scriptSet } from './script-registry.js'

export interface ScoreOptions {
  /** Scripts to report retention percentages for */
  scriptsToKeep?: string[]
  /** Pre-computed raw counts; computed as 0 when omitted */
  glyphCount?: number
  unusualCount?: number
}

/**
 * Counts non-overlapping occurrences of `needle` in `haystack`.
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) return 0

  let count = 0
  let from = haystack.indexOf(needle)
  while (from !== -1) {
    count++
    from = haystack.indexOf(needle, from + needle.length)
  }
  return count
}

/**
 * Share of the cleaned text's non-whitespace characters belonging to each
 * script, as a percentage. Unknown keys are skipped.
 *
 * @example
 * scriptRetention('αβγ abc', ['greek']) // { greek: 50 }
 */
export function scriptRetention(cleaned: string, scriptsToKeep: string[]): Record<string, number> {
  const percentages: Record<string, number> = {}
  const chars = Array.from(cleaned).filter(ch => !isWhitespace(ch))
  const total = chars.length

  for (const key of scriptsToKeep) {
    const charset = scriptSet(key)
    if (!charset) continue

    if (total === 0) {
      percentages[key] = 0
      continue
    }
    const inScript = chars.filter(ch => charset.has(ch)).length
    percentages[key] = (inScript / total) * 100
  }

  return percentages
}

/**
 * Scores one cleaning pass.
 *
 * @param original - Text before cleaning
 * @param cleaned - Text after cleaning, markers included
 * @param markerText - The marker the cleaner inserts
 * @returns Metrics; badness is in [0, 1] and goodCount + badCount equals
 *   totalNonWhitespace
 */
export function score(
  original: string,
  cleaned: string,
  markerText: string,
  options: ScoreOptions = {}
): QualityMetrics {
  const { scriptsToKeep = [], glyphCount = 0, unusualCount = 0 } = options

  const totalNonWhitespace = countNonWhitespace(original)
  const cleanedNonWhitespace = countNonWhitespace(cleaned)
  const markerCount = countOccurrences(cleaned, markerText)

  const markerChars = markerCount * countNonWhitespace(markerText)
  const adjustedCleaned = Math.max(0, cleanedNonWhitespace - markerChars)
  // Clamped: cleaned text longer than the original counts as nothing removed
  const badCount = Math.max(0, totalNonWhitespace - adjustedCleaned)
  const goodCount = totalNonWhitespace - badCount

  return {
    totalChars: Array.from(original).length,
    totalNonWhitespace,
    cleanedChars: Array.from(cleaned).length,
    cleanedNonWhitespace,
    markerCount,
    badCount,
    goodCount,
    badness: totalNonWhitespace > 0 ? badCount / totalNonWhitespace : 0,
    scriptPercentages: scriptRetention(cleaned, scriptsToKeep),
    glyphCount,
    unusualCount
  }
}
