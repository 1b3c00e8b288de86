/**
 * Entry points for cleaning and analysing one document's text.
 *
 * Unknown script keys are rejected with UnknownScriptError by every entry
 * point, so cleaning and analysis can never disagree about the allow-list.
 */

import type { QualityMetrics, TableScan } from '../types/analysis.js'
import { availableKeys, scriptSet, unusualChars } from './script-registry.js'
import { cleanDocument, type CleanDocumentOptions } from './document-cleaner.js'
import { TEXT_MISSING_MARKER } from './line-sanitizer.js'
import { score } from './badness-scorer.js'
import { countGlyphTokens, countUnusualChars } from './artifact-counter.js'
import { analyzeTables as scanDocumentTables } from './table-validator.js'
import { UnknownScriptError } from './errors.js'

/** Categories every allow-list includes, requested or not */
export const ALWAYS_KEEP_SCRIPTS = ['punctuation', 'numbers', 'common_symbols'] as const

const BASIC_WHITESPACE = [' ', '\t', '\n']

export function listAvailableScripts(): string[] {
  return availableKeys()
}

/**
 * Throws UnknownScriptError when any key is not registered.
 */
export function assertKnownScripts(scriptsToKeep: string[]): void {
  const known = availableKeys()
  const unknown = scriptsToKeep.filter(key => !known.includes(key))
  if (unknown.length > 0) {
    throw new UnknownScriptError(unknown, known)
  }
}

/**
 * Builds a fresh allow-list for one call: the requested scripts, the
 * always-keep categories and basic whitespace.
 *
 * @throws UnknownScriptError for unregistered keys
 */
export function buildAllowedCharSet(scriptsToKeep: string[]): Set<string> {
  assertKnownScripts(scriptsToKeep)

  const allowed = new Set<string>(BASIC_WHITESPACE)
  for (const key of [...scriptsToKeep, ...ALWAYS_KEEP_SCRIPTS]) {
    const chars = scriptSet(key)
    if (!chars) continue
    for (const ch of chars) allowed.add(ch)
  }
  return allowed
}

/**
 * Cleans text, keeping the requested scripts.
 *
 * @example
 * cleanText('Νόμος ЖЖЖЖЖ 4412/2016', ['greek'])
 * // 'Νόμος  4412/2016 <!-- text-missing -->'
 */
export function cleanText(
  text: string,
  scriptsToKeep: string[],
  options: CleanDocumentOptions = {}
): string {
  const allowed = buildAllowedCharSet(scriptsToKeep)
  return cleanDocument(text, allowed, unusualChars(), options)
}

/**
 * Cleans text and scores the result.
 *
 * @param calculateDetailedCounts - When false, script percentages and the raw
 *   glyph/unusual counts are skipped and reported as empty/zero
 */
export function analyzeText(
  text: string,
  scriptsToKeep: string[],
  calculateDetailedCounts: boolean = true,
  options: CleanDocumentOptions = {}
): QualityMetrics {
  const cleaned = cleanText(text, scriptsToKeep, options)

  if (!calculateDetailedCounts) {
    return score(text, cleaned, TEXT_MISSING_MARKER)
  }

  return score(text, cleaned, TEXT_MISSING_MARKER, {
    scriptsToKeep,
    glyphCount: countGlyphTokens(text),
    unusualCount: countUnusualChars(text)
  })
}

export function analyzeTables(text: string): TableScan {
  return scanDocumentTables(text)
}
