/**
 * Script Registry
 *
 * Hand-curated character sets for the scripts and symbol categories found in
 * gazette text, plus the derived "unusual" set: code points from blocks that
 * OCR font-mapping errors tend to produce.
 *
 * The registry is built on first access and is read-only afterwards.
 */

export const UNUSUAL_KEY = 'unusual'

const LATIN = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ'
const ACCENTED_GREEK = 'άέήίόύώΆΈΉΊΌΎΏϊϋΪΫΐΰ'
const FRENCH = 'àâçéèêëîïôùûüÿæœÀÂÇÉÈÊËÎÏÔÙÛÜŸÆŒ«»'
const SPANISH = 'áéíóúüñÁÉÍÓÚÜÑ¿¡'
const PUNCTUATION = '.,;:!?()[]{}\'"&@#$%^*_-+=|\\<>/~`'
const NUMBERS = '0123456789'
const COMMON_SYMBOLS = '€£¥©®™°§'

/** Half-open code point ranges [start, end) */
type CodePointRange = readonly [number, number]

// Greek and Coptic block with the Coptic letters (U+03E2-U+03EF) cut out
const GREEK_RANGES: readonly CodePointRange[] = [
  [0x0370, 0x03e2],
  [0x03f0, 0x0400],
]

const UNUSUAL_RANGES: readonly CodePointRange[] = [
  [0x0080, 0x0100], // Latin-1 Supplement
  [0x0100, 0x0180], // Latin Extended-A
  [0x0180, 0x0250], // Latin Extended-B
  [0x0250, 0x02b0], // IPA Extensions
  [0x1e00, 0x1f00], // Latin Extended Additional
  [0x03e2, 0x03f0], // Coptic letters inside Greek and Coptic
  [0x2c80, 0x2d00], // Coptic
  [0x0400, 0x0500], // Cyrillic
  [0x0500, 0x0530], // Cyrillic Supplement
]

export type ScriptRegistry = ReadonlyMap<string, ReadonlySet<string>>

function charsOf(text: string): Set<string> {
  return new Set(Array.from(text))
}

function rangeChars(ranges: readonly CodePointRange[]): Set<string> {
  const chars = new Set<string>()
  for (const [start, end] of ranges) {
    for (let code = start; code < end; code++) {
      chars.add(String.fromCodePoint(code))
    }
  }
  return chars
}

function buildRegistry(): ScriptRegistry {
  const registry = new Map<string, ReadonlySet<string>>()

  const greek = rangeChars(GREEK_RANGES)
  for (const ch of ACCENTED_GREEK) greek.add(ch)

  registry.set('latin', charsOf(LATIN))
  registry.set('greek', greek)
  registry.set('french', charsOf(FRENCH))
  registry.set('spanish', charsOf(SPANISH))
  registry.set('punctuation', charsOf(PUNCTUATION))
  registry.set('numbers', charsOf(NUMBERS))
  registry.set('common_symbols', charsOf(COMMON_SYMBOLS))

  // Legitimate accented letters and symbols must never be flagged
  const curated = charsOf(FRENCH + SPANISH + ACCENTED_GREEK + PUNCTUATION + COMMON_SYMBOLS)
  const unusual = rangeChars(UNUSUAL_RANGES)
  for (const ch of curated) unusual.delete(ch)
  registry.set(UNUSUAL_KEY, unusual)

  return registry
}

let registryInstance: ScriptRegistry | null = null

/**
 * Returns the process-wide registry, building it on first use.
 */
export function getScriptRegistry(): ScriptRegistry {
  if (!registryInstance) {
    registryInstance = buildRegistry()
  }
  return registryInstance
}

/**
 * Looks up the character set registered under `key`.
 *
 * @returns The set, or undefined for unknown keys
 */
export function scriptSet(key: string): ReadonlySet<string> | undefined {
  return getScriptRegistry().get(key)
}

/**
 * Registered script keys in registration order, without the internal
 * unusual set.
 */
export function availableKeys(): string[] {
  return Array.from(getScriptRegistry().keys()).filter(key => key !== UNUSUAL_KEY)
}

export function unusualChars(): ReadonlySet<string> {
  const unusual = scriptSet(UNUSUAL_KEY)
  if (!unusual) {
    throw new Error('Script registry is missing the unusual set')
  }
  return unusual
}
