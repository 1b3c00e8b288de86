/**
 * Tests for badness scoring and script retention
 */

import { countOccurrences, score, scriptRetention } from '../badness-scorer.js'
import { TEXT_MISSING_MARKER } from '../line-sanitizer.js'

describe('countOccurrences', () => {
  it('counts non-overlapping matches', () => {
    expect(countOccurrences('aaaa', 'aa')).toBe(2)
    expect(countOccurrences('abcabc', 'bc')).toBe(2)
  })

  it('returns 0 for an empty needle', () => {
    expect(countOccurrences('abc', '')).toBe(0)
  })
})

describe('scriptRetention', () => {
  it('reports the share of non-whitespace characters per script', () => {
    expect(scriptRetention('αβγ abc', ['greek'])).toEqual({ greek: 50 })
  })

  it('reports 0 for text without non-whitespace characters', () => {
    expect(scriptRetention(' \n', ['greek', 'latin'])).toEqual({ greek: 0, latin: 0 })
  })

  it('skips unknown keys', () => {
    expect(scriptRetention('abc', ['latin', 'klingon'])).toEqual({ latin: 100 })
  })
})

describe('score', () => {
  it('subtracts marker characters before comparing', () => {
    const metrics = score('Κείμενο ЖЖЖЖЖ', `Κείμενο ${TEXT_MISSING_MARKER}`, TEXT_MISSING_MARKER)

    expect(metrics.totalChars).toBe(13)
    expect(metrics.totalNonWhitespace).toBe(12)
    expect(metrics.cleanedChars).toBe(29)
    expect(metrics.cleanedNonWhitespace).toBe(26)
    expect(metrics.markerCount).toBe(1)
    expect(metrics.badCount).toBe(5)
    expect(metrics.goodCount).toBe(7)
    expect(metrics.badness).toBeCloseTo(5 / 12)
  })

  it('scores a line replaced by the marker as fully bad', () => {
    const metrics = score('ЖЖЖЖЖ', TEXT_MISSING_MARKER, TEXT_MISSING_MARKER)
    expect(metrics.badCount).toBe(5)
    expect(metrics.goodCount).toBe(0)
    expect(metrics.badness).toBe(1)
  })

  it('returns zero badness for empty input', () => {
    const metrics = score('', '', TEXT_MISSING_MARKER)
    expect(metrics.badness).toBe(0)
    expect(metrics.totalNonWhitespace).toBe(0)
    expect(metrics.scriptPercentages).toEqual({})
  })

  it('clamps when the cleaned text is longer than the original', () => {
    const metrics = score('ab', 'abc', TEXT_MISSING_MARKER)
    expect(metrics.badCount).toBe(0)
    expect(metrics.goodCount).toBe(2)
    expect(metrics.badness).toBe(0)
  })

  it('computes script percentages over the cleaned text', () => {
    const metrics = score('Κείμενο ЖЖЖЖЖ', `Κείμενο ${TEXT_MISSING_MARKER}`, TEXT_MISSING_MARKER, {
      scriptsToKeep: ['greek', 'latin']
    })
    // 26 non-whitespace characters: 7 Greek, 11 Latin letters in the marker
    expect(metrics.scriptPercentages.greek).toBeCloseTo((7 / 26) * 100)
    expect(metrics.scriptPercentages.latin).toBeCloseTo((11 / 26) * 100)
  })

  it('passes raw counts through', () => {
    const metrics = score('a', 'a', TEXT_MISSING_MARKER, { glyphCount: 2, unusualCount: 3 })
    expect(metrics.glyphCount).toBe(2)
    expect(metrics.unusualCount).toBe(3)
  })
})
