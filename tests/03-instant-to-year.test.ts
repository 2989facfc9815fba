/**
 * Segment 03: Instant to Year Tests
 *
 * Tests the estimate-then-correct year resolution, including both ends of
 * the 64-bit instant range.
 */

import { describe, it, expect } from 'vitest'
import { yearOf } from '../src/instant-to-year'
import { computeYearStart, firstInstantOfYear } from '../src/year-boundary'
import { MAX_INSTANT, MAX_YEAR, MILLIS_PER_DAY, MIN_INSTANT, MIN_YEAR } from '../src/constants'
import { InstantOutOfRangeError } from '../src/errors'

// ============================================================================
// 1. KNOWN INSTANTS
// ============================================================================

describe('yearOf', () => {
  it('places the Unix epoch in 1970', () => {
    expect(yearOf(0n)).toBe(1970)
  })

  it('places the last days of Gregorian 1969 in 1970', () => {
    expect(yearOf(BigInt(Date.UTC(1969, 11, 29)))).toBe(1970)
    expect(yearOf(BigInt(Date.UTC(1969, 11, 28, 23, 59, 59, 999)))).toBe(1969)
  })

  it('places the Gregorian Dec 31 of a leap year in its intercalary week', () => {
    expect(yearOf(BigInt(Date.UTC(2026, 11, 31, 12)))).toBe(2026)
    expect(yearOf(BigInt(Date.UTC(2027, 0, 3, 23, 59, 59, 999)))).toBe(2026)
    expect(yearOf(BigInt(Date.UTC(2027, 0, 4)))).toBe(2027)
  })

  it('places early Gregorian January days in the previous year', () => {
    expect(yearOf(BigInt(Date.UTC(2016, 0, 3)))).toBe(2015)
    expect(yearOf(BigInt(Date.UTC(2016, 0, 4)))).toBe(2016)
  })

  it('resolves years before year zero', () => {
    expect(yearOf(-62230550400000n)).toBe(-2)
    expect(yearOf(-62230550400000n - 1n)).toBe(-3)
    expect(yearOf(-62198496000000n - 1n)).toBe(-2)
  })

  it('round-trips every year boundary across three millennia', () => {
    for (let y = -1000; y < 2100; y++) {
      const start = firstInstantOfYear(y)
      expect(yearOf(start)).toBe(y)
      expect(yearOf(start - 1n)).toBe(y - 1)
    }
  })

  it('resolves the middle of every year', () => {
    for (let y = 1900; y < 2100; y++) {
      expect(yearOf(firstInstantOfYear(y) + 182n * MILLIS_PER_DAY)).toBe(y)
    }
  })
})

// ============================================================================
// 2. RANGE ENDS
// ============================================================================

describe('yearOf at the ends of the instant range', () => {
  it('resolves MIN_YEAR and MAX_YEAR boundaries', () => {
    expect(yearOf(firstInstantOfYear(MIN_YEAR))).toBe(MIN_YEAR)
    expect(yearOf(firstInstantOfYear(MAX_YEAR))).toBe(MAX_YEAR)
    expect(yearOf(computeYearStart(MAX_YEAR + 1) - 1n)).toBe(MAX_YEAR)
  })

  it('resolves the partial years beyond the supported range', () => {
    expect(yearOf(MIN_INSTANT)).toBe(MIN_YEAR - 1)
    expect(yearOf(firstInstantOfYear(MIN_YEAR) - 1n)).toBe(MIN_YEAR - 1)
    expect(yearOf(MAX_INSTANT)).toBe(MAX_YEAR + 1)
  })

  it('rejects instants outside 64 bits', () => {
    expect(() => yearOf(MIN_INSTANT - 1n)).toThrow(InstantOutOfRangeError)
    expect(() => yearOf(MAX_INSTANT + 1n)).toThrow(InstantOutOfRangeError)
  })
})
