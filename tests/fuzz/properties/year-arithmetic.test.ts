/**
 * Property tests for year arithmetic.
 *
 * Tests the invariants and laws for:
 * - withYear landing in the target year with the same time of day
 * - withYear undoing itself when no intercalary day was moved
 * - yearsBetween agreeing with withYear and being antisymmetric
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { supportedInstantGen, yearGen } from '../generators'
import { DAYS_IN_COMMON_YEAR } from '../../../src/constants'
import { hankeHenry } from '../../../src/calendar'
import { dayOfYear, millisOfDay } from '../../../src/fields'
import { isLeapYear } from '../../../src/leap-year'
import { yearOf } from '../../../src/instant-to-year'
import { withYear, yearsBetween } from '../../../src/year-arithmetic'

/** Whether moving the instant into the year keeps its day of year */
function keepsDay(instant: bigint, year: number): boolean {
  return dayOfYear(hankeHenry, instant) <= DAYS_IN_COMMON_YEAR || isLeapYear(year)
}

describe('withYear', () => {
  it('lands in the target year at the same time of day', () => {
    fc.assert(
      fc.property(supportedInstantGen(), yearGen(), (instant, year) => {
        const moved = withYear(instant, year)
        expect(yearOf(moved)).toBe(year)
        expect(millisOfDay(moved)).toBe(millisOfDay(instant))
      })
    )
  })

  it('keeps the day of year unless an intercalary day meets a common year', () => {
    fc.assert(
      fc.property(supportedInstantGen(), yearGen(), (instant, year) => {
        const moved = withYear(instant, year)
        const expected = keepsDay(instant, year) ? dayOfYear(hankeHenry, instant) : DAYS_IN_COMMON_YEAR
        expect(dayOfYear(hankeHenry, moved)).toBe(expected)
      })
    )
  })

  it('undoes itself when the day was kept', () => {
    fc.assert(
      fc.property(supportedInstantGen(), yearGen(), (instant, year) => {
        fc.pre(keepsDay(instant, year))
        expect(withYear(withYear(instant, year), yearOf(instant))).toBe(instant)
      })
    )
  })
})

describe('yearsBetween', () => {
  it('counts the years withYear moved an instant by', () => {
    fc.assert(
      fc.property(supportedInstantGen(), yearGen(), (instant, year) => {
        fc.pre(keepsDay(instant, year))
        expect(yearsBetween(withYear(instant, year), instant)).toBe(year - yearOf(instant))
      })
    )
  })

  it('is antisymmetric', () => {
    fc.assert(
      fc.property(supportedInstantGen(), supportedInstantGen(), (a, b) => {
        expect(yearsBetween(a, b)).toBe(-yearsBetween(b, a) || 0)
      })
    )
  })

  it('differs from the year difference by at most one', () => {
    fc.assert(
      fc.property(supportedInstantGen(), supportedInstantGen(), (a, b) => {
        const yearDiff = Math.abs(yearOf(a) - yearOf(b))
        const years = Math.abs(yearsBetween(a, b))
        expect(years).toBeLessThanOrEqual(yearDiff)
        expect(years).toBeGreaterThanOrEqual(Math.max(0, yearDiff - 1))
      })
    )
  })
})
